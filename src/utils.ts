import { existsSync, lstatSync, readdirSync } from 'fs';
import { globSync } from 'glob';
import { mkdirpSync } from 'mkdirp';
import { extname, join } from 'path';
import { Bif6FileExtension } from './config';

export function formatJson(value: unknown): string {
  return JSON.stringify(value, undefined, 4);
}

export function mkdir(...parts: string[]) {
  const dir = join(...parts);
  if (!existsSync(dir))
    mkdirpSync(dir);
  return dir;
}

/** Expands a file, a directory of .bif6 files or a glob into sorted paths. */
export function listInputs(input: string): string[] {
  if (existsSync(input) && lstatSync(input).isDirectory()) {
    return readdirSync(input)
      .filter((file) => extname(file).toLowerCase() === Bif6FileExtension)
      .sort()
      .map((file) => join(input, file));
  }
  return globSync(input).sort();
}

export function formatMz(value: number): string {
  return value.toFixed(4);
}
