import { Presets, SingleBar } from 'cli-progress';
import fs from 'fs';
import { padStart } from 'lodash';
import minimist from 'minimist';
import { basename, extname, join } from 'path';
import { parseBIF6 } from '../decoder/iterator';
import { DecodeOptions } from '../decoder/stream';
import { BIF6FormatError, BIF6IOError, describeError } from '../errors';
import { BIF6Header, BIF6Record, IntervalImage } from '../models/bif6';
import { formatJson, listInputs, mkdir } from '../utils';
import { decodeOptions } from './options';

export interface ExtractedInterval {
  id: number;
  mzLower: number;
  mzMiddle: number;
  mzUpper: number;
  total: number;
  file: string;
}

export interface ExtractIndex {
  source: string;
  header: BIF6Header;
  intervals: ExtractedInterval[];
}

function writeFile(out: string, name: string, data: Buffer | string) {
  fs.writeFileSync(join(out, name), data);
}

export function rawSamples(interval: IntervalImage): Buffer {
  const buf = Buffer.alloc(interval.image.length * BIF6Record.sampleSize);
  for (let i = 0; i < interval.image.length; i++)
    buf.writeUInt32LE(interval.image[i], i * BIF6Record.sampleSize);
  return buf;
}

/** Returns false when the file was skipped because its index already exists. */
function extract(inFile: string, out: string, options: DecodeOptions, newOnly: boolean): boolean {
  const name = basename(inFile, extname(inFile));
  if (newOnly && fs.existsSync(join(out, `${name}.json`)))
    return false;

  const intervals = parseBIF6(inFile, options);
  const index: ExtractIndex = {
    source: basename(inFile),
    header: intervals.header,
    intervals: [],
  };

  for (const interval of intervals) {
    const file = `${name}_${padStart(interval.id.toString(), 4, '0')}.u32`;
    writeFile(out, file, rawSamples(interval));
    index.intervals.push({
      id: interval.id,
      mzLower: interval.mzLower,
      mzMiddle: interval.mzMiddle,
      mzUpper: interval.mzUpper,
      total: IntervalImage.total(interval),
      file,
    });
  }

  writeFile(out, `${name}.json`, formatJson(index));
  return true;
}

export async function main(args: string[]) {
  const parsedArgs = minimist(args, {
    boolean: ['help', 'new-only', 'quiet'],
    string: ['max-dimension'],
  });

  if (parsedArgs._.length !== 2 || parsedArgs.help) {
    console.log('usage: bif6-tools extract <bif6 file|directory|glob> <output directory> [--new-only] [--quiet] [--max-dimension N]');
    return Boolean(parsedArgs.help);
  }

  const options = decodeOptions(parsedArgs['max-dimension']);
  if (!options)
    return false;

  const files = listInputs(parsedArgs._[0]);
  if (files.length === 0) {
    console.error(`no BIF6 files match ${parsedArgs._[0]}`);
    return false;
  }
  const out = mkdir(parsedArgs._[1]);

  const failures: string[] = [];
  const pbar = new SingleBar({}, Presets.shades_classic);
  if (!parsedArgs.quiet) {pbar.start(files.length, 0);}
  for (const file of files) {
    try {
      extract(file, out, options, parsedArgs['new-only']);
    } catch (err) {
      if (!(err instanceof BIF6FormatError || err instanceof BIF6IOError)) {
        if (!parsedArgs.quiet) {pbar.stop();}
        throw err;
      }
      failures.push(`${file}: ${describeError(err)}`);
    }
    if (!parsedArgs.quiet) {pbar.increment();}
  }
  if (!parsedArgs.quiet) {pbar.stop();}

  for (const failure of failures)
    console.error(failure);
  return failures.length === 0;
}
