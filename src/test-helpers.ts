import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

export interface FixtureInterval {
  id: number;
  mz: [number, number, number];
  samples: number[];
}

export interface FixtureOptions {
  width: number;
  height: number;
  intervalCount?: number;
  magic?: Buffer;
}

export const BIF6_MAGIC = Buffer.from([0x00, 0x00, 0x42, 0x49, 0x46, 0x36]);

/** Writes a BIF6 file image; test-only, the library has no encode path. */
export function encodeBIF6(options: FixtureOptions, intervals: FixtureInterval[]): Buffer {
  const header = Buffer.alloc(12);
  (options.magic ?? BIF6_MAGIC).copy(header, 0, 0, 6);
  header.writeUInt16LE(options.intervalCount ?? intervals.length, 6);
  header.writeUInt16LE(options.width, 8);
  header.writeUInt16LE(options.height, 10);

  const records = intervals.map((interval) => {
    const buf = Buffer.alloc(16 + interval.samples.length * 4);
    buf.writeUInt32LE(interval.id, 0);
    buf.writeFloatLE(interval.mz[0], 4);
    buf.writeFloatLE(interval.mz[1], 8);
    buf.writeFloatLE(interval.mz[2], 12);
    interval.samples.forEach((sample, i) => buf.writeUInt32LE(sample, 16 + i * 4));
    return buf;
  });

  return Buffer.concat([header, ...records]);
}

/** Three 3x2 intervals; the first is the TIC image. */
export const sampleIntervals: FixtureInterval[] = [
  { id: 0, mz: [0, 0, 0], samples: [10, 20, 30, 40, 50, 60] },
  { id: 3, mz: [12.5, 13, 13.5], samples: [1, 0, 2, 0, 3, 0] },
  { id: 7, mz: [27.75, 28, 28.25], samples: [0, 0, 0, 4294967295, 5, 6] },
];

export function sampleFile(): Buffer {
  return encodeBIF6({ width: 3, height: 2 }, sampleIntervals);
}

export async function withTempDir<T>(fn: (dir: string) => T | Promise<T>): Promise<T> {
  const dir = mkdtempSync(join(tmpdir(), 'bif6-'));
  try {
    return await fn(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

export function writeTempFile(dir: string, name: string, data: Buffer): string {
  const path = join(dir, name);
  writeFileSync(path, data);
  return path;
}
