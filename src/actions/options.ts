import { DecodeOptions } from '../decoder/stream';

/** Reads `--max-dimension`; null when the value is not a positive integer. */
export function decodeOptions(maxDimension: unknown): DecodeOptions | null {
  if (maxDimension === undefined)
    return {};
  const value = Number(maxDimension);
  if (maxDimension === '' || !Number.isInteger(value) || value <= 0) {
    console.error(`invalid --max-dimension: ${String(maxDimension)}`);
    return null;
  }
  return { maxDimension: value };
}
