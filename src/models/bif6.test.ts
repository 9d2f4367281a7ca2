import { describe, expect, it } from 'vitest';
import { BIF6FormatError, FormatErrorKind } from '../errors';
import { encodeBIF6, sampleFile } from '../test-helpers';
import { BIF6Header, BIF6Record, IntervalImage } from './bif6';

function metadataBuffer(id: number, lower: number, middle: number, upper: number): Buffer {
  const buf = Buffer.alloc(16);
  buf.writeUInt32LE(id, 0);
  buf.writeFloatLE(lower, 4);
  buf.writeFloatLE(middle, 8);
  buf.writeFloatLE(upper, 12);
  return buf;
}

function catchFormatError(fn: () => unknown): BIF6FormatError {
  try {
    fn();
  } catch (err) {
    if (err instanceof BIF6FormatError)
      return err;
    throw err;
  }
  throw new Error('expected a BIF6FormatError');
}

const header: BIF6Header = { intervalCount: 1, width: 3, height: 2 };
const position = { offset: 52, index: 1 };

describe('BIF6Header', () => {
  it('reads the interval count and image size', () => {
    expect(BIF6Header.load(sampleFile())).toEqual({ intervalCount: 3, width: 3, height: 2 });
  });

  it('matches only the BIF6 signature', () => {
    expect(BIF6Header.match(sampleFile())).toBe(true);
    expect(BIF6Header.match(Buffer.from('\0\0BIF5'))).toBe(false);
    expect(BIF6Header.match(Buffer.from('\0\0BI'))).toBe(false);
  });

  it('rejects a short header as truncated', () => {
    const err = catchFormatError(() => BIF6Header.load(sampleFile().subarray(0, 11)));
    expect(err.kind).toBe(FormatErrorKind.Truncated);
    expect(err.offset).toBe(0);
    expect(err.recordIndex).toBeNull();
  });

  it('rejects a wrong signature', () => {
    const buf = encodeBIF6({ width: 1, height: 1, magic: Buffer.from('\0\0BIF5') }, []);
    const err = catchFormatError(() => BIF6Header.load(buf));
    expect(err.kind).toBe(FormatErrorKind.InvalidMagic);
    expect(err.message).toBe('InvalidMagic: bad signature 000042494635 (header, offset 0)');
  });
});

describe('BIF6Record', () => {
  it('sizes the pixel payload from the header', () => {
    expect(BIF6Record.payloadSize(header)).toBe(24);
  });

  it('decodes the id and m/z band', () => {
    expect(BIF6Record.loadMetadata(metadataBuffer(42, 12.5, 13, 13.5), position)).toEqual({
      id: 42, mzLower: 12.5, mzMiddle: 13, mzUpper: 13.5,
    });
  });

  it('accepts a band with equal bounds', () => {
    const metadata = BIF6Record.loadMetadata(metadataBuffer(0, 0, 0, 0), position);
    expect(metadata.mzLower).toBe(0);
    expect(metadata.mzUpper).toBe(0);
  });

  it('rejects bounds out of order without reordering them', () => {
    const err = catchFormatError(() => BIF6Record.loadMetadata(metadataBuffer(1, 14, 13, 15), position));
    expect(err.kind).toBe(FormatErrorKind.InvalidRange);
    expect(err.offset).toBe(56);
    expect(err.recordIndex).toBe(1);
  });

  it('rejects NaN bounds', () => {
    const err = catchFormatError(() => BIF6Record.loadMetadata(metadataBuffer(1, 1, NaN, 2), position));
    expect(err.kind).toBe(FormatErrorKind.InvalidRange);
  });

  it('rejects short metadata', () => {
    const err = catchFormatError(() => BIF6Record.loadMetadata(Buffer.alloc(15), position));
    expect(err.kind).toBe(FormatErrorKind.Truncated);
    expect(err.offset).toBe(52);
    expect(err.message).toBe('Truncated: record metadata needs 16 bytes, got 15 (record 1, offset 52)');
  });

  it('bounds the image dimensions', () => {
    expect(() => BIF6Record.checkDimensions(header, 3, position)).not.toThrow();
    const tooWide = catchFormatError(() => BIF6Record.checkDimensions(header, 2, position));
    expect(tooWide.kind).toBe(FormatErrorKind.InvalidDimensions);
    const empty = catchFormatError(() =>
      BIF6Record.checkDimensions({ intervalCount: 0, width: 0, height: 2 }, 8192, position));
    expect(empty.kind).toBe(FormatErrorKind.InvalidDimensions);
    expect(empty.offset).toBe(52);
  });

  it('decodes samples row-major', () => {
    const payload = Buffer.alloc(24);
    [1, 2, 3, 4, 5, 4294967295].forEach((sample, i) => payload.writeUInt32LE(sample, i * 4));
    const metadata = { id: 5, mzLower: 1, mzMiddle: 2, mzUpper: 3 };
    const interval = BIF6Record.loadImage(payload, metadata, header, position);

    expect(interval.width).toBe(3);
    expect(interval.height).toBe(2);
    expect(Array.from(interval.image)).toEqual([1, 2, 3, 4, 5, 4294967295]);
    expect(IntervalImage.pixel(interval, 2, 0)).toBe(3);
    expect(IntervalImage.pixel(interval, 0, 1)).toBe(4);
  });

  it('rejects a short pixel payload', () => {
    const metadata = { id: 5, mzLower: 1, mzMiddle: 2, mzUpper: 3 };
    const err = catchFormatError(() => BIF6Record.loadImage(Buffer.alloc(20), metadata, header, position));
    expect(err.kind).toBe(FormatErrorKind.Truncated);
    expect(err.offset).toBe(68);
  });
});

describe('IntervalImage', () => {
  const interval: IntervalImage = {
    id: 0, mzLower: 0, mzMiddle: 0, mzUpper: 0,
    width: 2, height: 2,
    image: Uint32Array.from([1, 2, 3, 4]),
  };

  it('recognizes the TIC image by id', () => {
    expect(IntervalImage.isTicImage(interval)).toBe(true);
    expect(IntervalImage.isTicImage({ ...interval, id: 1 })).toBe(false);
  });

  it('sums all counts', () => {
    expect(IntervalImage.total(interval)).toBe(10);
  });

  it('refuses pixels outside the image', () => {
    expect(() => IntervalImage.pixel(interval, 2, 0)).toThrow(RangeError);
    expect(() => IntervalImage.pixel(interval, 0, -1)).toThrow(RangeError);
  });
});
