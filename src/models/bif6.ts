import { BIF6FormatError, FormatErrorKind } from '../errors';

const MAGIC = Buffer.from([0x00, 0x00, 0x42, 0x49, 0x46, 0x36]);  // \0\0BIF6

export interface BIF6Header {
  intervalCount: number;
  width: number;
  height: number;
}

export const BIF6Header = {
  size: 12,
  match(buf: Buffer): boolean {
    return buf.length >= MAGIC.length && buf.subarray(0, MAGIC.length).equals(MAGIC);
  },
  load(buf: Buffer): BIF6Header {
    if (buf.length < BIF6Header.size) {
      throw new BIF6FormatError(
        FormatErrorKind.Truncated,
        `header needs ${BIF6Header.size} bytes, got ${buf.length}`,
        0, null,
      );
    }
    if (!BIF6Header.match(buf)) {
      throw new BIF6FormatError(
        FormatErrorKind.InvalidMagic,
        `bad signature ${buf.subarray(0, MAGIC.length).toString('hex')}`,
        0, null,
      );
    }

    return {
      intervalCount: buf.readUInt16LE(6),
      width: buf.readUInt16LE(8),
      height: buf.readUInt16LE(10),
    };
  },
};

export interface IntervalImage {
  readonly id: number;
  readonly mzLower: number;
  readonly mzMiddle: number;
  readonly mzUpper: number;
  readonly width: number;
  readonly height: number;
  /** Row-major samples, `height` rows of `width` counts. */
  readonly image: Uint32Array;
}

export const IntervalImage = {
  /** The instrument writes the total-ion-count image first, with id 0. */
  isTicImage(interval: IntervalImage): boolean {
    return interval.id === 0;
  },
  pixel(interval: IntervalImage, x: number, y: number): number {
    if (!Number.isInteger(x) || !Number.isInteger(y) ||
      x < 0 || y < 0 || x >= interval.width || y >= interval.height) {
      throw new RangeError(`pixel (${x}, ${y}) outside ${interval.width}x${interval.height} image`);
    }
    return interval.image[y * interval.width + x];
  },
  total(interval: IntervalImage): number {
    let total = 0;
    for (const count of interval.image)
      total += count;
    return total;
  },
};

export interface BIF6RecordMetadata {
  id: number;
  mzLower: number;
  mzMiddle: number;
  mzUpper: number;
}

export interface RecordPosition {
  offset: number;
  index: number;
}

export const BIF6Record = {
  metadataSize: 16,
  // BIF6 samples are uint32 counts for the whole file.
  sampleSize: 4,

  payloadSize(header: BIF6Header): number {
    return header.width * header.height * BIF6Record.sampleSize;
  },

  loadMetadata(buf: Buffer, position: RecordPosition): BIF6RecordMetadata {
    if (buf.length < BIF6Record.metadataSize) {
      throw new BIF6FormatError(
        FormatErrorKind.Truncated,
        `record metadata needs ${BIF6Record.metadataSize} bytes, got ${buf.length}`,
        position.offset, position.index,
      );
    }

    const id = buf.readUInt32LE(0);
    const mzLower = buf.readFloatLE(4);
    const mzMiddle = buf.readFloatLE(8);
    const mzUpper = buf.readFloatLE(12);
    // written so that NaN fails too
    if (!(mzLower <= mzMiddle && mzMiddle <= mzUpper)) {
      throw new BIF6FormatError(
        FormatErrorKind.InvalidRange,
        `m/z bounds out of order: ${mzLower}, ${mzMiddle}, ${mzUpper}`,
        position.offset + 4, position.index,
      );
    }

    return { id, mzLower, mzMiddle, mzUpper };
  },

  checkDimensions(header: BIF6Header, maxDimension: number, position: RecordPosition) {
    const { width, height } = header;
    if (width === 0 || height === 0 || width > maxDimension || height > maxDimension) {
      throw new BIF6FormatError(
        FormatErrorKind.InvalidDimensions,
        `image size ${width}x${height} outside 1..${maxDimension}`,
        position.offset, position.index,
      );
    }
  },

  loadImage(
    buf: Buffer,
    metadata: BIF6RecordMetadata,
    header: BIF6Header,
    position: RecordPosition,
  ): IntervalImage {
    const payloadSize = BIF6Record.payloadSize(header);
    if (buf.length < payloadSize) {
      throw new BIF6FormatError(
        FormatErrorKind.Truncated,
        `pixel data needs ${payloadSize} bytes, got ${buf.length}`,
        position.offset + BIF6Record.metadataSize, position.index,
      );
    }

    const numPix = header.width * header.height;
    const image = new Uint32Array(numPix);
    for (let i = 0; i < numPix; i++)
      image[i] = buf.readUInt32LE(i * BIF6Record.sampleSize);

    return {
      ...metadata,
      width: header.width,
      height: header.height,
      image,
    };
  },
};
