import { closeSync, openSync, readSync } from 'fs';
import { MaxImageDimension } from '../config';
import { BIF6IOError } from '../errors';
import { BIF6Header, BIF6Record, IntervalImage } from '../models/bif6';

export type BIF6Source = string | Buffer;

export interface DecodeOptions {
  /** Largest accepted width or height, defaults to `MaxImageDimension`. */
  maxDimension?: number;
}

interface ByteSource {
  readonly path: string | null;
  /** Fills `target` from the current position; returns fewer bytes only at EOF. */
  read(target: Buffer): number;
  close(): void;
}

class FileSource implements ByteSource {
  private fd: number | null;

  constructor(readonly path: string) {
    try {
      this.fd = openSync(path, 'r');
    } catch (err) {
      throw new BIF6IOError('cannot open BIF6 file', path, err);
    }
  }

  read(target: Buffer): number {
    if (this.fd === null)
      throw new BIF6IOError('read after close', this.path, undefined);

    let filled = 0;
    while (filled < target.length) {
      let n: number;
      try {
        n = readSync(this.fd, target, filled, target.length - filled, null);
      } catch (err) {
        throw new BIF6IOError('read failed', this.path, err);
      }
      if (n === 0)
        break;
      filled += n;
    }
    return filled;
  }

  close() {
    if (this.fd === null)
      return;
    const fd = this.fd;
    this.fd = null;
    try {
      closeSync(fd);
    } catch (err) {
      throw new BIF6IOError('close failed', this.path, err);
    }
  }
}

class BufferSource implements ByteSource {
  readonly path = null;
  private position = 0;

  constructor(private readonly data: Buffer) {}

  read(target: Buffer): number {
    const n = this.data.copy(target, 0, this.position, this.position + target.length);
    this.position += n;
    return n;
  }

  close() {}
}

/**
 * Forward-only cursor over one BIF6 file. The header is read once, then
 * records are decoded one at a time until EOF.
 */
export class StreamDecoder {
  private header: BIF6Header | null = null;
  private closed = false;
  private position = 0;
  private index = 0;

  private constructor(
    private readonly source: ByteSource,
    private readonly maxDimension: number,
  ) {}

  static open(source: BIF6Source, options: DecodeOptions = {}): StreamDecoder {
    const bytes = typeof source === 'string' ? new FileSource(source) : new BufferSource(source);
    return new StreamDecoder(bytes, options.maxDimension ?? MaxImageDimension);
  }

  get path(): string | null {
    return this.source.path;
  }

  /** Byte offset of the next unread byte. */
  get offset(): number {
    return this.position;
  }

  /** Index the next decoded record will have. */
  get recordIndex(): number {
    return this.index;
  }

  readHeader(): BIF6Header {
    if (this.header)
      throw new Error('BIF6 header already read');
    this.header = BIF6Header.load(this.readBytes(BIF6Header.size));
    return this.header;
  }

  /** Decodes the next record, or returns null at a clean end of file. */
  nextRecord(): IntervalImage | null {
    if (!this.header)
      throw new Error('BIF6 header must be read before records');

    const position = { offset: this.position, index: this.index };
    const meta = this.readBytes(BIF6Record.metadataSize);
    if (meta.length === 0)
      return null;

    const metadata = BIF6Record.loadMetadata(meta, position);
    BIF6Record.checkDimensions(this.header, this.maxDimension, position);
    const payload = this.readBytes(BIF6Record.payloadSize(this.header));
    const interval = BIF6Record.loadImage(payload, metadata, this.header, position);

    this.index++;
    return interval;
  }

  close() {
    if (this.closed)
      return;
    this.closed = true;
    this.source.close();
  }

  private readBytes(size: number): Buffer {
    if (this.closed)
      throw new Error('BIF6 decoder is closed');
    const buf = Buffer.alloc(size);
    const n = this.source.read(buf);
    this.position += n;
    return buf.subarray(0, n);
  }
}
