import { BIF6Header, IntervalImage } from '../models/bif6';
import { BIF6Source, DecodeOptions, StreamDecoder } from './stream';

/**
 * Lazy, forward-only view of the records in one BIF6 file.
 *
 * The underlying file is closed when the records run out, when decoding
 * fails, or when the caller stops early (`break` in `for...of`, or
 * `close()`). After any of those the iterator stays done; iterating again
 * means calling `parseBIF6` again.
 */
export class IntervalImageIterator implements IterableIterator<IntervalImage> {
  private pending: IntervalImage | null = null;
  private done = false;

  constructor(
    private readonly decoder: StreamDecoder,
    readonly header: BIF6Header,
  ) {}

  [Symbol.iterator](): IntervalImageIterator {
    return this;
  }

  hasNext(): boolean {
    if (this.pending)
      return true;
    if (this.done)
      return false;
    this.pending = this.pull();
    return this.pending !== null;
  }

  next(): IteratorResult<IntervalImage> {
    if (!this.hasNext() || !this.pending)
      return { done: true, value: undefined };
    const value = this.pending;
    this.pending = null;
    return { done: false, value };
  }

  return(): IteratorResult<IntervalImage> {
    this.close();
    return { done: true, value: undefined };
  }

  close() {
    this.pending = null;
    if (this.done)
      return;
    this.done = true;
    this.decoder.close();
  }

  private pull(): IntervalImage | null {
    let interval: IntervalImage | null;
    try {
      interval = this.decoder.nextRecord();
    } catch (err) {
      this.close();
      throw err;
    }
    if (!interval)
      this.close();
    return interval;
  }
}

export function parseBIF6(source: BIF6Source, options: DecodeOptions = {}): IntervalImageIterator {
  const decoder = StreamDecoder.open(source, options);
  let header: BIF6Header;
  try {
    header = decoder.readHeader();
  } catch (err) {
    decoder.close();
    throw err;
  }
  return new IntervalImageIterator(decoder, header);
}
