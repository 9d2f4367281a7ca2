export { MaxImageDimension } from './config';
export { IntervalImageIterator, parseBIF6 } from './decoder/iterator';
export { StreamDecoder } from './decoder/stream';
export type { BIF6Source, DecodeOptions } from './decoder/stream';
export { BIF6FormatError, BIF6IOError, FormatErrorKind } from './errors';
export { BIF6Header, BIF6Record, IntervalImage } from './models/bif6';
export type { BIF6RecordMetadata, RecordPosition } from './models/bif6';
