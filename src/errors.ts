export enum FormatErrorKind {
  InvalidMagic = 'InvalidMagic',
  Truncated = 'Truncated',
  InvalidDimensions = 'InvalidDimensions',
  InvalidRange = 'InvalidRange',
}

export class BIF6IOError extends Error {
  readonly path: string | null;

  constructor(message: string, path: string | null, cause: unknown) {
    super(`${message}${path ? `: ${path}` : ''}`, { cause });
    this.name = 'BIF6IOError';
    this.path = path;
  }
}

export class BIF6FormatError extends Error {
  readonly kind: FormatErrorKind;
  /** Byte offset of the field or record that failed to decode. */
  readonly offset: number;
  /** Index of the failing record in file order, or null for the header. */
  readonly recordIndex: number | null;

  constructor(kind: FormatErrorKind, detail: string, offset: number, recordIndex: number | null) {
    const where = recordIndex === null ? 'header' : `record ${recordIndex}`;
    super(`${kind}: ${detail} (${where}, offset ${offset})`);
    this.name = 'BIF6FormatError';
    this.kind = kind;
    this.offset = offset;
    this.recordIndex = recordIndex;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
