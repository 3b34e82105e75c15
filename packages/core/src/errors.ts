/**
 * Typed error classes for the resource engine.
 *
 * `ParseError`, `MissingResourceError` and `UnsupportedFormatError` describe
 * bad or incomplete input and may be handled by the caller.
 * `SchemaMismatchError` means two incompatible resources were combined; it is
 * a caller bug and is not meant to be caught.
 */

/** Base class for all resource-engine errors. */
export class ResourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResourceError';
  }
}

export type ParseErrorKind = 'UnexpectedEof' | 'BadMagic' | 'TypeMismatch';

export interface ParseErrorDetails {
  /** Field, key or structure being read when the failure happened. */
  field?: string;
  /** Logical resource path, when known. */
  path?: string;
  /** Byte offset of the failing read, when known. */
  offset?: number;
}

/** Malformed, truncated or mistyped binary data. */
export class ParseError extends ResourceError {
  readonly kind: ParseErrorKind;
  readonly field: string | undefined;
  readonly path: string | undefined;
  readonly offset: number | undefined;
  readonly detail: string;

  constructor(kind: ParseErrorKind, detail: string, details: ParseErrorDetails = {}) {
    super(formatParseMessage(kind, detail, details));
    this.name = 'ParseError';
    this.kind = kind;
    this.detail = detail;
    this.field = details.field;
    this.path = details.path;
    this.offset = details.offset;
  }

  /** Copy of this error attributed to a resource path. */
  withPath(path: string): ParseError {
    if (this.path !== undefined) return this;
    return new ParseError(this.kind, this.detail, {
      field: this.field,
      offset: this.offset,
      path,
    });
  }
}

function formatParseMessage(kind: ParseErrorKind, detail: string, details: ParseErrorDetails): string {
  let message = `${kind}: ${detail}`;
  if (details.field !== undefined) message += ` (field "${details.field}")`;
  if (details.offset !== undefined) message += ` at offset ${details.offset}`;
  if (details.path !== undefined) message += ` in "${details.path}"`;
  return message;
}

/** Diff or merge invoked on resources of incompatible declared types. */
export class SchemaMismatchError extends ResourceError {
  constructor(
    public readonly operation: string,
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(`Cannot ${operation} incompatible resources: ${expected} and ${actual}`);
    this.name = 'SchemaMismatchError';
  }
}

/** An archive entry or lookup referenced a resource that is not available. */
export class MissingResourceError extends ResourceError {
  constructor(
    public readonly canonical: string,
    public readonly entryPath?: string,
  ) {
    super(
      entryPath === undefined
        ? `Missing resource "${canonical}"`
        : `Missing resource "${canonical}" for archive entry "${entryPath}"`,
    );
    this.name = 'MissingResourceError';
  }
}

/** Bytes that match no known schema, archive or fallback format. */
export class UnsupportedFormatError extends ResourceError {
  constructor(
    public readonly path: string,
    public readonly magic: string,
  ) {
    super(`Unsupported resource format for "${path}" (header "${magic}")`);
    this.name = 'UnsupportedFormatError';
  }
}
