/**
 * Error taxonomy for vCard parsing and generation.
 *
 * Every failure is thrown as a subclass of {@link VcardError} so callers can
 * catch the whole family or narrow on the kind.
 */

/** Where in the input an error was detected */
export interface ErrorLocation {
  /** Content line number (1-based, counted after unfolding) */
  line?: number;
  /** Character offset within the content line */
  offset?: number;
}

/** Base class of every error raised by this library */
export class VcardError extends Error {
  readonly line?: number;
  readonly offset?: number;

  constructor(
    message: string,
    public readonly property?: string,
    location: ErrorLocation = {},
  ) {
    super(message);
    this.name = 'VcardError';
    if (location.line !== undefined) this.line = location.line;
    if (location.offset !== undefined) this.offset = location.offset;
  }
}

/** Malformed token: bad escape sequence or unterminated quoted string */
export class LexError extends VcardError {
  constructor(message: string, location: ErrorLocation = {}) {
    super(message, undefined, location);
    this.name = 'LexError';
  }
}

export type ParseErrorCode =
  | 'UnexpectedToken'
  | 'MissingColon'
  | 'EmptyName'
  | 'MalformedParameter'
  | 'UnexpectedEnd';

/** Grammar violation at the content line, parameter or block level */
export class ParseError extends VcardError {
  constructor(
    public readonly code: ParseErrorCode,
    message: string,
    property?: string,
    location: ErrorLocation = {},
  ) {
    super(message, property, location);
    this.name = 'ParseError';
  }
}

/** CHARSET parameter with a value other than UTF-8 */
export class CharsetError extends VcardError {
  constructor(
    public readonly charset: string,
    property?: string,
    location: ErrorLocation = {},
  ) {
    super(`Unsupported CHARSET "${charset}"${property ? ` on ${property}` : ''}; only UTF-8 is accepted`, property, location);
    this.name = 'CharsetError';
  }
}

/** A value that does not match the grammar of its type */
export class ValueError extends VcardError {
  constructor(
    message: string,
    property?: string,
    public readonly fragment?: string,
    location: ErrorLocation = {},
  ) {
    super(message, property, location);
    this.name = 'ValueError';
  }
}

/** Cardinality or mandatory-property violation found in a complete vCard */
export class ValidationError extends VcardError {
  constructor(
    message: string,
    property: string,
    public readonly rule: string,
  ) {
    super(message, property);
    this.name = 'ValidationError';
  }
}
