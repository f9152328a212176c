/**
 * TOON codec errors. Decode failures carry the 1-based line they were found on.
 */

type ErrorOptions = { line?: number; cause?: unknown };

export type DecodeErrorCode =
  | "EMPTY_DOCUMENT"
  | "UNTERMINATED_STRING"
  | "INVALID_ESCAPE"
  | "TRAILING_CHARACTERS"
  | "MISSING_COLON"
  | "MISSING_KEY"
  | "UNEXPECTED_INDENT"
  | "EXPECTED_LIST_ITEM"
  | "UNEXPECTED_CONTENT"
  | "TAB_INDENT"
  | "INDENT_MULTIPLE"
  | "LENGTH_MISMATCH"
  | "ROW_WIDTH_MISMATCH";

export class ToonError extends Error {
  override readonly name: string = "ToonError";
  readonly line?: number;

  constructor(message: string, options?: ErrorOptions) {
    super(message);
    this.line = options?.line;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, ToonError.prototype);
  }

  /** Human-readable location string */
  get location(): string {
    return this.line !== undefined ? `line ${this.line}` : "";
  }

  override toString(): string {
    const loc = this.location;
    return loc && !this.message.startsWith("Line ")
      ? `${this.name}: ${this.message} (${loc})`
      : `${this.name}: ${this.message}`;
  }
}

export class ToonDecodeError extends ToonError {
  override readonly name = "ToonDecodeError";
  readonly code: DecodeErrorCode;
  readonly reason: string;

  constructor(reason: string, options: ErrorOptions & { code: DecodeErrorCode }) {
    super(options.line !== undefined ? `Line ${options.line}: ${reason}` : reason, options);
    this.code = options.code;
    this.reason = reason;
    Object.setPrototypeOf(this, ToonDecodeError.prototype);
  }
}

export class ToonOptionsError extends ToonError {
  override readonly name = "ToonOptionsError";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, ToonOptionsError.prototype);
  }
}
