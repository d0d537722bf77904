// packages/options-core/src/errors.ts

export type SchemeOptionsErrorCode =
  | "INVALID_BOOLEAN"
  | "INVALID_DURATION"
  | "INVALID_SIGNING_KEY";

/**
 * Base error for configuration that cannot be materialized into options.
 * No HTTP semantics here; the hosting layer decides how fatal this is.
 */
export class SchemeOptionsError extends Error {
  code: SchemeOptionsErrorCode;

  constructor(code: SchemeOptionsErrorCode, message: string) {
    super(message);
    this.name = "SchemeOptionsError";
    this.code = code;
  }
}

/**
 * A non-empty scalar value that does not parse as its field's type.
 */
export class FieldFormatError extends SchemeOptionsError {
  /** The raw string that failed to parse. */
  readonly raw: string;

  constructor(code: "INVALID_BOOLEAN" | "INVALID_DURATION", raw: string, message: string) {
    super(code, message);
    this.name = "FieldFormatError";
    this.raw = raw;
  }
}

/**
 * A signing key value that is present but not valid base64.
 */
export class KeyDecodeError extends SchemeOptionsError {
  readonly issuer?: string;

  constructor(message: string, issuer?: string) {
    super("INVALID_SIGNING_KEY", message);
    this.name = "KeyDecodeError";
    this.issuer = issuer;
  }
}
