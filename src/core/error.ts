/**
 * TextsliceErrorCode defines an exported type contract.
 */
export type TextsliceErrorCode =
  | "INDEX_OUT_OF_BOUNDS"
  | "INDEX_NOT_BOUNDARY"
  | "NEGATIVE_ARGUMENT"
  | "NON_POSITIVE_ARGUMENT"
  | "NON_INTEGER_ARGUMENT"
  | "CHAR_NOT_SINGLE"
  | "TRIM_SET_IS_TEXT"
  | "PATTERN_UNSUPPORTED"
  | "PAD_ZERO_WIDTH"
  | "SUBSTITUTION_NEEDS_REGEX"
  | "SUBSTITUTION_INVALID"
  | "HEX_ODD_LENGTH"
  | "HEX_LENGTH_MISMATCH"
  | "HEX_INVALID_DIGIT"
  | "BYTES_NOT_UINT8"
  | "ASCII_INVALID"
  | "STREAM_NOT_MARKABLE"
  | "STREAM_NOT_MARKED";

/**
 * Broad failure class of a {@link TextsliceErrorCode}.
 */
export type TextsliceErrorKind = "invalid-argument" | "format" | "io";

const KIND_BY_CODE: Record<TextsliceErrorCode, TextsliceErrorKind> = {
  INDEX_OUT_OF_BOUNDS: "invalid-argument",
  INDEX_NOT_BOUNDARY: "invalid-argument",
  NEGATIVE_ARGUMENT: "invalid-argument",
  NON_POSITIVE_ARGUMENT: "invalid-argument",
  NON_INTEGER_ARGUMENT: "invalid-argument",
  CHAR_NOT_SINGLE: "invalid-argument",
  TRIM_SET_IS_TEXT: "invalid-argument",
  PATTERN_UNSUPPORTED: "invalid-argument",
  PAD_ZERO_WIDTH: "invalid-argument",
  SUBSTITUTION_NEEDS_REGEX: "invalid-argument",
  SUBSTITUTION_INVALID: "invalid-argument",
  HEX_ODD_LENGTH: "invalid-argument",
  HEX_LENGTH_MISMATCH: "invalid-argument",
  HEX_INVALID_DIGIT: "format",
  BYTES_NOT_UINT8: "invalid-argument",
  ASCII_INVALID: "format",
  STREAM_NOT_MARKABLE: "io",
  STREAM_NOT_MARKED: "io",
};

/**
 * TextsliceError provides an exported class contract.
 */
export class TextsliceError extends Error {
  readonly code: TextsliceErrorCode;
  readonly kind: TextsliceErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(code: TextsliceErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "TextsliceError";
    this.code = code;
    this.kind = KIND_BY_CODE[code];
    if (details) this.details = details;
  }
}

/**
 * Reject a count-like argument that is not an integer. `Infinity` passes only when
 * `allowInfinity` is set.
 */
export function assertInteger(name: string, value: number, allowInfinity = false): void {
  if (Number.isInteger(value) || (allowInfinity && value === Infinity)) return;
  throw new TextsliceError("NON_INTEGER_ARGUMENT", `${name} must be an integer`, {
    name,
    value,
  });
}

/**
 * Reject a count-like argument that is not an integer or lies below zero.
 */
export function assertNonNegative(name: string, value: number, allowInfinity = false): void {
  assertInteger(name, value, allowInfinity);
  if (value < 0) {
    throw new TextsliceError("NEGATIVE_ARGUMENT", `${name} must be non-negative`, {
      name,
      value,
    });
  }
}
