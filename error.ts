/**
 * The closed set of failure kinds raised by the value types
 */
export type ErrorKind =
  | "InvalidCast"
  | "InvalidOperation"
  | "FormatError"
  | "Overflow"
  | "NullArgument"
  | "InvalidArgument";

/**
 * An error raised while building, converting or parsing a value
 */
export class TemporalError extends Error {
  /**
   * What went wrong, so callers can tell an out-of-range value apart from
   * an unrecognizable one
   */
  public kind: ErrorKind;

  /**
   * Create a new TemporalError
   */
  constructor(kind: ErrorKind, message: string, cause?: unknown) {
    super(message, { cause });
    this.kind = kind;
    this.name = "TemporalError";
  }
}

/**
 * A wire level error, raised when a value on the wire doesn't match what its
 * codec declares
 */
export class ProtocolError extends Error {
  /**
   * Create a new ProtocolError
   */
  constructor(message: string) {
    super(message);
    this.name = "ProtocolError";
  }
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: TemporalError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T>(
  kind: ErrorKind,
  message: string,
  cause?: unknown,
): Result<T> {
  return { ok: false, error: new TemporalError(kind, message, cause) };
}

/**
 * Returns the value of a successful result or throws its error
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
