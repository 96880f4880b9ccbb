/**
 * Base error class for binvalue errors.
 */
export class BinvalueError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BinvalueError";
  }
}

// Byte-level codec errors. These are raised by the writer, reader and
// binary codec only; the facade wraps them in a BinaryCodecError.

/**
 * Error thrown when binary encoding fails.
 */
export class EncodeError extends BinvalueError {
  constructor(message: string) {
    super(message);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when binary decoding fails.
 */
export class DecodeError extends BinvalueError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when buffer is exhausted during decoding.
 */
export class BufferUnderflowError extends DecodeError {
  constructor(needed: number, available: number) {
    super(`Buffer underflow: needed ${needed} bytes, only ${available} available`);
    this.name = "BufferUnderflowError";
  }
}

/**
 * Error thrown when an unassigned value tag is encountered.
 */
export class InvalidTagError extends DecodeError {
  constructor(readonly tag: number) {
    super(`Invalid value tag: ${tag}`);
    this.name = "InvalidTagError";
  }
}

// Mapping errors. Every failure of toValue/fromValue/toBytes/fromBytes is one
// of the classes below.

/**
 * Discriminant carried by every mapping error.
 */
export type ValueErrorKind =
  | "binary"
  | "custom"
  | "expected"
  | "duplicated"
  | "missing"
  | "unknown"
  | "eof"
  | "depth";

/**
 * Wraps a failure of the binary codec. The cause is not inspected.
 */
export class BinaryCodecError extends BinvalueError {
  readonly kind = "binary";

  constructor(cause: unknown) {
    super(`binary codec error: ${describeCodecFailure(cause)}`, { cause });
    this.name = "BinaryCodecError";
  }
}

/**
 * Domain error reported by a shape descriptor.
 */
export class CustomError extends BinvalueError {
  readonly kind = "custom";

  constructor(readonly detail: string) {
    super(`custom error: ${detail}`);
    this.name = "CustomError";
  }
}

/**
 * Shape or type mismatch. Both sides are human-readable descriptions.
 */
export class ExpectedError extends BinvalueError {
  readonly kind = "expected";

  constructor(
    readonly expected: string,
    readonly found: string
  ) {
    super(`expected ${expected}, found ${found}`);
    this.name = "ExpectedError";
  }
}

/**
 * A struct saw the same field twice.
 */
export class DuplicatedFieldError extends BinvalueError {
  readonly kind = "duplicated";

  constructor(readonly field: string) {
    super(`field ${field} was duplicated`);
    this.name = "DuplicatedFieldError";
  }
}

/**
 * A struct required a field the input did not contain.
 */
export class MissingFieldError extends BinvalueError {
  readonly kind = "missing";

  constructor(readonly field: string) {
    super(`field ${field} was missing`);
    this.name = "MissingFieldError";
  }
}

/**
 * An unrecognized field or enum variant name.
 */
export class UnknownError extends BinvalueError {
  readonly kind = "unknown";

  constructor(readonly identifier: string) {
    super(`field or variant ${identifier} was unknown`);
    this.name = "UnknownError";
  }
}

/**
 * A value was required but none was available.
 */
export class EofError extends BinvalueError {
  readonly kind = "eof";

  constructor() {
    super("unexpected eof");
    this.name = "EofError";
  }
}

/**
 * Nesting went deeper than the configured maximum.
 */
export class DepthLimitError extends BinvalueError {
  readonly kind = "depth";

  constructor(readonly limit: number) {
    super(`nesting depth exceeds the limit of ${limit}`);
    this.name = "DepthLimitError";
  }
}

/**
 * The closed set of errors raised by the mapping engine.
 */
export type ValueError =
  | BinaryCodecError
  | CustomError
  | ExpectedError
  | DuplicatedFieldError
  | MissingFieldError
  | UnknownError
  | EofError
  | DepthLimitError;

/**
 * Returns true if the error belongs to the mapping error taxonomy.
 */
export function isValueError(error: unknown): error is ValueError {
  return (
    error instanceof BinaryCodecError ||
    error instanceof CustomError ||
    error instanceof ExpectedError ||
    error instanceof DuplicatedFieldError ||
    error instanceof MissingFieldError ||
    error instanceof UnknownError ||
    error instanceof EofError ||
    error instanceof DepthLimitError
  );
}

function describeCodecFailure(cause: unknown): string {
  if (cause instanceof EncodeError) {
    return `encode: ${cause.message}`;
  }
  if (cause instanceof DecodeError) {
    return `decode: ${cause.message}`;
  }
  return cause instanceof Error ? cause.message : String(cause);
}
