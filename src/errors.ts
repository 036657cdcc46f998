import type { ValueType } from "./types";

/**
 * Base error class for stillwire errors.
 */
export class StillwireError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StillwireError";
  }
}

/**
 * Error thrown when encoding fails.
 */
export class EncodeError extends StillwireError {
  constructor(message: string) {
    super(message);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when decoding fails.
 */
export class DecodeError extends StillwireError {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when a sequence is serialized without a known length.
 */
export class UnknownSeqLengthError extends EncodeError {
  constructor() {
    super("sequences of unknown length are not allowed");
    this.name = "UnknownSeqLengthError";
  }
}

/**
 * Error thrown when a map is serialized without a known length.
 */
export class UnknownMapLengthError extends EncodeError {
  constructor() {
    super("maps of unknown length are not allowed");
    this.name = "UnknownMapLengthError";
  }
}

/**
 * Error thrown when a variant index does not fit in the one-byte tag.
 */
export class TooManyVariantsError extends EncodeError {
  readonly enumName: string;
  readonly variantIndex: number;

  constructor(enumName: string, variantIndex: number) {
    super(`enum \`${enumName}\` has more than 256 variants (variant index ${variantIndex})`);
    this.name = "TooManyVariantsError";
    this.enumName = enumName;
    this.variantIndex = variantIndex;
  }
}

/**
 * Error thrown when a struct asks the encoder to leave out a field.
 */
export class FieldSkippingNotAllowedError extends EncodeError {
  readonly field: string;

  constructor(field: string) {
    super(`field \`${field}\` cannot be skipped`);
    this.name = "FieldSkippingNotAllowedError";
    this.field = field;
  }
}

/**
 * Error thrown when the input ends before a value is complete.
 */
export class EndOfStreamError extends DecodeError {
  constructor(message: string = "a byte reader reached the end of the stream prematurely") {
    super(message);
    this.name = "EndOfStreamError";
  }
}

/**
 * Error thrown when an in-memory buffer is exhausted during decoding.
 */
export class BufferUnderflowError extends EndOfStreamError {
  constructor(needed: number, available: number) {
    super(`Buffer underflow: needed ${needed} bytes, only ${available} available`);
    this.name = "BufferUnderflowError";
  }
}

/**
 * Error thrown when a byte sequence is not a valid encoding of the requested type.
 */
export class InvalidBytesError extends DecodeError {
  readonly valueType: ValueType;
  readonly bytes: Uint8Array;

  constructor(valueType: ValueType, bytes: Uint8Array) {
    super(
      `invalid byte sequence while decoding value of type \`${valueType}\`: [${Array.from(bytes).join(", ")}]`
    );
    this.name = "InvalidBytesError";
    this.valueType = valueType;
    this.bytes = bytes;
  }
}

/**
 * Error thrown when text payloads are not valid UTF-8.
 */
export class Utf8Error extends DecodeError {
  constructor(cause: unknown) {
    super(`UTF-8 decode error: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "Utf8Error";
    this.cause = cause;
  }
}

/**
 * Decode requests the format carries no metadata for.
 */
export type UnsupportedOperation = "deserializeAny" | "deserializeIdentifier" | "deserializeIgnoredAny";

/**
 * Error thrown for self-describing, identifier and ignored-value decode requests.
 */
export class UnsupportedOperationError extends DecodeError {
  readonly operation: UnsupportedOperation;

  constructor(operation: UnsupportedOperation) {
    super(`\`${operation}\` is not allowed`);
    this.name = "UnsupportedOperationError";
    this.operation = operation;
  }
}

/**
 * Error thrown when a framed length exceeds the configured limit.
 */
export class LengthLimitExceededError extends DecodeError {
  readonly length: number;
  readonly limit: number;

  constructor(length: number, limit: number) {
    super(`Length ${length} exceeds maximum ${limit}`);
    this.name = "LengthLimitExceededError";
    this.length = length;
    this.limit = limit;
  }
}

/**
 * Error thrown when the underlying sink or stream fails.
 */
export class IoError extends StillwireError {
  constructor(cause: unknown) {
    super(`I/O error: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "IoError";
  }
}

/**
 * Error raised by the traversal framework itself, such as a shape mismatch.
 */
export class CustomError extends StillwireError {
  constructor(message: string) {
    super(message);
    this.name = "CustomError";
  }
}

/**
 * Error thrown when a type is not registered.
 */
export class TypeNotRegisteredError extends StillwireError {
  constructor(typeName: string) {
    super(`Type not registered: ${typeName}`);
    this.name = "TypeNotRegisteredError";
  }
}
