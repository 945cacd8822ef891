import { Token, hex, tokenName } from "./tokens";

/**
 * Base error class for spanwire errors.
 */
export class SpanwireError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SpanwireError";
  }
}

/**
 * Error thrown when encoding fails.
 */
export class EncodeError extends SpanwireError {
  constructor(message: string) {
    super(message);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when decoding fails.
 */
export class DecodeError extends SpanwireError {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when a number does not fit the primitive it is encoded as.
 */
export class ValueOutOfRangeError extends EncodeError {
  constructor(kind: string, value: number | bigint) {
    super(`Value out of range for ${kind}: ${value}`);
    this.name = "ValueOutOfRangeError";
  }
}

/**
 * Error thrown when a string cannot be encoded as UTF-8 without loss, or a
 * char value is not exactly one Unicode scalar.
 */
export class InvalidStringError extends EncodeError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidStringError";
  }
}

/**
 * Error thrown when the input ends before a read completes.
 */
export class UnexpectedEndError extends DecodeError {
  readonly needed: number;
  readonly available: number;

  constructor(needed: number, available: number) {
    super(`Unexpected end of input: needed ${needed} bytes, only ${available} available`);
    this.name = "UnexpectedEndError";
    this.needed = needed;
    this.available = available;
  }
}

/**
 * Error thrown when a structural token is required but another byte is found.
 */
export class ExpectedTokenError extends DecodeError {
  readonly expected: Token;
  readonly actual: number;
  readonly offset: number;

  constructor(expected: Token, actual: number, offset: number) {
    super(`Expected token ${tokenName(expected)} at offset ${offset}, got 0x${hex(actual)}`);
    this.name = "ExpectedTokenError";
    this.expected = expected;
    this.actual = actual;
    this.offset = offset;
  }
}

/**
 * Error thrown when string payload bytes are not valid UTF-8.
 */
export class InvalidUtf8Error extends DecodeError {
  constructor(offset: number) {
    super(`Invalid UTF-8 in string at offset ${offset}`);
    this.name = "InvalidUtf8Error";
  }
}

/**
 * Error thrown when a decoded u32 is not a Unicode scalar value.
 */
export class InvalidCharCodeError extends DecodeError {
  readonly code: number;

  constructor(code: number) {
    super(`Invalid char code: 0x${code.toString(16)}`);
    this.name = "InvalidCharCodeError";
    this.code = code;
  }
}

/**
 * Error thrown when a bool byte is neither 0 nor 1.
 */
export class InvalidBoolError extends DecodeError {
  constructor(byte: number) {
    super(`Invalid bool byte: 0x${hex(byte)}`);
    this.name = "InvalidBoolError";
  }
}

/**
 * Error thrown when an enum ordinal is outside the target's variant list.
 */
export class UnknownVariantIndexError extends DecodeError {
  readonly index: number;

  constructor(enumName: string, index: number, variantCount: number) {
    super(`Unknown variant index ${index} for enum ${enumName} (${variantCount} variants)`);
    this.name = "UnknownVariantIndexError";
    this.index = index;
  }
}

/**
 * Error thrown for calls that need a self-describing format.
 */
export class UnsupportedOperationError extends DecodeError {
  constructor(operation: string) {
    super(`Calls to ${operation} are not supported: decoding requires a known shape`);
    this.name = "UnsupportedOperationError";
  }
}

/**
 * Error thrown when a struct field is missing from the input.
 */
export class MissingFieldError extends DecodeError {
  constructor(structName: string, field: string) {
    super(`Missing field ${field} in struct ${structName}`);
    this.name = "MissingFieldError";
  }
}

/**
 * Error thrown when the input holds a field the struct does not declare.
 */
export class UnknownFieldError extends DecodeError {
  constructor(structName: string, field: string) {
    super(`Unknown field ${field} in struct ${structName}`);
    this.name = "UnknownFieldError";
  }
}

/**
 * Error thrown when a struct field appears twice.
 */
export class DuplicateFieldError extends DecodeError {
  constructor(structName: string, field: string) {
    super(`Duplicate field ${field} in struct ${structName}`);
    this.name = "DuplicateFieldError";
  }
}

/**
 * Error thrown when a tuple holds a different number of elements than its shape.
 */
export class InvalidLengthError extends DecodeError {
  constructor(expected: number, actual: number) {
    super(`Invalid length: expected ${expected} elements, got ${actual}`);
    this.name = "InvalidLengthError";
  }
}

/**
 * Error thrown when input remains after the top-level value.
 */
export class TrailingBytesError extends DecodeError {
  constructor(remaining: number) {
    super(`${remaining} trailing bytes after value`);
    this.name = "TrailingBytesError";
  }
}

/**
 * Error thrown when a declared string or bytes length exceeds the limit.
 */
export class LengthLimitExceededError extends DecodeError {
  constructor(length: bigint, max: number) {
    super(`Length ${length} exceeds maximum ${max}`);
    this.name = "LengthLimitExceededError";
  }
}

/**
 * Error thrown when nesting goes deeper than the configured limit.
 * Raised as EncodeError by the encoder and DecodeError by the decoder.
 */
export class EncodeDepthExceededError extends EncodeError {
  constructor(max: number) {
    super(`Nesting depth exceeds maximum ${max}`);
    this.name = "EncodeDepthExceededError";
  }
}

export class DecodeDepthExceededError extends DecodeError {
  constructor(max: number) {
    super(`Nesting depth exceeds maximum ${max}`);
    this.name = "DecodeDepthExceededError";
  }
}

/**
 * Error thrown when a shape reference is not registered.
 */
export class ShapeNotRegisteredError extends SpanwireError {
  constructor(name: string) {
    super(`Shape not registered: ${name}`);
    this.name = "ShapeNotRegisteredError";
  }
}
