/**
 * spanwire - token-delimited binary encoding for structured data
 *
 * Values are written depth-first with one-byte structural tokens framing
 * sequences, maps, enums and options. The stream carries no type tags, so
 * decoding always needs the shape of the expected value.
 *
 * @example
 * ```typescript
 * import { encode, decode, v, s } from 'spanwire';
 *
 * const bytes = encode(v.struct("Human", { name: v.string("Ayush"), age: v.u8(19) }));
 * const human = decode(bytes, s.struct("Human", { name: s.string(), age: s.u8() }));
 * ```
 */

// Tokens and limits
export {
  Token,
  tokenName,
  isToken,
  isScalarValue,
  consoleTrace,
  SEQ_TOKENS,
  MAP_TOKENS,
  DEFAULT_MAX_DEPTH,
  MaxUint8,
  MaxUint16,
  MaxUint32,
  MaxUint64,
  MinInt8,
  MaxInt8,
  MinInt16,
  MaxInt16,
  MinInt32,
  MaxInt32,
  MinInt64,
  MaxInt64,
  MaxCodePoint,
} from "./tokens";
export type { TraceEvent, TraceSink, CollectionTokens } from "./tokens";

// Errors
export {
  SpanwireError,
  EncodeError,
  DecodeError,
  ValueOutOfRangeError,
  InvalidStringError,
  UnexpectedEndError,
  ExpectedTokenError,
  InvalidUtf8Error,
  InvalidCharCodeError,
  InvalidBoolError,
  UnknownVariantIndexError,
  UnsupportedOperationError,
  MissingFieldError,
  UnknownFieldError,
  DuplicateFieldError,
  InvalidLengthError,
  TrailingBytesError,
  LengthLimitExceededError,
  EncodeDepthExceededError,
  DecodeDepthExceededError,
  ShapeNotRegisteredError,
} from "./errors";

// Value and shape models
export { v } from "./value";
export type {
  Value,
  StructValue,
  EnumValue,
  StructFields,
  VariantPayload,
  IntKind,
  FloatKind,
  BigIntKind,
  NumberKind,
} from "./value";
export { s } from "./shape";
export type { Shape, StructShape, EnumShape, VariantShape, FieldShape, PrimitiveKind } from "./shape";

// Writer / Reader
export { Writer } from "./writer";
export type { WriterOptions } from "./writer";
export { Reader, DEFAULT_MAX_LENGTH } from "./reader";
export type { ReaderOptions } from "./reader";

// Encoder / Decoder
import { Encoder, type EncodeOptions } from "./encoder";
import { Decoder, type DecodeOptions } from "./decoder";
export { Encoder, leadingByte } from "./encoder";
export type { EncodeOptions } from "./encoder";
export { Decoder, CollectionCursor } from "./decoder";
export type { DecodeOptions } from "./decoder";

// Registry
export { Registry, defaultRegistry, define } from "./registry";

import type { Shape } from "./shape";
import type { Value } from "./value";

/**
 * Library version.
 */
export const VERSION = "0.3.0";

/**
 * Encodes a value. Throws an EncodeError subclass on failure.
 */
export function encode(value: Value, options?: EncodeOptions): Uint8Array {
  return new Encoder(options).encode(value);
}

/**
 * Decodes a value of the given shape. Throws a DecodeError subclass on
 * failure. The format is not self-describing, so there is no shapeless
 * variant of this call.
 */
export function decode(data: Uint8Array, shape: Shape, options?: DecodeOptions): Value {
  return new Decoder(data, options).decode(shape);
}

/**
 * Marshal encodes an application value through a conversion to Value.
 */
export function marshal<T>(value: T, toValue: (value: T) => Value, options?: EncodeOptions): Uint8Array {
  return encode(toValue(value), options);
}

/**
 * Unmarshal decodes bytes of `shape` and converts the result with `fromValue`.
 */
export function unmarshal<T>(
  data: Uint8Array,
  shape: Shape,
  fromValue: (value: Value) => T,
  options?: DecodeOptions
): T {
  return fromValue(decode(data, shape, options));
}
