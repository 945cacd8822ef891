/**
 * Structural tokens used in the spanwire encoding format.
 *
 * Every token is a single byte written at a byte boundary. The decoder only
 * looks for a token where the grammar expects one, so payload bytes may take
 * any value.
 */
export enum Token {
  /** Unit value, unit struct, and `None` */
  Unit = 0x02,
  /** Opens a sequence or tuple */
  SeqStart = 0x03,
  /** Separates sequence elements */
  SeqValueSep = 0x04,
  /** Opens a map or struct */
  MapStart = 0x05,
  /** Sits between a map key and its value */
  MapKeySep = 0x06,
  /** Separates map entries */
  MapValueSep = 0x07,
  /** Precedes the payload of `Some` */
  Some = 0x81,
  /** Closes a sequence or tuple */
  SeqEnd = 0x83,
  /** Closes a map or struct */
  MapEnd = 0x85,
  /** Opens a length-prefixed UTF-8 string */
  StringDelim = 0x86,
  /** Opens a length-prefixed byte buffer */
  ByteDelim = 0x87,
  /** Opens an enum variant (followed by its u32 ordinal) */
  EnumMarker = 0x88,
}

const TOKEN_NAMES: ReadonlyMap<number, string> = new Map([
  [Token.Unit, "Unit"],
  [Token.SeqStart, "SeqStart"],
  [Token.SeqValueSep, "SeqValueSep"],
  [Token.MapStart, "MapStart"],
  [Token.MapKeySep, "MapKeySep"],
  [Token.MapValueSep, "MapValueSep"],
  [Token.Some, "Some"],
  [Token.SeqEnd, "SeqEnd"],
  [Token.MapEnd, "MapEnd"],
  [Token.StringDelim, "StringDelim"],
  [Token.ByteDelim, "ByteDelim"],
  [Token.EnumMarker, "EnumMarker"],
]);

/**
 * Returns the display name of a token.
 */
export function tokenName(token: Token): string {
  return TOKEN_NAMES.get(token) ?? `0x${hex(token)}`;
}

/**
 * Returns true if the byte is one of the token values.
 */
export function isToken(byte: number): boolean {
  return TOKEN_NAMES.has(byte);
}

/**
 * Formats a byte as two hex digits.
 */
export function hex(byte: number): string {
  return byte.toString(16).padStart(2, "0");
}

/**
 * Frame tokens of a collection: the opening and closing bytes and the
 * separator written between elements (entries, for maps).
 */
export interface CollectionTokens {
  start: Token;
  end: Token;
  separator: Token;
}

export const SEQ_TOKENS: CollectionTokens = {
  start: Token.SeqStart,
  end: Token.SeqEnd,
  separator: Token.SeqValueSep,
};

export const MAP_TOKENS: CollectionTokens = {
  start: Token.MapStart,
  end: Token.MapEnd,
  separator: Token.MapValueSep,
};

/**
 * Integer bounds for the fixed-width primitives.
 */
export const MaxUint8 = 0xff;
export const MaxUint16 = 0xffff;
export const MaxUint32 = 0xffffffff;
export const MaxUint64 = BigInt("0xffffffffffffffff");
export const MinInt8 = -0x80;
export const MaxInt8 = 0x7f;
export const MinInt16 = -0x8000;
export const MaxInt16 = 0x7fff;
export const MinInt32 = -0x80000000;
export const MaxInt32 = 0x7fffffff;
export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1

/** Default maximum nesting depth for encode and decode. */
export const DEFAULT_MAX_DEPTH = 128;

/**
 * Largest Unicode scalar value.
 */
export const MaxCodePoint = 0x10ffff;

/**
 * Returns true if the code point is a Unicode scalar value (in range and not a
 * surrogate).
 */
export function isScalarValue(codePoint: number): boolean {
  return (
    Number.isInteger(codePoint) &&
    codePoint >= 0 &&
    codePoint <= MaxCodePoint &&
    (codePoint < 0xd800 || codePoint > 0xdfff)
  );
}

/**
 * Observability hook invoked at token boundaries.
 */
export interface TraceEvent {
  direction: "write" | "read";
  token: Token;
  /** Byte offset of the token in the buffer */
  offset: number;
}

export type TraceSink = (event: TraceEvent) => void;

/**
 * Returns a trace sink that logs one line per token with console.debug.
 */
export function consoleTrace(prefix: string = "spanwire"): TraceSink {
  return (event) => {
    console.debug(
      `${prefix}: ${event.direction} ${tokenName(event.token)} @ ${event.offset}`
    );
  };
}
