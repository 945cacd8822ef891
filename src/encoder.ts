import { EncodeDepthExceededError } from "./errors";
import { type CollectionTokens, DEFAULT_MAX_DEPTH, MAP_TOKENS, SEQ_TOKENS, Token } from "./tokens";
import type { StructFields, Value, VariantPayload } from "./value";
import { Writer, type WriterOptions } from "./writer";

/**
 * Options for Encoder configuration.
 */
export interface EncodeOptions extends WriterOptions {
  /** Maximum nesting depth of the value. Default: 128 */
  maxDepth?: number;
}

// Scratch view for computing the first byte of a float's encoding
const floatScratch = new DataView(new ArrayBuffer(8));

/**
 * Returns the first byte the encoder will emit for `value`.
 *
 * Composite kinds and strings always start with a token. Primitives start
 * with their low byte, which can be any value.
 */
export function leadingByte(value: Value): number {
  switch (value.kind) {
    case "bool":
      return value.value ? 1 : 0;
    case "i8":
    case "i16":
    case "i32":
    case "u8":
    case "u16":
    case "u32":
      return value.value & 0xff;
    case "i64":
    case "u64":
      return Number(BigInt.asUintN(8, value.value));
    case "f32":
      floatScratch.setFloat32(0, value.value, true);
      return floatScratch.getUint8(0);
    case "f64":
      floatScratch.setFloat64(0, value.value, true);
      return floatScratch.getUint8(0);
    case "char":
      return (value.value.codePointAt(0) ?? 0) & 0xff;
    case "string":
      return Token.StringDelim;
    case "bytes":
      return Token.ByteDelim;
    case "unit":
      return Token.Unit;
    case "option":
      return value.value === null ? Token.Unit : Token.Some;
    case "seq":
    case "tuple":
      return Token.SeqStart;
    case "map":
    case "struct":
      return Token.MapStart;
    case "enum":
      return Token.EnumMarker;
  }
}

/**
 * Encoder walks a Value depth-first and writes it to a Writer.
 */
export class Encoder {
  private readonly writer: Writer;
  private readonly maxDepth: number;
  private depth = 0;

  constructor(options: EncodeOptions = {}) {
    this.writer = new Writer(options);
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  /**
   * Encodes `value` into a fresh buffer. The encoder may be reused.
   */
  encode(value: Value): Uint8Array {
    this.writer.reset();
    this.writeValue(value);
    return this.writer.bytes().slice();
  }

  /**
   * Writes one value at the current position.
   */
  writeValue(value: Value): void {
    if (this.depth >= this.maxDepth) {
      throw new EncodeDepthExceededError(this.maxDepth);
    }
    this.depth++;
    try {
      this.writeInner(value);
    } finally {
      this.depth--;
    }
  }

  private writeInner(value: Value): void {
    const w = this.writer;
    switch (value.kind) {
      case "bool":
        w.writeBool(value.value);
        break;
      case "i8":
        w.writeI8(value.value);
        break;
      case "i16":
        w.writeI16(value.value);
        break;
      case "i32":
        w.writeI32(value.value);
        break;
      case "i64":
        w.writeI64(value.value);
        break;
      case "u8":
        w.writeU8(value.value);
        break;
      case "u16":
        w.writeU16(value.value);
        break;
      case "u32":
        w.writeU32(value.value);
        break;
      case "u64":
        w.writeU64(value.value);
        break;
      case "f32":
        w.writeF32(value.value);
        break;
      case "f64":
        w.writeF64(value.value);
        break;
      case "char":
        w.writeChar(value.value);
        break;
      case "string":
        w.writeString(value.value);
        break;
      case "bytes":
        w.writeByteBuffer(value.value);
        break;
      case "unit":
        w.writeToken(Token.Unit);
        break;
      case "option":
        if (value.value === null) {
          w.writeToken(Token.Unit);
        } else {
          w.writeToken(Token.Some);
          this.writeValue(value.value);
        }
        break;
      case "seq":
      case "tuple":
        this.writeSeq(value.elements);
        break;
      case "map":
        this.writeCollection(MAP_TOKENS, value.entries, ([key]) => key, ([key, entryValue]) => {
          this.writeValue(key);
          w.writeToken(Token.MapKeySep);
          this.writeValue(entryValue);
        });
        break;
      case "struct":
        this.writeStructFields(value.fields);
        break;
      case "enum":
        w.writeToken(Token.EnumMarker);
        w.writeU32(value.index);
        this.writeVariantPayload(value.payload);
        break;
    }
  }

  private writeVariantPayload(payload: VariantPayload): void {
    switch (payload.kind) {
      case "unit":
        break;
      case "newtype":
        this.writeValue(payload.value);
        break;
      case "tuple":
        this.writeSeq(payload.elements);
        break;
      case "struct":
        this.writeStructFields(payload.fields);
        break;
    }
  }

  private writeSeq(elements: Value[]): void {
    this.writeCollection(SEQ_TOKENS, elements, (element) => element, (element) => {
      this.writeValue(element);
    });
  }

  /**
   * Struct fields are map entries with string keys.
   */
  private writeStructFields(fields: StructFields): void {
    this.writeCollection(
      MAP_TOKENS,
      fields,
      () => Token.StringDelim,
      ([name, fieldValue]) => {
        this.writer.writeString(name);
        this.writer.writeToken(Token.MapKeySep);
        this.writeValue(fieldValue);
      }
    );
  }

  /**
   * Writes `start`, the items with a separator between each pair, and `end`.
   *
   * The decoder tells an empty collection apart by peeking the end token
   * right after `start`. When the first item's encoding begins with the end
   * or separator byte, one separator is written before it so that peek stays
   * unambiguous.
   */
  private writeCollection<T>(
    tokens: CollectionTokens,
    items: readonly T[],
    lead: (item: T) => Value | number,
    writeItem: (item: T) => void
  ): void {
    this.writer.writeToken(tokens.start);
    items.forEach((item, i) => {
      if (i > 0) {
        this.writer.writeToken(tokens.separator);
      } else {
        const first = lead(item);
        const byte = typeof first === "number" ? first : leadingByte(first);
        if (byte === tokens.end || byte === tokens.separator) {
          this.writer.writeToken(tokens.separator);
        }
      }
      writeItem(item);
    });
    this.writer.writeToken(tokens.end);
  }
}
