import {
  DecodeDepthExceededError,
  DuplicateFieldError,
  InvalidLengthError,
  MissingFieldError,
  TrailingBytesError,
  UnknownFieldError,
  UnknownVariantIndexError,
  UnsupportedOperationError,
} from "./errors";
import { Reader, type ReaderOptions } from "./reader";
import { Registry, defaultRegistry } from "./registry";
import type { EnumShape, FieldShape, Shape } from "./shape";
import { type CollectionTokens, DEFAULT_MAX_DEPTH, MAP_TOKENS, SEQ_TOKENS, Token } from "./tokens";
import type { EnumValue, StructFields, Value, VariantPayload } from "./value";

/**
 * Options for Decoder configuration.
 */
export interface DecodeOptions extends ReaderOptions {
  /** Maximum nesting depth of the shape being decoded. Default: 128 */
  maxDepth?: number;
  /** Accept input left over after the top-level value. Default: false */
  allowTrailingBytes?: boolean;
  /** Registry used to resolve `ref` shapes. Default: defaultRegistry */
  registry?: Registry;
}

/**
 * Pulls the elements of one sequence or map, one at a time.
 *
 * The caller has already consumed the start token and consumes the end token
 * once `next()` returns false.
 */
export class CollectionCursor {
  private first = true;

  constructor(
    private readonly reader: Reader,
    private readonly tokens: CollectionTokens
  ) {}

  /**
   * Positions the reader at the next element. Returns false when the end
   * token is next.
   */
  next(): boolean {
    if (this.reader.peekToken(this.tokens.end)) {
      return false;
    }
    if (!this.first) {
      this.reader.eatToken(this.tokens.separator);
    } else if (this.reader.peekToken(this.tokens.separator)) {
      // Escaped first element
      this.reader.eatToken(this.tokens.separator);
    }
    this.first = false;
    return true;
  }
}

/**
 * Decoder reads a Value from a buffer, driven by the caller's Shape.
 */
export class Decoder {
  private readonly reader: Reader;
  private readonly maxDepth: number;
  private readonly allowTrailingBytes: boolean;
  private readonly registry: Registry;
  private depth = 0;

  constructor(data: Uint8Array, options: DecodeOptions = {}) {
    this.reader = new Reader(data, options);
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.allowTrailingBytes = options.allowTrailingBytes ?? false;
    this.registry = options.registry ?? defaultRegistry;
  }

  /**
   * Returns the number of bytes consumed so far.
   */
  get position(): number {
    return this.reader.position;
  }

  /**
   * Decodes one top-level value and checks that the input is used up.
   */
  decode(shape: Shape): Value {
    const value = this.readValue(shape);
    if (!this.allowTrailingBytes && this.reader.hasMore) {
      throw new TrailingBytesError(this.reader.remaining);
    }
    return value;
  }

  /**
   * Reads one value of `shape` at the current position.
   */
  readValue(shape: Shape): Value {
    if (this.depth >= this.maxDepth) {
      throw new DecodeDepthExceededError(this.maxDepth);
    }
    this.depth++;
    try {
      return this.readInner(shape);
    } finally {
      this.depth--;
    }
  }

  private readInner(shape: Shape): Value {
    const r = this.reader;
    switch (shape.kind) {
      case "bool":
        return { kind: "bool", value: r.readBool() };
      case "i8":
        return { kind: "i8", value: r.readI8() };
      case "i16":
        return { kind: "i16", value: r.readI16() };
      case "i32":
        return { kind: "i32", value: r.readI32() };
      case "i64":
        return { kind: "i64", value: r.readI64() };
      case "u8":
        return { kind: "u8", value: r.readU8() };
      case "u16":
        return { kind: "u16", value: r.readU16() };
      case "u32":
        return { kind: "u32", value: r.readU32() };
      case "u64":
        return { kind: "u64", value: r.readU64() };
      case "f32":
        return { kind: "f32", value: r.readF32() };
      case "f64":
        return { kind: "f64", value: r.readF64() };
      case "char":
        return { kind: "char", value: r.readChar() };
      case "string":
        return { kind: "string", value: r.readString() };
      case "bytes":
        return { kind: "bytes", value: r.readByteBuffer() };
      case "unit":
        r.eatToken(Token.Unit);
        return { kind: "unit" };
      case "option":
        if (r.peekToken(Token.Unit)) {
          r.eatToken(Token.Unit);
          return { kind: "option", value: null };
        }
        r.eatToken(Token.Some);
        return { kind: "option", value: this.readValue(shape.of) };
      case "seq":
        return { kind: "seq", elements: this.readSeq(shape.of) };
      case "tuple":
        return { kind: "tuple", elements: this.readTuple(shape.elements) };
      case "map":
        return { kind: "map", entries: this.readMap(shape.key, shape.value) };
      case "struct":
        return {
          kind: "struct",
          name: shape.name,
          fields: this.readStructFields(shape.name, shape.fields),
        };
      case "enum":
        return this.readEnum(shape);
      case "ref":
        return this.readValue(this.registry.resolve(shape.name));
      case "any":
        throw new UnsupportedOperationError("decodeAny");
    }
  }

  private readSeq(of: Shape): Value[] {
    this.reader.eatToken(Token.SeqStart);
    const cursor = new CollectionCursor(this.reader, SEQ_TOKENS);
    const elements: Value[] = [];
    while (cursor.next()) {
      elements.push(this.readValue(of));
    }
    this.reader.eatToken(Token.SeqEnd);
    return elements;
  }

  private readTuple(shapes: Shape[]): Value[] {
    this.reader.eatToken(Token.SeqStart);
    const cursor = new CollectionCursor(this.reader, SEQ_TOKENS);
    const elements: Value[] = [];
    for (const shape of shapes) {
      if (!cursor.next()) {
        throw new InvalidLengthError(shapes.length, elements.length);
      }
      elements.push(this.readValue(shape));
    }
    // Extra elements surface as a missing SeqEnd
    this.reader.eatToken(Token.SeqEnd);
    return elements;
  }

  private readMap(keyShape: Shape, valueShape: Shape): Array<[Value, Value]> {
    this.reader.eatToken(Token.MapStart);
    const cursor = new CollectionCursor(this.reader, MAP_TOKENS);
    const entries: Array<[Value, Value]> = [];
    while (cursor.next()) {
      const key = this.readValue(keyShape);
      this.reader.eatToken(Token.MapKeySep);
      entries.push([key, this.readValue(valueShape)]);
    }
    this.reader.eatToken(Token.MapEnd);
    return entries;
  }

  /**
   * Reads a map of string keys into fields, returned in declaration order.
   * A missing option field reads as None.
   */
  private readStructFields(structName: string, fields: FieldShape[]): StructFields {
    this.reader.eatToken(Token.MapStart);
    const cursor = new CollectionCursor(this.reader, MAP_TOKENS);
    const seen = new Map<string, Value>();
    while (cursor.next()) {
      const name = this.reader.readString();
      const field = fields.find((f) => f.name === name);
      if (!field) {
        throw new UnknownFieldError(structName, name);
      }
      if (seen.has(name)) {
        throw new DuplicateFieldError(structName, name);
      }
      this.reader.eatToken(Token.MapKeySep);
      seen.set(name, this.readValue(field.shape));
    }
    this.reader.eatToken(Token.MapEnd);

    return fields.map((field): [string, Value] => {
      const value = seen.get(field.name);
      if (value !== undefined) {
        return [field.name, value];
      }
      if (this.resolveRefs(field.shape).kind === "option") {
        return [field.name, { kind: "option", value: null }];
      }
      throw new MissingFieldError(structName, field.name);
    });
  }

  /**
   * Follows `ref` shapes until a concrete shape is reached.
   */
  private resolveRefs(shape: Shape): Shape {
    let current = shape;
    for (let hops = 0; current.kind === "ref"; hops++) {
      if (hops >= this.maxDepth) {
        throw new DecodeDepthExceededError(this.maxDepth);
      }
      current = this.registry.resolve(current.name);
    }
    return current;
  }

  private readEnum(shape: EnumShape): EnumValue {
    this.reader.eatToken(Token.EnumMarker);
    const index = this.reader.readU32();
    const variant = shape.variants[index];
    if (variant === undefined) {
      throw new UnknownVariantIndexError(shape.name, index, shape.variants.length);
    }

    let payload: VariantPayload;
    switch (variant.kind) {
      case "unit":
        payload = { kind: "unit" };
        break;
      case "newtype":
        payload = { kind: "newtype", value: this.readValue(variant.shape) };
        break;
      case "tuple":
        payload = { kind: "tuple", elements: this.readTuple(variant.elements) };
        break;
      case "struct":
        payload = {
          kind: "struct",
          fields: this.readStructFields(`${shape.name}::${variant.name}`, variant.fields),
        };
        break;
    }

    return { kind: "enum", name: shape.name, index, variant: variant.name, payload };
  }
}
