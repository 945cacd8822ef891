import { InvalidStringError, ValueOutOfRangeError } from "./errors";
import {
  Token,
  type TraceSink,
  isScalarValue,
  MaxInt16,
  MaxInt32,
  MaxInt64,
  MaxInt8,
  MaxUint16,
  MaxUint32,
  MaxUint64,
  MaxUint8,
  MinInt16,
  MinInt32,
  MinInt64,
  MinInt8,
} from "./tokens";

const INITIAL_CAPACITY = 256;
const GROWTH_FACTOR = 2;

// Module-level singleton to avoid repeated instantiation
const textEncoder = new TextEncoder();

const LONE_SURROGATE = /\p{Cs}/u;

/**
 * Options for Writer configuration.
 */
export interface WriterOptions {
  /** Initial buffer capacity. Default: 256 */
  initialCapacity?: number;
  /** Called for every token written */
  trace?: TraceSink;
}

/**
 * Writer appends spanwire tokens and fixed-width primitives to a growable
 * buffer. All multi-byte values are little-endian.
 */
export class Writer {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;
  private readonly trace: TraceSink | undefined;

  constructor(options: WriterOptions = {}) {
    this.buffer = new Uint8Array(Math.max(1, options.initialCapacity ?? INITIAL_CAPACITY));
    this.view = new DataView(this.buffer.buffer);
    this.pos = 0;
    this.trace = options.trace;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Resets the writer for reuse.
   */
  reset(): void {
    this.pos = 0;
  }

  /**
   * Ensures the buffer has room for `needed` more bytes.
   */
  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }

    let newCapacity = this.buffer.length * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer.subarray(0, this.pos));
    this.buffer = newBuffer;
    this.view = new DataView(this.buffer.buffer);
  }

  /**
   * Writes a structural token.
   */
  writeToken(token: Token): void {
    this.trace?.({ direction: "write", token, offset: this.pos });
    this.writeByte(token);
  }

  /**
   * Writes a raw byte.
   */
  writeByte(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.pos++] = value & 0xff;
  }

  /**
   * Writes raw bytes with no framing.
   */
  writeRaw(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.pos);
    this.pos += data.length;
  }

  /**
   * Writes a boolean as a single 0 or 1 byte.
   */
  writeBool(value: boolean): void {
    this.writeByte(value ? 1 : 0);
  }

  writeI8(value: number): void {
    checkInt("i8", value, MinInt8, MaxInt8);
    this.ensureCapacity(1);
    this.view.setInt8(this.pos, value);
    this.pos += 1;
  }

  writeI16(value: number): void {
    checkInt("i16", value, MinInt16, MaxInt16);
    this.ensureCapacity(2);
    this.view.setInt16(this.pos, value, true);
    this.pos += 2;
  }

  writeI32(value: number): void {
    checkInt("i32", value, MinInt32, MaxInt32);
    this.ensureCapacity(4);
    this.view.setInt32(this.pos, value, true);
    this.pos += 4;
  }

  writeI64(value: bigint): void {
    checkBigInt("i64", value, MinInt64, MaxInt64);
    this.ensureCapacity(8);
    this.view.setBigInt64(this.pos, value, true);
    this.pos += 8;
  }

  writeU8(value: number): void {
    checkInt("u8", value, 0, MaxUint8);
    this.writeByte(value);
  }

  writeU16(value: number): void {
    checkInt("u16", value, 0, MaxUint16);
    this.ensureCapacity(2);
    this.view.setUint16(this.pos, value, true);
    this.pos += 2;
  }

  writeU32(value: number): void {
    checkInt("u32", value, 0, MaxUint32);
    this.ensureCapacity(4);
    this.view.setUint32(this.pos, value, true);
    this.pos += 4;
  }

  writeU64(value: bigint): void {
    checkBigInt("u64", value, 0n, MaxUint64);
    this.ensureCapacity(8);
    this.view.setBigUint64(this.pos, value, true);
    this.pos += 8;
  }

  /**
   * Writes a 32-bit float (IEEE 754). The value is rounded to single precision.
   */
  writeF32(value: number): void {
    this.ensureCapacity(4);
    this.view.setFloat32(this.pos, value, true);
    this.pos += 4;
  }

  /**
   * Writes a 64-bit float (IEEE 754).
   */
  writeF64(value: number): void {
    this.ensureCapacity(8);
    this.view.setFloat64(this.pos, value, true);
    this.pos += 8;
  }

  /**
   * Writes a char as the u32 of its code point. `value` must hold exactly one
   * Unicode scalar.
   */
  writeChar(value: string): void {
    const codePoint = value.codePointAt(0);
    if (
      codePoint === undefined ||
      !isScalarValue(codePoint) ||
      value.length !== (codePoint > 0xffff ? 2 : 1)
    ) {
      throw new InvalidStringError(`char must be exactly one Unicode scalar value: ${JSON.stringify(value)}`);
    }
    this.writeU32(codePoint);
  }

  /**
   * Writes a string: StringDelim, u64 byte length, UTF-8 bytes.
   */
  writeString(value: string): void {
    if (LONE_SURROGATE.test(value)) {
      throw new InvalidStringError("string contains a lone surrogate and is not valid UTF-16");
    }
    const bytes = textEncoder.encode(value);
    this.writeToken(Token.StringDelim);
    this.writeU64(BigInt(bytes.length));
    this.writeRaw(bytes);
  }

  /**
   * Writes a byte buffer: ByteDelim, u64 length, raw bytes.
   */
  writeByteBuffer(data: Uint8Array): void {
    this.writeToken(Token.ByteDelim);
    this.writeU64(BigInt(data.length));
    this.writeRaw(data);
  }
}

function checkInt(kind: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ValueOutOfRangeError(kind, value);
  }
}

function checkBigInt(kind: string, value: bigint, min: bigint, max: bigint): void {
  if (value < min || value > max) {
    throw new ValueOutOfRangeError(kind, value);
  }
}
