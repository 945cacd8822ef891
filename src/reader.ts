import {
  ExpectedTokenError,
  InvalidBoolError,
  InvalidCharCodeError,
  InvalidUtf8Error,
  LengthLimitExceededError,
  UnexpectedEndError,
} from "./errors";
import { Token, type TraceSink, isScalarValue } from "./tokens";

/** Default maximum string or bytes length (64 MB). */
export const DEFAULT_MAX_LENGTH = 64 * 1024 * 1024;

// Module-level singleton to avoid repeated instantiation
const textDecoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Options for Reader configuration.
 */
export interface ReaderOptions {
  /** Maximum declared string or bytes length. Default: 64 MB */
  maxLength?: number;
  /** Called for every token consumed */
  trace?: TraceSink;
}

/**
 * Reader consumes spanwire data from a buffer through a forward-only cursor.
 * The buffer is never copied; strings and byte buffers are read from
 * sub-views of it.
 */
export class Reader {
  private readonly buffer: Uint8Array;
  private readonly view: DataView;
  private pos: number;
  private readonly end: number;
  private readonly maxLength: number;
  private readonly trace: TraceSink | undefined;

  constructor(data: Uint8Array, options: ReaderOptions = {}) {
    this.buffer = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.pos = 0;
    this.end = data.length;
    this.maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH;
    this.trace = options.trace;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.end - this.pos;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.end;
  }

  /**
   * Checks if there are enough bytes available.
   */
  private checkAvailable(needed: number): void {
    if (this.pos + needed > this.end) {
      throw new UnexpectedEndError(needed, this.remaining);
    }
  }

  /**
   * Returns the next byte without consuming it, or undefined at end of input.
   */
  peekByte(): number | undefined {
    return this.pos < this.end ? this.buffer[this.pos] : undefined;
  }

  /**
   * Returns true if the next byte is `token`. Consumes nothing.
   */
  peekToken(token: Token): boolean {
    return this.peekByte() === token;
  }

  /**
   * Consumes `token` or throws if the next byte is something else.
   */
  eatToken(token: Token): void {
    this.checkAvailable(1);
    const actual = this.buffer[this.pos];
    if (actual !== token) {
      throw new ExpectedTokenError(token, actual, this.pos);
    }
    this.trace?.({ direction: "read", token, offset: this.pos });
    this.pos++;
  }

  /**
   * Reads a raw byte.
   */
  readByte(): number {
    this.checkAvailable(1);
    return this.buffer[this.pos++];
  }

  /**
   * Reads `length` raw bytes as a view into the input.
   */
  readRaw(length: number): Uint8Array {
    this.checkAvailable(length);
    const bytes = this.buffer.subarray(this.pos, this.pos + length);
    this.pos += length;
    return bytes;
  }

  /**
   * Reads a boolean. Only 0 and 1 are accepted.
   */
  readBool(): boolean {
    const byte = this.readByte();
    if (byte > 1) {
      throw new InvalidBoolError(byte);
    }
    return byte === 1;
  }

  readI8(): number {
    this.checkAvailable(1);
    const value = this.view.getInt8(this.pos);
    this.pos += 1;
    return value;
  }

  readI16(): number {
    this.checkAvailable(2);
    const value = this.view.getInt16(this.pos, true);
    this.pos += 2;
    return value;
  }

  readI32(): number {
    this.checkAvailable(4);
    const value = this.view.getInt32(this.pos, true);
    this.pos += 4;
    return value;
  }

  readI64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigInt64(this.pos, true);
    this.pos += 8;
    return value;
  }

  readU8(): number {
    return this.readByte();
  }

  readU16(): number {
    this.checkAvailable(2);
    const value = this.view.getUint16(this.pos, true);
    this.pos += 2;
    return value;
  }

  readU32(): number {
    this.checkAvailable(4);
    const value = this.view.getUint32(this.pos, true);
    this.pos += 4;
    return value;
  }

  readU64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigUint64(this.pos, true);
    this.pos += 8;
    return value;
  }

  /**
   * Reads a 32-bit float (IEEE 754).
   */
  readF32(): number {
    this.checkAvailable(4);
    const value = this.view.getFloat32(this.pos, true);
    this.pos += 4;
    return value;
  }

  /**
   * Reads a 64-bit float (IEEE 754).
   */
  readF64(): number {
    this.checkAvailable(8);
    const value = this.view.getFloat64(this.pos, true);
    this.pos += 8;
    return value;
  }

  /**
   * Reads a char stored as the u32 of its code point.
   */
  readChar(): string {
    const code = this.readU32();
    if (!isScalarValue(code)) {
      throw new InvalidCharCodeError(code);
    }
    return String.fromCodePoint(code);
  }

  /**
   * Reads a string: StringDelim, u64 byte length, UTF-8 bytes.
   */
  readString(): string {
    this.eatToken(Token.StringDelim);
    const length = this.readLength();
    const start = this.pos;
    const bytes = this.readRaw(length);
    try {
      return textDecoder.decode(bytes);
    } catch (err) {
      if (err instanceof TypeError) {
        throw new InvalidUtf8Error(start);
      }
      throw err;
    }
  }

  /**
   * Reads a byte buffer: ByteDelim, u64 length, raw bytes.
   * The result is a view into the input.
   */
  readByteBuffer(): Uint8Array {
    this.eatToken(Token.ByteDelim);
    return this.readRaw(this.readLength());
  }

  /**
   * Reads a u64 length prefix and checks it against the limit and the input.
   */
  private readLength(): number {
    const length = this.readU64();
    // Compared as numbers so maxLength may be Infinity
    const n = Number(length);
    if (n > this.maxLength) {
      throw new LengthLimitExceededError(length, this.maxLength);
    }
    this.checkAvailable(n);
    return n;
  }
}
