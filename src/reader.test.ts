import { describe, it, expect } from 'vitest';
import { Reader } from './reader';
import { Writer } from './writer';
import {
  ExpectedTokenError,
  InvalidBoolError,
  InvalidCharCodeError,
  InvalidUtf8Error,
  LengthLimitExceededError,
  UnexpectedEndError,
} from './errors';
import { Token, type TraceEvent } from './tokens';

describe('Reader', () => {
  describe('primitives', () => {
    it('reads what the writer wrote', () => {
      const writer = new Writer();
      writer.writeBool(true);
      writer.writeI8(-128);
      writer.writeI16(-300);
      writer.writeI32(-70000);
      writer.writeI64(-9223372036854775808n);
      writer.writeU8(255);
      writer.writeU16(65535);
      writer.writeU32(4294967295);
      writer.writeU64(18446744073709551615n);
      writer.writeF32(1.5);
      writer.writeF64(2.718281828459045);
      writer.writeChar('λ');

      const reader = new Reader(writer.bytes());
      expect(reader.readBool()).toBe(true);
      expect(reader.readI8()).toBe(-128);
      expect(reader.readI16()).toBe(-300);
      expect(reader.readI32()).toBe(-70000);
      expect(reader.readI64()).toBe(-9223372036854775808n);
      expect(reader.readU8()).toBe(255);
      expect(reader.readU16()).toBe(65535);
      expect(reader.readU32()).toBe(4294967295);
      expect(reader.readU64()).toBe(18446744073709551615n);
      expect(reader.readF32()).toBe(1.5);
      expect(reader.readF64()).toBe(2.718281828459045);
      expect(reader.readChar()).toBe('λ');
      expect(reader.hasMore).toBe(false);
    });

    it('rounds f32 to single precision', () => {
      const writer = new Writer();
      writer.writeF32(3.14159);
      expect(new Reader(writer.bytes()).readF32()).toBe(Math.fround(3.14159));
    });

    it('reads from a view with a byte offset', () => {
      const backing = new Uint8Array([0xaa, 0x34, 0x12, 0xbb]);
      const reader = new Reader(backing.subarray(1, 3));
      expect(reader.readU16()).toBe(0x1234);
      expect(reader.hasMore).toBe(false);
    });

    it('fails on a truncated fixed-width read', () => {
      const reader = new Reader(new Uint8Array([0x34]));
      expect(() => reader.readU16()).toThrow(UnexpectedEndError);
      expect(() => reader.readU16()).toThrow(
        'Unexpected end of input: needed 2 bytes, only 1 available'
      );
    });

    it('rejects bool bytes other than 0 and 1', () => {
      const reader = new Reader(new Uint8Array([2]));
      expect(() => reader.readBool()).toThrow(InvalidBoolError);
    });

    it('rejects surrogate char codes', () => {
      const reader = new Reader(new Uint8Array([0x00, 0xd8, 0x00, 0x00]));
      expect(() => reader.readChar()).toThrow(InvalidCharCodeError);
    });

    it('rejects char codes above 0x10ffff', () => {
      const reader = new Reader(new Uint8Array([0x00, 0x00, 0x11, 0x00]));
      expect(() => reader.readChar()).toThrow('Invalid char code: 0x110000');
    });
  });

  describe('tokens', () => {
    it('peeks without consuming', () => {
      const reader = new Reader(new Uint8Array([Token.SeqStart]));
      expect(reader.peekToken(Token.SeqStart)).toBe(true);
      expect(reader.peekToken(Token.MapStart)).toBe(false);
      expect(reader.position).toBe(0);
    });

    it('peeks false at end of input', () => {
      const reader = new Reader(new Uint8Array([]));
      expect(reader.peekToken(Token.SeqEnd)).toBe(false);
    });

    it('eats the expected token', () => {
      const reader = new Reader(new Uint8Array([Token.Unit]));
      reader.eatToken(Token.Unit);
      expect(reader.position).toBe(1);
    });

    it('reports the token it expected and the byte it found', () => {
      const reader = new Reader(new Uint8Array([0x00, 0x04]));
      reader.readByte();
      expect(() => reader.eatToken(Token.SeqEnd)).toThrow(ExpectedTokenError);
      expect(() => reader.eatToken(Token.SeqEnd)).toThrow(
        'Expected token SeqEnd at offset 1, got 0x04'
      );
      expect(reader.position).toBe(1);
    });

    it('fails to eat at end of input', () => {
      const reader = new Reader(new Uint8Array([]));
      expect(() => reader.eatToken(Token.MapEnd)).toThrow(UnexpectedEndError);
    });

    it('traces consumed tokens', () => {
      const events: TraceEvent[] = [];
      const reader = new Reader(new Uint8Array([0x05, 0x85]), { trace: (e) => events.push(e) });
      reader.eatToken(Token.MapStart);
      reader.peekToken(Token.MapEnd);
      reader.eatToken(Token.MapEnd);
      expect(events).toEqual([
        { direction: 'read', token: Token.MapStart, offset: 0 },
        { direction: 'read', token: Token.MapEnd, offset: 1 },
      ]);
    });
  });

  describe('string', () => {
    it('reads a length-prefixed string', () => {
      const reader = new Reader(
        new Uint8Array([0x86, 2, 0, 0, 0, 0, 0, 0, 0, 0x68, 0x69])
      );
      expect(reader.readString()).toBe('hi');
      expect(reader.hasMore).toBe(false);
    });

    it('keeps a leading byte order mark', () => {
      const writer = new Writer();
      writer.writeString('\ufeffa');
      expect(new Reader(writer.bytes()).readString()).toBe('\ufeffa');
    });

    it('rejects invalid UTF-8', () => {
      const reader = new Reader(new Uint8Array([0x86, 1, 0, 0, 0, 0, 0, 0, 0, 0xff]));
      expect(() => reader.readString()).toThrow(InvalidUtf8Error);
      expect(() => new Reader(new Uint8Array([0x86, 1, 0, 0, 0, 0, 0, 0, 0, 0xff])).readString())
        .toThrow('Invalid UTF-8 in string at offset 9');
    });

    it('fails when the length runs past the input', () => {
      const reader = new Reader(new Uint8Array([0x86, 5, 0, 0, 0, 0, 0, 0, 0, 0x61]));
      expect(() => reader.readString()).toThrow(
        'Unexpected end of input: needed 5 bytes, only 1 available'
      );
    });

    it('enforces maxLength', () => {
      const reader = new Reader(
        new Uint8Array([0x86, 3, 0, 0, 0, 0, 0, 0, 0, 0x61, 0x62, 0x63]),
        { maxLength: 2 }
      );
      expect(() => reader.readString()).toThrow(LengthLimitExceededError);
    });

    it('requires the string delimiter', () => {
      const reader = new Reader(new Uint8Array([0x87, 0, 0, 0, 0, 0, 0, 0, 0]));
      expect(() => reader.readString()).toThrow(ExpectedTokenError);
    });
  });

  describe('byte buffer', () => {
    it('returns a view into the input', () => {
      const data = new Uint8Array([0x87, 2, 0, 0, 0, 0, 0, 0, 0, 0xde, 0xad]);
      const bytes = new Reader(data).readByteBuffer();
      expect(bytes).toEqual(new Uint8Array([0xde, 0xad]));
      expect(bytes.buffer).toBe(data.buffer);
      expect(bytes.byteOffset).toBe(9);
    });

    it('accepts an unbounded maxLength', () => {
      const data = new Uint8Array([0x87, 2, 0, 0, 0, 0, 0, 0, 0, 0xde, 0xad]);
      expect(new Reader(data, { maxLength: Infinity }).readByteBuffer()).toEqual(
        new Uint8Array([0xde, 0xad])
      );
      const huge = new Uint8Array([0x87, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]);
      expect(() => new Reader(huge, { maxLength: Infinity }).readByteBuffer()).toThrow(
        UnexpectedEndError
      );
    });

    it('rejects a declared length above maxLength', () => {
      const data = new Uint8Array([0x87, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]);
      expect(() => new Reader(data).readByteBuffer()).toThrow(LengthLimitExceededError);
    });
  });
});
