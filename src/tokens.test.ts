import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  Token,
  tokenName,
  isToken,
  isScalarValue,
  consoleTrace,
  SEQ_TOKENS,
  MAP_TOKENS,
} from './tokens';

describe('Token', () => {
  it('uses distinct byte values', () => {
    const values = Object.values(Token).filter((x): x is number => typeof x === 'number');
    expect(values).toHaveLength(12);
    expect(new Set(values).size).toBe(12);
  });

  it('names tokens', () => {
    expect(tokenName(Token.SeqStart)).toBe('SeqStart');
    expect(tokenName(Token.MapValueSep)).toBe('MapValueSep');
    expect(tokenName(Token.EnumMarker)).toBe('EnumMarker');
  });

  it('recognizes token bytes', () => {
    expect(isToken(0x83)).toBe(true);
    expect(isToken(0x02)).toBe(true);
    expect(isToken(0x00)).toBe(false);
    expect(isToken(0xff)).toBe(false);
  });

  it('pairs collection tokens', () => {
    expect(SEQ_TOKENS).toEqual({ start: 0x03, end: 0x83, separator: 0x04 });
    expect(MAP_TOKENS).toEqual({ start: 0x05, end: 0x85, separator: 0x07 });
  });
});

describe('isScalarValue', () => {
  it('accepts scalar values', () => {
    for (const cp of [0, 0x41, 0xd7ff, 0xe000, 0xffff, 0x1f600, 0x10ffff]) {
      expect(isScalarValue(cp)).toBe(true);
    }
  });

  it('rejects surrogates and out of range values', () => {
    for (const cp of [-1, 0xd800, 0xdbff, 0xdc00, 0xdfff, 0x110000, 1.5]) {
      expect(isScalarValue(cp)).toBe(false);
    }
  });
});

describe('consoleTrace', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs one line per event', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const sink = consoleTrace();
    sink({ direction: 'write', token: Token.MapEnd, offset: 7 });
    sink({ direction: 'read', token: Token.Unit, offset: 0 });

    expect(debug).toHaveBeenCalledTimes(2);
    expect(debug).toHaveBeenNthCalledWith(1, 'spanwire: write MapEnd @ 7');
    expect(debug).toHaveBeenNthCalledWith(2, 'spanwire: read Unit @ 0');
  });

  it('uses the given prefix', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    consoleTrace('codec')({ direction: 'read', token: Token.Some, offset: 3 });
    expect(debug).toHaveBeenCalledWith('codec: read Some @ 3');
  });
});
