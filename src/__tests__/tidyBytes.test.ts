/**
 * Tests for encoding repair
 */

import { describe, expect, it } from 'vitest';
import {
  REPLACEMENT_CHARACTER,
  decodeCp1252Byte,
  readUtf8Sequence,
  tidyBytes,
  tidyString,
  tidyUtf8Bytes,
} from '../core/encoding/index.js';

function bytes(...values: number[]): Uint8Array {
  return Uint8Array.from(values);
}

/** Deterministic byte noise (LCG) */
function noise(seed: number, length: number): Uint8Array {
  const out = new Uint8Array(length);
  let state = seed;
  for (let i = 0; i < length; i++) {
    state = (state * 1103515245 + 12345) % 2147483648;
    out[i] = state & 0xff;
  }
  return out;
}

function isWellFormed(text: string): boolean {
  return !/[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/.test(text);
}

describe('decodeCp1252Byte', () => {
  it('should decode Latin-1 bytes to the same codepoint', () => {
    expect(decodeCp1252Byte(0xe9)).toBe('é');
    expect(decodeCp1252Byte(0xa0)).toBe('\u00a0');
    expect(decodeCp1252Byte(0xff)).toBe('ÿ');
  });

  it('should decode CP1252 extensions', () => {
    expect(decodeCp1252Byte(0x80)).toBe('€');
    expect(decodeCp1252Byte(0x93)).toBe('“');
    expect(decodeCp1252Byte(0x9f)).toBe('Ÿ');
  });

  it('should substitute undefined CP1252 bytes', () => {
    for (const byte of [0x81, 0x8d, 0x8f, 0x90, 0x9d]) {
      expect(decodeCp1252Byte(byte)).toBe(REPLACEMENT_CHARACTER);
    }
  });
});

describe('readUtf8Sequence', () => {
  it('should read sequences of every length', () => {
    expect(readUtf8Sequence(bytes(0x41), 0)).toEqual({ code: 0x41, length: 1 });
    expect(readUtf8Sequence(bytes(0xc3, 0xa9), 0)).toEqual({ code: 0xe9, length: 2 });
    expect(readUtf8Sequence(bytes(0xe2, 0x82, 0xac), 0)).toEqual({ code: 0x20ac, length: 3 });
    expect(readUtf8Sequence(bytes(0xf0, 0x9f, 0x8e, 0x89), 0)).toEqual({ code: 0x1f389, length: 4 });
  });

  it('should reject overlong forms, surrogates and out-of-range codepoints', () => {
    expect(readUtf8Sequence(bytes(0xc0, 0xaf), 0)).toBeNull();
    expect(readUtf8Sequence(bytes(0xe0, 0x80, 0xaf), 0)).toBeNull();
    expect(readUtf8Sequence(bytes(0xed, 0xa0, 0x80), 0)).toBeNull();
    expect(readUtf8Sequence(bytes(0xf4, 0x90, 0x80, 0x80), 0)).toBeNull();
  });

  it('should reject truncated sequences and stray continuation bytes', () => {
    expect(readUtf8Sequence(bytes(0xe2, 0x82), 0)).toBeNull();
    expect(readUtf8Sequence(bytes(0xa9), 0)).toBeNull();
  });
});

describe('tidyUtf8Bytes', () => {
  it('should leave valid UTF-8 untouched', () => {
    const text = 'Łódź, 日本, 🎉';
    expect(tidyUtf8Bytes(new TextEncoder().encode(text))).toBe(text);
  });

  it('should decode Latin-1 text', () => {
    expect(tidyUtf8Bytes(bytes(0x4d, 0xfc, 0x6c, 0x6c, 0x65, 0x72))).toBe('Müller');
  });

  it('should decode Windows-1252 punctuation', () => {
    expect(tidyUtf8Bytes(bytes(0x93, 0x68, 0x69, 0x94))).toBe('“hi”');
  });

  it('should repair byte by byte in mixed input', () => {
    // UTF-8 "é" followed by a Latin-1 "é"
    expect(tidyUtf8Bytes(bytes(0xc3, 0xa9, 0xe9))).toBe('éé');
  });

  it('should decode each byte of a broken sequence on its own', () => {
    expect(tidyUtf8Bytes(bytes(0xe2, 0x82))).toBe('â‚');
    expect(tidyUtf8Bytes(bytes(0xc0, 0xaf))).toBe('À¯');
    expect(tidyUtf8Bytes(bytes(0xed, 0xa0, 0x80))).toBe('\u00ed\u00a0\u20ac');
  });

  it('should substitute undefined bytes', () => {
    expect(tidyUtf8Bytes(bytes(0x61, 0x81, 0x62))).toBe(`a${REPLACEMENT_CHARACTER}b`);
  });

  it('should return an empty string for no input', () => {
    expect(tidyUtf8Bytes(new Uint8Array(0))).toBe('');
  });

  it('should produce text that round-trips through UTF-8 for arbitrary bytes', () => {
    for (const seed of [1, 7, 42, 1234, 99991]) {
      const text = tidyUtf8Bytes(noise(seed, 512));
      expect(isWellFormed(text)).toBe(true);
      expect(Buffer.from(text, 'utf-8').toString('utf-8')).toBe(text);
    }
  });
});

describe('tidyString', () => {
  it('should replace unpaired surrogates', () => {
    expect(tidyString('a\uD800b')).toBe(`a${REPLACEMENT_CHARACTER}b`);
    expect(tidyString('\uDC00')).toBe(REPLACEMENT_CHARACTER);
    expect(tidyString('x\uD83D')).toBe(`x${REPLACEMENT_CHARACTER}`);
  });

  it('should keep surrogate pairs', () => {
    expect(tidyString('😀 ok')).toBe('😀 ok');
  });
});

describe('tidyBytes', () => {
  it('should accept strings and bytes', () => {
    expect(tidyBytes('plain')).toBe('plain');
    expect(tidyBytes(Buffer.from([0x63, 0x61, 0x66, 0xe9]))).toBe('café');
  });
});
