/**
 * Tests for slug transforms
 */

import { afterEach, describe, expect, it } from 'vitest';
import {
  approximateAscii,
  clean,
  downcase,
  toAscii,
  truncate,
  truncateBytes,
  upcase,
  withDashes,
  wordChars,
} from '../core/slug/index.js';
import { addApproximations, resetApproximations } from '../core/characters/index.js';
import { createLocaleBackend } from '../core/encoding/index.js';
import { InvalidBoundError } from '../core/models/index.js';
import { utf8ByteLength } from '../shared/utils/text.js';

describe('approximateAscii', () => {
  afterEach(() => {
    resetApproximations();
  });

  it('should transliterate with the default table', () => {
    expect(approximateAscii('Łódź, Poland')).toBe('Lodz, Poland');
    expect(approximateAscii('Jürgen Müller')).toBe('Jurgen Muller');
    expect(approximateAscii('¡Feliz año!')).toBe('¡Feliz ano!');
  });

  it('should prefer the override table', () => {
    expect(approximateAscii('Jürgen Müller', 'german')).toBe('Juergen Mueller');
    expect(approximateAscii('¡Feliz año!', 'spanish')).toBe('¡Feliz anio!');
  });

  it('should fall back to the default table for characters the override lacks', () => {
    expect(approximateAscii('Ærø Müller', 'german')).toBe('AEro Mueller');
  });

  it('should fall back to the default table for unknown locales', () => {
    expect(approximateAscii('Jürgen Müller', 'martian')).toBe('Jurgen Muller');
  });

  it('should accept a table instead of a name', () => {
    const table = new Map([[0xfc, 'uu']]);
    expect(approximateAscii('Jürgen', table)).toBe('Juurgen');
  });

  it('should pass through characters no table maps', () => {
    expect(approximateAscii('日本')).toBe('日本');
    expect(approximateAscii('¿Qué? 🎉')).toBe('¿Que? 🎉');
  });

  it('should use registered entries', () => {
    addApproximations('spanish', { 'ñ': 'nh' });
    expect(approximateAscii('año', 'spanish')).toBe('anho');
  });
});

describe('wordChars', () => {
  it('should remove punctuation and symbols', () => {
    expect(wordChars('Hello, world! (2024)')).toBe('Hello world 2024');
    expect(wordChars('¿Qué tal?')).toBe('Qué tal');
    expect(wordChars('50% off — €10')).toBe('50 off  10');
  });

  it('should keep whitespace, letters and digits', () => {
    expect(wordChars('a\nb\tc 1')).toBe('a\nb\tc 1');
    expect(wordChars('日本語 テキスト')).toBe('日本語 テキスト');
  });
});

describe('clean', () => {
  it('should turn dashes into spaces and collapse whitespace', () => {
    expect(clean('  foo--bar   baz  ')).toBe('foo bar baz');
    expect(clean('a\t\tb\nc')).toBe('a b c');
  });

  it('should be idempotent', () => {
    const once = clean(' -x- y \t z- ');
    expect(once).toBe('x y z');
    expect(clean(once)).toBe(once);
  });
});

describe('toAscii', () => {
  it('should delete non-ASCII characters without transliterating', () => {
    expect(toAscii('¡Feliz anio!')).toBe('Feliz anio!');
    expect(toAscii('Müller')).toBe('Mller');
    expect(toAscii('日本 abc 🎉')).toBe(' abc ');
  });

  it('should leave nothing at or above U+0080', () => {
    const result = toAscii('Ωmega – ünïcödé ✓ 😀 plain');
    expect([...result].every((char) => (char.codePointAt(0) ?? 0) < 0x80)).toBe(true);
    expect(result).toBe('mega  ncd   plain');
  });
});

describe('case mapping', () => {
  it('should map case beyond ASCII', () => {
    expect(downcase('ÜBER ΣΟΦΙΑ')).toBe('über σοφια');
    expect(upcase('straße')).toBe('STRASSE');
  });

  it('should use the given backend', () => {
    expect(downcase('ISTANBUL', createLocaleBackend('tr'))).toBe('ıstanbul');
  });
});

describe('truncate', () => {
  it('should count codepoints, not bytes', () => {
    expect(truncate('üéøá', 3)).toBe('üéø');
    expect(truncate('😀😀', 1)).toBe('😀');
  });

  it('should not change shorter input', () => {
    expect(truncate('ab', 5)).toBe('ab');
    expect(truncate('', 0)).toBe('');
  });

  it('should reject invalid bounds', () => {
    expect(() => truncate('abc', -1)).toThrow(InvalidBoundError);
    expect(() => truncate('abc', 1.5)).toThrow(InvalidBoundError);
    expect(() => truncate('abc', Number.NaN)).toThrow(InvalidBoundError);
    expect(() => truncate('abc', Number.POSITIVE_INFINITY)).toThrow(InvalidBoundError);
  });
});

describe('truncateBytes', () => {
  it('should stop before a character that would overflow', () => {
    expect(truncateBytes('üéøá', 3)).toBe('ü');
    expect(truncateBytes('üéøá', 4)).toBe('üé');
    expect(truncateBytes('😀a', 3)).toBe('');
    expect(truncateBytes('a😀', 4)).toBe('a');
    expect(truncateBytes('a😀', 5)).toBe('a😀');
  });

  it('should not change input within the budget', () => {
    expect(truncateBytes('abc', 10)).toBe('abc');
    expect(truncateBytes('abc', 3)).toBe('abc');
  });

  it('should return a codepoint prefix within the budget for any limit', () => {
    const text = 'aé日😀 b€';
    for (let max = 0; max <= 16; max++) {
      const result = truncateBytes(text, max);
      expect(utf8ByteLength(result)).toBeLessThanOrEqual(max);
      expect(text.startsWith(result)).toBe(true);
      expect(Buffer.from(result, 'utf-8').toString('utf-8')).toBe(result);
    }
  });

  it('should reject invalid bounds', () => {
    expect(() => truncateBytes('abc', -3)).toThrow('max must be a non-negative integer, got -3');
  });
});

describe('withDashes', () => {
  it('should replace each whitespace character', () => {
    expect(withDashes('hello   world\tfoo')).toBe('hello---world-foo');
  });

  it('should give single dashes after clean', () => {
    expect(withDashes(clean('hello   world\tfoo'))).toBe('hello-world-foo');
  });
});
