/**
 * Slug transforms
 *
 * Pure string → string operations. All of them walk the input by codepoint;
 * none depends on anything but its arguments and the character tables.
 */

import type { ApproximationTable, Utf8Backend } from '../models/index.js';
import { InvalidBoundError } from '../models/index.js';
import {
  DEFAULT_APPROXIMATIONS,
  getApproximations,
  resolveApproximations,
  isStrippable,
} from '../characters/index.js';
import { getUtf8Backend } from '../encoding/index.js';
import { utf8ByteLength, utf8Length } from '../../shared/utils/text.js';

/**
 * Reject bounds that are negative, fractional or not finite.
 */
export function assertBound(max: number, name = 'max'): void {
  if (!Number.isInteger(max) || max < 0) {
    throw new InvalidBoundError(max, name);
  }
}

/**
 * Replace accented characters with ASCII look-alikes.
 *
 * Each codepoint is looked up in `overrides` first, then in the default
 * table; anything found in neither is kept. Unknown override names leave
 * only the default table in play.
 *
 * @example
 * approximateAscii('Łódź, Poland')            // 'Lodz, Poland'
 * approximateAscii('Jürgen Müller', 'german') // 'Juergen Mueller'
 * approximateAscii('日本')                     // '日本'
 */
export function approximateAscii(value: string, overrides?: string | ApproximationTable): string {
  const override = resolveApproximations(overrides);
  const fallback = getApproximations(DEFAULT_APPROXIMATIONS);
  let result = '';
  for (const char of value) {
    const code = char.codePointAt(0) ?? 0;
    result += override?.get(code) ?? fallback?.get(code) ?? char;
  }
  return result;
}

/**
 * Remove punctuation, symbols and control characters.
 * Letters, digits and whitespace survive.
 */
export function wordChars(value: string): string {
  let result = '';
  for (const char of value) {
    if (!isStrippable(char.codePointAt(0) ?? 0)) {
      result += char;
    }
  }
  return result;
}

/**
 * Dashes become spaces, whitespace runs collapse to one space, ends are trimmed.
 */
export function clean(value: string): string {
  return value.replace(/-/g, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Delete every codepoint outside ASCII. Nothing is transliterated;
 * run approximateAscii first to keep accented letters.
 */
export function toAscii(value: string): string {
  return value.replace(/[^\x00-\x7f]/gu, '');
}

export function downcase(value: string, backend: Utf8Backend = getUtf8Backend()): string {
  return backend.downcase(value);
}

export function upcase(value: string, backend: Utf8Backend = getUtf8Backend()): string {
  return backend.upcase(value);
}

/**
 * Keep the first `max` codepoints.
 *
 * @example
 * truncate('üéøá', 3) // 'üéø'
 */
export function truncate(value: string, max: number): string {
  assertBound(max);
  return Array.from(value).slice(0, max).join('');
}

/**
 * Keep the longest codepoint prefix whose UTF-8 encoding fits in `max` bytes.
 * The result may be shorter than `max` when a multi-byte character would
 * straddle the limit.
 *
 * @example
 * truncateBytes('üéøá', 3) // 'ü'
 */
export function truncateBytes(value: string, max: number): string {
  assertBound(max);
  if (utf8ByteLength(value) <= max) {
    return value;
  }

  let used = 0;
  let result = '';
  for (const char of value) {
    const size = utf8Length(char.codePointAt(0) ?? 0);
    if (used + size > max) {
      break;
    }
    used += size;
    result += char;
  }
  return result;
}

/**
 * Replace each whitespace character with a dash.
 */
export function withDashes(value: string): string {
  return value.replace(/\s/g, '-');
}
