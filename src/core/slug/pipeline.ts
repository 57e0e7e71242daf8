/**
 * Canonical slug pipeline
 */

import type { NormalizeOptions, Utf8Backend } from '../models/index.js';
import { getUtf8Backend } from '../encoding/index.js';
import {
  approximateAscii,
  assertBound,
  clean,
  toAscii,
  truncateBytes,
  wordChars,
  withDashes,
} from './transforms.js';

/** Default UTF-8 byte budget of a slug */
export const DEFAULT_MAX_BYTES = 255;

/**
 * Normalize text for use as a slug: strip, drop non-word characters,
 * downcase, truncate to `maxBytes` and turn whitespace into dashes.
 *
 * Approximation runs before ASCII deletion so accented letters are
 * transliterated rather than lost. Truncation runs before dashes are
 * added, so a cut that lands on a space leaves a trailing dash.
 */
export function normalizeSlug(
  value: string,
  options: NormalizeOptions = {},
  backend: Utf8Backend = getUtf8Backend(),
): string {
  const { ascii = false, maxBytes = DEFAULT_MAX_BYTES, locale } = options;
  assertBound(maxBytes, 'maxBytes');

  let result = value;
  if (ascii) {
    result = toAscii(approximateAscii(result, locale));
  }
  result = clean(result);
  result = wordChars(result);
  result = clean(result);
  result = backend.downcase(result);
  result = truncateBytes(result, maxBytes);
  return withDashes(result);
}
