/**
 * Slug command implementations
 *
 * Pure functions behind the CLI commands; the CLI only prints their results.
 */

import type { NormalizeOptions } from '../../core/models/index.js';
import { DEFAULT_APPROXIMATIONS, getApproximations, listLocales } from '../../core/characters/index.js';
import { SlugString } from '../../core/slug/index.js';
import { createLogger } from '../../shared/utils/debug.js';

const log = createLogger('slug-command');

/** One line of the `locales` listing */
export interface LocaleSummary {
  locale: string;
  entries: number;
  isDefault: boolean;
}

/**
 * Normalize each text to a slug.
 */
export function slugifyTexts(texts: readonly string[], options: NormalizeOptions): string[] {
  log.debug('Slugifying', { count: texts.length, options });
  return texts.map((text) => new SlugString(text).normalizeInPlace(options));
}

/**
 * Approximate each text without any other normalization.
 */
export function approximateTexts(texts: readonly string[], locale?: string): string[] {
  return texts.map((text) => new SlugString(text).approximateAsciiInPlace(locale));
}

export function listLocaleSummaries(): LocaleSummary[] {
  return listLocales().map((locale) => ({
    locale,
    entries: getApproximations(locale)?.size ?? 0,
    isDefault: locale === DEFAULT_APPROXIMATIONS,
  }));
}
