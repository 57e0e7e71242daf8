/**
 * Slug transforms and pipeline - public API
 */

export {
  assertBound,
  approximateAscii,
  wordChars,
  clean,
  toAscii,
  downcase,
  upcase,
  truncate,
  truncateBytes,
  withDashes,
} from './transforms.js';

export { DEFAULT_MAX_BYTES, normalizeSlug } from './pipeline.js';

export {
  SlugString,
  type SlugInput,
  type SlugStringOptions,
  toSlug,
  slugify,
} from './SlugString.js';
