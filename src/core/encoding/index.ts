/**
 * Encoding normalizer - public API
 */

export { REPLACEMENT_CHARACTER, CP1252_UNDEFINED_BYTES, decodeCp1252Byte } from './cp1252.js';
export { readUtf8Sequence, tidyUtf8Bytes, tidyString, tidyBytes } from './tidyBytes.js';
export {
  type Utf8BackendOptions,
  standardBackend,
  createLocaleBackend,
  createWhatwgBackend,
  createUtf8Backend,
  getUtf8Backend,
  setUtf8Backend,
  resetUtf8Backend,
} from './backends.js';
export { compose } from './compose.js';
