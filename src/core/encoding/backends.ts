/**
 * UTF-8 backends
 *
 * A backend bundles the Unicode primitives the slug pipeline needs:
 * byte repair, canonical composition and case mapping. One backend is the
 * process-wide default; SlugString instances may carry their own.
 */

import type { BackendName, Utf8Backend } from '../models/index.js';
import { ConfigError, isLocaleTag } from '../models/index.js';
import { tidyBytes, tidyString } from './tidyBytes.js';
import { REPLACEMENT_CHARACTER } from './cp1252.js';
import { createLogger } from '../../shared/utils/debug.js';
import { getErrorMessage } from '../../shared/utils/error.js';

const log = createLogger('backend');

export interface Utf8BackendOptions {
  /** BCP 47 tag used by the locale backend for case mapping */
  caseLocale?: string;
}

/** String.prototype normalization and case mapping */
export const standardBackend: Utf8Backend = {
  name: 'standard',
  tidyBytes,
  compose: (value) => value.normalize('NFC'),
  downcase: (value) => value.toLowerCase(),
  upcase: (value) => value.toUpperCase(),
};

/**
 * Locale-sensitive case mapping through the host's Intl data
 * (e.g. Turkish dotted and dotless i). The tag is checked here, so the
 * returned backend's case mapping does not throw.
 */
export function createLocaleBackend(caseLocale?: string): Utf8Backend {
  if (caseLocale !== undefined && !isLocaleTag(caseLocale)) {
    throw new ConfigError(`case locale must be a valid BCP 47 language tag, got "${caseLocale}"`);
  }
  return {
    name: 'locale',
    tidyBytes,
    compose: (value) => value.normalize('NFC'),
    downcase: (value) => value.toLocaleLowerCase(caseLocale),
    upcase: (value) => value.toLocaleUpperCase(caseLocale),
  };
}

// Codepoints the WHATWG windows-1252 decoder passes through for bytes CP1252 leaves undefined
const WHATWG_UNDEFINED_CP1252 = /[\u0081\u008d\u008f\u0090\u009d]/g;

/**
 * Byte repair through the WHATWG Encoding API.
 *
 * Input that is not valid UTF-8 as a whole is decoded as windows-1252 as a
 * whole; the standard backend repairs byte by byte instead.
 */
export function createWhatwgBackend(): Utf8Backend {
  const utf8 = new TextDecoder('utf-8', { fatal: true });
  const windows1252 = new TextDecoder('windows-1252');

  return {
    name: 'whatwg',
    tidyBytes: (input) => {
      if (typeof input === 'string') {
        return tidyString(input);
      }
      try {
        return utf8.decode(input);
      } catch (err) {
        log.debug('Input is not UTF-8, decoding as windows-1252', { reason: getErrorMessage(err) });
        return windows1252.decode(input).replace(WHATWG_UNDEFINED_CP1252, REPLACEMENT_CHARACTER);
      }
    },
    compose: (value) => value.normalize('NFC'),
    downcase: (value) => value.toLowerCase(),
    upcase: (value) => value.toUpperCase(),
  };
}

/**
 * Build a backend by name.
 */
export function createUtf8Backend(name: BackendName, options: Utf8BackendOptions = {}): Utf8Backend {
  switch (name) {
    case 'standard':
      return standardBackend;
    case 'locale':
      return createLocaleBackend(options.caseLocale);
    case 'whatwg':
      return createWhatwgBackend();
  }
}

let activeBackend: Utf8Backend = standardBackend;

/** Backend used by SlugString instances created without one */
export function getUtf8Backend(): Utf8Backend {
  return activeBackend;
}

export function setUtf8Backend(backend: Utf8Backend): void {
  log.debug('UTF-8 backend selected', { name: backend.name });
  activeBackend = backend;
}

/** Restore the standard backend (for testing) */
export function resetUtf8Backend(): void {
  activeBackend = standardBackend;
}
