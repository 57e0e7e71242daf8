import type { NormalizeOptions, SlugwrightConfig } from '../../core/models/index.js';
import { addApproximations } from '../../core/characters/index.js';
import { createUtf8Backend, setUtf8Backend } from '../../core/encoding/index.js';

/**
 * Install the configured backend and custom approximation tables.
 * Returns the normalize defaults the configuration asks for.
 */
export function applyConfig(config: SlugwrightConfig): NormalizeOptions {
  setUtf8Backend(createUtf8Backend(config.backend, { caseLocale: config.caseLocale }));

  for (const [locale, mapping] of Object.entries(config.approximations)) {
    addApproximations(locale, mapping);
  }

  return {
    ascii: config.ascii,
    maxBytes: config.maxBytes,
    locale: config.locale,
  };
}
