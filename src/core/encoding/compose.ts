/**
 * Canonical composition
 *
 * Approximation tables match precomposed codepoints ("ü" as U+00FC, not
 * "u" + U+0308), so text is composed before any table lookup.
 */

import type { Utf8Backend } from '../models/index.js';
import { getUtf8Backend } from './backends.js';

export function compose(value: string, backend: Utf8Backend = getUtf8Backend()): string {
  return backend.compose(value);
}
