/**
 * Strippable codepoint set
 *
 * Punctuation, symbols and control characters removed by word-character
 * filtering. Loaded from resources on first lookup.
 */

import { loadStrippableFile } from '../../infra/resources/index.js';

let strippable: ReadonlySet<number> | null = null;

function buildStrippableSet(): ReadonlySet<number> {
  const set = new Set<number>();
  for (const [first, last] of loadStrippableFile().ranges) {
    for (let code = first; code <= last; code++) {
      set.add(code);
    }
  }
  return set;
}

/** The full strippable set */
export function getStrippable(): ReadonlySet<number> {
  if (strippable === null) {
    strippable = buildStrippableSet();
  }
  return strippable;
}

export function isStrippable(code: number): boolean {
  return getStrippable().has(code);
}
