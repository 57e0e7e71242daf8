/**
 * Approximation table registry
 *
 * Maps accented codepoints to ASCII replacement text, per named locale.
 * Built-in tables come from resources/characters/approximations and are
 * loaded on first use; callers may add entries or whole new tables.
 */

import type { ApproximationMapping, ApproximationTable } from '../models/index.js';
import { InvalidApproximationError } from '../models/index.js';
import { loadApproximationFiles } from '../../infra/resources/index.js';
import { createLogger } from '../../shared/utils/debug.js';

/** Name of the table consulted after any override */
export const DEFAULT_APPROXIMATIONS = 'latin';

const log = createLogger('approximations');

let registry: Map<string, Map<number, string>> | null = null;

function toCodepoint(locale: string, key: string): number {
  const chars = Array.from(key);
  const code = chars[0]?.codePointAt(0);
  if (chars.length !== 1 || code === undefined) {
    throw new InvalidApproximationError(locale, key);
  }
  return code;
}

function toTable(locale: string, mapping: ApproximationMapping): Map<number, string> {
  const table = new Map<number, string>();
  for (const [key, replacement] of Object.entries(mapping)) {
    table.set(toCodepoint(locale, key), replacement);
  }
  return table;
}

function loadBuiltins(): Map<string, Map<number, string>> {
  const tables = new Map<string, Map<number, string>>();
  for (const file of loadApproximationFiles()) {
    tables.set(file.locale, toTable(file.locale, file.approximations));
  }
  log.debug('Loaded built-in approximation tables', { locales: [...tables.keys()] });
  return tables;
}

function getRegistry(): Map<string, Map<number, string>> {
  if (registry === null) {
    registry = loadBuiltins();
  }
  return registry;
}

/**
 * Look up a table by name.
 */
export function getApproximations(locale: string): ApproximationTable | undefined {
  return getRegistry().get(locale);
}

export function hasApproximations(locale: string): boolean {
  return getRegistry().has(locale);
}

/** Registered table names, sorted */
export function listLocales(): string[] {
  return [...getRegistry().keys()].sort();
}

/**
 * Add entries to a named table, creating it when absent.
 * Later registrations for the same character replace earlier ones.
 */
export function addApproximations(locale: string, mapping: ApproximationMapping): void {
  const additions = toTable(locale, mapping);
  const tables = getRegistry();
  const table = tables.get(locale);
  if (table) {
    for (const [code, replacement] of additions) {
      table.set(code, replacement);
    }
  } else {
    tables.set(locale, additions);
  }
  log.debug('Registered approximations', { locale, entries: additions.size });
}

/** Drop custom registrations; built-ins reload on next lookup */
export function resetApproximations(): void {
  registry = null;
}

/**
 * Resolve an override argument to a table.
 * Unknown names resolve to undefined, leaving only the default table.
 */
export function resolveApproximations(
  overrides: string | ApproximationTable | undefined,
): ApproximationTable | undefined {
  if (overrides === undefined || typeof overrides !== 'string') {
    return overrides;
  }
  const table = getApproximations(overrides);
  if (!table) {
    log.debug('Unknown approximation locale, using default table', { locale: overrides });
  }
  return table;
}
