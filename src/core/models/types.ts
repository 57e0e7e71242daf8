/**
 * Core type definitions for slugwright
 */

/** Names of the built-in UTF-8 backends */
export type BackendName = 'standard' | 'locale' | 'whatwg';

/** Log levels */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Codepoint → replacement text */
export type ApproximationTable = ReadonlyMap<number, string>;

/** Plain-object form of an approximation table, keyed by single characters */
export type ApproximationMapping = Readonly<Record<string, string>>;

/**
 * Unicode primitives the slug pipeline delegates to.
 *
 * Implementations differ in how they reach the platform's Unicode support,
 * not in what they return for well-formed input.
 */
export interface Utf8Backend {
  readonly name: BackendName;
  /** Repair input into well-formed Unicode text. Must never throw. */
  tidyBytes(input: string | Uint8Array): string;
  /** Canonical composition (NFC) */
  compose(value: string): string;
  downcase(value: string): string;
  upcase(value: string): string;
}

/** Options accepted by the canonical normalize pipeline */
export interface NormalizeOptions {
  /** Approximate, then drop everything outside ASCII */
  ascii?: boolean;
  /** UTF-8 byte budget for the slug body (default 255) */
  maxBytes?: number;
  /** Approximation override table, by name or as a table */
  locale?: string | ApproximationTable;
}

/** Debug log configuration */
export interface DebugConfig {
  enabled: boolean;
  logFile?: string;
}

/** Resolved configuration (camelCase, defaults applied) */
export interface SlugwrightConfig {
  backend: BackendName;
  caseLocale?: string;
  ascii: boolean;
  maxBytes: number;
  locale?: string;
  logLevel: LogLevel;
  debug?: DebugConfig;
  approximations: Record<string, Record<string, string>>;
}
