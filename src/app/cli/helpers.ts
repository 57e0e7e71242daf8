/**
 * CLI helper functions
 *
 * Merge command-line flags into the loaded configuration.
 */

import { InvalidArgumentError } from 'commander';
import { BackendNameSchema, CaseLocaleSchema, ConfigError } from '../../core/models/index.js';
import { DEFAULT_APPROXIMATIONS, hasApproximations } from '../../core/characters/index.js';
import type { NormalizeOptions, SlugwrightConfig } from '../../core/models/index.js';

/** Global options registered on the program */
export type GlobalOptions = {
  config?: string;
  verbose?: boolean;
  backend?: string;
  caseLocale?: string;
  ascii?: boolean;
  maxBytes?: number;
  locale?: string;
};

/** Normalize settings every command shares */
export interface CliSettings extends NormalizeOptions {
  ascii: boolean;
  maxBytes: number;
  locale?: string;
}

/**
 * Flags win over the config file and environment.
 * --verbose turns on the debug log and debug-level console output.
 */
export function applyCliOverrides(config: SlugwrightConfig, opts: GlobalOptions): SlugwrightConfig {
  let backend = config.backend;
  if (opts.backend !== undefined) {
    const parsed = BackendNameSchema.safeParse(opts.backend);
    if (!parsed.success) {
      throw new ConfigError(`--backend must be one of: ${BackendNameSchema.options.join(', ')}`);
    }
    backend = parsed.data;
  }

  if (opts.caseLocale !== undefined && !CaseLocaleSchema.safeParse(opts.caseLocale).success) {
    throw new ConfigError(`--case-locale must be a valid BCP 47 language tag, got "${opts.caseLocale}"`);
  }

  const verbose = opts.verbose === true;

  return {
    ...config,
    backend,
    caseLocale: opts.caseLocale ?? config.caseLocale,
    ascii: opts.ascii ?? config.ascii,
    maxBytes: opts.maxBytes ?? config.maxBytes,
    locale: opts.locale ?? config.locale,
    logLevel: verbose ? 'debug' : config.logLevel,
    debug: verbose && !config.debug?.enabled
      ? { enabled: true, logFile: config.debug?.logFile }
      : config.debug,
  };
}

export function toCliSettings(config: SlugwrightConfig): CliSettings {
  return {
    ascii: config.ascii,
    maxBytes: config.maxBytes,
    locale: config.locale,
  };
}

/** Option parser for --max-bytes */
export function parseMaxBytes(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/** Warning text for a locale that names no approximation table */
export function unknownLocaleWarning(locale: string | undefined): string | undefined {
  if (locale === undefined || hasApproximations(locale)) {
    return undefined;
  }
  return `No approximation table named "${locale}", using "${DEFAULT_APPROXIMATIONS}" only`;
}
