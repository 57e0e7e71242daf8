/**
 * Configuration loader
 *
 * Reads .slugwright.yaml from the working directory (or an explicit path),
 * layers SLUGWRIGHT_* environment overrides on top, validates the result
 * and converts it to the camelCase SlugwrightConfig.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, SlugwrightConfigSchema } from '../../core/models/index.js';
import type { RawSlugwrightConfig, SlugwrightConfig } from '../../core/models/index.js';
import { DEFAULT_MAX_BYTES } from '../../core/slug/index.js';
import { formatIssues, getErrorMessage } from '../../shared/utils/error.js';
import { isRecord } from '../../shared/utils/types.js';
import { createLogger } from '../../shared/utils/debug.js';
import { applyConfigEnvOverrides } from './env/config-env-overrides.js';

export const CONFIG_FILE_NAME = '.slugwright.yaml';

const log = createLogger('config');

export interface LoadConfigOptions {
  /** Directory searched for .slugwright.yaml (default: process.cwd()) */
  cwd?: string;
  /** Explicit config file; must exist */
  configPath?: string;
}

export function getConfigPath(cwd: string): string {
  return join(cwd, CONFIG_FILE_NAME);
}

function readConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`failed to read ${path}: ${getErrorMessage(err)}`);
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${path} must contain a mapping`);
  }
  return { ...parsed };
}

function toConfig(raw: RawSlugwrightConfig): SlugwrightConfig {
  return {
    backend: raw.backend ?? 'standard',
    caseLocale: raw.case_locale,
    ascii: raw.ascii ?? false,
    maxBytes: raw.max_bytes ?? DEFAULT_MAX_BYTES,
    locale: raw.locale,
    logLevel: raw.log_level ?? 'info',
    debug: raw.debug
      ? { enabled: raw.debug.enabled ?? false, logFile: raw.debug.log_file }
      : undefined,
    approximations: raw.approximations ?? {},
  };
}

/**
 * Load the effective configuration.
 */
export function loadConfig(options: LoadConfigOptions = {}): SlugwrightConfig {
  const cwd = resolve(options.cwd ?? process.cwd());
  const path = options.configPath ? resolve(cwd, options.configPath) : getConfigPath(cwd);

  let raw: Record<string, unknown> = {};
  if (existsSync(path)) {
    raw = readConfigFile(path);
    log.debug('Loaded config file', { path });
  } else if (options.configPath) {
    throw new ConfigError(`config file not found: ${path}`);
  }

  applyConfigEnvOverrides(raw);

  const result = SlugwrightConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`invalid settings in ${path}\n${formatIssues(result.error.issues)}`);
  }
  return toConfig(result.data);
}
