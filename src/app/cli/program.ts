/**
 * Commander program setup
 *
 * Creates the Command instance, registers global options,
 * and sets up the preAction hook for initialization.
 */

import { createRequire } from 'node:module';
import { resolve } from 'node:path';
import { Command } from 'commander';
import { DEFAULT_MAX_BYTES } from '../../core/slug/index.js';
import { applyConfig, loadConfig } from '../../infra/config/index.js';
import { debug, info, setLogLevel } from '../../shared/ui/index.js';
import { initDebugLogger, createLogger, getDebugLogFile, setVerboseConsole } from '../../shared/utils/debug.js';
import {
  applyCliOverrides,
  parseMaxBytes,
  toCliSettings,
  type CliSettings,
  type GlobalOptions,
} from './helpers.js';

const require = createRequire(import.meta.url);
const { version: cliVersion } = require('../../../package.json') as { version: string };

const log = createLogger('cli');

export { cliVersion };

/** Normalize settings resolved in the preAction hook */
export let cliSettings: CliSettings = { ascii: false, maxBytes: DEFAULT_MAX_BYTES };

export const program = new Command();

program
  .name('slugwright')
  .description('Convert text into URL-safe slugs')
  .version(cliVersion);

// --- Global options ---
program
  .option('-a, --ascii', 'Approximate accented letters, then drop non-ASCII characters')
  .option('-m, --max-bytes <n>', 'UTF-8 byte budget of each slug', parseMaxBytes)
  .option('-l, --locale <name>', 'Approximation table applied before the default one (e.g. german)')
  .option('--backend <name>', 'Unicode backend (standard|locale|whatwg)')
  .option('--case-locale <tag>', 'BCP 47 tag for locale-sensitive case mapping')
  .option('-c, --config <path>', 'Config file (default: ./.slugwright.yaml)')
  .option('-v, --verbose', 'Write a debug log and echo it to stderr');

// Common initialization for all commands
program.hook('preAction', () => {
  const cwd = resolve(process.cwd());
  const opts = program.opts<GlobalOptions>();

  const config = applyCliOverrides(loadConfig({ cwd, configPath: opts.config }), opts);

  initDebugLogger(config.debug, cwd);
  setVerboseConsole(opts.verbose === true);
  setLogLevel(config.logLevel);

  applyConfig(config);
  cliSettings = toCliSettings(config);

  log.info('slugwright CLI starting', { version: cliVersion, cwd, backend: config.backend, settings: cliSettings });

  const logFile = getDebugLogFile();
  if (logFile) {
    info(`Debug log: ${logFile}`);
  }
  debug(`backend=${config.backend} ascii=${cliSettings.ascii} maxBytes=${cliSettings.maxBytes} locale=${cliSettings.locale ?? '-'}`);
});
