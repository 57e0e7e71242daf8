#!/usr/bin/env node

/**
 * slugwright CLI entry point
 *
 * Import order matters: program setup → commands → parse.
 */

import { program } from './program.js';
import './commands.js';
import { ConfigError } from '../../core/models/index.js';
import { error } from '../../shared/ui/index.js';
import { getErrorMessage } from '../../shared/utils/error.js';
import { EXIT_GENERAL_ERROR, EXIT_INVALID_CONFIG, EXIT_SIGINT } from '../../exitCodes.js';

process.once('SIGINT', () => {
  process.exit(EXIT_SIGINT);
});

program.parseAsync().catch((err: unknown) => {
  error(getErrorMessage(err));
  process.exit(err instanceof ConfigError ? EXIT_INVALID_CONFIG : EXIT_GENERAL_ERROR);
});
