/**
 * Process exit codes for the slugwright CLI
 */

export const EXIT_GENERAL_ERROR = 1;
export const EXIT_INVALID_CONFIG = 2;
export const EXIT_SIGINT = 130; // 128 + SIGINT(2), UNIX convention
