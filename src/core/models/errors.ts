/**
 * Errors raised for caller mistakes.
 *
 * Malformed text never produces one of these; encoding repair absorbs it.
 */

/** A truncation bound that is negative, fractional or not finite */
export class InvalidBoundError extends Error {
  readonly bound: number;

  constructor(bound: number, name = 'max') {
    super(`${name} must be a non-negative integer, got ${String(bound)}`);
    this.name = 'InvalidBoundError';
    this.bound = bound;
  }
}

/** An approximation entry whose key is not exactly one character */
export class InvalidApproximationError extends Error {
  constructor(locale: string, key: string) {
    super(`Approximation keys for '${locale}' must be a single character, got ${JSON.stringify(key)}`);
    this.name = 'InvalidApproximationError';
  }
}

/** Invalid configuration file or environment override */
export class ConfigError extends Error {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}
