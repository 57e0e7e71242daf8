/**
 * slugwright - URL-safe slugs from arbitrary text
 *
 * This module exports the public API for programmatic usage.
 */

// Models
export * from './core/models/index.js';

// Character tables
export * from './core/characters/index.js';

// Encoding repair, composition and UTF-8 backends
export * from './core/encoding/index.js';

// Transforms, pipeline and SlugString
export * from './core/slug/index.js';

// Configuration
export * from './infra/config/index.js';

// Logging
export {
  initDebugLogger,
  resetDebugLogger,
  setVerboseConsole,
  createLogger,
  type ComponentLogger,
} from './shared/utils/debug.js';
export { getErrorMessage } from './shared/utils/error.js';
