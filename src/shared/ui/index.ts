/**
 * UI utilities for terminal output: re-export hub.
 */

export {
  LogManager,
  type LogLevel,
  setLogLevel,
  debug,
  info,
  warn,
  error,
  status,
} from './LogManager.js';
