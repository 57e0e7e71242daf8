/**
 * Log level management and formatted console output.
 *
 * LogManager is a singleton that encapsulates the current log level state.
 * Diagnostics go to stderr so that stdout carries only slugs.
 */

import chalk from 'chalk';
import type { LogLevel } from '../../core/models/index.js';

export type { LogLevel };

/** Log level priorities */
const LOG_PRIORITIES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Manages console log output level and provides formatted logging.
 * Singleton; use LogManager.getInstance().
 */
export class LogManager {
  private static instance: LogManager | null = null;
  private currentLogLevel: LogLevel = 'info';

  private constructor() {}

  static getInstance(): LogManager {
    if (!LogManager.instance) {
      LogManager.instance = new LogManager();
    }
    return LogManager.instance;
  }

  /** Reset singleton for testing */
  static resetInstance(): void {
    LogManager.instance = null;
  }

  setLogLevel(level: LogLevel): void {
    this.currentLogLevel = level;
  }

  shouldLog(level: LogLevel): boolean {
    return LOG_PRIORITIES[level] >= LOG_PRIORITIES[this.currentLogLevel];
  }

  debug(message: string): void {
    if (this.shouldLog('debug')) {
      console.error(chalk.gray(`[DEBUG] ${message}`));
    }
  }

  info(message: string): void {
    if (this.shouldLog('info')) {
      console.error(chalk.blue(`[INFO] ${message}`));
    }
  }

  warn(message: string): void {
    if (this.shouldLog('warn')) {
      console.error(chalk.yellow(`[WARN] ${message}`));
    }
  }

  error(message: string): void {
    if (this.shouldLog('error')) {
      console.error(chalk.red(`[ERROR] ${message}`));
    }
  }
}

export function setLogLevel(level: LogLevel): void {
  LogManager.getInstance().setLogLevel(level);
}

export function debug(message: string): void {
  LogManager.getInstance().debug(message);
}

export function info(message: string): void {
  LogManager.getInstance().info(message);
}

export function warn(message: string): void {
  LogManager.getInstance().warn(message);
}

export function error(message: string): void {
  LogManager.getInstance().error(message);
}

/** Labelled value line, e.g. for listings */
export function status(label: string, value: string, color?: 'green' | 'yellow' | 'red'): void {
  const colorFn = color ? chalk[color] : chalk.white;
  console.log(`${chalk.gray(label)}: ${colorFn(value)}`);
}
