/**
 * Debug logging utilities for slugwright
 * Writes debug logs to file when enabled in config.
 * When verbose console is enabled, also outputs to stderr.
 */

import { existsSync, appendFileSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { DebugConfig } from '../../core/models/index.js';

/** Scoped logger returned by createLogger */
export interface ComponentLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

/**
 * Debug logger singleton.
 * Manages file-based debug logging and verbose console output.
 */
export class DebugLogger {
  private static instance: DebugLogger | null = null;

  private debugEnabled = false;
  private debugLogFile: string | null = null;
  private initialized = false;
  private verboseConsoleEnabled = false;

  private constructor() {}

  static getInstance(): DebugLogger {
    if (!DebugLogger.instance) {
      DebugLogger.instance = new DebugLogger();
    }
    return DebugLogger.instance;
  }

  /** Reset singleton for testing */
  static resetInstance(): void {
    DebugLogger.instance = null;
  }

  private static getDefaultLogFile(projectDir: string): string {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
    return join(projectDir, '.slugwright', 'logs', `debug-${timestamp}.log`);
  }

  /** Initialize debug logger from config */
  init(config?: DebugConfig, projectDir?: string): void {
    if (this.initialized) {
      return;
    }

    this.debugEnabled = config?.enabled ?? false;

    if (this.debugEnabled) {
      if (config?.logFile) {
        this.debugLogFile = config.logFile;
      } else if (projectDir) {
        this.debugLogFile = DebugLogger.getDefaultLogFile(projectDir);
      }

      if (this.debugLogFile) {
        const logDir = dirname(this.debugLogFile);
        if (!existsSync(logDir)) {
          mkdirSync(logDir, { recursive: true });
        }

        const header = [
          '='.repeat(60),
          'slugwright debug log',
          `Started: ${new Date().toISOString()}`,
          `Project: ${projectDir || 'N/A'}`,
          '='.repeat(60),
          '',
        ].join('\n');

        writeFileSync(this.debugLogFile, header, 'utf-8');
      }
    }

    this.initialized = true;
  }

  /** Reset state (for testing) */
  reset(): void {
    this.debugEnabled = false;
    this.debugLogFile = null;
    this.initialized = false;
    this.verboseConsoleEnabled = false;
  }

  setVerboseConsole(enabled: boolean): void {
    this.verboseConsoleEnabled = enabled;
  }

  getLogFile(): string | null {
    return this.debugLogFile;
  }

  /** Format log message with timestamp and level */
  private static formatLogMessage(level: string, component: string, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    let logLine = `[${timestamp}] [${level.toUpperCase()}] [${component}] ${message}`;

    if (data !== undefined) {
      try {
        const dataStr = typeof data === 'string' ? data : JSON.stringify(data, null, 2);
        logLine += `\n${dataStr}`;
      } catch {
        logLine += '\n[Unable to serialize data]';
      }
    }

    return logLine;
  }

  private static formatConsoleMessage(level: string, component: string, message: string): string {
    const timestamp = new Date().toISOString().slice(11, 23);
    return `[${timestamp}] [${level}] [${component}] ${message}`;
  }

  /** Write a log entry to verbose console (stderr) and/or file */
  writeLog(level: string, component: string, message: string, data?: unknown): void {
    if (this.verboseConsoleEnabled) {
      process.stderr.write(DebugLogger.formatConsoleMessage(level, component, message) + '\n');
    }

    if (!this.debugEnabled || !this.debugLogFile) {
      return;
    }

    const logLine = DebugLogger.formatLogMessage(level, component, message, data);
    try {
      appendFileSync(this.debugLogFile, logLine + '\n', 'utf-8');
    } catch {
      // Unwritable log file: the entry is dropped, the caller carries on
    }
  }
}

export function initDebugLogger(config?: DebugConfig, projectDir?: string): void {
  DebugLogger.getInstance().init(config, projectDir);
}

export function resetDebugLogger(): void {
  DebugLogger.getInstance().reset();
}

export function setVerboseConsole(enabled: boolean): void {
  DebugLogger.getInstance().setVerboseConsole(enabled);
}

export function getDebugLogFile(): string | null {
  return DebugLogger.getInstance().getLogFile();
}

/**
 * Create a logger bound to a component name.
 * Resolves the singleton on every call so resets in tests take effect.
 */
export function createLogger(component: string): ComponentLogger {
  return {
    debug: (message, data) => DebugLogger.getInstance().writeLog('DEBUG', component, message, data),
    info: (message, data) => DebugLogger.getInstance().writeLog('INFO', component, message, data),
    error: (message, data) => DebugLogger.getInstance().writeLog('ERROR', component, message, data),
  };
}
