/**
 * Levelled, coloured logger for orchestrator diagnostics.
 * User-facing banners and progress blocks do not go through here.
 */

import chalk from 'chalk';
import type { LogLevel } from '../core/types.js';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

class Logger {
  private level: LogLevel = 'info';
  private quiet = false;

  setLevel(level: LogLevel) {
    this.level = level;
  }

  /**
   * Quiet mode silences everything below `error`
   */
  setQuiet(quiet: boolean) {
    this.quiet = quiet;
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.quiet && level !== 'error') {
      return false;
    }
    return LEVELS[level] >= LEVELS[this.level];
  }

  debug(message: string, ...args: unknown[]) {
    if (this.shouldLog('debug')) {
      console.log(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]) {
    if (this.shouldLog('info')) {
      console.log(chalk.blue(`[INFO] ${message}`), ...args);
    }
  }

  warn(message: string, ...args: unknown[]) {
    if (this.shouldLog('warn')) {
      console.warn(chalk.yellow(`[WARN] ${message}`), ...args);
    }
  }

  error(message: string, ...args: unknown[]) {
    if (this.shouldLog('error')) {
      console.error(chalk.red(`[ERROR] ${message}`), ...args);
    }
  }

  /**
   * Success log (info level)
   */
  success(message: string, ...args: unknown[]) {
    if (this.shouldLog('info')) {
      console.log(chalk.green(`[✓] ${message}`), ...args);
    }
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
