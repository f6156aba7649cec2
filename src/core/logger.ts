/**
 * Leveled console logger. Writes to stderr so command output on stdout stays
 * machine readable.
 */

import chalk from 'chalk';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

export class Logger {
  private level: LogLevel = 'warn';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  error(message: string, error?: Error): void {
    if (!this.isEnabled('error')) return;
    console.error(chalk.red(`[ERROR] ${message}`));
    if (error) {
      console.error(chalk.gray(error.stack || error.message));
    }
  }

  warn(message: string): void {
    if (this.isEnabled('warn')) {
      console.error(chalk.yellow(`[WARN] ${message}`));
    }
  }

  info(message: string): void {
    if (this.isEnabled('info')) {
      console.error(`[INFO] ${message}`);
    }
  }

  debug(message: string): void {
    if (this.isEnabled('debug')) {
      console.error(chalk.gray(`[DEBUG] ${message}`));
    }
  }
}

export const logger = new Logger();
