/**
 * Leveled console logger
 */

import chalk from 'chalk';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LogFields = Record<string, unknown>;

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

const LEVEL_LABELS: Record<LogLevel, string> = {
  error: chalk.red('ERROR'),
  warn: chalk.yellow('WARN '),
  info: chalk.cyan('INFO '),
  debug: chalk.gray('DEBUG'),
};

export class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = 'info') {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  debug(message: string, fields?: LogFields): void {
    this.log('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.log('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.log('error', message, fields);
  }

  private log(level: LogLevel, message: string, fields?: LogFields): void {
    if (!this.isEnabled(level)) return;

    const line = `${chalk.gray(new Date().toISOString())} ${LEVEL_LABELS[level]} ${message}`;
    const suffix = fields && Object.keys(fields).length > 0 ? ` ${chalk.gray(JSON.stringify(fields))}` : '';

    if (level === 'error') {
      console.error(line + suffix);
    } else if (level === 'warn') {
      console.warn(line + suffix);
    } else {
      console.log(line + suffix);
    }
  }
}

export const logger = new Logger();
