import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type Emitting = Exclude<LogLevel, 'silent'>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const FORMAT: Record<Emitting, (message: string) => string> = {
  debug: (message) => chalk.gray(`[DEBUG] ${message}`),
  info: (message) => chalk.blue(`[INFO] ${message}`),
  warn: (message) => chalk.yellow(`⚠ ${message}`),
  error: (message) => chalk.red(`✗ ${message}`),
};

/**
 * Diagnostics go to stderr so that command output on stdout (`--json`)
 * stays parseable at any level.
 */
class Logger {
  private _level: LogLevel = 'info';

  set level(level: LogLevel) {
    this._level = level;
  }

  get level(): LogLevel {
    return this._level;
  }

  debug(message: string, ...args: unknown[]): void {
    this.emit('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.emit('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.emit('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.emit('error', message, args);
  }

  private emit(level: Emitting, message: string, args: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this._level]) return;
    console.error(FORMAT[level](message), ...args);
  }
}

export const logger = new Logger();
