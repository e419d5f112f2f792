import chalk from 'chalk';

export enum LogLevel { DEBUG = 0, INFO = 1, WARN = 2, ERROR = 3 }

export type EventLevel = 'debug' | 'info' | 'warn' | 'error';

export type EventFields = Record<string, unknown>;

export function parseLogLevel(value: string): LogLevel {
  switch (value.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      throw new Error(`Invalid log level: ${value}`);
  }
}

export class Logger {
  // Default to WARN - minimal output unless verbose mode is enabled
  private level: LogLevel = LogLevel.WARN;

  setLevel(level: LogLevel): void { this.level = level; }

  getLevel(): LogLevel { return this.level; }

  debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) {
      console.log(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) {
      console.log(chalk.blue(`[INFO] ${message}`), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) {
      console.warn(chalk.yellow(`[WARN] ${message}`), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.ERROR) {
      console.error(chalk.red(`[ERROR] ${message}`), ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    console.log(chalk.green(`[SUCCESS] ${message}`), ...args);
  }

  /**
   * Structured event, written as a single JSON line: `{"event": name, ...fields}`.
   */
  event(level: EventLevel, name: string, fields: EventFields = {}): void {
    const line = JSON.stringify({ event: name, ...fields });
    this[level](line);
  }
}

export const logger = new Logger();

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
