/**
 * Structured Logger
 */

import type { Result, ResultJSON } from '../result.js';
import type { LogFormatter } from './formatters/types.js';
import { LineFormatter } from './formatters/line.js';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

/**
 * Anything with a string `write`, e.g. `process.stdout`
 */
export interface LogOutput {
  write(chunk: string): unknown;
}

/**
 * Log entry data. Task results carry `result`; plain messages carry `message`.
 */
export interface LogEntry {
  level: LogLevel;
  timestamp: Date;
  pid: number;
  progname: string;
  message?: string;
  fields: LogFields;
  result?: ResultJSON;
  tags?: string[];
}

/**
 * Logger options
 */
export interface LoggerOptions {
  /** Output stream (default: process.stdout) */
  output?: LogOutput;
  /** Log formatter (default: LineFormatter) */
  formatter?: LogFormatter;
  /** Program name (default: 'ledger') */
  progname?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Enable/disable logging (default: true) */
  enabled?: boolean;
  /** Fields bound to every entry */
  fields?: LogFields;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Structured logger for ledger operations and task execution.
 */
export class Logger {
  private output: LogOutput;
  private formatter: LogFormatter;
  private progname: string;
  private level: LogLevel;
  private enabled: boolean;
  private readonly fields: LogFields;

  constructor(options: LoggerOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.formatter = options.formatter ?? new LineFormatter();
    this.progname = options.progname ?? 'ledger';
    this.level = options.level ?? 'info';
    this.enabled = options.enabled ?? true;
    this.fields = { ...options.fields };
  }

  /**
   * Logger with `fields` bound on top of this one's
   */
  child(fields: LogFields): Logger {
    return new Logger({
      output: this.output,
      formatter: this.formatter,
      progname: this.progname,
      level: this.level,
      enabled: this.enabled,
      fields: { ...this.fields, ...fields },
    });
  }

  /**
   * Log a result at the appropriate level
   */
  log<T extends object>(result: Result<T>, options?: { level?: LogLevel; tags?: string[] }): void {
    if (!this.enabled) return;

    const level = options?.level ?? this.inferLevel(result);
    if (!this.shouldLog(level)) return;

    this.write({
      level,
      timestamp: new Date(),
      pid: process.pid,
      progname: this.progname,
      fields: this.fields,
      result: result.toJSON(),
      tags: options?.tags,
    });
  }

  debug(message: string | (() => string), fields?: LogFields): void {
    this.logMessage('debug', message, fields);
  }

  info(message: string | (() => string), fields?: LogFields): void {
    this.logMessage('info', message, fields);
  }

  warn(message: string | (() => string), fields?: LogFields): void {
    this.logMessage('warn', message, fields);
  }

  error(message: string | (() => string), fields?: LogFields): void {
    this.logMessage('error', message, fields);
  }

  private logMessage(level: LogLevel, message: string | (() => string), fields?: LogFields): void {
    if (!this.enabled || !this.shouldLog(level)) return;

    this.write({
      level,
      timestamp: new Date(),
      pid: process.pid,
      progname: this.progname,
      message: typeof message === 'function' ? message() : message,
      fields: { ...this.fields, ...fields },
    });
  }

  private write(entry: LogEntry): void {
    this.output.write(this.formatter.format(entry) + '\n');
  }

  private inferLevel<T extends object>(result: Result<T>): LogLevel {
    if (result.failed) return 'error';
    if (result.skipped) return 'warn';
    return 'info';
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.level];
  }

  /**
   * Set the log level
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Set the formatter
   */
  setFormatter(formatter: LogFormatter): void {
    this.formatter = formatter;
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }
}

/**
 * Create a new logger instance
 */
export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}
