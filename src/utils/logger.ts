/**
 * Structured Logger
 *
 * One line per entry on the console method matching its level: JSON in
 * production, bracketed text elsewhere.
 */

import { getConfig } from './config';
import { isTutorError } from './errors';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const CONSOLE_METHOD: Record<LogLevel, 'debug' | 'info' | 'warn' | 'error'> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
};

/**
 * LOG_LEVEL-style name to a level; unknown names read as INFO
 */
export function parseLogLevel(name: string | undefined): LogLevel {
  switch (name?.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

export interface LoggedError {
  message: string;
  name?: string;
  code?: string;
  details?: unknown;
  stack?: string;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  context?: string;
  data?: unknown;
  error?: LoggedError;
}

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
}

export function describeError(error: unknown): LoggedError {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }
  if (isTutorError(error)) {
    return {
      message: error.message,
      name: error.name,
      code: error.code,
      details: error.details,
      stack: error.stack,
    };
  }
  return { message: error.message, name: error.name, stack: error.stack };
}

export class Logger {
  private readonly level: LogLevel;
  private readonly pretty: boolean;

  constructor(private readonly context?: string, options: LoggerOptions = {}) {
    const { logging } = getConfig();
    this.level = options.level ?? parseLogLevel(logging.level);
    this.pretty = options.pretty ?? logging.pretty;
  }

  /**
   * Same level and format, context extended as "parent:child"
   */
  child(context: string): Logger {
    return new Logger(this.context ? `${this.context}:${context}` : context, {
      level: this.level,
      pretty: this.pretty,
    });
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  debug(message: string, data?: unknown): void {
    this.write(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: unknown): void {
    this.write(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write(LogLevel.WARN, message, data);
  }

  error(message: string, error?: unknown, data?: unknown): void {
    this.write(LogLevel.ERROR, message, data, error === undefined ? undefined : describeError(error));
  }

  private write(level: LogLevel, message: string, data?: unknown, error?: LoggedError): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      context: this.context,
      data,
      error,
    };

    // Looked up per call so console spies installed later still see output
    console[CONSOLE_METHOD[level]](this.pretty ? this.formatPretty(entry) : JSON.stringify(entry));
  }

  private formatPretty(entry: LogEntry): string {
    let line = `[${entry.timestamp}] [${entry.level}]`;
    if (entry.context) {
      line += ` [${entry.context}]`;
    }
    line += ` ${entry.message}`;

    if (entry.data !== undefined) {
      line += `\n  Data: ${JSON.stringify(entry.data, null, 2)}`;
    }

    if (entry.error) {
      const { message, code, details, stack } = entry.error;
      line += `\n  Error: ${message}`;
      if (code) {
        line += ` (${code})`;
      }
      if (details !== undefined) {
        line += `\n  Details: ${JSON.stringify(details)}`;
      }
      if (stack && this.level === LogLevel.DEBUG) {
        line += `\n${stack}`;
      }
    }

    return line;
  }
}

export const createLogger = (context: string): Logger => new Logger(context);
