/**
 * Structured Logging
 *
 * JSON-structured logging with levels and context.
 */

import type { TrellisConfig } from '../config/config.ts';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: 'json' | 'pretty';
  context?: Record<string, unknown>;
  output?: (entry: LogEntry) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Structured logger
 */
export class Logger {
  private level: LogLevel;
  private format: 'json' | 'pretty';
  private context: Record<string, unknown>;
  private output: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.context = options.context ?? {};
    this.output = options.output ?? this.defaultOutput.bind(this);
  }

  /**
   * Log at debug level
   */
  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  /**
   * Log at info level
   */
  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  /**
   * Log at warn level
   */
  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  /**
   * Log at error level
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log('error', message, context, toError(error));
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: { ...this.context, ...context },
      output: this.output,
    });
  }

  /**
   * Set the log level
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Check if a level is enabled
   */
  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  /**
   * Core logging method
   */
  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    this.output(entry);
  }

  /**
   * Default output handler
   */
  private defaultOutput(entry: LogEntry): void {
    const line = this.format === 'json' ? JSON.stringify(entry, jsonReplacer) : formatPretty(entry);
    if (entry.level === 'error' || entry.level === 'warn') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

/**
 * Pretty line for development. A `component` context value is lifted
 * into a bracketed prefix.
 */
export function formatPretty(entry: LogEntry): string {
  const { component, ...rest } = entry.context ?? {};
  const timestamp = DIM + entry.timestamp + RESET;
  const level = COLORS[entry.level] + entry.level.toUpperCase().padEnd(5) + RESET;
  const prefix = typeof component === 'string' ? `[${component}] ` : '';

  let output = `${timestamp} ${level} ${prefix}${entry.message}`;

  if (Object.keys(rest).length > 0) {
    output += ` ${DIM}${JSON.stringify(rest, jsonReplacer)}${RESET}`;
  }

  if (entry.error?.stack) {
    output += `\n${DIM}${entry.error.stack}${RESET}`;
  }

  return output;
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

function toError(error: unknown): Error | undefined {
  if (error === undefined || error instanceof Error) return error;
  return new Error(String(error));
}

/**
 * Create a logger from validated configuration
 */
export function createLogger(config: Pick<TrellisConfig, 'logLevel' | 'logFormat'>): Logger {
  return new Logger({
    level: config.logLevel,
    format: config.logFormat,
  });
}

// Default logger instance
let defaultLogger: Logger | null = null;

/**
 * Get the default logger
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const env = process.env.TRELLIS_ENV ?? 'development';
    defaultLogger = new Logger({
      level: env === 'production' ? 'info' : 'debug',
      format: env === 'production' ? 'json' : 'pretty',
    });
  }
  return defaultLogger;
}

/**
 * Set the default logger
 */
export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}
