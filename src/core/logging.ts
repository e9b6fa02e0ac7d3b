/**
 * Centralized logging setup for all modules.
 *
 * Provides structured logging with different levels and colors.
 */

import { config } from './config.js';

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARNING = 2,
  ERROR = 3,
}

/**
 * Structured fields attached to a log line
 */
export type LogContext = Record<string, unknown>;

/**
 * ANSI color codes for terminal output
 */
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

export function parseLogLevel(level: string): LogLevel {
  switch (level.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARNING':
      return LogLevel.WARNING;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Logger class
 */
export class Logger {
  private name: string;
  private minLevel: LogLevel;

  constructor(name: string, minLevel: LogLevel = parseLogLevel(config.logLevel)) {
    this.name = name;
    this.minLevel = minLevel;
  }

  /**
   * Derive a logger for a sub-component (e.g. `telephony.monitor`)
   */
  child(name: string): Logger {
    return new Logger(`${this.name}.${name}`, this.minLevel);
  }

  private formatMessage(level: string, message: string, color: string): string {
    const timestamp = new Date().toISOString();
    return `${colors.gray}${timestamp}${colors.reset} ${color}[${level}]${colors.reset} ${colors.cyan}${this.name}${colors.reset} ${message}`;
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage('DEBUG', message, colors.gray), context ?? '');
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.log(this.formatMessage('INFO', message, colors.blue), context ?? '');
    }
  }

  warning(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.WARNING)) {
      console.warn(this.formatMessage('WARNING', message, colors.yellow), context ?? '');
    }
  }

  error(message: string, context?: LogContext | Error): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage('ERROR', message, colors.red), context ?? '');
      if (context instanceof Error && context.stack && config.isDevelopment) {
        console.error(colors.dim + context.stack + colors.reset);
      }
    }
  }
}

/**
 * Create a logger instance for a module
 */
export function getLogger(name: string): Logger {
  return new Logger(name);
}

/**
 * Default logger instance for quick use
 */
export const logger = getLogger('outbound-caller');

/**
 * Format phone number for logs: +1***0100
 */
export function redactPhoneNumber(phoneNumber: string | undefined): string {
  if (!phoneNumber) return 'unknown';
  if (phoneNumber.length > 6) {
    return `${phoneNumber.substring(0, 3)}***${phoneNumber.slice(-4)}`;
  }
  return '***';
}

/**
 * Error message for logging without assuming the thrown value is an Error
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
