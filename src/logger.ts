/**
 * Centralized logging with levels, context tags and an optional file sink
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LEVELS.some(level => level === value);
}

export class Logger {
  private minLevel: LogLevel;
  private logFile: string | null = null;

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel);
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const context = entry.context ? `[${entry.context}]` : '';

    let message = `${timestamp} ${level} ${context} ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += '\n  ' + JSON.stringify(entry.data, null, 2).split('\n').join('\n  ');
    }

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}\n  Stack: ${entry.error.stack}`;
    }

    return message;
  }

  private getConsoleColor(level: LogLevel): string {
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m',
      info: '\x1b[32m',
      warn: '\x1b[33m',
      error: '\x1b[31m'
    };
    return colors[level];
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    const formatted = this.formatMessage(entry);
    const color = this.getConsoleColor(entry.level);
    const reset = '\x1b[0m';

    switch (entry.level) {
      case 'error':
        console.error(`${color}${formatted}${reset}`);
        break;
      case 'warn':
        console.warn(`${color}${formatted}${reset}`);
        break;
      default:
        console.log(`${color}${formatted}${reset}`);
    }

    if (this.logFile) {
      try {
        appendFileSync(this.logFile, formatted + '\n');
      } catch (error) {
        // Console output above already carries the entry.
        console.error(`Log file write failed (${this.logFile}): ${error instanceof Error ? error.message : String(error)}`);
        this.logFile = null;
      }
    }
  }

  debug(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context });
  }

  info(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context });
  }

  warn(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context });
  }

  error(message: string, error?: Error, context?: string): void {
    this.log({ timestamp: new Date(), level: 'error', message, error, context });
  }

  success(message: string, context?: string): void {
    this.log({ timestamp: new Date(), level: 'info', message: `✅ ${message}`, context });
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * Mirror every emitted entry into a file (appended, directories created)
   */
  setLogFile(path: string | null): void {
    if (path) {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.logFile = path;
  }
}

export const logger = new Logger(isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info');

export type ErrorCode =
  | 'NO_VOLUMES_CONFIGURED'
  | 'STATUS_STORE_CORRUPT'
  | 'ASSIGNMENT_CONFLICT'
  | 'INDEX_CANCELLED'
  | 'INVALID_MANIFEST'
  | 'INVALID_CONFIG'
  | 'INTERNAL_ERROR'
  | 'UNKNOWN_ERROR';

/**
 * Application error carrying a stable code
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode = 'UNKNOWN_ERROR',
    public statusCode: number = 500,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Normalize any thrown value into an AppError and log it
 */
export function handleError(error: unknown, context?: string): AppError {
  if (error instanceof AppError) {
    logger.error(error.message, error, context);
    return error;
  }

  if (error instanceof Error) {
    const appError = new AppError(error.message, 'INTERNAL_ERROR', 500);
    logger.error(error.message, error, context);
    return appError;
  }

  const appError = new AppError(String(error), 'UNKNOWN_ERROR', 500);
  logger.error(String(error), undefined, context);
  return appError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
