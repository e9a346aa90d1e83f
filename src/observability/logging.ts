/**
 * Structured logging for transfer operations
 */

import { DynamoDBError } from '../error/index.js';
import type { RetryEvent } from '../resilience/index.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Console-based logger with structured output
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';

    const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;

    switch (level) {
      case 'error':
        console.error(logMessage);
        break;
      case 'warn':
        console.warn(logMessage);
        break;
      case 'debug':
      case 'trace':
        console.debug(logMessage);
        break;
      default:
        console.log(logMessage);
    }
  }
}

/**
 * Logger that discards everything; the engine default
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: LogContext): void {}

  warn(_message: string, _context?: LogContext): void {}

  info(_message: string, _context?: LogContext): void {}

  debug(_message: string, _context?: LogContext): void {}

  trace(_message: string, _context?: LogContext): void {}
}

export function logOperation(
  logger: Logger,
  operation: string,
  tableName: string,
  durationMs: number,
  context: LogContext = {}
): void {
  logger.info('Transfer operation completed', {
    operation,
    tableName,
    durationMs,
    ...context,
  });
}

export function logError(logger: Logger, operation: string, error: Error): void {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  logger.error('Transfer operation failed', {
    operation,
    errorName: error.name,
    errorCode: code,
    errorMessage: error.message,
  });
}

/**
 * Logs a failed attempt before its backoff sleep. Throttling and other
 * retryable failures are worded apart.
 */
export function logRetry(logger: Logger, tableName: string, operation: string, event: RetryEvent): void {
  logger.warn(event.throttled ? 'Request throttled, backing off' : 'Request failed, retrying', {
    tableName,
    operation,
    attempt: event.attempt,
    delayMs: event.delayMs,
    errorCode: event.error instanceof DynamoDBError ? event.error.code : undefined,
  });
}
