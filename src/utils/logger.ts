/**
 * Logger utility module for the moderation bot.
 * Provides structured logging with Winston, including file rotation,
 * console output, and specialized handlers for errors and rejections.
 *
 * @module utils/logger
 */

import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';

/**
 * Directory path for log files.
 * Logs are stored in the 'logs' directory at the project root.
 */
const logDir = path.join(__dirname, '../../logs');

// Ensure log directory exists
if (!fs.existsSync(logDir)) {
  fs.mkdirSync(logDir, { recursive: true });
}

/**
 * Custom format for log entries.
 * Combines timestamp, error stack traces, and metadata into a readable format.
 */
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
    if (Object.keys(meta).length > 0 && meta.stack) {
      msg += `\n${meta.stack}`;
    } else if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

/**
 * Reads the log level directly from process.env to avoid a circular
 * dependency with the config module.
 */
const getLogLevel = (): string => {
  return process.env.LOG_LEVEL || 'info';
};

/**
 * Main Winston logger instance.
 *
 * Console output is colorized; `combined.log` and `error.log` rotate at 10MB.
 * Uncaught exceptions and unhandled rejections get their own files.
 *
 * @example
 * ```typescript
 * logger.info('Filter matched', { groupId: -100123, keyword: 'hello' });
 * logger.warn('Gateway call failed', { operation: 'deleteMessage', error });
 * ```
 */
export const logger = winston.createLogger({
  level: getLogLevel(),
  format: logFormat,
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        logFormat
      )
    }),
    new winston.transports.File({
      filename: path.join(logDir, 'combined.log'),
      maxsize: 10485760, // 10MB
      maxFiles: 5,
      tailable: true
    }),
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 10485760, // 10MB
      maxFiles: 5,
      tailable: true
    })
  ],
  exceptionHandlers: [
    new winston.transports.File({
      filename: path.join(logDir, 'exceptions.log'),
      maxsize: 10485760, // 10MB
      maxFiles: 3
    })
  ],
  rejectionHandlers: [
    new winston.transports.File({
      filename: path.join(logDir, 'rejections.log'),
      maxsize: 10485760, // 10MB
      maxFiles: 3
    })
  ]
});

/**
 * Updates the logger's level at runtime.
 *
 * @param level - The new log level (error, warn, info, debug)
 */
export const updateLogLevel = (level: string): void => {
  logger.level = level;
};

/**
 * Context metadata for structured logging.
 */
export interface LogContext {
  /** Telegram chat ID of the group */
  groupId?: number;
  /** Telegram user ID of the affected member */
  userId?: number;
  /** Telegram user ID of the admin who issued a command */
  adminId?: number;
  /** Operation type */
  operation?: string;
  /** Additional metadata */
  [key: string]: unknown;
}

/**
 * Helper class for structured logging with consistent context.
 */
export class StructuredLogger {
  /**
   * Logs a routine moderation event (filter responses, welcomes, approvals).
   *
   * @example
   * ```typescript
   * StructuredLogger.logModerationEvent('Join request approved', {
   *   groupId: -100123,
   *   userId: 12345,
   *   operation: 'approve_join'
   * });
   * ```
   */
  static logModerationEvent(event: string, context: LogContext): void {
    logger.info(event, this.sanitizeContext(context));
  }

  /**
   * Logs a security event (deletions, warnings, mutes, bans, restriction changes).
   *
   * @example
   * ```typescript
   * StructuredLogger.logSecurityEvent('Member auto-muted', {
   *   groupId: -100123,
   *   userId: 12345,
   *   operation: 'escalation',
   *   reason: 'link'
   * });
   * ```
   */
  static logSecurityEvent(event: string, context: LogContext): void {
    logger.warn(`[SECURITY] ${event}`, this.sanitizeContext(context));
  }

  /**
   * Logs an error with full context and stack trace.
   */
  static logError(error: Error | string, context: LogContext = {}): void {
    if (error instanceof Error) {
      logger.error(error.message, { ...this.sanitizeContext(context), stack: error.stack });
    } else {
      logger.error(error, this.sanitizeContext(context));
    }
  }

  /**
   * Logs a debug message (only in debug log level).
   */
  static logDebug(message: string, context: LogContext = {}): void {
    logger.debug(message, this.sanitizeContext(context));
  }

  /**
   * Masks fields that may carry credentials before they reach a transport.
   */
  private static sanitizeContext(context: LogContext): LogContext {
    const sanitized = { ...context };

    const sensitiveKeys = ['token', 'botToken', 'password', 'secret'];

    for (const key of sensitiveKeys) {
      if (key in sanitized) {
        sanitized[key] = '[REDACTED]';
      }
    }

    return sanitized;
  }
}
