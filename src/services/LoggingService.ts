/**
 * Centralized logging service using Winston
 * Console output is always on; a JSON log file is added when a path is given
 */

import winston from 'winston';
import { LogLevel } from '../domain/models/types';

/**
 * LoggingService provides structured logging for the capture tools
 */
export class LoggingService {
  private logger: winston.Logger;
  private context: string;
  private logFile?: string;

  /**
   * Creates a new LoggingService instance
   * @param context - The context/module name for log messages
   * @param logFile - Path to the log file, if any
   * @param level - Minimum logging level (default: 'info')
   */
  constructor(context: string, logFile?: string, level: LogLevel = 'info') {
    this.context = context;
    this.logFile = logFile;

    this.logger = winston.createLogger({
      level,
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.json()
      ),
      defaultMeta: { context: this.context },
      transports: [
        // Console transport with human-readable format
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.printf(({ level, message, context, timestamp }) => {
              return `${timestamp} [${context}] ${level}: ${message}`;
            })
          ),
        }),
        // File transport for all logs, when requested
        ...(logFile
          ? [
              new winston.transports.File({
                filename: logFile,
                format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
              }),
            ]
          : []),
      ],
    });
  }

  /**
   * Log an informational message
   * @param message - The message to log
   * @param meta - Additional metadata (optional)
   */
  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  /**
   * Log a warning message
   * @param message - The message to log
   * @param meta - Additional metadata (optional)
   */
  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  /**
   * Log an error message
   * @param message - The error message
   * @param error - The error object (optional)
   * @param meta - Additional metadata (optional)
   */
  error(message: string, error?: Error, meta?: Record<string, unknown>): void {
    this.logger.error(message, {
      ...meta,
      error: error
        ? {
            message: error.message,
            stack: error.stack,
            name: error.name,
          }
        : undefined,
    });
  }

  /**
   * Log a debug message
   * @param message - The message to log
   * @param meta - Additional metadata (optional)
   */
  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  /**
   * Create a child logger with additional context
   * @param childContext - Appended to this logger's context
   */
  child(childContext: string): LoggingService {
    return new LoggingService(`${this.context}:${childContext}`, this.logFile, this.getLevel());
  }

  /**
   * Get the current logging level
   * @returns The minimum level this logger writes
   */
  getLevel(): LogLevel {
    return parseLogLevel(this.logger.level) ?? 'info';
  }

  /**
   * Close the logger and flush any pending writes
   */
  async close(): Promise<void> {
    return new Promise((resolve) => {
      this.logger.on('finish', resolve);
      this.logger.end();
    });
  }
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Narrow a free-form string to a log level
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find(level => level === value?.toLowerCase());
}

/**
 * Factory function to create a logger instance
 * @param context - The context/module name
 * @param logFile - Path to the log file
 * @param level - Logging level
 */
export function createLogger(
  context: string,
  logFile?: string,
  level: LogLevel = 'info'
): LoggingService {
  return new LoggingService(context, logFile, level);
}
