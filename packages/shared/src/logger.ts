/**
 * Structured Logger with Winston
 *
 * Features:
 * - Multiple log levels (error, warn, info, debug)
 * - File logging with daily rotation
 * - Console output for development (stdout, or stderr for CLI tools)
 * - Structured JSON logs
 * - Context injection (service, requestId, etc)
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface LoggerConfig {
  /** Service name (api, cli) */
  service: string;
  /** Log level */
  level?: LogLevel;
  /** Enable console output */
  console?: boolean;
  /** Send every console level to stderr (keeps stdout free for program output) */
  stderr?: boolean;
  /** Enable file logging */
  file?: boolean;
  /** Log directory */
  logDir?: string;
  /** Drop everything (tests) */
  silent?: boolean;
}

export interface LogContext {
  [key: string]: unknown;
}

/**
 * Narrow an arbitrary string (usually LOG_LEVEL) to a LogLevel
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

function buildTransports(config: LoggerConfig): winston.transport[] {
  // Define log format
  const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true }),
    winston.format.metadata({ fillExcept: ['message', 'level', 'timestamp', 'service'] }),
    winston.format.json()
  );

  // Console format (pretty print for dev)
  const consoleFormat = winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
      const metaStr = Object.keys(meta).length > 0 ? `\n${JSON.stringify(meta, null, 2)}` : '';
      return `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}${metaStr}`;
    })
  );

  const transports: winston.transport[] = [];

  if (config.console !== false) {
    transports.push(
      new winston.transports.Console({
        format: consoleFormat,
        stderrLevels: config.stderr ? [...LOG_LEVELS] : ['error'],
        silent: config.silent,
      })
    );
  }

  if (config.file !== false && !config.silent) {
    const logDir = config.logDir || path.join(process.cwd(), 'logs', config.service);
    fs.mkdirSync(logDir, { recursive: true });

    // Combined logs
    transports.push(
      new DailyRotateFile({
        filename: path.join(logDir, `${config.service}-%DATE%.log`),
        datePattern: 'YYYY-MM-DD',
        maxSize: '20m',
        maxFiles: '14d',
        format: logFormat,
      })
    );

    // Error logs (separate file)
    transports.push(
      new DailyRotateFile({
        filename: path.join(logDir, `${config.service}-error-%DATE%.log`),
        datePattern: 'YYYY-MM-DD',
        maxSize: '20m',
        maxFiles: '30d',
        level: 'error',
        format: logFormat,
      })
    );
  }

  // winston complains when it has nowhere to write
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ silent: true }));
  }

  return transports;
}

/**
 * Logger class with structured logging
 */
export class Logger {
  private logger: winston.Logger;
  readonly service: string;

  constructor(config: LoggerConfig, instance?: winston.Logger) {
    this.service = config.service;
    this.logger =
      instance ??
      winston.createLogger({
        level: config.level || 'info',
        defaultMeta: { service: config.service },
        transports: buildTransports(config),
      });
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

  private log(level: LogLevel, message: string, context?: LogContext): void {
    this.logger.log(level, message, context);
  }

  /**
   * Create child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger({ service: this.service }, this.logger.child(context));
  }

  /**
   * Close logger and flush logs
   */
  async close(): Promise<void> {
    return new Promise((resolve) => {
      this.logger.close();
      // Give it a moment to flush
      setTimeout(resolve, 100);
    });
  }
}

/**
 * Create a logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
