/**
 * Structured logging on winston.
 *
 * One process-wide winston instance; packages log through a namespaced
 * Logger from createLogger(). Console output goes to stderr so stdout stays
 * reserved for command output. File transports rotate daily under LOG_DIR.
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

export type LogContext = Record<string, unknown>;

export interface LoggerConfig {
  level: string;
  enableConsole: boolean;
  enableFile: boolean;
  /** JSON lines on the console instead of the colored dev format */
  jsonConsole: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
}

/**
 * LOG_LEVEL, LOG_CONSOLE, LOG_FILE, LOG_DIR, LOG_MAX_FILES, LOG_MAX_SIZE.
 * File logging is always off under NODE_ENV=test.
 */
export function readLoggerConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const production = env.NODE_ENV === 'production';
  return {
    level: env.LOG_LEVEL || (production ? 'info' : 'debug'),
    enableConsole: env.LOG_CONSOLE !== 'false',
    enableFile: env.LOG_FILE !== 'false' && env.NODE_ENV !== 'test',
    jsonConsole: production,
    logDir: env.LOG_DIR || path.join(process.cwd(), 'logs'),
    maxFiles: env.LOG_MAX_FILES || '14d',
    maxSize: env.LOG_MAX_SIZE || '20m',
  };
}

const TIMESTAMP = 'YYYY-MM-DD HH:mm:ss.SSS';

const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: TIMESTAMP }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: TIMESTAMP }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const details = Object.keys(meta).length > 0 ? `\n${JSON.stringify(meta, null, 2)}` : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${details}`;
  })
);

function rotatingFile(config: LoggerConfig, name: string, level?: string): DailyRotateFile {
  return new DailyRotateFile({
    filename: path.join(config.logDir, `${name}-%DATE%.log`),
    datePattern: 'YYYY-MM-DD',
    level,
    format: structuredFormat,
    maxSize: config.maxSize,
    maxFiles: config.maxFiles,
    zippedArchive: true,
  });
}

function createTransports(config: LoggerConfig): winston.transport[] {
  const transports: winston.transport[] = [];

  if (config.enableConsole) {
    transports.push(
      new winston.transports.Console({
        format: config.jsonConsole ? structuredFormat : consoleFormat,
        level: config.level,
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (config.enableFile) {
    try {
      fs.mkdirSync(config.logDir, { recursive: true });
      transports.push(rotatingFile(config, 'error', 'error'), rotatingFile(config, 'combined'));
    } catch (error) {
      process.stderr.write(`Failed to initialize file log transports: ${String(error)}\n`);
    }
  }

  // winston complains about a logger without transports
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ silent: true }));
  }
  return transports;
}

const config = readLoggerConfig();

export const winstonLogger = winston.createLogger({
  level: config.level,
  format: structuredFormat,
  defaultMeta: { service: 'cloverrun' },
  transports: createTransports(config),
  exitOnError: false,
});

function describeError(error: unknown): unknown {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack, name: error.name };
  }
  return error;
}

/**
 * Namespaced front for the shared winston instance
 */
export class Logger {
  constructor(readonly namespace: string) {}

  error(message: string, error?: unknown, context?: LogContext): void {
    const entry = this.entry(context);
    winstonLogger.error(message, error ? { ...entry, error: describeError(error) } : entry);
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, this.entry(context));
  }

  info(message: string, context?: LogContext): void {
    winstonLogger.info(message, this.entry(context));
  }

  debug(message: string, context?: LogContext): void {
    winstonLogger.debug(message, this.entry(context));
  }

  private entry(context?: LogContext): LogContext {
    return { namespace: this.namespace, ...context };
  }
}

export function createLogger(packageName: string): Logger {
  return new Logger(packageName);
}

export const logger = new Logger('cloverrun');
