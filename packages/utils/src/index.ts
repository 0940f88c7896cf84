/**
 * @cloverrun/utils - Shared utilities package
 *
 * Logger, error classes and environment configuration. No simulation
 * logic lives here.
 */

// Logging
export { logger, Logger, winstonLogger, createLogger, readLoggerConfig } from './logger.js';
export type { LogContext, LoggerConfig } from './logger.js';

// Configuration loading
export * from './config/index.js';

// Error handling
export * from './errors.js';
