/**
 * Custom Error Classes
 * ====================
 * Standardized error classes for the runner. Every error carries a stable
 * code and a context bag that ends up in the structured logs.
 */

export type ErrorContext = Record<string, unknown>;

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: ErrorContext;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    statusCode: number = 500,
    context?: ErrorContext,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - bad CLI arguments, invalid run configuration
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }
}

/**
 * Not found error - for missing resources
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, context?: ErrorContext) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404, { resource, identifier, ...context });
  }
}

/**
 * Configuration error - environment or project layout problems
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: ErrorContext) {
    super(message, 'CONFIGURATION_ERROR', 500, { configKey, ...context });
  }
}

/**
 * Build error - the simulation executable is missing and could not be built.
 * Always fatal for the whole run.
 */
export class BuildError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'BUILD_ERROR', 500, context);
  }
}

/**
 * Process error - an external process could not be started at all
 * (as opposed to starting and reporting failure)
 */
export class ProcessError extends AppError {
  public readonly command: string;

  constructor(message: string, command: string, context?: ErrorContext) {
    super(message, 'PROCESS_ERROR', 500, { command, ...context });
    this.command = command;
  }
}

/**
 * Filesystem error - permissions, missing directories, disk space
 */
export class FilesystemError extends AppError {
  public readonly path: string;

  constructor(message: string, path: string, operation?: string, context?: ErrorContext) {
    super(message, 'FILESYSTEM_ERROR', 500, { path, operation, ...context });
    this.path = path;
  }
}

/**
 * Extract a message from anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
