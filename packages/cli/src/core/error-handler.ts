/**
 * Error Handler - User-friendly error messages, no secret leakage
 */

import { AppError, BuildError, ConfigurationError, ProcessError, logger } from '@cloverrun/utils';

/**
 * Sensitive patterns that should never appear in error messages
 */
const SENSITIVE_PATTERNS = [
  /api[_-]?key/i,
  /token/i,
  /secret/i,
  /password/i,
  /private[_-]?key/i,
  /bearer/i,
  /authorization/i,
];

function containsSensitiveInfo(message: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(message));
}

function sanitizeErrorMessage(message: string): string {
  if (containsSensitiveInfo(message)) {
    return 'An error occurred. Please check your configuration and try again.';
  }
  return message;
}

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return sanitizeErrorMessage(error.message);
  }

  if (typeof error === 'string') {
    return sanitizeErrorMessage(error);
  }

  return 'An unexpected error occurred';
}

/**
 * Add an operator hint for the failures that have an obvious next step
 */
export function handleRunnerError(error: unknown): string {
  const message = formatError(error);

  if (error instanceof BuildError) {
    return `${message} (check CLOVERRUN_BUILD_COMMANDS and the compiler toolchain)`;
  }
  if (error instanceof ConfigurationError) {
    return `${message} (see --base-dir and the CLOVERRUN_* environment variables)`;
  }
  if (error instanceof ProcessError) {
    return `${message} (is ${error.command} executable?)`;
  }

  return message;
}

/**
 * Log error with full context (for debugging)
 * This should include full error details, but never expose secrets
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  const sanitizedContext = context
    ? Object.fromEntries(
        Object.entries(context).map(([key, value]) => [
          key,
          containsSensitiveInfo(String(value)) ? '[REDACTED]' : value,
        ])
      )
    : undefined;

  logger.error('CLI error', error, {
    code: error instanceof AppError ? error.code : undefined,
    context: sanitizedContext,
  });
}

/**
 * Handle and format error for CLI output
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logError(error, context);
  return handleRunnerError(error);
}
