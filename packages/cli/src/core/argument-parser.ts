/**
 * Argument Parser
 *
 * Commander hands over camelCase keys with string values. Keys are never
 * renamed here; only values are coerced before the command's zod schema
 * gets them.
 */

import type { z } from 'zod';
import { ValidationError } from '@cloverrun/utils';

/**
 * One `  path: message` line per zod issue
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Validate raw arguments against a command schema.
 *
 * @throws ValidationError listing every failing field
 */
export function parseArguments<T extends z.ZodTypeAny>(
  schema: T,
  rawArgs: Record<string, unknown>
): z.infer<T> {
  const parsed = schema.safeParse(rawArgs);
  if (parsed.success) {
    return parsed.data;
  }
  const lines = formatIssues(parsed.error);
  throw new ValidationError(`Invalid arguments:\n${lines.join('\n')}`, {
    issues: parsed.error.issues,
    formattedMessages: lines,
  });
}

/**
 * "true"/"false" become booleans; a string becomes a number only when the
 * number prints back as the same text, so "007", "1e3" and paths stay
 * strings.
 */
export function coerceOptionValue(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;

  const trimmed = value.trim();
  if (trimmed === '') return value;
  const asNumber = Number(trimmed);
  return Number.isFinite(asNumber) && String(asNumber) === trimmed ? asNumber : value;
}

/**
 * Drop unset options and coerce the rest
 */
export function normalizeOptions(options: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(options)
      .filter(([, value]) => value !== undefined && value !== null)
      .map(([key, value]) => [key, coerceOptionValue(value)])
  );
}
