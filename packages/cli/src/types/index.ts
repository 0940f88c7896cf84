/**
 * CLI-specific type definitions
 */

import type { z } from 'zod';
import type { CommandContext } from '../core/command-context.js';

/**
 * Command definition structure
 */
export interface CommandDefinition<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
  /**
   * Command name (e.g., 'run', 'generate')
   */
  name: string;

  /**
   * Command description for help text
   */
  description: string;

  /**
   * Zod schema for argument validation
   */
  schema: TSchema;

  /**
   * Command handler. Receives arguments already validated against schema.
   */
  handler(args: z.infer<TSchema>, ctx: CommandContext): Promise<unknown> | unknown;

  /**
   * Optional examples for help text
   */
  examples?: string[];
}

/**
 * Package command module structure
 */
export interface PackageCommandModule {
  /**
   * Package name (e.g., 'simulation', 'deck')
   */
  packageName: string;

  /**
   * Package description
   */
  description: string;

  /**
   * Commands in this package
   */
  commands: CommandDefinition[];
}

/**
 * Output format options
 */
export type OutputFormat = 'json' | 'table' | 'csv';
