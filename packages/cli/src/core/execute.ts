/**
 * Universal Command Executor
 *
 * Handles all the boring universal stuff:
 * - Normalize options
 * - Parse arguments (Zod validation)
 * - Create context
 * - Call handler
 * - Format output
 * - Error handling and exit code
 */

import type { z } from 'zod';
import { logger } from '@cloverrun/utils';
import { validateAndCoerceArgs } from './validation-pipeline.js';
import { formatOutput } from './output-formatter.js';
import { handleError } from './error-handler.js';
import { CommandContext } from './command-context.js';
import { getProgressIndicator, resetProgressIndicator } from './progress-indicator.js';
import type { CommandDefinition, OutputFormat } from '../types/index.js';

export interface ExecuteOptions {
  packageName?: string;
  /**
   * Context override (for testing)
   */
  context?: CommandContext;
  /**
   * Where formatted output goes (defaults to console.log)
   */
  write?: (output: string) => void;
}

const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table', 'csv'];

function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Flags the executor itself acts on. Format is a CLI concern, not a handler
 * concern.
 */
function readCliFlags(args: unknown): { verbose: boolean; format: OutputFormat } {
  if (typeof args !== 'object' || args === null) {
    return { verbose: false, format: 'table' };
  }
  const verbose = 'verbose' in args && args.verbose === true;
  const format = 'format' in args && isOutputFormat(args.format) ? args.format : 'table';
  return { verbose, format };
}

/**
 * Exit code a handler asks for through an `exitCode` field on its result
 */
export function resultExitCode(result: unknown): number {
  if (typeof result === 'object' && result !== null && 'exitCode' in result) {
    const { exitCode } = result;
    if (typeof exitCode === 'number' && Number.isInteger(exitCode)) {
      return exitCode;
    }
  }
  return 0;
}

/**
 * Execute a command definition with pre-validated arguments
 *
 * Use this when arguments have already been validated (e.g., from defineCommand).
 * Returns the exit code, which is also set on process.exitCode.
 */
export async function executeValidated<TSchema extends z.ZodTypeAny>(
  commandDef: CommandDefinition<TSchema>,
  validatedArgs: z.infer<TSchema>,
  options: ExecuteOptions = {}
): Promise<number> {
  const fullCommandName = options.packageName
    ? `${options.packageName}.${commandDef.name}`
    : commandDef.name;
  const write = options.write ?? ((output: string) => console.log(output));
  const progress = getProgressIndicator();

  const { verbose: isVerboseMode, format } = readCliFlags(validatedArgs);

  let exitCode: number;
  try {
    if (!isVerboseMode) {
      progress.start(`Running ${fullCommandName}...`);
    }

    const ctx = options.context ?? new CommandContext();
    const result = await commandDef.handler(validatedArgs, ctx);

    progress.stop();
    write(formatOutput(result, format));
    exitCode = resultExitCode(result);
  } catch (error) {
    progress.fail('Error occurred');
    const message = handleError(error, { command: fullCommandName });
    console.error(`Error: ${message}`);
    exitCode = 1;
  } finally {
    resetProgressIndicator();
  }

  if (exitCode !== 0) {
    logger.debug('Command finished with non-zero exit code', {
      command: fullCommandName,
      exitCode,
    });
  }
  process.exitCode = exitCode;
  return exitCode;
}

/**
 * Execute a command definition with raw options
 *
 * This is the entry point for raw Commander.js options.
 * It normalizes and validates arguments before calling the handler.
 */
export async function execute<TSchema extends z.ZodTypeAny>(
  commandDef: CommandDefinition<TSchema>,
  rawOptions: Record<string, unknown>,
  options: ExecuteOptions = {}
): Promise<number> {
  let args: z.infer<TSchema>;
  try {
    args = validateAndCoerceArgs(commandDef.schema, rawOptions);
  } catch (error) {
    const message = handleError(error, { command: commandDef.name });
    console.error(`Error: ${message}`);
    process.exitCode = 1;
    return 1;
  }
  return executeValidated(commandDef, args, options);
}
