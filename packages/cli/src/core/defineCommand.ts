/**
 * Standard Command Wrapper
 *
 * - Commander owns flags & parsing
 * - Wrapper owns: canonical option shape (camelCase), value coercion, schema
 *   validation, handler invocation
 *
 * Validation always uses commandDef.schema from the registry, so the schema
 * lives in one place.
 *
 * Invariant: Normalization never renames keys. Ever.
 */

import type { Command } from 'commander';
import { NotFoundError } from '@cloverrun/utils';
import { execute, type ExecuteOptions } from './execute.js';
import { commandRegistry, type CommandRegistry } from './command-registry.js';

type CoerceFn = (raw: Record<string, unknown>) => Record<string, unknown>;

export type DefineCommandArgs = {
  name: string;
  packageName: string;
  // Merge Commander positional arguments into options before coercion
  argsToOpts?: (args: unknown[], rawOpts: Record<string, unknown>) => Record<string, unknown>;
  // Value coercion only (numbers/lists), NOT key renaming
  coerce?: CoerceFn;
  registry?: CommandRegistry;
  executeOptions?: ExecuteOptions;
};

/**
 * Standard command wiring:
 * - Commander parses flags -> camelCase properties
 * - Optional argsToOpts() for positional arguments
 * - Optional coerce() for value parsing only
 * - execute() validates with the registry schema and runs the handler
 */
export function defineCommand(cmd: Command, args: DefineCommandArgs): Command {
  cmd.name(args.name);

  cmd.action(async (...commanderArgs: unknown[]) => {
    const registry = args.registry ?? commandRegistry;
    const commandDef = registry.getCommand(args.packageName, args.name);
    if (!commandDef) {
      throw new NotFoundError('Command', `${args.packageName}.${args.name}`);
    }

    // Commander gives camelCase keys already
    const rawOpts = cmd.opts();

    // Commander passes (...positionals, options, command)
    const positionals = commanderArgs.slice(0, Math.max(0, commanderArgs.length - 2));
    const merged = args.argsToOpts ? args.argsToOpts(positionals, rawOpts) : rawOpts;
    const coerced = args.coerce ? args.coerce(merged) : merged;

    await execute(commandDef, coerced, {
      packageName: args.packageName,
      ...args.executeOptions,
    });
  });

  return cmd;
}
