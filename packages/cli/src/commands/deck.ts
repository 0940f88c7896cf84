/**
 * Input Deck Commands
 */

import type { Command } from 'commander';
import type { CommandDefinition, PackageCommandModule } from '../types/index.js';
import { defineCommand } from '../core/defineCommand.js';
import { commandRegistry } from '../core/command-registry.js';
import { generateDeckSchema, parseDeckSchema } from '../command-defs/deck.js';
import { generateDeckHandler } from '../handlers/deck/generate-deck.js';
import { parseDeckHandler } from '../handlers/deck/parse-deck.js';
import { addRunConfigOverrideOptions } from './run-config-options.js';

/**
 * Register deck commands
 */
export function registerDeckCommands(program: Command): void {
  const deckCmd = program.command('deck').description('Input deck operations');

  const generateCmd = deckCmd
    .command('generate [file]')
    .description('Write one input deck (randomized unless --fixed)')
    .option('--fixed', 'Use configured values instead of random draws')
    .option('--cells <n>', 'Grid cells per side (x_cells = y_cells)')
    .option('--steps <n>', 'End step')
    .option('--visit-freq <n>', 'Snapshot frequency in steps')
    .option('--seed <n>', 'Seed for the random draws')
    .option('--base-dir <path>', 'Project root, used when no file is given')
    .option('--format <format>', 'Output format (json, table, csv)', 'table');
  addRunConfigOverrideOptions(generateCmd);

  defineCommand(generateCmd, {
    name: 'generate',
    packageName: 'deck',
    argsToOpts: ([file], opts) => ({ ...opts, file }),
  });

  const parseCmd = deckCmd
    .command('parse <file>')
    .description('Print the fields of an input deck')
    .option('--format <format>', 'Output format (json, table, csv)', 'table');

  defineCommand(parseCmd, {
    name: 'parse',
    packageName: 'deck',
    argsToOpts: ([file], opts) => ({ ...opts, file }),
  });
}

const generateCommand: CommandDefinition<typeof generateDeckSchema> = {
  name: 'generate',
  description: 'Write one input deck (randomized unless --fixed)',
  schema: generateDeckSchema,
  handler: generateDeckHandler,
  examples: [
    'cloverrun deck generate',
    'cloverrun deck generate ./clover.in --seed 7',
    'cloverrun deck generate ./clover.in --fixed --cells 128',
  ],
};

const parseCommand: CommandDefinition<typeof parseDeckSchema> = {
  name: 'parse',
  description: 'Print the fields of an input deck',
  schema: parseDeckSchema,
  handler: parseDeckHandler,
  examples: ['cloverrun deck parse CloverLeaf_Serial/clover.in --format json'],
};

const deckModule: PackageCommandModule = {
  packageName: 'deck',
  description: 'Input deck operations',
  commands: [generateCommand, parseCommand],
};

commandRegistry.registerPackage(deckModule);
