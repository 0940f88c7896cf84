/**
 * Simulation Commands
 */

import type { Command } from 'commander';
import type { CommandDefinition, PackageCommandModule } from '../types/index.js';
import { defineCommand } from '../core/defineCommand.js';
import { commandRegistry } from '../core/command-registry.js';
import { runSchema } from '../command-defs/simulation.js';
import { runSimulationHandler } from '../handlers/simulation/run-simulation.js';
import { addRunConfigOverrideOptions } from './run-config-options.js';

/**
 * Register simulation commands
 */
export function registerSimulationCommands(program: Command): void {
  const simCmd = program
    .command('simulation')
    .description('Run the simulation binary over sequential iterations');

  const runCmd = simCmd
    .command('run')
    .description('Run N iterations: deck, execute, collect, archive')
    .option('--iterations <n>', 'Number of iterations', '1')
    .option('--cells <n>', 'Grid cells per side (x_cells = y_cells)')
    .option('--steps <n>', 'End step')
    .option('--visit-freq <n>', 'Snapshot frequency in steps')
    .option('--generate-input', 'Randomize a fresh deck for every iteration')
    .option('--reuse-deck', 'Run the deck already in the working directory as-is')
    .option('--base-dir <path>', 'Project root (defaults to CLOVERRUN_BASE_DIR or auto-detect)')
    .option('--seed <n>', 'Seed for randomized decks')
    .option('--timeout-ms <ms>', 'Kill a run that takes longer than this')
    .option('--post-process <command>', 'Shell command run after each iteration is collected')
    .option('--archive-prefix <prefix>', 'Archive file name prefix')
    .option('--format <format>', 'Output format (json, table, csv)', 'table')
    .option('--verbose', 'Show simulation output instead of a spinner');
  addRunConfigOverrideOptions(runCmd);

  defineCommand(runCmd, {
    name: 'run',
    packageName: 'simulation',
  });
}

const runCommand: CommandDefinition<typeof runSchema> = {
  name: 'run',
  description: 'Run N iterations: deck, execute, collect, archive',
  schema: runSchema,
  handler: runSimulationHandler,
  examples: [
    'cloverrun simulation run --iterations 3 --cells 64 --steps 10',
    'cloverrun simulation run --iterations 20 --generate-input --seed 42',
    'cloverrun simulation run --reuse-deck --post-process "python3 visualize.py"',
  ],
};

const simulationModule: PackageCommandModule = {
  packageName: 'simulation',
  description: 'Run the simulation binary over sequential iterations',
  commands: [runCommand],
};

commandRegistry.registerPackage(simulationModule);
