#!/usr/bin/env -S node --import tsx

/**
 * cloverrun CLI Entry Point
 *
 * Command modules register themselves in commandRegistry when imported (side effects).
 * registerXCommands functions add Commander options and wire them to execute(),
 * which uses handlers from the registry.
 */

// Before anything reads process.env (the logger does at import time)
import 'dotenv/config';
import { program } from 'commander';
import { logger } from '@cloverrun/utils';
import { handleError } from '../core/error-handler.js';
import { registerSimulationCommands } from '../commands/simulation.js';
import { registerDeckCommands } from '../commands/deck.js';

program
  .name('cloverrun')
  .description('Sequential CloverLeaf simulation runner')
  .version('1.0.0');

registerSimulationCommands(program);
registerDeckCommands(program);

program.configureOutput({
  writeErr: (str) => {
    process.stderr.write(str);
  },
});

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (error) {
    const message = handleError(error);
    console.error(`Error: ${message}`);
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled error in CLI', error);
  process.exitCode = 1;
});

export { program };
