/**
 * @cloverrun/cli - command-line interface
 *
 * Public API exports for the CLI package
 */

export * from './core/command-registry.js';
export * from './core/argument-parser.js';
export * from './core/output-formatter.js';
export * from './core/error-handler.js';
export * from './core/command-context.js';
export * from './core/execute.js';
export * from './core/defineCommand.js';
export * from './types/index.js';
export { registerSimulationCommands } from './commands/simulation.js';
export { registerDeckCommands } from './commands/deck.js';
