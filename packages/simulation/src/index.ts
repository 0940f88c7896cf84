/**
 * @cloverrun/simulation
 *
 * Everything that touches the simulation binary's working directory:
 * deck rendering and generation, run classification and execution.
 */

export { SIMULATION_FILES, COMPLETION_MARKER, type SimulationFileNames } from './layout.js';
export {
  DECK_BEGIN,
  DECK_END,
  formatDeckNumber,
  renderInputDeck,
  parseInputDeck,
} from './deck/input-deck.js';
export {
  RANDOM_RANGES,
  drawOneDecimal,
  randomizeRunConfig,
  assertValidRunConfig,
  writeInputDeck,
  generateInputDeck,
  type Range,
  type RandomRanges,
  type GenerateDeckOptions,
} from './deck/generate.js';
export { WorkingDirectory } from './working-directory.js';
export { classifyRun, type RunClassification } from './executor/classify.js';
export {
  RunExecutor,
  type RunExecutorOptions,
  type BuildReport,
} from './executor/run-executor.js';
