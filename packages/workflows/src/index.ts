export type {
  WorkflowContext,
  RunIterationsSpec,
  RunIterationsResult,
  IterationReport,
  PhaseTimings,
  ArchiveFailure,
  IterationProgressEvent,
  PostProcessor,
} from './types.js';

export { runIterations } from './simulation/runIterations.js';
export {
  RunStateMachine,
  IllegalTransitionError,
  describeState,
  type RunPhase,
  type RunState,
} from './simulation/runStateMachine.js';
export {
  createShellPostProcessor,
  ITERATION_ENV,
  ITERATION_DIR_ENV,
  type ShellPostProcessorOptions,
} from './simulation/postProcess.js';
export { createProductionContext } from './context/createProductionContext.js';
export type { ProductionContextConfig } from './context/createProductionContext.js';
