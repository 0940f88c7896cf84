import type {
  ClockPort,
  DeckMode,
  IterationArchive,
  RunConfig,
  RunConfigOverrides,
  RunResult,
  RunStatus,
  StepOutcome,
} from '@cloverrun/core';
import type { BuildReport, WorkingDirectory } from '@cloverrun/simulation';
import type {
  ArchiveIterationParams,
  CollectIterationParams,
  CollectedIteration,
} from '@cloverrun/storage';
import type { RunPhase } from './simulation/runStateMachine.js';

/**
 * Run iterations specification - what to run, not how.
 */
export type RunIterationsSpec = {
  iterations: number;
  mode: DeckMode;
  /** Base configuration, CLI flags already applied */
  config: RunConfig;
  /** Fields pinned by the operator; they win over randomized draws */
  overrides?: RunConfigOverrides;
  /** Seed for randomized decks; drawn from the clock when absent */
  seed?: number;
  /** Root for iteration_<i> directories */
  outputDir: string;
};

export type PhaseTimings = {
  prepareMs: number;
  executeMs?: number;
  collectMs?: number;
  postProcessMs?: number;
  archiveMs?: number;
};

/**
 * Per-iteration report. status is 'completed' once the artifacts are
 * collected; archive and post-processing problems are recorded alongside.
 */
export type IterationReport = {
  iteration: number;
  label: string;
  mode: DeckMode;
  status: 'completed' | 'failed';
  /** Config written to (or read from) the deck */
  config?: RunConfig;
  run?: {
    status: RunStatus;
    reason?: string;
    exitCode?: number;
    timedOut: boolean;
    durationMs: number;
    logPath: string;
    snapshots: number;
  };
  iterationDir?: string;
  archive?: IterationArchive;
  errorCode?: string;
  errorMessage?: string;
  warnings: string[];
  timings: PhaseTimings;
};

export type ArchiveFailure = {
  iteration: number;
  iterationDir: string;
  errorCode: string;
  errorMessage: string;
};

export type RunIterationsResult = {
  runId: string;
  status: 'completed' | 'halted';
  mode: DeckMode;
  seed?: number;
  startedAtISO: string;
  finishedAtISO: string;
  totalDurationMs: number;
  build: BuildReport;
  planned: number;
  attempted: number;
  succeeded: number;
  /** Iteration the run halted in */
  failedAt?: number;
  haltReason?: string;
  /** Where to look when a run failed */
  failedLogPath?: string;
  iterations: IterationReport[];
  archives: IterationArchive[];
  archiveFailures: ArchiveFailure[];
  exitCode: 0 | 1;
};

export type IterationProgressEvent = {
  iteration: number;
  total: number;
  phase: RunPhase | 'completed' | 'halted';
};

export type PostProcessor = {
  command: string;
  run: (q: { iteration: number; iterationDir: string }) => Promise<StepOutcome<void>>;
};

export type WorkflowContext = {
  clock: ClockPort & { nowISO(): string };
  ids: { newRunId(): string };
  logger: {
    info: (message: string, context?: unknown) => void;
    warn: (message: string, context?: unknown) => void;
    error: (message: string, context?: unknown) => void;
    debug?: (message: string, context?: unknown) => void;
  };

  /** Shared by executor, collector and archiver */
  workingDir: WorkingDirectory;

  executor: {
    ensureBinary: () => Promise<BuildReport>;
    execute: () => Promise<RunResult>;
  };

  collector: {
    collect: (q: CollectIterationParams) => Promise<StepOutcome<CollectedIteration>>;
  };

  archiver: {
    archive: (q: ArchiveIterationParams) => Promise<StepOutcome<IterationArchive>>;
    cleanWorkingDirectory: (workingDir: WorkingDirectory) => Promise<StepOutcome<string[]>>;
  };

  postProcessor?: PostProcessor;

  onProgress?: (event: IterationProgressEvent) => void;
};
