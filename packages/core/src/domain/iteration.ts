/**
 * Iteration domain types
 *
 * An iteration is one generate → execute → collect → archive cycle. The plan
 * fixes how many iterations run and where each one's deck comes from.
 */

/**
 * Where an iteration's input deck comes from
 * - fixed: render the configured RunConfig
 * - randomized: draw a fresh RunConfig from the seeded RNG
 * - existing: reuse the deck already present in the working directory
 */
export type DeckMode = 'fixed' | 'randomized' | 'existing';

export interface IterationPlanEntry {
  /** 1-based */
  index: number;
  /** Zero-padded index used in file and archive names */
  label: string;
  mode: DeckMode;
}

export interface IterationPlan {
  total: number;
  mode: DeckMode;
  entries: IterationPlanEntry[];
}

/**
 * Zero-pad an iteration index. At least two digits, wider when the plan
 * itself needs more, so every label in a plan has the same width.
 */
export function formatIterationIndex(index: number, total: number = index): string {
  const width = Math.max(2, String(Math.max(total, index)).length);
  return String(index).padStart(width, '0');
}

/**
 * Build an ordered plan [1..total]
 */
export function createIterationPlan(total: number, mode: DeckMode): IterationPlan {
  if (!Number.isInteger(total) || total < 1) {
    throw new RangeError(`Iteration count must be a positive integer, got ${total}`);
  }
  const entries: IterationPlanEntry[] = [];
  for (let index = 1; index <= total; index++) {
    entries.push({ index, label: formatIterationIndex(index, total), mode });
  }
  return { total, mode, entries };
}

export type RunStatus = 'success' | 'failed';

/**
 * Files a run left in the working directory, as absolute paths
 */
export interface RunArtifacts {
  log: string;
  /** Snapshot index file; absent when the binary did not write one */
  manifest?: string;
  snapshots: string[];
}

/**
 * Outcome of one executor invocation
 */
export interface RunResult {
  status: RunStatus;
  /** Why the run counts as failed */
  reason?: string;
  exitCode?: number;
  timedOut: boolean;
  durationMs: number;
  logPath: string;
  artifacts: RunArtifacts;
}

/**
 * One compressed bundle per iteration
 */
export interface IterationArchive {
  iteration: number;
  archiveName: string;
  archivePath: string;
  createdAtISO: string;
}

/**
 * Success-or-failure-with-reason result surfaced by pipeline steps. Only the
 * orchestrator decides what a failure means for the run.
 */
export type StepOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; errorCode: string; errorMessage: string; cause?: unknown };
