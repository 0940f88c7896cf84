import { DateTime } from 'luxon';
import { v4 as uuidv4 } from 'uuid';
import { createSystemClock, type ClockPort } from '@cloverrun/core';
import { RunExecutor, WorkingDirectory } from '@cloverrun/simulation';
import { collectIteration, IterationArchiver } from '@cloverrun/storage';
import { createLogger, type Logger, type RunnerPaths } from '@cloverrun/utils';
import { createShellPostProcessor } from '../simulation/postProcess.js';
import type { IterationProgressEvent, WorkflowContext } from '../types.js';

// Re-export WorkflowContext for convenience
export type { WorkflowContext } from '../types.js';

export interface ProductionContextConfig {
  /**
   * Resolved project layout (binary, output and archive locations)
   */
  paths: RunnerPaths;

  /**
   * Kill a run after this many milliseconds; unset waits indefinitely
   */
  timeoutMs?: number;

  /**
   * Shell command run after each iteration is collected
   */
  postProcessCommand?: string;

  archivePrefix?: string;

  /**
   * Zone for archive timestamps (defaults to local time)
   */
  archiveZone?: string;

  /**
   * Pass the binary's own output through to the terminal
   */
  inheritOutput?: boolean;

  /**
   * Optional logger override (defaults to the namespaced winston logger)
   */
  logger?: WorkflowContext['logger'];

  /**
   * Optional clock override (for testing)
   */
  clock?: ClockPort;

  /**
   * Optional ID generator override (for testing)
   */
  ids?: {
    newRunId: () => string;
  };

  onProgress?: (event: IterationProgressEvent) => void;
}

/**
 * Create a production WorkflowContext with real dependencies
 *
 * This wires up:
 * - the binary's working directory handle
 * - the execa-backed run executor (build on demand, optional timeout)
 * - the artifact collector and tar archiver
 * - the optional shell post-processing hook
 * - real clock and ID generation
 */
export function createProductionContext(config: ProductionContextConfig): WorkflowContext {
  const clock = config.clock ?? createSystemClock();
  const workingDir = new WorkingDirectory(config.paths.binaryDir);
  const executor = new RunExecutor(workingDir, {
    binaryPath: config.paths.binaryPath,
    buildCommands: config.paths.buildCommands,
    timeoutMs: config.timeoutMs,
    inheritOutput: config.inheritOutput,
    clock,
  });
  const archiver = new IterationArchiver({
    archiveDir: config.paths.archiveDir,
    prefix: config.archivePrefix,
    zone: config.archiveZone,
    clock,
  });
  const logger = config.logger ?? adaptLogger(createLogger('@cloverrun/workflows'));

  return {
    clock: {
      nowMs: () => clock.nowMs(),
      nowISO: () => DateTime.fromMillis(clock.nowMs()).toUTC().toISO() ?? '',
    },
    ids: config.ids ?? { newRunId: () => uuidv4() },
    logger,
    workingDir,
    executor: {
      ensureBinary: () => executor.ensureBinary(),
      execute: () => executor.execute(),
    },
    collector: { collect: collectIteration },
    archiver: {
      archive: (q) => archiver.archive(q),
      cleanWorkingDirectory: (dir) => archiver.cleanWorkingDirectory(dir),
    },
    postProcessor: config.postProcessCommand
      ? createShellPostProcessor(config.postProcessCommand, {
          cwd: config.paths.baseDir,
          timeoutMs: config.timeoutMs,
          inheritOutput: config.inheritOutput,
        })
      : undefined,
    onProgress: config.onProgress,
  };
}

function adaptLogger(logger: Logger): WorkflowContext['logger'] {
  return {
    info: (message, context) => logger.info(message, toLogContext(context)),
    warn: (message, context) => logger.warn(message, toLogContext(context)),
    error: (message, context) => logger.error(message, undefined, toLogContext(context)),
    debug: (message, context) => logger.debug(message, toLogContext(context)),
  };
}

function toLogContext(context: unknown): Record<string, unknown> | undefined {
  if (context === undefined) return undefined;
  if (typeof context === 'object' && context !== null && !Array.isArray(context)) {
    return Object.fromEntries(Object.entries(context));
  }
  return { detail: context };
}
