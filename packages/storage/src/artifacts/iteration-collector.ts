/**
 * Artifact Collector
 *
 * Moves a successful run's output out of the working directory into its own
 * iteration directory and copies the deck that produced it alongside.
 * Moving (not copying) is what leaves the working directory empty for the
 * next run; the drain check afterwards enforces it.
 */

import { copyFile, mkdir } from 'fs/promises';
import { basename, join } from 'path';
import type { RunResult, StepOutcome } from '@cloverrun/core';
import type { WorkingDirectory } from '@cloverrun/simulation';
import { errorMessage } from '@cloverrun/utils';
import { moveFile } from './move-file.js';
import { logger } from '../logger.js';

export interface CollectIterationParams {
  iteration: number;
  /** Root under which iteration_<i> is created */
  outputDir: string;
  workingDir: WorkingDirectory;
  result: RunResult;
}

export interface CollectedIteration {
  iteration: number;
  iterationDir: string;
  /** Copy of the deck inside iterationDir */
  deckCopy: string;
  /** Every file now in iterationDir, deck copy included */
  files: string[];
}

export function iterationDirName(iteration: number): string {
  return `iteration_${iteration}`;
}

export async function collectIteration(
  params: CollectIterationParams
): Promise<StepOutcome<CollectedIteration>> {
  const { iteration, outputDir, workingDir, result } = params;

  if (result.status !== 'success') {
    return {
      ok: false,
      errorCode: 'RUN_NOT_SUCCESSFUL',
      errorMessage: `Iteration ${iteration} did not complete; refusing to collect`,
    };
  }

  const iterationDir = join(outputDir, iterationDirName(iteration));
  const deckCopy = join(iterationDir, workingDir.files.deck);
  const files: string[] = [deckCopy];
  const sources = [
    ...result.artifacts.snapshots,
    ...(result.artifacts.manifest ? [result.artifacts.manifest] : []),
    result.artifacts.log,
  ];

  try {
    await mkdir(iterationDir, { recursive: true });
    await copyFile(workingDir.deckPath, deckCopy);

    for (const source of sources) {
      const destination = join(iterationDir, basename(source));
      await moveFile(source, destination);
      files.push(destination);
    }
  } catch (error) {
    logger.error('Collection failed', error, { iteration, iterationDir });
    return {
      ok: false,
      errorCode: 'COLLECTION_FAILED',
      errorMessage: `Failed to collect iteration ${iteration} into ${iterationDir}: ${errorMessage(error)}`,
      cause: error,
    };
  }

  try {
    await workingDir.assertDrained();
  } catch (error) {
    return {
      ok: false,
      errorCode: 'WORKING_DIR_NOT_DRAINED',
      errorMessage: errorMessage(error),
      cause: error,
    };
  }

  logger.info('Collected iteration artifacts', {
    iteration,
    iterationDir,
    snapshots: result.artifacts.snapshots.length,
  });

  return { ok: true, value: { iteration, iterationDir, deckCopy, files } };
}
