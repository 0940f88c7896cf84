/**
 * Archiver
 *
 * Packs an iteration directory into one tar.gz under the archive root, then
 * removes any snapshot files still sitting in the binary's working directory
 * (residue of a crashed earlier run, for example).
 *
 * A failed archive never touches the iteration directory: the raw artifacts
 * stay where the collector put them.
 */

import { existsSync } from 'fs';
import { mkdir, rm } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { DateTime } from 'luxon';
import { create as createTar } from 'tar';
import {
  createSystemClock,
  type ClockPort,
  type IterationArchive,
  type StepOutcome,
} from '@cloverrun/core';
import type { WorkingDirectory } from '@cloverrun/simulation';
import { errorMessage } from '@cloverrun/utils';
import { buildArchiveName, DEFAULT_ARCHIVE_PREFIX } from './archive-naming.js';
import { logger } from '../logger.js';

export interface IterationArchiverOptions {
  archiveDir: string;
  prefix?: string;
  clock?: ClockPort;
  /** Zone for archive timestamps; local time by default */
  zone?: string;
}

export interface ArchiveIterationParams {
  iteration: number;
  total: number;
  iterationDir: string;
}

export class IterationArchiver {
  private readonly clock: ClockPort;
  private readonly prefix: string;

  constructor(private readonly options: IterationArchiverOptions) {
    this.clock = options.clock ?? createSystemClock();
    this.prefix = options.prefix ?? DEFAULT_ARCHIVE_PREFIX;
  }

  get archiveDir(): string {
    return this.options.archiveDir;
  }

  async archive(params: ArchiveIterationParams): Promise<StepOutcome<IterationArchive>> {
    const { iteration, total, iterationDir } = params;
    const nowMs = this.clock.nowMs();
    const archiveName = buildArchiveName({
      timestampMs: nowMs,
      iteration,
      total,
      prefix: this.prefix,
      zone: this.options.zone,
    });
    const archivePath = join(this.options.archiveDir, archiveName);

    if (!existsSync(iterationDir)) {
      return {
        ok: false,
        errorCode: 'ITERATION_DIR_MISSING',
        errorMessage: `Nothing to archive: ${iterationDir} does not exist`,
      };
    }

    if (existsSync(archivePath)) {
      return {
        ok: false,
        errorCode: 'ARCHIVE_EXISTS',
        errorMessage: `Archive ${archivePath} already exists; not overwriting`,
      };
    }

    try {
      await mkdir(this.options.archiveDir, { recursive: true });
      await createTar(
        { gzip: true, portable: true, file: archivePath, cwd: dirname(iterationDir) },
        [basename(iterationDir)]
      );
    } catch (error) {
      logger.error('Archive creation failed', error, { iteration, archivePath });
      // Drop the partial archive only; the iteration directory stays
      await rm(archivePath, { force: true }).catch((cleanupError: unknown) => {
        logger.warn('Could not remove partial archive', {
          archivePath,
          error: errorMessage(cleanupError),
        });
      });
      return {
        ok: false,
        errorCode: 'ARCHIVE_FAILED',
        errorMessage: `Failed to create ${archiveName}: ${errorMessage(error)}`,
        cause: error,
      };
    }

    const createdAtISO = DateTime.fromMillis(nowMs).toUTC().toISO() ?? new Date(nowMs).toISOString();
    logger.info('Created archive', { iteration, archivePath });

    return {
      ok: true,
      value: { iteration, archiveName, archivePath, createdAtISO },
    };
  }

  /**
   * Delete snapshot files left directly in the working directory
   */
  async cleanWorkingDirectory(workingDir: WorkingDirectory): Promise<StepOutcome<string[]>> {
    try {
      const removed = await workingDir.removeSnapshots();
      if (removed.length > 0) {
        logger.warn('Removed leftover snapshot files from working directory', {
          workingDir: workingDir.path,
          count: removed.length,
        });
      }
      return { ok: true, value: removed };
    } catch (error) {
      return {
        ok: false,
        errorCode: 'CLEANUP_FAILED',
        errorMessage: errorMessage(error),
        cause: error,
      };
    }
  }
}
