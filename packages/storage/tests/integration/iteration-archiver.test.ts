import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  realpathSync,
  rmSync,
  writeFileSync,
} from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { extract } from 'tar';
import { createFixedClock } from '@cloverrun/core';
import { WorkingDirectory } from '@cloverrun/simulation';
import { IterationArchiver } from '../../src/artifacts/iteration-archiver.js';

const AT = Date.UTC(2024, 2, 5, 7, 8, 9, 450);

describe('IterationArchiver', () => {
  let root: string;
  let iterationDir: string;
  let archiveDir: string;

  beforeEach(() => {
    root = realpathSync(mkdtempSync(join(tmpdir(), 'cloverrun-archive-')));
    iterationDir = join(root, 'out', 'iteration_1');
    archiveDir = join(root, 'archives');
    mkdirSync(iterationDir, { recursive: true });
    writeFileSync(join(iterationDir, 'clover.in'), 'deck');
    writeFileSync(join(iterationDir, 'clover.0001.vtk'), 'snapshot one');
    writeFileSync(join(iterationDir, 'clover.out'), 'Calculation complete');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function archiver(prefix?: string): IterationArchiver {
    return new IterationArchiver({ archiveDir, prefix, clock: createFixedClock(AT), zone: 'utc' });
  }

  it('should pack the iteration directory into one tar.gz', async () => {
    const outcome = await archiver().archive({ iteration: 1, total: 3, iterationDir });

    const archivePath = join(archiveDir, 'clover_data_20240305_070809_01.tar.gz');
    expect(outcome).toEqual({
      ok: true,
      value: {
        iteration: 1,
        archiveName: 'clover_data_20240305_070809_01.tar.gz',
        archivePath,
        createdAtISO: '2024-03-05T07:08:09.450Z',
      },
    });

    const unpacked = join(root, 'unpacked');
    mkdirSync(unpacked);
    await extract({ file: archivePath, cwd: unpacked });
    expect(readFileSync(join(unpacked, 'iteration_1', 'clover.0001.vtk'), 'utf8')).toBe(
      'snapshot one'
    );
    expect(readFileSync(join(unpacked, 'iteration_1', 'clover.in'), 'utf8')).toBe('deck');
    // The raw artifacts stay where they were
    expect(existsSync(join(iterationDir, 'clover.out'))).toBe(true);
  });

  it('should use the configured prefix', async () => {
    const outcome = await archiver('sweep').archive({ iteration: 2, total: 2, iterationDir });
    expect(outcome.ok && outcome.value.archiveName).toBe('sweep_20240305_070809_02.tar.gz');
  });

  it('should never overwrite an existing archive', async () => {
    mkdirSync(archiveDir);
    const existing = join(archiveDir, 'clover_data_20240305_070809_01.tar.gz');
    writeFileSync(existing, 'older');

    const outcome = await archiver().archive({ iteration: 1, total: 1, iterationDir });

    expect(outcome).toEqual({
      ok: false,
      errorCode: 'ARCHIVE_EXISTS',
      errorMessage: `Archive ${existing} already exists; not overwriting`,
    });
    expect(readFileSync(existing, 'utf8')).toBe('older');
  });

  it('should report a missing iteration directory', async () => {
    const missing = join(root, 'out', 'iteration_9');
    const outcome = await archiver().archive({ iteration: 9, total: 9, iterationDir: missing });
    expect(outcome).toEqual({
      ok: false,
      errorCode: 'ITERATION_DIR_MISSING',
      errorMessage: `Nothing to archive: ${missing} does not exist`,
    });
  });

  it('should leave the iteration directory alone when archiving fails', async () => {
    // A file where the archive directory should be
    writeFileSync(archiveDir, 'not a directory');

    const outcome = await archiver().archive({ iteration: 1, total: 1, iterationDir });

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.errorCode).toBe('ARCHIVE_FAILED');
    }
    expect(existsSync(join(iterationDir, 'clover.0001.vtk'))).toBe(true);
  });

  describe('cleanWorkingDirectory', () => {
    it('should remove leftover snapshots only', async () => {
      const binaryDir = join(root, 'bin');
      mkdirSync(binaryDir);
      writeFileSync(join(binaryDir, 'clover.in'), 'deck');
      writeFileSync(join(binaryDir, 'clover.0003.vtk'), 'stale');
      const workingDir = new WorkingDirectory(binaryDir);

      const outcome = await archiver().cleanWorkingDirectory(workingDir);

      expect(outcome).toEqual({ ok: true, value: [join(binaryDir, 'clover.0003.vtk')] });
      expect(existsSync(join(binaryDir, 'clover.in'))).toBe(true);
    });

    it('should report a failure to list the directory', async () => {
      const outcome = await archiver().cleanWorkingDirectory(
        new WorkingDirectory(join(root, 'missing'))
      );
      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.errorCode).toBe('CLEANUP_FAILED');
      }
    });
  });
});
