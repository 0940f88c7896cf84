/**
 * Working directory handle
 *
 * The binary's working directory is shared, mutable and single-writer: one
 * iteration at a time, and it must hold no artifact files before the next
 * run starts. Every component that touches it goes through this handle
 * rather than joining paths on its own.
 */

import { existsSync } from 'fs';
import { readdir, readFile, unlink } from 'fs/promises';
import { join } from 'path';
import type { RunArtifacts } from '@cloverrun/core';
import { FilesystemError, errorMessage } from '@cloverrun/utils';
import { SIMULATION_FILES, type SimulationFileNames } from './layout.js';

export class WorkingDirectory {
  readonly path: string;
  readonly files: SimulationFileNames;

  constructor(path: string, files: SimulationFileNames = SIMULATION_FILES) {
    this.path = path;
    this.files = files;
  }

  get deckPath(): string {
    return join(this.path, this.files.deck);
  }

  get logPath(): string {
    return join(this.path, this.files.log);
  }

  get manifestPath(): string {
    return join(this.path, this.files.manifest);
  }

  exists(): boolean {
    return existsSync(this.path);
  }

  hasDeck(): boolean {
    return existsSync(this.deckPath);
  }

  /**
   * Snapshot files currently in the directory, sorted by name
   */
  async listSnapshots(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.path);
    } catch (error) {
      throw new FilesystemError(
        `Failed to list ${this.path}: ${errorMessage(error)}`,
        this.path,
        'readdir'
      );
    }
    return entries
      .filter((name) => name.endsWith(this.files.snapshotExtension))
      .sort()
      .map((name) => join(this.path, name));
  }

  /**
   * Log contents, or null when the binary never wrote one
   */
  async readLog(): Promise<string | null> {
    if (!existsSync(this.logPath)) {
      return null;
    }
    try {
      return await readFile(this.logPath, 'utf8');
    } catch (error) {
      throw new FilesystemError(
        `Failed to read ${this.logPath}: ${errorMessage(error)}`,
        this.logPath,
        'read'
      );
    }
  }

  /**
   * Artifacts a run would hand to the collector: snapshots, manifest, log
   */
  async collectArtifacts(): Promise<RunArtifacts> {
    return {
      log: this.logPath,
      manifest: existsSync(this.manifestPath) ? this.manifestPath : undefined,
      snapshots: await this.listSnapshots(),
    };
  }

  /**
   * Artifact files still present: anything the next run would mix up with
   * its own output. The deck is not residue.
   */
  async residue(): Promise<string[]> {
    const leftovers = await this.listSnapshots();
    for (const file of [this.logPath, this.manifestPath]) {
      if (existsSync(file)) {
        leftovers.push(file);
      }
    }
    return leftovers;
  }

  /**
   * Throws when any artifact file is still present
   */
  async assertDrained(): Promise<void> {
    const leftovers = await this.residue();
    if (leftovers.length > 0) {
      throw new FilesystemError(
        `Working directory not drained: ${leftovers.length} artifact file(s) remain`,
        this.path,
        'drain',
        { residue: leftovers }
      );
    }
  }

  /**
   * Delete every snapshot file. Returns the paths removed.
   */
  async removeSnapshots(): Promise<string[]> {
    const snapshots = await this.listSnapshots();
    for (const file of snapshots) {
      try {
        await unlink(file);
      } catch (error) {
        throw new FilesystemError(`Failed to remove ${file}: ${errorMessage(error)}`, file, 'unlink');
      }
    }
    return snapshots;
  }
}
