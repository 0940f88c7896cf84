/**
 * RunExecutor - invokes the simulation binary and classifies the run
 *
 * The binary takes no arguments: it finds its deck by name in its working
 * directory and writes its log and snapshots beside it. Whether a run
 * succeeded is decided by classifyRun() over the log, never by exit code.
 */

import { existsSync } from 'fs';
import { execa, ExecaError } from 'execa';
import { createSystemClock, type ClockPort, type RunResult } from '@cloverrun/core';
import { BuildError, ProcessError, errorMessage } from '@cloverrun/utils';
import { classifyRun } from './classify.js';
import type { WorkingDirectory } from '../working-directory.js';
import { logger } from '../logger.js';

export interface RunExecutorOptions {
  /** Absolute path of the executable */
  binaryPath: string;
  /** Shell commands run in the working directory when the executable is missing */
  buildCommands?: string[];
  /** Kill the run after this many milliseconds; unset waits indefinitely */
  timeoutMs?: number;
  /** Pass the binary's stdout/stderr through instead of discarding it */
  inheritOutput?: boolean;
  clock?: ClockPort;
}

export interface BuildReport {
  built: boolean;
  commands: string[];
}

export class RunExecutor {
  private readonly clock: ClockPort;

  constructor(
    private readonly workingDir: WorkingDirectory,
    private readonly options: RunExecutorOptions
  ) {
    this.clock = options.clock ?? createSystemClock();
  }

  get binaryPath(): string {
    return this.options.binaryPath;
  }

  /**
   * Make sure the executable exists, building it when it does not.
   *
   * @throws BuildError if a build command fails or the executable is still
   * missing afterwards
   */
  async ensureBinary(): Promise<BuildReport> {
    if (existsSync(this.options.binaryPath)) {
      return { built: false, commands: [] };
    }

    const commands = this.options.buildCommands ?? [];
    logger.warn('Simulation executable not found, building', {
      binaryPath: this.options.binaryPath,
      commands,
    });

    if (commands.length === 0) {
      throw new BuildError(
        `Simulation executable not found at ${this.options.binaryPath} and no build commands are configured`,
        { binaryPath: this.options.binaryPath }
      );
    }

    for (const command of commands) {
      try {
        await execa(command, {
          shell: true,
          cwd: this.workingDir.path,
          stdio: this.options.inheritOutput ? 'inherit' : 'pipe',
        });
      } catch (error) {
        const stderr = error instanceof ExecaError ? String(error.stderr ?? '') : '';
        throw new BuildError(`Build command failed: ${command}`, {
          command,
          cwd: this.workingDir.path,
          exitCode: error instanceof ExecaError ? error.exitCode : undefined,
          stderr: stderr.slice(-2000),
          cause: errorMessage(error),
        });
      }
    }

    if (!existsSync(this.options.binaryPath)) {
      throw new BuildError(`Build finished but ${this.options.binaryPath} was not produced`, {
        binaryPath: this.options.binaryPath,
        commands,
      });
    }

    logger.info('Simulation executable built', { binaryPath: this.options.binaryPath });
    return { built: true, commands };
  }

  /**
   * Classify whatever the last run left in the working directory.
   * Reads only; calling it again gives the same answer.
   */
  async inspect(
    extra: { exitCode?: number; timedOut?: boolean; durationMs?: number } = {}
  ): Promise<RunResult> {
    const timedOut = extra.timedOut ?? false;
    const classification = timedOut
      ? {
          status: 'failed' as const,
          reason: `run exceeded timeout of ${this.options.timeoutMs ?? 0}ms`,
        }
      : classifyRun(await this.workingDir.readLog());

    return {
      status: classification.status,
      reason: classification.reason,
      exitCode: extra.exitCode,
      timedOut,
      durationMs: extra.durationMs ?? 0,
      logPath: this.workingDir.logPath,
      artifacts: await this.workingDir.collectArtifacts(),
    };
  }

  /**
   * Run the binary to completion and classify the result.
   *
   * @throws ProcessError when the binary cannot be started at all
   */
  async execute(): Promise<RunResult> {
    const startedAt = this.clock.nowMs();
    let exitCode: number | undefined;
    let timedOut = false;

    logger.debug('Starting simulation', {
      binaryPath: this.options.binaryPath,
      cwd: this.workingDir.path,
      timeoutMs: this.options.timeoutMs,
    });

    try {
      const result = await execa(this.options.binaryPath, [], {
        cwd: this.workingDir.path,
        timeout: this.options.timeoutMs,
        stdio: this.options.inheritOutput ? 'inherit' : 'ignore',
      });
      exitCode = result.exitCode;
    } catch (error) {
      if (!(error instanceof ExecaError)) {
        throw error;
      }
      if (error.timedOut) {
        timedOut = true;
      } else if (error.exitCode === undefined && error.signal === undefined) {
        // Never started: ENOENT, EACCES, bad interpreter
        throw new ProcessError(
          `Failed to start simulation: ${error.shortMessage}`,
          this.options.binaryPath,
          { cwd: this.workingDir.path }
        );
      }
      exitCode = error.exitCode;
      logger.warn('Simulation process exited abnormally', {
        exitCode: error.exitCode,
        signal: error.signal,
        timedOut: error.timedOut,
      });
    }

    const result = await this.inspect({
      exitCode,
      timedOut,
      durationMs: this.clock.nowMs() - startedAt,
    });

    if (result.status === 'success' && exitCode !== undefined && exitCode !== 0) {
      logger.warn('Run reported completion but exited non-zero', {
        exitCode,
        logPath: result.logPath,
      });
    }

    return result;
  }
}
