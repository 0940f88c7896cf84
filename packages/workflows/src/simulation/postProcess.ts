/**
 * Post-processing hook
 *
 * Runs an operator-supplied shell command after an iteration's artifacts are
 * collected and before they are archived (a visualizer, say). The command
 * learns which iteration it is looking at from its environment.
 */

import { execa, ExecaError } from 'execa';
import type { StepOutcome } from '@cloverrun/core';
import { errorMessage } from '@cloverrun/utils';
import type { PostProcessor } from '../types.js';

export const ITERATION_ENV = 'CLOVERRUN_ITERATION';
export const ITERATION_DIR_ENV = 'CLOVERRUN_ITERATION_DIR';

export interface ShellPostProcessorOptions {
  cwd: string;
  timeoutMs?: number;
  inheritOutput?: boolean;
}

export function createShellPostProcessor(
  command: string,
  options: ShellPostProcessorOptions
): PostProcessor {
  return {
    command,
    async run({ iteration, iterationDir }): Promise<StepOutcome<void>> {
      try {
        await execa(command, {
          shell: true,
          cwd: options.cwd,
          timeout: options.timeoutMs,
          stdio: options.inheritOutput ? 'inherit' : 'pipe',
          env: {
            [ITERATION_ENV]: String(iteration),
            [ITERATION_DIR_ENV]: iterationDir,
          },
        });
        return { ok: true, value: undefined };
      } catch (error) {
        const detail =
          error instanceof ExecaError
            ? `${error.shortMessage}${error.stderr ? `: ${String(error.stderr).trim()}` : ''}`
            : errorMessage(error);
        return {
          ok: false,
          errorCode: 'POST_PROCESS_FAILED',
          errorMessage: `Post-processing command failed for iteration ${iteration}: ${detail}`,
          cause: error,
        };
      }
    },
  };
}
