/**
 * Handler for `simulation run`.
 *
 * Thin adapter: parses args, calls workflow, returns data.
 * NO orchestration logic - that belongs in the workflow.
 */

import { DEFAULT_RUN_CONFIG, type DeckMode } from '@cloverrun/core';
import { runIterations, type RunIterationsResult } from '@cloverrun/workflows';
import type { CommandContext } from '../../core/command-context.js';
import { createProgressBar, getProgressIndicator } from '../../core/progress-indicator.js';
import type { RunSimulationArgs } from '../../command-defs/simulation.js';
import { toRunConfigOverrides } from '../../command-defs/run-config.js';

export type RunSimulationSummary = RunIterationsResult & {
  outputDir: string;
  archiveDir: string;
};

export function deckModeFor(args: Pick<RunSimulationArgs, 'generateInput' | 'reuseDeck'>): DeckMode {
  if (args.generateInput) return 'randomized';
  if (args.reuseDeck) return 'existing';
  return 'fixed';
}

export async function runSimulationHandler(
  args: RunSimulationArgs,
  ctx: CommandContext
): Promise<RunSimulationSummary> {
  const paths = ctx.services.runnerPaths(args.baseDir);
  const progress = getProgressIndicator();

  const workflowCtx = ctx.services.workflowContext({
    paths,
    timeoutMs: args.timeoutMs,
    postProcessCommand: args.postProcess,
    archivePrefix: args.archivePrefix,
    inheritOutput: args.verbose,
    onProgress: ({ iteration, total, phase }) => {
      const done = phase === 'completed' ? iteration : iteration - 1;
      progress.updateMessage(
        `Iteration ${iteration}/${total} ${phase} ${createProgressBar(done, total, 20)}`
      );
    },
  });

  const result = await runIterations(
    {
      iterations: args.iterations,
      mode: deckModeFor(args),
      config: DEFAULT_RUN_CONFIG,
      overrides: toRunConfigOverrides(args),
      seed: args.seed,
      outputDir: paths.outputDir,
    },
    workflowCtx
  );

  return { ...result, outputDir: paths.outputDir, archiveDir: paths.archiveDir };
}
