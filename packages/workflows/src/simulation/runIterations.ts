import { readFile } from 'fs/promises';
import { z } from 'zod';
import {
  createDeterministicRNG,
  createIterationPlan,
  mergeRunConfig,
  validateRunConfig,
  type DeterministicRNG,
  type IterationArchive,
  type IterationPlanEntry,
  type RunConfig,
  type RunResult,
} from '@cloverrun/core';
import { generateInputDeck, parseInputDeck, writeInputDeck } from '@cloverrun/simulation';
import {
  AppError,
  ConfigurationError,
  FilesystemError,
  ValidationError,
  errorMessage,
} from '@cloverrun/utils';
import type {
  ArchiveFailure,
  IterationProgressEvent,
  IterationReport,
  RunIterationsResult,
  RunIterationsSpec,
  WorkflowContext,
} from '../types.js';
import { RunStateMachine } from './runStateMachine.js';

const SpecSchema = z.object({
  iterations: z.number().int().min(1, 'iterations must be at least 1'),
  mode: z.enum(['fixed', 'randomized', 'existing']),
  outputDir: z.string().min(1, 'outputDir is required'),
  seed: z.number().int().nonnegative().optional(),
});

const SEED_MODULUS = 2 ** 31;

type Halt = { errorCode: string; errorMessage: string; logPath?: string };

/**
 * Drive N sequential iterations:
 * prepare deck → execute → collect → post-process → archive.
 *
 * The first failed run or failed collection halts the whole run and leaves
 * that iteration's files where they are. Archive and post-processing
 * failures are recorded and the run carries on.
 *
 * Throws only for problems found before iteration 1 (invalid spec, working
 * directory not ready, build failure).
 */
export async function runIterations(
  spec: RunIterationsSpec,
  ctx: WorkflowContext
): Promise<RunIterationsResult> {
  const parsed = SpecSchema.safeParse(spec);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid run specification: ${msg}`, {
      issues: parsed.error.issues,
    });
  }

  const baseCheck = validateRunConfig(mergeRunConfig(spec.config, spec.overrides));
  if (!baseCheck.ok) {
    throw new ValidationError(`Invalid run configuration: ${baseCheck.issues.join('; ')}`, {
      issues: baseCheck.issues,
    });
  }
  const fixedConfig: RunConfig = baseCheck.config;

  const runId = ctx.ids.newRunId();
  const startedMs = ctx.clock.nowMs();
  const startedAtISO = ctx.clock.nowISO();
  const plan = createIterationPlan(spec.iterations, spec.mode);
  const seed =
    spec.mode === 'randomized' ? (spec.seed ?? startedMs % SEED_MODULUS) : spec.seed;
  const rng: DeterministicRNG | undefined =
    spec.mode === 'randomized' ? createDeterministicRNG(seed) : undefined;

  const { workingDir } = ctx;
  if (!workingDir.exists()) {
    throw new ConfigurationError(
      `Working directory ${workingDir.path} does not exist`,
      'CLOVERRUN_BINARY_DIR'
    );
  }
  if (spec.mode === 'existing' && !workingDir.hasDeck()) {
    throw new ConfigurationError(
      `No input deck at ${workingDir.deckPath}; generate one or choose another deck mode`,
      'deck'
    );
  }
  const residue = await workingDir.residue();
  if (residue.length > 0) {
    throw new FilesystemError(
      `Working directory ${workingDir.path} still holds ${residue.length} artifact file(s) from an earlier run; move or delete them first`,
      workingDir.path,
      'preflight',
      { residue }
    );
  }

  ctx.logger.info('[workflows.runIterations] start', {
    runId,
    iterations: plan.total,
    mode: plan.mode,
    seed,
    workingDir: workingDir.path,
    outputDir: spec.outputDir,
  });

  const build = await ctx.executor.ensureBinary();

  const machine = new RunStateMachine(plan.total);
  const iterations: IterationReport[] = [];
  const archives: IterationArchive[] = [];
  const archiveFailures: ArchiveFailure[] = [];
  let halt: (Halt & { iteration: number }) | undefined;

  const since = (t0: number): number => ctx.clock.nowMs() - t0;
  const progress = (iteration: number, phase: IterationProgressEvent['phase']): void =>
    ctx.onProgress?.({ iteration, total: plan.total, phase });

  for (const entry of plan.entries) {
    const { index: iteration } = entry;
    machine.transition({ kind: 'preparing', iteration });
    progress(iteration, 'preparing');

    const report: IterationReport = {
      iteration,
      label: entry.label,
      mode: entry.mode,
      status: 'failed',
      warnings: [],
      timings: { prepareMs: 0 },
    };
    iterations.push(report);

    const fail = (h: Halt): Halt & { iteration: number } => {
      report.errorCode = h.errorCode;
      report.errorMessage = h.errorMessage;
      machine.halt(h.errorMessage);
      progress(iteration, 'halted');
      ctx.logger.error('[workflows.runIterations] halted', {
        runId,
        iteration,
        errorCode: h.errorCode,
        errorMessage: h.errorMessage,
        logPath: h.logPath,
      });
      return { ...h, iteration };
    };

    // preparing
    let t0 = ctx.clock.nowMs();
    try {
      report.config = await prepareDeck(entry, ctx, fixedConfig, spec, rng, report.warnings);
    } catch (e: unknown) {
      report.timings.prepareMs = since(t0);
      halt = fail({
        errorCode: codeOf(e, 'DECK_PREPARATION_FAILED'),
        errorMessage: errorMessage(e),
      });
      break;
    }
    report.timings.prepareMs = since(t0);

    // executing
    machine.transition({ kind: 'executing', iteration });
    progress(iteration, 'executing');
    t0 = ctx.clock.nowMs();
    let result: RunResult;
    try {
      result = await ctx.executor.execute();
    } catch (e: unknown) {
      report.timings.executeMs = since(t0);
      halt = fail({
        errorCode: codeOf(e, 'EXECUTION_ERROR'),
        errorMessage: errorMessage(e),
      });
      break;
    }
    report.timings.executeMs = since(t0);
    report.run = {
      status: result.status,
      reason: result.reason,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
      durationMs: result.durationMs,
      logPath: result.logPath,
      snapshots: result.artifacts.snapshots.length,
    };

    if (result.status !== 'success') {
      halt = fail({
        errorCode: result.timedOut ? 'SIMULATION_TIMEOUT' : 'SIMULATION_FAILED',
        errorMessage: `Iteration ${iteration} failed: ${result.reason ?? 'unknown reason'}; inspect ${result.logPath}`,
        logPath: result.logPath,
      });
      break;
    }

    // collecting
    machine.transition({ kind: 'collecting', iteration });
    progress(iteration, 'collecting');
    t0 = ctx.clock.nowMs();
    const collected = await ctx.collector.collect({
      iteration,
      outputDir: spec.outputDir,
      workingDir,
      result,
    });
    report.timings.collectMs = since(t0);

    if (!collected.ok) {
      halt = fail({ errorCode: collected.errorCode, errorMessage: collected.errorMessage });
      break;
    }
    const { iterationDir } = collected.value;
    report.iterationDir = iterationDir;
    report.status = 'completed';

    if (ctx.postProcessor) {
      t0 = ctx.clock.nowMs();
      const post = await ctx.postProcessor.run({ iteration, iterationDir });
      report.timings.postProcessMs = since(t0);
      if (!post.ok) {
        report.warnings.push(post.errorMessage);
        ctx.logger.warn('[workflows.runIterations] post-processing failed', {
          runId,
          iteration,
          command: ctx.postProcessor.command,
          errorMessage: post.errorMessage,
        });
      }
    }

    // archiving
    machine.transition({ kind: 'archiving', iteration });
    progress(iteration, 'archiving');
    t0 = ctx.clock.nowMs();
    const archived = await ctx.archiver.archive({ iteration, total: plan.total, iterationDir });
    if (archived.ok) {
      report.archive = archived.value;
      archives.push(archived.value);
    } else {
      archiveFailures.push({
        iteration,
        iterationDir,
        errorCode: archived.errorCode,
        errorMessage: archived.errorMessage,
      });
      report.warnings.push(archived.errorMessage);
      ctx.logger.warn('[workflows.runIterations] archive failed; iteration directory kept', {
        runId,
        iteration,
        iterationDir,
        errorCode: archived.errorCode,
      });
    }

    const cleaned = await ctx.archiver.cleanWorkingDirectory(workingDir);
    if (!cleaned.ok) {
      report.warnings.push(cleaned.errorMessage);
      ctx.logger.warn('[workflows.runIterations] cleanup failed', {
        runId,
        iteration,
        errorMessage: cleaned.errorMessage,
      });
    }
    report.timings.archiveMs = since(t0);

    ctx.logger.info('[workflows.runIterations] iteration complete', {
      runId,
      iteration,
      iterationDir,
      archive: report.archive?.archivePath,
      runMs: result.durationMs,
    });

    if (iteration === plan.total) {
      machine.transition({ kind: 'completed' });
      progress(iteration, 'completed');
    }
  }

  const succeeded = iterations.filter((r) => r.status === 'completed').length;
  const status = machine.state.kind === 'completed' ? 'completed' : 'halted';
  const finishedAtISO = ctx.clock.nowISO();

  ctx.logger.info('[workflows.runIterations] done', {
    runId,
    status,
    attempted: iterations.length,
    succeeded,
    failedAt: halt?.iteration,
    archiveFailures: archiveFailures.length,
  });

  return {
    runId,
    status,
    mode: plan.mode,
    seed,
    startedAtISO,
    finishedAtISO,
    totalDurationMs: since(startedMs),
    build,
    planned: plan.total,
    attempted: iterations.length,
    succeeded,
    failedAt: halt?.iteration,
    haltReason: halt?.errorMessage,
    failedLogPath: halt?.logPath,
    iterations,
    archives,
    archiveFailures,
    exitCode: status === 'completed' ? 0 : 1,
  };
}

async function prepareDeck(
  entry: IterationPlanEntry,
  ctx: WorkflowContext,
  fixedConfig: RunConfig,
  spec: RunIterationsSpec,
  rng: DeterministicRNG | undefined,
  warnings: string[]
): Promise<RunConfig | undefined> {
  const deckPath = ctx.workingDir.deckPath;

  switch (entry.mode) {
    case 'fixed':
      await writeInputDeck(deckPath, fixedConfig);
      return fixedConfig;

    case 'randomized':
      return generateInputDeck(deckPath, {
        cells: fixedConfig.cells,
        steps: fixedConfig.steps,
        randomize: true,
        rng,
        base: spec.config,
        overrides: spec.overrides,
      });

    case 'existing': {
      if (!ctx.workingDir.hasDeck()) {
        throw new ConfigurationError(`Input deck ${deckPath} disappeared`, 'deck');
      }
      const text = await readFile(deckPath, 'utf8');
      try {
        return parseInputDeck(text).config;
      } catch (e: unknown) {
        // The binary is the judge of its own deck; we only lose the record
        warnings.push(`Could not parse existing deck: ${errorMessage(e)}`);
        return undefined;
      }
    }
  }
}

function codeOf(error: unknown, fallback: string): string {
  return error instanceof AppError ? error.code : fallback;
}
