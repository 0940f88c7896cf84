/**
 * Handler for `deck generate`: write one deck, report what went into it.
 */

import { join, resolve } from 'path';
import { createDeterministicRNG } from '@cloverrun/core';
import { generateInputDeck, SIMULATION_FILES } from '@cloverrun/simulation';
import type { CommandContext } from '../../core/command-context.js';
import type { GenerateDeckArgs } from '../../command-defs/deck.js';
import { toRunConfigOverrides } from '../../command-defs/run-config.js';
import { flattenRunConfig } from './deck-fields.js';

export type GenerateDeckResult = {
  path: string;
  mode: 'fixed' | 'randomized';
  seed?: number;
} & Record<string, unknown>;

export async function generateDeckHandler(
  args: GenerateDeckArgs,
  ctx: CommandContext
): Promise<GenerateDeckResult> {
  // Without a file, the deck goes where the binary will read it
  const path = args.file
    ? resolve(args.file)
    : join(ctx.services.runnerPaths(args.baseDir).binaryDir, SIMULATION_FILES.deck);
  const rng = args.fixed ? undefined : createDeterministicRNG(args.seed);

  const config = await generateInputDeck(path, {
    cells: args.cells,
    steps: args.steps,
    randomize: !args.fixed,
    rng,
    overrides: toRunConfigOverrides(args),
    createParent: true,
  });

  return {
    path,
    mode: args.fixed ? 'fixed' : 'randomized',
    seed: rng?.getSeed(),
    ...flattenRunConfig(config),
  };
}
