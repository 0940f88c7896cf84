/**
 * Input Deck Generator
 *
 * Produces a deck either from fixed values or from uniform random draws.
 * Draws go through a DeterministicRNG, so a seed reproduces the deck exactly.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import {
  DEFAULT_RUN_CONFIG,
  mergeRunConfig,
  validateRunConfig,
  type DeterministicRNG,
  type RunConfig,
  type RunConfigOverrides,
} from '@cloverrun/core';
import { FilesystemError, ValidationError, errorMessage } from '@cloverrun/utils';
import { renderInputDeck } from './input-deck.js';
import { logger } from '../logger.js';

/** Inclusive [min, max] */
export type Range = readonly [min: number, max: number];

export interface RandomRanges {
  density1: Range;
  density2: Range;
  energy1: Range;
  energy2: Range;
  state2Xmax: Range;
  state2Ymax: Range;
}

export const RANDOM_RANGES: RandomRanges = {
  density1: [0.1, 0.5],
  density2: [0.8, 1.5],
  energy1: [0.8, 1.2],
  energy2: [2.0, 3.0],
  state2Xmax: [4.0, 6.0],
  state2Ymax: [1.5, 2.5],
};

/**
 * Uniform draw from [min, max] rounded to one decimal place
 */
export function drawOneDecimal(rng: DeterministicRNG, [min, max]: Range): number {
  const rounded = Math.round(rng.nextFloat(min, max) * 10) / 10;
  return Math.min(max, Math.max(min, rounded));
}

/**
 * Draw the randomized fields on top of base. The six draws always happen in
 * the same order, so an override never shifts the draws that follow it.
 * Explicit overrides win over drawn values.
 */
export function randomizeRunConfig(
  rng: DeterministicRNG,
  base: RunConfig = DEFAULT_RUN_CONFIG,
  overrides: RunConfigOverrides = {},
  ranges: RandomRanges = RANDOM_RANGES
): RunConfig {
  const density1 = drawOneDecimal(rng, ranges.density1);
  const density2 = drawOneDecimal(rng, ranges.density2);
  const energy1 = drawOneDecimal(rng, ranges.energy1);
  const energy2 = drawOneDecimal(rng, ranges.energy2);
  const xmax = drawOneDecimal(rng, ranges.state2Xmax);
  const ymax = drawOneDecimal(rng, ranges.state2Ymax);

  const drawn = mergeRunConfig(base, {
    state1: { density: density1, energy: energy1 },
    state2: { density: density2, energy: energy2, xmin: 0.0, xmax, ymin: 0.0, ymax },
  });
  return mergeRunConfig(drawn, overrides);
}

/**
 * Validate a config, raising ValidationError with every issue listed
 */
export function assertValidRunConfig(config: RunConfig): RunConfig {
  const result = validateRunConfig(config);
  if (!result.ok) {
    throw new ValidationError(`Invalid run configuration: ${result.issues.join('; ')}`, {
      issues: result.issues,
    });
  }
  return result.config;
}

/**
 * Write a config to path as deck text, replacing any existing file.
 * The parent directory must already exist.
 */
export async function writeInputDeck(path: string, config: RunConfig): Promise<void> {
  const text = renderInputDeck(assertValidRunConfig(config));
  try {
    await writeFile(path, text, 'utf8');
  } catch (error) {
    throw new FilesystemError(
      `Failed to write input deck ${path}: ${errorMessage(error)}`,
      path,
      'write',
      { parent: dirname(path) }
    );
  }
}

export interface GenerateDeckOptions {
  cells: number;
  steps: number;
  /** Draw the randomized fields instead of using base values */
  randomize?: boolean;
  /** Required when randomize is set */
  rng?: DeterministicRNG;
  base?: RunConfig;
  overrides?: RunConfigOverrides;
  /** Create the parent directory when missing */
  createParent?: boolean;
}

/**
 * Generate a deck at outputPath for the given grid and step count.
 * Returns the exact config that was written.
 */
export async function generateInputDeck(
  outputPath: string,
  options: GenerateDeckOptions
): Promise<RunConfig> {
  const overrides: RunConfigOverrides = {
    ...options.overrides,
    cells: options.cells,
    steps: options.steps,
  };
  const base = options.base ?? DEFAULT_RUN_CONFIG;

  let config: RunConfig;
  if (options.randomize) {
    if (!options.rng) {
      throw new ValidationError('A seeded RNG is required to randomize a deck');
    }
    config = randomizeRunConfig(options.rng, base, overrides);
  } else {
    config = mergeRunConfig(base, overrides);
  }

  if (options.createParent) {
    const parent = dirname(outputPath);
    await mkdir(parent, { recursive: true }).catch((error: unknown) => {
      throw new FilesystemError(
        `Failed to create ${parent}: ${errorMessage(error)}`,
        parent,
        'mkdir'
      );
    });
  }
  await writeInputDeck(outputPath, config);

  logger.debug('Generated input deck', {
    path: outputPath,
    randomized: options.randomize ?? false,
    state1: config.state1,
    state2: config.state2,
    cells: config.cells,
    steps: config.steps,
  });

  return config;
}
