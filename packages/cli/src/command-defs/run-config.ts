import { z } from 'zod';
import type { RunConfigOverrides } from '@cloverrun/core';

/**
 * Per-field deck overrides shared by `simulation run` and `deck generate`.
 * An override pins the field even when the deck is randomized.
 */
export const runConfigOverrideShape = {
  density1: z.coerce.number().positive().optional(),
  energy1: z.coerce.number().positive().optional(),
  density2: z.coerce.number().positive().optional(),
  energy2: z.coerce.number().positive().optional(),
  state2Xmin: z.coerce.number().optional(),
  state2Xmax: z.coerce.number().optional(),
  state2Ymin: z.coerce.number().optional(),
  state2Ymax: z.coerce.number().optional(),
  xmin: z.coerce.number().optional(),
  xmax: z.coerce.number().optional(),
  ymin: z.coerce.number().optional(),
  ymax: z.coerce.number().optional(),
  initialTimestep: z.coerce.number().positive().optional(),
  timestepRise: z.coerce.number().positive().optional(),
  maxTimestep: z.coerce.number().positive().optional(),
  testProblem: z.coerce.number().int().positive().optional(),
};

const overrideObject = z.object(runConfigOverrideShape);
export type RunConfigOverrideArgs = z.infer<typeof overrideObject>;

/**
 * Map flat CLI fields onto the nested override shape. Absent flags stay
 * undefined and leave the base value alone.
 */
export function toRunConfigOverrides(
  args: RunConfigOverrideArgs & { cells?: number; steps?: number; visitFreq?: number }
): RunConfigOverrides {
  return {
    cells: args.cells,
    steps: args.steps,
    visitFrequency: args.visitFreq,
    testProblem: args.testProblem,
    state1: { density: args.density1, energy: args.energy1 },
    state2: {
      density: args.density2,
      energy: args.energy2,
      xmin: args.state2Xmin,
      xmax: args.state2Xmax,
      ymin: args.state2Ymin,
      ymax: args.state2Ymax,
    },
    domain: { xmin: args.xmin, xmax: args.xmax, ymin: args.ymin, ymax: args.ymax },
    timestep: {
      initial: args.initialTimestep,
      rise: args.timestepRise,
      max: args.maxTimestep,
    },
  };
}
