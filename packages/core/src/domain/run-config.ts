/**
 * Run configuration
 *
 * Everything one invocation of the simulation binary is parameterized by.
 * The input deck is a pure rendering of this object.
 */

import { z } from 'zod';

const finite = () => z.number().finite();
const positive = () => z.number().finite().positive();

export const StateOneSchema = z.object({
  density: positive(),
  energy: positive(),
});

export const StateTwoSchema = z.object({
  density: positive(),
  energy: positive(),
  geometry: z.literal('rectangle'),
  xmin: finite(),
  xmax: finite(),
  ymin: finite(),
  ymax: finite(),
});

export const DomainBoundsSchema = z.object({
  xmin: finite(),
  xmax: finite(),
  ymin: finite(),
  ymax: finite(),
});

export const TimestepSchema = z.object({
  initial: positive(),
  rise: positive(),
  max: positive(),
});

export const RunConfigSchema = z
  .object({
    /** Cells per axis; the grid is always square */
    cells: z.number().int().positive(),
    /** end_step */
    steps: z.number().int().positive(),
    state1: StateOneSchema,
    state2: StateTwoSchema,
    domain: DomainBoundsSchema,
    timestep: TimestepSchema,
    testProblem: z.number().int().positive(),
    /** Steps between snapshot emissions */
    visitFrequency: z.number().int().min(1),
  })
  .superRefine((config, ctx) => {
    if (config.domain.xmax <= config.domain.xmin) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['domain', 'xmax'],
        message: 'domain xmax must be greater than xmin',
      });
    }
    if (config.domain.ymax <= config.domain.ymin) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['domain', 'ymax'],
        message: 'domain ymax must be greater than ymin',
      });
    }
    if (config.state2.xmax <= config.state2.xmin) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['state2', 'xmax'],
        message: 'state 2 xmax must be greater than xmin',
      });
    }
    if (config.state2.ymax <= config.state2.ymin) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['state2', 'ymax'],
        message: 'state 2 ymax must be greater than ymin',
      });
    }
  });

export type StateOne = z.infer<typeof StateOneSchema>;
export type StateTwo = z.infer<typeof StateTwoSchema>;
export type DomainBounds = z.infer<typeof DomainBoundsSchema>;
export type TimestepControls = z.infer<typeof TimestepSchema>;
export type RunConfig = z.infer<typeof RunConfigSchema>;

/**
 * Partial overrides applied on top of a base config. Nested blocks merge
 * field by field.
 */
export type RunConfigOverrides = {
  cells?: number;
  steps?: number;
  testProblem?: number;
  visitFrequency?: number;
  state1?: Partial<StateOne>;
  state2?: Partial<Omit<StateTwo, 'geometry'>>;
  domain?: Partial<DomainBounds>;
  timestep?: Partial<TimestepControls>;
};

export const DEFAULT_RUN_CONFIG: RunConfig = {
  cells: 64,
  steps: 87,
  state1: { density: 0.2, energy: 1.0 },
  state2: {
    density: 1.0,
    energy: 2.5,
    geometry: 'rectangle',
    xmin: 0.0,
    xmax: 1.0,
    ymin: 0.0,
    ymax: 1.0,
  },
  domain: { xmin: 0.0, xmax: 10.0, ymin: 0.0, ymax: 10.0 },
  timestep: { initial: 0.04, rise: 1.5, max: 0.04 },
  testProblem: 2,
  visitFrequency: 5,
};

/**
 * Merge overrides into a base config. Undefined override fields never
 * clobber the base value.
 */
export function mergeRunConfig(base: RunConfig, overrides: RunConfigOverrides = {}): RunConfig {
  const { state1 = {}, state2 = {}, domain = {}, timestep = {} } = overrides;
  return {
    cells: overrides.cells ?? base.cells,
    steps: overrides.steps ?? base.steps,
    testProblem: overrides.testProblem ?? base.testProblem,
    visitFrequency: overrides.visitFrequency ?? base.visitFrequency,
    state1: {
      density: state1.density ?? base.state1.density,
      energy: state1.energy ?? base.state1.energy,
    },
    state2: {
      density: state2.density ?? base.state2.density,
      energy: state2.energy ?? base.state2.energy,
      geometry: 'rectangle',
      xmin: state2.xmin ?? base.state2.xmin,
      xmax: state2.xmax ?? base.state2.xmax,
      ymin: state2.ymin ?? base.state2.ymin,
      ymax: state2.ymax ?? base.state2.ymax,
    },
    domain: {
      xmin: domain.xmin ?? base.domain.xmin,
      xmax: domain.xmax ?? base.domain.xmax,
      ymin: domain.ymin ?? base.domain.ymin,
      ymax: domain.ymax ?? base.domain.ymax,
    },
    timestep: {
      initial: timestep.initial ?? base.timestep.initial,
      rise: timestep.rise ?? base.timestep.rise,
      max: timestep.max ?? base.timestep.max,
    },
  };
}

export type RunConfigValidation =
  | { ok: true; config: RunConfig }
  | { ok: false; issues: string[] };

/**
 * Validate an unknown value as a RunConfig
 */
export function validateRunConfig(input: unknown): RunConfigValidation {
  const parsed = RunConfigSchema.safeParse(input);
  if (parsed.success) {
    return { ok: true, config: parsed.data };
  }
  return {
    ok: false,
    issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
  };
}
