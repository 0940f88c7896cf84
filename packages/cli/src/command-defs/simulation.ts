import { z } from 'zod';
import { DEFAULT_RUN_CONFIG } from '@cloverrun/core';
import { DEFAULT_ARCHIVE_PREFIX } from '@cloverrun/storage';
import { runConfigOverrideShape } from './run-config.js';

export const runSchema = z
  .object({
    iterations: z.coerce.number().int().min(1).default(1),
    cells: z.coerce.number().int().positive().default(DEFAULT_RUN_CONFIG.cells),
    steps: z.coerce.number().int().positive().default(DEFAULT_RUN_CONFIG.steps),
    visitFreq: z.coerce.number().int().min(1).default(DEFAULT_RUN_CONFIG.visitFrequency),
    generateInput: z.boolean().default(false),
    reuseDeck: z.boolean().default(false),
    baseDir: z.coerce.string().min(1).optional(),
    seed: z.coerce.number().int().nonnegative().optional(),
    timeoutMs: z.coerce.number().int().positive().optional(),
    postProcess: z.coerce.string().min(1).optional(),
    archivePrefix: z.coerce
      .string()
      .regex(/^[A-Za-z0-9._-]+$/, 'archive prefix may only use letters, digits, ".", "_" and "-"')
      .default(DEFAULT_ARCHIVE_PREFIX),
    format: z.enum(['json', 'table', 'csv']).default('table'),
    verbose: z.boolean().default(false),
    ...runConfigOverrideShape,
  })
  .refine((args) => !(args.generateInput && args.reuseDeck), {
    message: '--generate-input and --reuse-deck cannot be combined',
    path: ['reuseDeck'],
  });

export type RunSimulationArgs = z.infer<typeof runSchema>;
