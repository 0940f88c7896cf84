import { z } from 'zod';
import { DEFAULT_RUN_CONFIG } from '@cloverrun/core';
import { runConfigOverrideShape } from './run-config.js';

export const generateDeckSchema = z.object({
  file: z.coerce.string().min(1).optional(),
  fixed: z.boolean().default(false),
  cells: z.coerce.number().int().positive().default(DEFAULT_RUN_CONFIG.cells),
  steps: z.coerce.number().int().positive().default(DEFAULT_RUN_CONFIG.steps),
  visitFreq: z.coerce.number().int().min(1).default(DEFAULT_RUN_CONFIG.visitFrequency),
  seed: z.coerce.number().int().nonnegative().optional(),
  baseDir: z.coerce.string().min(1).optional(),
  format: z.enum(['json', 'table', 'csv']).default('table'),
  ...runConfigOverrideShape,
});

export const parseDeckSchema = z.object({
  file: z.coerce.string().min(1),
  format: z.enum(['json', 'table', 'csv']).default('table'),
});

export type GenerateDeckArgs = z.infer<typeof generateDeckSchema>;
export type ParseDeckArgs = z.infer<typeof parseDeckSchema>;
