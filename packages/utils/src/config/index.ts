/**
 * Configuration loading from environment variables
 *
 * Resolves where the simulation binary lives and where iteration output and
 * archives go. Everything is relative to a project root that is detected at
 * startup unless overridden.
 */

import { existsSync, statSync } from 'fs';
import { dirname, isAbsolute, join, resolve } from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

export const DEFAULT_BINARY_DIR = 'CloverLeaf_Serial';
export const DEFAULT_BINARY_NAME = 'clover_leaf';
export const DEFAULT_OUTPUT_DIR = 'data_processing/new_data';
export const DEFAULT_BUILD_COMMANDS = ['make clean', 'make COMPILER=GNU'];

export interface RunnerPaths {
  /** Project root everything else resolves against */
  baseDir: string;
  /** Working directory of the simulation binary */
  binaryDir: string;
  /** Absolute path of the simulation executable */
  binaryPath: string;
  /** Root under which iteration_<i> directories are created */
  outputDir: string;
  /** Directory receiving one archive per iteration */
  archiveDir: string;
  /** Shell commands run in binaryDir when the executable is missing */
  buildCommands: string[];
}

const EnvSchema = z.object({
  CLOVERRUN_BASE_DIR: z.string().min(1).optional(),
  CLOVERRUN_BINARY_DIR: z.string().min(1).default(DEFAULT_BINARY_DIR),
  CLOVERRUN_BINARY_NAME: z
    .string()
    .min(1)
    .regex(/^[^/\\]+$/, 'must be a file name, not a path')
    .default(DEFAULT_BINARY_NAME),
  CLOVERRUN_OUTPUT_DIR: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
  CLOVERRUN_ARCHIVE_DIR: z.string().min(1).optional(),
  CLOVERRUN_BUILD_COMMANDS: z.string().min(1).optional(),
});

const rootCache = new Map<string, string>();

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

/**
 * Find the project root by walking up from startDir, looking for the
 * directory that contains the simulation binary directory.
 */
export function findProjectRoot(
  startDir: string = process.cwd(),
  markerDir: string = DEFAULT_BINARY_DIR
): string {
  const cacheKey = `${resolve(startDir)}::${markerDir}`;
  const cached = rootCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  let current = resolve(startDir);
  for (;;) {
    if (isDirectory(join(current, markerDir))) {
      rootCache.set(cacheKey, current);
      return current;
    }
    const parent = dirname(current);
    if (parent === current) {
      break;
    }
    current = parent;
  }

  throw new ConfigurationError(
    `Could not find project root: no ancestor of ${startDir} contains ${markerDir}/`,
    'CLOVERRUN_BASE_DIR',
    { startDir, markerDir }
  );
}

export function clearProjectRootCache(): void {
  rootCache.clear();
}

/**
 * Split a build command list. Commands are separated by `&&` or newlines.
 */
export function parseBuildCommands(value: string): string[] {
  return value
    .split(/&&|\n/)
    .map((command) => command.trim())
    .filter((command) => command.length > 0);
}

function resolveFrom(baseDir: string, path: string): string {
  return isAbsolute(path) ? path : join(baseDir, path);
}

export interface RunnerPathsOptions {
  /** Explicit project root (CLI --base-dir); wins over the environment */
  baseDir?: string;
  /** Directory the root search starts from */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load runner paths from environment variables
 */
export function getRunnerPaths(options: RunnerPathsOptions = {}): RunnerPaths {
  const parsed = EnvSchema.safeParse(options.env ?? process.env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue ? issue.path.join('.') : undefined;
    throw new ConfigurationError(
      `Invalid runner configuration: ${parsed.error.issues
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join('; ')}`,
      key,
      { issues: parsed.error.issues }
    );
  }
  const env = parsed.data;

  const explicitBase = options.baseDir ?? env.CLOVERRUN_BASE_DIR;
  const baseDir = explicitBase
    ? resolve(options.cwd ?? process.cwd(), explicitBase)
    : findProjectRoot(options.cwd, env.CLOVERRUN_BINARY_DIR);

  if (!isDirectory(baseDir)) {
    throw new ConfigurationError(`Base directory does not exist: ${baseDir}`, 'CLOVERRUN_BASE_DIR', {
      baseDir,
    });
  }

  const binaryDir = resolveFrom(baseDir, env.CLOVERRUN_BINARY_DIR);
  if (!isDirectory(binaryDir)) {
    throw new ConfigurationError(
      `Simulation directory does not exist: ${binaryDir}`,
      'CLOVERRUN_BINARY_DIR',
      { binaryDir }
    );
  }

  const outputDir = resolveFrom(baseDir, env.CLOVERRUN_OUTPUT_DIR);
  const buildCommands = env.CLOVERRUN_BUILD_COMMANDS
    ? parseBuildCommands(env.CLOVERRUN_BUILD_COMMANDS)
    : [...DEFAULT_BUILD_COMMANDS];

  return {
    baseDir,
    binaryDir,
    binaryPath: join(binaryDir, env.CLOVERRUN_BINARY_NAME),
    outputDir,
    archiveDir: env.CLOVERRUN_ARCHIVE_DIR ? resolveFrom(baseDir, env.CLOVERRUN_ARCHIVE_DIR) : outputDir,
    buildCommands,
  };
}
