/**
 * Command Context - Lazy service creation
 *
 * This is NOT a framework - just an object that knows how to resolve the
 * project layout and build a workflow context. Keeps service wiring out of
 * the handlers.
 */

import { getRunnerPaths, type RunnerPaths } from '@cloverrun/utils';
import {
  createProductionContext,
  type ProductionContextConfig,
  type WorkflowContext,
} from '@cloverrun/workflows';

/**
 * Services available in command context
 */
export interface CommandServices {
  /**
   * Resolve base, binary, output and archive locations
   */
  runnerPaths(baseDir?: string): RunnerPaths;
  workflowContext(config: ProductionContextConfig): WorkflowContext;
}

/**
 * Options for creating a CommandContext with service overrides
 * Useful for testing
 */
export interface CommandContextOptions {
  /**
   * Environment to read CLOVERRUN_* settings from (defaults to process.env)
   */
  env?: NodeJS.ProcessEnv;
  /**
   * Directory the project-root search starts from (defaults to process.cwd())
   */
  cwd?: string;
  /**
   * Override workflow context construction (for testing)
   */
  workflowContextOverride?: (config: ProductionContextConfig) => WorkflowContext;
  /**
   * Defaults merged into every workflow context config (clock, ids, archive zone)
   */
  workflowDefaults?: Partial<Omit<ProductionContextConfig, 'paths'>>;
}

/**
 * Command context - provides services
 */
export class CommandContext {
  private _services: CommandServices | null = null;
  private readonly _options: CommandContextOptions;

  constructor(options: CommandContextOptions = {}) {
    this._options = options;
  }

  /**
   * Get services (lazy creation)
   */
  get services(): CommandServices {
    if (!this._services) {
      this._services = this._createServices();
    }
    return this._services;
  }

  private _createServices(): CommandServices {
    const pathsCache = new Map<string, RunnerPaths>();

    return {
      runnerPaths: (baseDir?: string) => {
        const key = baseDir ?? '';
        const cached = pathsCache.get(key);
        if (cached) {
          return cached;
        }
        const paths = getRunnerPaths({
          baseDir,
          cwd: this._options.cwd,
          env: this._options.env,
        });
        pathsCache.set(key, paths);
        return paths;
      },
      workflowContext: (config: ProductionContextConfig) => {
        const merged: ProductionContextConfig = { ...this._options.workflowDefaults, ...config };
        return this._options.workflowContextOverride
          ? this._options.workflowContextOverride(merged)
          : createProductionContext(merged);
      },
    };
  }
}

/**
 * Factory function to create CommandContext with optional overrides
 */
export function createCommandContext(options: CommandContextOptions = {}): CommandContext {
  return new CommandContext(options);
}
