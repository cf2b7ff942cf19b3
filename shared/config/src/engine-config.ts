/**
 * Engine Configuration
 *
 * Defaults for the profit optimizer and the loop search, plus env-driven
 * overrides. Every resolved config passes EngineConfigSchema.
 *
 * Environment variables:
 * - LOOP_OPTIMIZER_INITIAL_AMOUNT: starting trade size (default: 1)
 * - LOOP_OPTIMIZER_XTOL: simplex spread tolerance on the trade size (default: 1e-4)
 * - LOOP_OPTIMIZER_FTOL: simplex spread tolerance on the profit (default: 1e-4)
 * - LOOP_OPTIMIZER_MAX_ITERATIONS: iteration cap per optimization (default: 200)
 * - LOOP_OPTIMIZER_MAX_EVALUATIONS: loop simulations per optimization (default: 400)
 * - LOOP_SEARCH_MAX_CANDIDATES: permutations attempted per search (default: 1,000,000)
 */

import type { EngineConfig, OptimizerOptions, SearchOptions } from '@loop-arb/types';
import { EngineConfigSchema, validateOrThrow } from './schemas';

// =============================================================================
// Defaults
// =============================================================================

export const ENGINE_DEFAULTS: Readonly<EngineConfig> = Object.freeze({
  optimizer: Object.freeze({
    initialAmount: 1,
    xtol: 1e-4,
    ftol: 1e-4,
    // 200 * number of variables; the trade size is the only variable
    maxIterations: 200,
    maxEvaluations: 400,
  }),
  search: Object.freeze({
    maxLoopCandidates: 1_000_000,
    defaultLoopSizes: [3],
  }),
});

export const ENGINE_ENV_VARS = {
  initialAmount: 'LOOP_OPTIMIZER_INITIAL_AMOUNT',
  xtol: 'LOOP_OPTIMIZER_XTOL',
  ftol: 'LOOP_OPTIMIZER_FTOL',
  maxIterations: 'LOOP_OPTIMIZER_MAX_ITERATIONS',
  maxEvaluations: 'LOOP_OPTIMIZER_MAX_EVALUATIONS',
  maxLoopCandidates: 'LOOP_SEARCH_MAX_CANDIDATES',
} as const;

export interface EngineConfigOverrides {
  optimizer?: Partial<OptimizerOptions>;
  search?: Partial<SearchOptions>;
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Merge partial overrides onto the defaults and validate the result.
 *
 * @throws Error listing every invalid field
 */
export function resolveEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const merged = {
    optimizer: { ...ENGINE_DEFAULTS.optimizer, ...overrides.optimizer },
    search: {
      ...ENGINE_DEFAULTS.search,
      defaultLoopSizes: [...ENGINE_DEFAULTS.search.defaultLoopSizes],
      ...overrides.search,
    },
  };
  return validateOrThrow(EngineConfigSchema, merged, 'EngineConfig');
}

/**
 * Parse a numeric env var. Missing or blank values fall back to the default;
 * anything else must be a number (NaN fails validation).
 */
function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return Number(raw);
}

/**
 * Build the engine configuration from environment variables.
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws Error when a variable is set to an invalid value
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const { optimizer, search } = ENGINE_DEFAULTS;
  return resolveEngineConfig({
    optimizer: {
      initialAmount: readNumber(env, ENGINE_ENV_VARS.initialAmount, optimizer.initialAmount),
      xtol: readNumber(env, ENGINE_ENV_VARS.xtol, optimizer.xtol),
      ftol: readNumber(env, ENGINE_ENV_VARS.ftol, optimizer.ftol),
      maxIterations: readNumber(env, ENGINE_ENV_VARS.maxIterations, optimizer.maxIterations),
      maxEvaluations: readNumber(env, ENGINE_ENV_VARS.maxEvaluations, optimizer.maxEvaluations),
    },
    search: {
      maxLoopCandidates: readNumber(env, ENGINE_ENV_VARS.maxLoopCandidates, search.maxLoopCandidates),
    },
  });
}
