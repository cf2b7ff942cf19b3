/**
 * @loop-arb/config
 *
 * Engine defaults, env-driven overrides and the zod schemas used to validate
 * pool, converter and arbitrator inputs before they reach the core.
 */

export {
  ENGINE_DEFAULTS,
  ENGINE_ENV_VARS,
  loadEngineConfig,
  resolveEngineConfig,
} from './engine-config';
export type { EngineConfigOverrides } from './engine-config';

export {
  AssetSchema,
  AssetListSchema,
  AssetPairSchema,
  RateSchema,
  AmountsSchema,
  FeePercentSchema,
  GasCostSchema,
  GasPriceSchema,
  InitialAssetsSchema,
  LoopSizesSchema,
  PositiveIntSchema,
  NonNegativeIntSchema,
  OptimizerOptionsSchema,
  SearchOptionsSchema,
  EngineConfigSchema,
  validateWithDetails,
  validateOrThrow,
} from './schemas';
export type { ValidationResult, ValidationIssue } from './schemas';
