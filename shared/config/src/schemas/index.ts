/**
 * Zod Schema Validation for Engine Inputs
 *
 * Runtime validation for everything a caller hands to the engine: asset
 * lists, pair tuples, rates, pool balances, converter fees and engine
 * configuration. These checks run once at construction/load time and never
 * inside the enumeration or simulation loops.
 */

import { z } from 'zod';

// =============================================================================
// Primitive Schemas
// =============================================================================

/**
 * Positive integer.
 */
export const PositiveIntSchema = z
  .number()
  .int()
  .positive('Value must be a positive integer');

/**
 * Non-negative integer.
 */
export const NonNegativeIntSchema = z
  .number()
  .int()
  .min(0, 'Value cannot be negative');

/**
 * Asset identifier. Any non-empty string.
 */
export const AssetSchema = z.string().min(1, 'Asset identifier cannot be empty');

/**
 * Ordered list of unique assets held by a pool.
 */
export const AssetListSchema = z
  .array(AssetSchema)
  .min(2, 'A pool needs at least 2 assets')
  .refine(assets => new Set(assets).size === assets.length, {
    message: 'Pool assets must be unique',
  });

/**
 * Simple-mode pair such as ['ETH', 'USDT'].
 */
export const AssetPairSchema = z
  .tuple([AssetSchema, AssetSchema])
  .refine(([asset0, asset1]) => asset0 !== asset1, {
    message: 'A pair must reference two different assets',
  });

/**
 * Fixed exchange rate (asset0 -> asset1).
 */
export const RateSchema = z
  .number()
  .finite('Rate must be finite')
  .positive('Rate must be positive');

/**
 * Pool balances. Zero is allowed (an empty side), negatives are not.
 */
export const AmountsSchema = z.array(
  z.number().finite('Amount must be finite').min(0, 'Amount cannot be negative')
);

/**
 * Converter fee in percent (10 = 10%).
 */
export const FeePercentSchema = z
  .number()
  .min(0, 'Fee cannot be negative')
  .max(100, 'Fee cannot exceed 100%');

/**
 * Gas units consumed by one conversion.
 */
export const GasCostSchema = NonNegativeIntSchema;

/**
 * Price of one gas unit, denominated in the loop's initial asset.
 */
export const GasPriceSchema = z
  .number()
  .finite('Gas price must be finite')
  .min(0, 'Gas price cannot be negative');

/**
 * Assets a reported loop is allowed to start from.
 */
export const InitialAssetsSchema = z
  .array(AssetSchema)
  .min(1, 'At least one initial asset is required');

/**
 * Requested loop sizes, e.g. [3] for triangular arbitrage.
 */
export const LoopSizesSchema = z
  .array(z.number().int().min(2, 'A loop needs at least 2 pairs'))
  .min(1, 'At least one loop size is required');

// =============================================================================
// Engine Configuration Schemas
// =============================================================================

export const OptimizerOptionsSchema = z.object({
  initialAmount: z.number().finite().positive('Initial amount must be positive'),
  xtol: z.number().positive('xtol must be positive'),
  ftol: z.number().positive('ftol must be positive'),
  maxIterations: PositiveIntSchema,
  maxEvaluations: PositiveIntSchema,
});

export const SearchOptionsSchema = z.object({
  maxLoopCandidates: PositiveIntSchema,
  defaultLoopSizes: LoopSizesSchema,
});

export const EngineConfigSchema = z.object({
  optimizer: OptimizerOptionsSchema,
  search: SearchOptionsSchema,
});

// =============================================================================
// Validation Helpers
// =============================================================================

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Validation result type.
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationIssue[] };

/**
 * Validate data against a schema with detailed error information.
 *
 * @param schema - Zod schema to validate against
 * @param data - Data to validate
 */
export function validateWithDetails<T>(
  schema: z.ZodType<T>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((e: z.ZodIssue) => ({
      path: e.path.join('.'),
      message: e.message,
    })),
  };
}

/**
 * Validate data and throw on failure.
 * Use at construction/load time, not in hot paths.
 *
 * @param schema - Zod schema to validate against
 * @param data - Data to validate
 * @param context - Context string for error message
 */
export function validateOrThrow<T>(
  schema: z.ZodType<T>,
  data: unknown,
  context: string
): T {
  const result = validateWithDetails(schema, data);

  if (result.success) {
    return result.data;
  }

  const errorDetails = result.errors
    .map(e => `  - ${e.path || '(root)'}: ${e.message}`)
    .join('\n');

  throw new Error(`Validation failed for ${context}:\n${errorDetails}`);
}
