/**
 * Input validation for engine constructors.
 *
 * Bridges the zod schemas in @loop-arb/config to the engine's typed errors:
 * schema failures surface as ValidationError with one issue per failing path.
 */

import { validateWithDetails } from '@loop-arb/config';
import type { z } from 'zod';
import { ValidationError } from './error-handling';

/**
 * Validate `value` against `schema` and return the parsed value.
 *
 * @param field - Name of the argument being validated (used in the message)
 * @throws ValidationError when the value does not satisfy the schema
 */
export function assertValid<T>(schema: z.ZodType<T>, value: unknown, field: string): T {
  const result = validateWithDetails(schema, value);
  if (result.success) {
    return result.data;
  }

  const issues = result.errors.map(e => (e.path ? `${field}.${e.path}: ${e.message}` : `${field}: ${e.message}`));
  throw new ValidationError(`Invalid ${field}: ${issues.join('; ')}`, { field, issues });
}
