/**
 * Error Handling
 *
 * Typed errors for pool construction, loop validation and simulation, plus a
 * Result type for fallible operations whose failure is an expected outcome.
 */

import type { Asset } from '@loop-arb/types';

// =============================================================================
// Error Codes
// =============================================================================

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  ARGUMENT_CONFLICT = 1002,

  // Pool & conversion errors (2000-2999)
  INVALID_POOL = 2000,
  IMPOSSIBLE_CONVERSION = 2001,
  LIQUIDITY_DEPLETED = 2002,
  EXCHANGE_TYPE_MISMATCH = 2003,

  // Loop errors (3000-3999)
  INVALID_LOOP = 3000,

  // Validation errors (6000-6999)
  VALIDATION_FAILED = 6000,
  INVALID_CONFIG = 6002,
}

export enum ErrorSeverity {
  /** Expected outcome, no action required */
  INFO = 'info',
  /** Recoverable by the caller */
  WARNING = 'warning',
  /** Failure of the requested operation */
  ERROR = 'error',
  /** Programmer or configuration error */
  CRITICAL = 'critical'
}

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base error class for the engine.
 */
export class ArbitrageError extends Error {
  readonly code: ErrorCode;
  readonly severity: ErrorSeverity;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    options: {
      severity?: ErrorSeverity;
      context?: Record<string, unknown>;
      cause?: Error;
    } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'ArbitrageError';
    this.code = code;
    this.severity = options.severity ?? ErrorSeverity.ERROR;
    this.timestamp = Date.now();
    this.context = options.context;

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      timestamp: this.timestamp,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
      stack: this.stack
    };
  }
}

// =============================================================================
// Input Errors
// =============================================================================

/**
 * Invalid caller input (schema violation).
 */
export class ValidationError extends ArbitrageError {
  readonly field?: string;
  readonly issues: string[];

  constructor(
    message: string,
    options: {
      field?: string;
      issues?: string[];
      context?: Record<string, unknown>;
    } = {}
  ) {
    super(message, ErrorCode.VALIDATION_FAILED, {
      severity: ErrorSeverity.WARNING,
      context: { ...options.context, field: options.field, issues: options.issues }
    });
    this.name = 'ValidationError';
    this.field = options.field;
    this.issues = options.issues ?? [];
  }
}

/**
 * Engine configuration could not be resolved.
 */
export class ConfigurationError extends ArbitrageError {
  constructor(message: string, options: { cause?: Error } = {}) {
    super(message, ErrorCode.INVALID_CONFIG, {
      severity: ErrorSeverity.CRITICAL,
      cause: options.cause
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Mutually exclusive or co-required arguments were combined incorrectly
 * (pairs and pools together, pairs without rates).
 */
export class ArgumentConflictError extends ArbitrageError {
  readonly conflicting: string[];

  constructor(message: string, conflictingArguments: string[]) {
    super(message, ErrorCode.ARGUMENT_CONFLICT, {
      severity: ErrorSeverity.WARNING,
      context: { arguments: conflictingArguments }
    });
    this.name = 'ArgumentConflictError';
    this.conflicting = conflictingArguments;
  }
}

// =============================================================================
// Pool & Conversion Errors
// =============================================================================

/**
 * A pool cannot be built from the provided data.
 */
export class InvalidPoolError extends ArbitrageError {
  readonly poolName?: string;

  constructor(reason: string, poolName?: string) {
    super(`Invalid pool${poolName ? ` ${poolName}` : ''}: ${reason}`, ErrorCode.INVALID_POOL, {
      severity: ErrorSeverity.WARNING,
      context: { poolName, reason }
    });
    this.name = 'InvalidPoolError';
    this.poolName = poolName;
  }
}

/**
 * The requested asset (or asset/target combination) is not convertible
 * by the pair or pool it was sent to.
 */
export class ImpossibleConversionError extends ArbitrageError {
  readonly asset: Asset;
  readonly target?: Asset;

  constructor(asset: Asset, target?: Asset, venue?: string) {
    const route = target !== undefined ? `${asset} -> ${target}` : asset;
    super(`Invalid conversion: ${route}${venue ? ` on ${venue}` : ''}`, ErrorCode.IMPOSSIBLE_CONVERSION, {
      severity: ErrorSeverity.ERROR,
      context: { asset, target, venue }
    });
    this.name = 'ImpossibleConversionError';
    this.asset = asset;
    this.target = target;
  }
}

/**
 * The trade would require a negative (or zero) balance on one side of the
 * invariant. Pool state is left unmutated when this is raised.
 */
export class LiquidityDepletedError extends ArbitrageError {
  readonly index: number;
  readonly requiredBalance: number;

  constructor(index: number, requiredBalance: number) {
    super('LP tokens were fully depleted', ErrorCode.LIQUIDITY_DEPLETED, {
      severity: ErrorSeverity.INFO,
      context: { index, requiredBalance }
    });
    this.name = 'LiquidityDepletedError';
    this.index = index;
    this.requiredBalance = requiredBalance;
  }
}

/**
 * A converter was invoked with data inconsistent with its invariant.
 * Indicates a configuration or programming error.
 */
export class ExchangeTypeMismatchError extends ArbitrageError {
  readonly kind: string;

  constructor(kind: string, reason: string) {
    super(`Invalid conversion for ${kind} exchange: ${reason}`, ErrorCode.EXCHANGE_TYPE_MISMATCH, {
      severity: ErrorSeverity.CRITICAL,
      context: { kind, reason }
    });
    this.name = 'ExchangeTypeMismatchError';
    this.kind = kind;
  }
}

// =============================================================================
// Loop Errors
// =============================================================================

/**
 * A sequence of pairs does not form a closed conversion cycle.
 */
export class InvalidLoopError extends ArbitrageError {
  readonly pairs: string[];
  readonly reason: string;

  constructor(pairs: string[], reason: string) {
    super(`Invalid loop: ${pairs.join(' -> ')} (${reason})`, ErrorCode.INVALID_LOOP, {
      severity: ErrorSeverity.INFO,
      context: { pairs, reason }
    });
    this.name = 'InvalidLoopError';
    this.pairs = pairs;
    this.reason = reason;
  }
}

// =============================================================================
// Result Type
// =============================================================================

/**
 * Result type for operations that may fail.
 */
export type Result<T, E = ArbitrageError> =
  | { success: true; data: T }
  | { success: false; error: E };

export function success<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function failure<E extends ArbitrageError>(error: E): { success: false; error: E } {
  return { success: false, error };
}

/**
 * Wrap a sync function to return Result type instead of throwing.
 */
export function tryCatchSync<T>(
  fn: () => T,
  errorCode: ErrorCode = ErrorCode.UNKNOWN_ERROR
): Result<T> {
  try {
    return success(fn());
  } catch (error) {
    if (error instanceof ArbitrageError) {
      return failure(error);
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    return failure(new ArbitrageError(cause.message || 'Unknown error', errorCode, { cause }));
  }
}

// =============================================================================
// Classification & Formatting
// =============================================================================

export function isLiquidityDepleted(error: unknown): error is LiquidityDepletedError {
  return error instanceof LiquidityDepletedError;
}

/**
 * Format error for logging.
 */
export function formatErrorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof ArbitrageError) {
    return error.toJSON();
  }
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }
  return { message: String(error) };
}
