/**
 * @loop-arb/core
 *
 * Loop arbitrage simulation engine: invariant formulas, pools, loops, the
 * profit optimizer and the combinatorial loop search.
 *
 * @module @loop-arb/core
 */

// =============================================================================
// Logging
// =============================================================================

export {
  createPinoLogger,
  getLogger,
  resetLoggerCache,
  RecordingLogger,
  NullLogger,
  LOG_LEVELS,
} from './logging';
export type { ILogger, LoggerConfig, LogLevel, LogMeta, LogEntry } from './logging';

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  ErrorSeverity,
  ArbitrageError,
  ValidationError,
  ConfigurationError,
  ArgumentConflictError,
  InvalidPoolError,
  ImpossibleConversionError,
  LiquidityDepletedError,
  ExchangeTypeMismatchError,
  InvalidLoopError,
  success,
  failure,
  tryCatchSync,
  isLiquidityDepleted,
  formatErrorForLog,
} from './error-handling';
export type { Result } from './error-handling';

export { assertValid } from './validation';

// =============================================================================
// Math
// =============================================================================

export {
  createFixedRateFormula,
  createInvariantFormula,
  CONSTANT_PRODUCT_FORMULA,
  CONSTANT_SUM_FORMULA,
} from './utils/amm-math';
export type { InvariantFormula } from './utils/amm-math';

export { minimizeNelderMead } from './utils/nelder-mead';
export type { NelderMeadOptions, NelderMeadResult, Objective } from './utils/nelder-mead';

// =============================================================================
// Simulation & Search
// =============================================================================

export * from './simulation';
export * from './path-finding';
