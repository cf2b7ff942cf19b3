/**
 * @loop-arb/types
 *
 * Type-only module shared by the config and core packages.
 */

export type {
  Asset,
  InvariantKind,
  InvariantSpec,
  ConversionResult,
  ProfitEstimate,
  LoopReport,
  LoopSearchStats,
  OptimizerOptions,
  SearchOptions,
  EngineConfig,
} from './engine';
