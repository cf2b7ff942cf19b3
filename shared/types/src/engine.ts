// =============================================================================
// Assets & Invariants
// =============================================================================

/** Opaque asset identifier (ticker, mint, address...). Identity is by equality. */
export type Asset = string;

/**
 * Pricing invariants the engine knows how to simulate.
 * - fixed-rate: two assets, infinite depth, no slippage
 * - constant-product: prod(balances) = C
 * - constant-sum: sum(balances) = C (stable pools)
 */
export type InvariantKind = 'fixed-rate' | 'constant-product' | 'constant-sum';

/** Declarative description of an invariant, resolved by createInvariantFormula(). */
export type InvariantSpec =
  | { kind: 'fixed-rate'; rate: number }
  | { kind: 'constant-product' }
  | { kind: 'constant-sum' };

/** One hop of a simulated trade. */
export interface ConversionResult {
  asset: Asset;
  amount: number;
}

// =============================================================================
// Results
// =============================================================================

/**
 * Output of the profit optimizer for a single loop.
 * `amount` and `profit` are denominated in the loop's initial asset.
 */
export interface ProfitEstimate {
  amount: number;
  profit: number;
  iterations: number;
  evaluations: number;
  converged: boolean;
}

export interface LoopReport {
  /** Assets visited, starting and ending with the initial asset */
  path: Asset[];
  /** Pair labels in hop order, e.g. ['A/B', 'B/C', 'A/C'] */
  pairs: string[];
  initialAsset: Asset;
  size: number;
  /** Amount returned for one unit of the initial asset */
  unitReturn: number;
  optimalAmount: number;
  profit: number;
  gasCost: number;
  netProfit: number;
  converged: boolean;
}

export interface LoopSearchStats {
  candidatesExamined: number;
  loopsAccepted: number;
  rejectedInvalid: number;
  rejectedInitialAsset: number;
  /** True when the candidate budget ran out before enumeration finished */
  truncated: boolean;
  durationMs: number;
}

// =============================================================================
// Configuration
// =============================================================================

export interface OptimizerOptions {
  /** Starting trade size */
  initialAmount: number;
  /** Absolute simplex spread tolerance on the trade size */
  xtol: number;
  /** Absolute spread tolerance on the objective */
  ftol: number;
  maxIterations: number;
  maxEvaluations: number;
}

export interface SearchOptions {
  /** Upper bound on permutations attempted per getLoops() call */
  maxLoopCandidates: number;
  defaultLoopSizes: number[];
}

export interface EngineConfig {
  optimizer: OptimizerOptions;
  search: SearchOptions;
}
