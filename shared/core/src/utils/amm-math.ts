/**
 * AMM (Automated Market Maker) invariant formulas.
 *
 * Every formula follows one contract: given source index `i`, target index
 * `j`, an input `amount` and the pool's live balance vector `state`, it
 * writes the post-trade balances into `state` and returns the amount of the
 * target asset handed to the trader. Fees are not part of the invariant;
 * the pool applies them to the returned amount.
 *
 * Failures (depletion, mismatched data) are raised before any write, so a
 * rejected trade leaves `state` exactly as it was.
 *
 * @module utils/amm-math
 */

import type { InvariantKind, InvariantSpec } from '@loop-arb/types';
import { ExchangeTypeMismatchError, LiquidityDepletedError } from '../error-handling';

// =============================================================================
// Formula Contract
// =============================================================================

export interface InvariantFormula {
  readonly kind: InvariantKind;
  /** Whether the formula reads and writes pool balances */
  readonly requiresState: boolean;
  apply(i: number, j: number, amount: number, state: number[]): number;
}

function assertStatefulIndices(kind: InvariantKind, i: number, j: number, state: number[]): void {
  if (state.length < 2) {
    throw new ExchangeTypeMismatchError(kind, `needs pool balances, got ${state.length}`);
  }
  if (!Number.isInteger(i) || !Number.isInteger(j) || i < 0 || j < 0 || i >= state.length || j >= state.length) {
    throw new ExchangeTypeMismatchError(kind, `index pair (${i}, ${j}) outside a ${state.length}-asset pool`);
  }
  if (i === j) {
    throw new ExchangeTypeMismatchError(kind, `source and target index are both ${i}`);
  }
}

// =============================================================================
// Fixed Rate
// =============================================================================

/**
 * Two-asset conversion at a fixed rate with infinite depth (no slippage).
 * asset0 -> asset1 multiplies by `rate`, asset1 -> asset0 divides by it.
 */
export function createFixedRateFormula(rate: number): InvariantFormula {
  return {
    kind: 'fixed-rate',
    requiresState: false,
    apply(i: number, j: number, amount: number): number {
      if (i === 0 && j === 1) {
        return amount * rate;
      }
      if (i === 1 && j === 0) {
        return amount / rate;
      }
      throw new ExchangeTypeMismatchError('fixed-rate', `index pair (${i}, ${j}) outside a two-asset pool`);
    },
  };
}

// =============================================================================
// Constant Product: prod(x_k) = C
// =============================================================================

export const CONSTANT_PRODUCT_FORMULA: InvariantFormula = Object.freeze({
  kind: 'constant-product' as const,
  requiresState: true,
  apply(i: number, j: number, amount: number, state: number[]): number {
    assertStatefulIndices('constant-product', i, j, state);

    // An empty side zeroes the product, leaving nothing to solve for
    for (let k = 0; k < state.length; k++) {
      if (!(state[k] > 0)) {
        throw new LiquidityDepletedError(k, state[k]);
      }
    }

    const nextI = state[i] + amount;
    if (!(nextI > 0)) {
      throw new LiquidityDepletedError(i, nextI);
    }

    let constant = 1;
    let productWithoutJ = 1;
    for (let k = 0; k < state.length; k++) {
      constant *= state[k];
      if (k !== j) {
        productWithoutJ *= k === i ? nextI : state[k];
      }
    }

    const initialJ = state[j];
    const finalJ = constant / productWithoutJ;
    if (!(finalJ > 0) || !Number.isFinite(finalJ)) {
      throw new LiquidityDepletedError(j, finalJ);
    }

    state[i] = nextI;
    state[j] = finalJ;
    return initialJ - finalJ;
  },
});

// =============================================================================
// Constant Sum: sum(x_k) = C
// =============================================================================

/**
 * Stable-pool invariant. Trades 1:1 until the target side runs dry.
 */
export const CONSTANT_SUM_FORMULA: InvariantFormula = Object.freeze({
  kind: 'constant-sum' as const,
  requiresState: true,
  apply(i: number, j: number, amount: number, state: number[]): number {
    assertStatefulIndices('constant-sum', i, j, state);

    const nextI = state[i] + amount;
    if (nextI < 0) {
      throw new LiquidityDepletedError(i, nextI);
    }

    let constant = 0;
    let sumWithoutJ = 0;
    for (let k = 0; k < state.length; k++) {
      constant += state[k];
      if (k !== j) {
        sumWithoutJ += k === i ? nextI : state[k];
      }
    }

    const initialJ = state[j];
    const finalJ = constant - sumWithoutJ;
    if (finalJ < 0) {
      throw new LiquidityDepletedError(j, finalJ);
    }

    state[i] = nextI;
    state[j] = finalJ;
    return initialJ - finalJ;
  },
});

// =============================================================================
// Factory
// =============================================================================

/**
 * Resolve a declarative invariant spec to its formula.
 */
export function createInvariantFormula(spec: InvariantSpec): InvariantFormula {
  switch (spec.kind) {
    case 'fixed-rate':
      return createFixedRateFormula(spec.rate);
    case 'constant-product':
      return CONSTANT_PRODUCT_FORMULA;
    case 'constant-sum':
      return CONSTANT_SUM_FORMULA;
    default: {
      const unknownSpec: never = spec;
      throw new ExchangeTypeMismatchError(String(unknownSpec), 'unknown invariant');
    }
  }
}
