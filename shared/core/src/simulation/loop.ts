/**
 * Loop
 *
 * An ordered cycle of pairs that starts and ends in the same asset. The
 * initial asset is the one the first and last pair share; for a two-pair
 * loop over the same two assets asset0 of the first pair wins.
 *
 * Validity is decided structurally (each pair can take the asset the
 * previous hop produced) without touching pool state, so enumerating
 * permutations never simulates a trade.
 *
 * @module simulation
 */

import type { Asset, OptimizerOptions, ProfitEstimate } from '@loop-arb/types';
import { ENGINE_DEFAULTS } from '@loop-arb/config';
import { InvalidLoopError, isLiquidityDepleted } from '../error-handling';
import type { Result } from '../error-handling';
import { minimizeNelderMead } from '../utils/nelder-mead';
import type { Pair } from './pair';
import type { Pool } from './pool';

// =============================================================================
// Structural Validation
// =============================================================================

export type LoopRejectionReason =
  | 'too-few-pairs'
  | 'disjoint-ends'
  | 'broken-chain'
  | 'not-closed';

export interface LoopRejection {
  reason: LoopRejectionReason;
  detail: string;
}

type ChainCheck =
  | { valid: true; path: Asset[] }
  | { valid: false; rejection: LoopRejection };

function reject(reason: LoopRejectionReason, detail: string): ChainCheck {
  return { valid: false, rejection: { reason, detail } };
}

function checkChain(pairs: readonly Pair[]): ChainCheck {
  if (pairs.length < 2) {
    return reject('too-few-pairs', `a loop needs at least 2 pairs, got ${pairs.length}`);
  }

  const first = pairs[0];
  const last = pairs[pairs.length - 1];
  let initialAsset: Asset;
  if (last.has(first.asset0)) {
    initialAsset = first.asset0;
  } else if (last.has(first.asset1)) {
    initialAsset = first.asset1;
  } else {
    return reject('disjoint-ends', `${first} and ${last} share no asset`);
  }

  const path: Asset[] = [initialAsset];
  let asset = initialAsset;
  for (const pair of pairs) {
    const next = pair.counterpart(asset);
    if (next === undefined) {
      return reject('broken-chain', `${pair} cannot take ${asset}`);
    }
    asset = next;
    path.push(asset);
  }

  if (asset !== initialAsset) {
    return reject('not-closed', `ends on ${asset} instead of ${initialAsset}`);
  }
  return { valid: true, path };
}

/** Paths of pair lists tryCreate already checked, consumed by the constructor */
const checkedPaths = new WeakMap<readonly Pair[], Asset[]>();

// =============================================================================
// Loop
// =============================================================================

export interface ProfitSearchOptions extends Partial<OptimizerOptions> {
  withFees?: boolean;
}

export class Loop {
  readonly pairs: readonly Pair[];
  readonly initialAsset: Asset;
  /** Distinct pools touched by the loop, in first-use order */
  readonly pools: readonly Pool[];
  private readonly path: readonly Asset[];

  /**
   * @throws InvalidLoopError if the pairs do not chain into a closed cycle
   */
  constructor(pairs: readonly Pair[]) {
    const path = checkedPaths.get(pairs) ?? Loop.walk(pairs);
    checkedPaths.delete(pairs);
    this.pairs = Object.freeze([...pairs]);
    this.path = Object.freeze(path);
    this.initialAsset = path[0];
    this.pools = Object.freeze([...new Set(pairs.map(pair => pair.pool))]);
  }

  private static walk(pairs: readonly Pair[]): Asset[] {
    const check = checkChain(pairs);
    if (!check.valid) {
      throw new InvalidLoopError(pairs.map(String), check.rejection.detail);
    }
    return check.path;
  }

  /**
   * Build a loop, or describe why the pairs do not form one. Used by the
   * enumerator, where rejection is the common case.
   */
  static tryCreate(pairs: readonly Pair[]): Result<Loop, LoopRejection> {
    const check = checkChain(pairs);
    if (!check.valid) {
      return { success: false, error: check.rejection };
    }
    const checked = [...pairs];
    checkedPaths.set(checked, check.path);
    return { success: true, data: new Loop(checked) };
  }

  get size(): number {
    return this.pairs.length;
  }

  /** Assets visited, starting and ending with the initial asset. */
  getAssetPath(): Asset[] {
    return [...this.path];
  }

  // ===========================================================================
  // Simulation
  // ===========================================================================

  /**
   * Push `amount` of the initial asset through every pair in order and
   * return what comes back. Hops through the same pool see each other's
   * balance changes.
   *
   * @param reset - Restore every touched pool afterwards, also on failure
   * @throws LiquidityDepletedError if a hop would drain a pool
   */
  convert(amount: number, withFees = true, reset = true): number {
    let asset = this.initialAsset;
    let current = amount;
    try {
      for (const pair of this.pairs) {
        const result = pair.convert(asset, current, withFees);
        asset = result.asset;
        current = result.amount;
      }
    } finally {
      if (reset) {
        this.resetPools();
      }
    }
    return current;
  }

  /** Amount returned for one unit of the initial asset. */
  getUnitReturn(withFees = true): number {
    return this.convert(1, withFees);
  }

  resetPools(): void {
    for (const pool of this.pools) {
      pool.reset();
    }
  }

  /**
   * Trade size with the largest absolute profit, found by Nelder-Mead on
   * amount - convert(amount). Sizes that deplete a pool are scored +Infinity
   * so the simplex backs off the liquidity boundary.
   *
   * @throws LiquidityDepletedError if no tried size was feasible
   */
  getMaxAbsoluteProfit(options: ProfitSearchOptions = {}): ProfitEstimate {
    const { withFees = true, ...overrides } = options;
    const settings: OptimizerOptions = { ...ENGINE_DEFAULTS.optimizer, ...overrides };

    const objective = ([amount]: readonly number[]): number => {
      try {
        return amount - this.convert(amount, withFees);
      } catch (error) {
        if (isLiquidityDepleted(error)) {
          return Infinity;
        }
        throw error;
      }
    };

    const result = minimizeNelderMead(objective, [settings.initialAmount], settings);
    const amount = result.x[0];
    return {
      amount,
      profit: this.convert(amount, withFees) - amount,
      iterations: result.iterations,
      evaluations: result.evaluations,
      converged: result.converged,
    };
  }

  /**
   * Gas for one pass through the loop, priced in the initial asset.
   */
  getGasCost(gasPrice = 0): number {
    let gas = 0;
    for (const pair of this.pairs) {
      gas += pair.pool.converter.gasCost;
    }
    return gas * gasPrice;
  }

  toString(): string {
    return this.pairs.map(String).join(' -> ');
  }
}
