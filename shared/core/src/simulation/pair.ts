/**
 * Pair
 *
 * A view of two assets inside one Pool. Holds the pool handle plus the two
 * asset indices; the pool owns all state.
 *
 * @module simulation
 */

import type { Asset, ConversionResult } from '@loop-arb/types';
import { ImpossibleConversionError, InvalidPoolError } from '../error-handling';
import type { Pool } from './pool';

export class Pair {
  readonly pool: Pool;
  readonly asset0: Asset;
  readonly asset1: Asset;
  readonly index0: number;
  readonly index1: number;

  constructor(pool: Pool, index0: number, index1: number) {
    const asset0 = pool.assets[index0];
    const asset1 = pool.assets[index1];
    if (asset0 === undefined || asset1 === undefined || index0 === index1) {
      throw new InvalidPoolError(`no pair at indices (${index0}, ${index1})`, pool.name);
    }
    this.pool = pool;
    this.asset0 = asset0;
    this.asset1 = asset1;
    this.index0 = index0;
    this.index1 = index1;
  }

  has(asset: Asset): boolean {
    return asset === this.asset0 || asset === this.asset1;
  }

  /**
   * The asset received when `asset` goes through this pair, or undefined if
   * the pair cannot take it. Structural only; no pool state is touched.
   */
  counterpart(asset: Asset): Asset | undefined {
    if (asset === this.asset0) return this.asset1;
    if (asset === this.asset1) return this.asset0;
    return undefined;
  }

  /**
   * Convert `amount` of `asset` into the opposite asset through the parent pool.
   *
   * @throws ImpossibleConversionError if `asset` is not one of the pair's assets
   */
  convert(asset: Asset, amount: number, withFees = true): ConversionResult {
    if (asset === this.asset0) {
      return {
        asset: this.asset1,
        amount: this.pool.convertByIndex(this.index0, this.index1, amount, withFees),
      };
    }
    if (asset === this.asset1) {
      return {
        asset: this.asset0,
        amount: this.pool.convertByIndex(this.index1, this.index0, amount, withFees),
      };
    }
    throw new ImpossibleConversionError(asset, undefined, this.toString());
  }

  toString(): string {
    return `${this.asset0}/${this.asset1}`;
  }
}
