/**
 * Pool
 *
 * A liquidity venue: an ordered set of assets, the balances the invariant
 * operates on, and the Converter that prices trades. `convert` mutates the
 * working balances; callers (Loop) restore them with `reset()`.
 *
 * @module simulation
 */

import type { Asset } from '@loop-arb/types';
import { AmountsSchema, AssetListSchema, RateSchema, validateWithDetails } from '@loop-arb/config';
import type { z } from 'zod';
import { ImpossibleConversionError, InvalidPoolError } from '../error-handling';
import { createFixedRateFormula } from '../utils/amm-math';
import { Converter } from './converter';
import { Pair } from './pair';

/** Name given to pools and converters synthesized from a bare rate. */
export const GENERIC_POOL_NAME = 'GENERIC';

export interface PoolOptions {
  name: string;
  assets: readonly Asset[];
  /** Balances, one per asset. Required for pools of more than 2 assets. */
  amounts?: readonly number[];
  /** asset0 -> asset1 rate for an implicit fixed-rate pool */
  rate?: number;
  converter?: Converter;
}

function checkField<T>(schema: z.ZodType<T>, value: unknown, poolName: string): T {
  const result = validateWithDetails(schema, value);
  if (!result.success) {
    const issue = result.errors[0];
    throw new InvalidPoolError(issue.path ? `${issue.path}: ${issue.message}` : issue.message, poolName);
  }
  return result.data;
}

export class Pool {
  readonly name: string;
  readonly assets: readonly Asset[];
  readonly converter: Converter;
  private readonly initial: readonly number[] | undefined;
  private state: number[];
  private readonly indexByAsset: Map<Asset, number>;

  constructor(options: PoolOptions) {
    const { name, amounts, rate, converter } = options;
    const assets = checkField(AssetListSchema, options.assets, name);

    if (amounts !== undefined && amounts.length !== assets.length) {
      throw new InvalidPoolError(`got ${amounts.length} amounts for ${assets.length} assets`, name);
    }
    if (assets.length > 2 && amounts === undefined) {
      throw new InvalidPoolError(`a pool of ${assets.length} assets needs one amount per asset`, name);
    }

    if (converter) {
      if (converter.formula.requiresState && amounts === undefined) {
        throw new InvalidPoolError(`a ${converter.kind} pool needs one amount per asset`, name);
      }
      this.converter = converter;
    } else {
      if (assets.length !== 2 || rate === undefined) {
        throw new InvalidPoolError('without a converter a pool needs exactly 2 assets and a rate', name);
      }
      const fixedRate = checkField(RateSchema, rate, name);
      this.converter = new Converter(GENERIC_POOL_NAME, createFixedRateFormula(fixedRate));
    }

    this.name = name;
    this.assets = Object.freeze([...assets]);
    this.initial = amounts !== undefined
      ? Object.freeze([...checkField(AmountsSchema, amounts, name)])
      : undefined;
    this.state = this.initial ? [...this.initial] : [];
    this.indexByAsset = new Map(assets.map((asset, index) => [asset, index]));
  }

  // ===========================================================================
  // State
  // ===========================================================================

  /** Live balances (empty for infinite-depth fixed-rate pools). */
  get amounts(): readonly number[] {
    return this.state;
  }

  get initialAmounts(): readonly number[] | undefined {
    return this.initial;
  }

  get isStateful(): boolean {
    return this.converter.formula.requiresState;
  }

  /**
   * Restore the balances the pool was created with.
   */
  reset(): void {
    if (this.initial) {
      this.state = [...this.initial];
    }
  }

  /**
   * A pool with the same assets and converter and its own copy of the
   * initial balances, for evaluating loops in isolation.
   */
  clone(name: string = this.name): Pool {
    return new Pool({
      name,
      assets: this.assets,
      amounts: this.initial,
      converter: this.converter,
    });
  }

  // ===========================================================================
  // Conversion
  // ===========================================================================

  indexOf(asset: Asset): number | undefined {
    return this.indexByAsset.get(asset);
  }

  /**
   * Trade `amount` of `asset` for `target`. Mutates the pool balances.
   *
   * @throws ImpossibleConversionError if either asset is not in the pool or they are equal
   */
  convert(asset: Asset, amount: number, target: Asset, withFees = true): number {
    if (asset === target) {
      throw new ImpossibleConversionError(asset, target, this.name);
    }
    const i = this.indexByAsset.get(asset);
    const j = this.indexByAsset.get(target);
    if (i === undefined || j === undefined) {
      throw new ImpossibleConversionError(asset, target, this.name);
    }
    return this.convertByIndex(i, j, amount, withFees);
  }

  /**
   * Index-addressed conversion used by Pair. The fee is applied to the
   * invariant's output, never to the invariant math itself.
   */
  convertByIndex(i: number, j: number, amount: number, withFees = true): number {
    const amountOut = this.converter.apply(i, j, amount, this.state);
    return withFees ? this.converter.applyFee(amountOut) : amountOut;
  }

  /**
   * One Pair per unordered asset combination, in asset order.
   */
  getPairs(): Pair[] {
    const pairs: Pair[] = [];
    for (let a = 0; a < this.assets.length - 1; a++) {
      for (let b = a + 1; b < this.assets.length; b++) {
        pairs.push(new Pair(this, a, b));
      }
    }
    return pairs;
  }

  toString(): string {
    return `${this.assets.join('-')} ${this.converter}`;
  }
}
