/**
 * Arbitrator
 *
 * Enumerates every ordered selection of pairs of the requested sizes, keeps
 * the ones that form a closed loop starting in one of the configured initial
 * assets, and ranks them by unit return.
 *
 * Two ways to describe the market:
 * - simple mode: `pairs` + `rates`, one fixed-rate pool per pair
 * - pools mode: explicit Pool instances, all of their pairs are used
 *
 * The search is combinatorial (sum over sizes of P(pairs, size) candidates)
 * and is capped by `search.maxLoopCandidates`.
 *
 * @module path-finding
 */

import type {
  Asset,
  EngineConfig,
  LoopReport,
  LoopSearchStats,
  ProfitEstimate,
} from '@loop-arb/types';
import {
  AssetPairSchema,
  GasPriceSchema,
  InitialAssetsSchema,
  LoopSizesSchema,
  resolveEngineConfig,
} from '@loop-arb/config';
import type { EngineConfigOverrides } from '@loop-arb/config';
import { ArgumentConflictError, ConfigurationError, isLiquidityDepleted } from '../error-handling';
import { getLogger } from '../logging';
import type { ILogger } from '../logging';
import { Loop } from '../simulation/loop';
import type { Pair } from '../simulation/pair';
import { GENERIC_POOL_NAME, Pool } from '../simulation/pool';
import { assertValid } from '../validation';
import { combinations, countPermutations, permutations } from './combinatorics';
import { LoopPool } from './loop-pool';

// =============================================================================
// Types
// =============================================================================

export interface ArbitratorOptions {
  /** Simple mode: asset tuples, each priced by the rate at the same index */
  pairs?: ReadonlyArray<readonly Asset[]>;
  rates?: readonly number[];
  /** Pools mode */
  pools?: readonly Pool[];
  /** Only loops starting (and ending) in one of these assets are kept */
  initialAssets: readonly Asset[] | ReadonlySet<Asset>;
  /** Price of one gas unit in the initial asset (default: 0) */
  gasPrice?: number;
  logger?: ILogger;
  config?: EngineConfigOverrides;
}

export interface EvaluateOptions {
  withFees?: boolean;
  /** Optimize only the best `limit` loops */
  limit?: number;
}

function emptyStats(): LoopSearchStats {
  return {
    candidatesExamined: 0,
    loopsAccepted: 0,
    rejectedInvalid: 0,
    rejectedInitialAsset: 0,
    truncated: false,
    durationMs: 0,
  };
}

function resolveConfig(overrides: EngineConfigOverrides | undefined): EngineConfig {
  try {
    return resolveEngineConfig(overrides);
  } catch (error) {
    throw new ConfigurationError('Invalid arbitrator configuration', {
      cause: error instanceof Error ? error : undefined,
    });
  }
}

// =============================================================================
// Arbitrator
// =============================================================================

export class Arbitrator {
  readonly pools: readonly Pool[];
  readonly pairs: readonly Pair[];
  readonly initialAssets: ReadonlySet<Asset>;
  readonly gasPrice: number;
  readonly config: EngineConfig;
  private readonly logger: ILogger;
  private stats: LoopSearchStats = emptyStats();

  /**
   * @throws ArgumentConflictError when pairs and pools are combined, or pairs lack matching rates
   * @throws ValidationError for malformed pairs, initial assets or gas price
   * @throws InvalidPoolError for an unusable rate
   * @throws ConfigurationError for invalid engine config overrides
   */
  constructor(options: ArbitratorOptions) {
    const { pairs, rates, pools } = options;
    this.logger = options.logger ?? getLogger('arbitrator');

    this.config = resolveConfig(options.config);

    if (pairs !== undefined && pools !== undefined) {
      throw new ArgumentConflictError('Pass either pairs with rates or pools, not both', ['pairs', 'pools']);
    }

    if (pools !== undefined) {
      this.pools = [...pools];
    } else if (pairs !== undefined) {
      if (rates === undefined) {
        throw new ArgumentConflictError('pairs require rates', ['pairs', 'rates']);
      }
      if (rates.length !== pairs.length) {
        throw new ArgumentConflictError(
          `got ${rates.length} rates for ${pairs.length} pairs`,
          ['pairs', 'rates']
        );
      }
      this.pools = pairs.map((pair, index) => new Pool({
        name: GENERIC_POOL_NAME,
        assets: assertValid(AssetPairSchema, pair, `pairs.${index}`),
        rate: rates[index],
      }));
    } else {
      throw new ArgumentConflictError('Either pairs with rates or pools are required', ['pairs', 'pools']);
    }

    this.initialAssets = new Set(assertValid(InitialAssetsSchema, [...options.initialAssets], 'initialAssets'));
    this.gasPrice = assertValid(GasPriceSchema, options.gasPrice ?? 0, 'gasPrice');
    this.pairs = this.pools.flatMap(pool => pool.getPairs());

    this.logger.info('Arbitrator initialized', {
      mode: pools !== undefined ? 'pools' : 'pairs',
      pools: this.pools.length,
      pairs: this.pairs.length,
      initialAssets: [...this.initialAssets],
      maxLoopCandidates: this.config.search.maxLoopCandidates,
    });
  }

  // ===========================================================================
  // Search
  // ===========================================================================

  /**
   * Every valid loop of the given sizes, best unit return first.
   *
   * @throws ValidationError for an empty size list or a size below 2
   */
  getLoops(sizes: readonly number[] = this.config.search.defaultLoopSizes, withFees = true): Loop[] {
    return this.createLoopPool(sizes).sortLoops(withFees);
  }

  /**
   * Rank loops and run the profit optimizer on each (or on the best `limit`).
   */
  evaluateLoops(
    sizes: readonly number[] = this.config.search.defaultLoopSizes,
    options: EvaluateOptions = {}
  ): LoopReport[] {
    const { withFees = true, limit } = options;
    const ranked = this.createLoopPool(sizes).rankLoops(withFees);
    const selected = limit !== undefined ? ranked.slice(0, Math.max(0, limit)) : ranked;

    return selected.map(({ loop, unitReturn }) => {
      const estimate = this.toTrade(loop, this.estimateProfit(loop, withFees));
      const gasCost = loop.getGasCost(this.gasPrice);
      return {
        path: loop.getAssetPath(),
        pairs: loop.pairs.map(String),
        initialAsset: loop.initialAsset,
        size: loop.size,
        unitReturn,
        optimalAmount: estimate.amount,
        profit: estimate.profit,
        gasCost,
        netProfit: estimate.profit - gasCost,
        converged: estimate.converged,
      };
    });
  }

  /** Counters of the most recent search. */
  getStats(): LoopSearchStats {
    return { ...this.stats };
  }

  private createLoopPool(sizes: readonly number[]): LoopPool {
    const requested = assertValid(LoopSizesSchema, [...sizes], 'sizes');
    const budget = this.config.search.maxLoopCandidates;
    const stats = emptyStats();
    const startTime = Date.now();
    const loopPool = new LoopPool([], this.logger.child({ component: 'loop-pool' }));

    search:
    for (const size of requested) {
      if (size > this.pairs.length) {
        this.logger.debug('Loop size exceeds available pairs', { size, pairs: this.pairs.length });
        continue;
      }
      this.logger.debug('Enumerating loops', {
        size,
        candidates: countPermutations(this.pairs.length, size),
      });

      for (const combination of combinations(this.pairs, size)) {
        for (const candidate of permutations(combination)) {
          if (stats.candidatesExamined >= budget) {
            stats.truncated = true;
            break search;
          }
          stats.candidatesExamined++;

          const result = Loop.tryCreate(candidate);
          if (!result.success) {
            stats.rejectedInvalid++;
            continue;
          }
          if (!this.initialAssets.has(result.data.initialAsset)) {
            stats.rejectedInitialAsset++;
            continue;
          }
          loopPool.add(result.data);
          stats.loopsAccepted++;
        }
      }
    }

    stats.durationMs = Date.now() - startTime;
    this.stats = stats;

    if (stats.truncated) {
      this.logger.warn('Loop search stopped at candidate limit', {
        maxLoopCandidates: budget,
        loopsAccepted: stats.loopsAccepted,
      });
    }
    this.logger.info('Loop search complete', { ...stats });

    return loopPool;
  }

  private estimateProfit(loop: Loop, withFees: boolean): ProfitEstimate {
    try {
      return loop.getMaxAbsoluteProfit({ ...this.config.optimizer, withFees });
    } catch (error) {
      if (!isLiquidityDepleted(error)) {
        throw error;
      }
      this.logger.debug('No feasible trade size found', { loop: loop.toString() });
      return { amount: 0, profit: 0, iterations: 0, evaluations: 0, converged: false };
    }
  }

  /**
   * The optimizer is unconstrained; a best size at or below zero means the
   * loop only pays when run backwards, which is not a trade on this loop.
   */
  private toTrade(loop: Loop, estimate: ProfitEstimate): ProfitEstimate {
    if (estimate.amount > 0) {
      return estimate;
    }
    this.logger.debug('Best trade size is not positive, reporting no trade', {
      loop: loop.toString(),
      amount: estimate.amount,
    });
    return { ...estimate, amount: 0, profit: 0, converged: false };
  }
}
