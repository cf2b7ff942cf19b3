/**
 * Loop Pool
 *
 * Ranks a set of loops by the amount one unit of the initial asset comes
 * back as. Each loop is simulated once per ranking; the sort runs on the
 * precomputed keys and is stable, so ties keep discovery order.
 *
 * @module path-finding
 */

import { isLiquidityDepleted } from '../error-handling';
import { getLogger } from '../logging';
import type { ILogger } from '../logging';
import type { Loop } from '../simulation/loop';

export interface RankedLoop {
  loop: Loop;
  /** Output of convert(1); -Infinity when a unit trade depletes a pool */
  unitReturn: number;
}

function byUnitReturnDescending(a: RankedLoop, b: RankedLoop): number {
  if (a.unitReturn === b.unitReturn) return 0;
  return a.unitReturn > b.unitReturn ? -1 : 1;
}

export class LoopPool {
  private loops: Loop[];
  private readonly logger: ILogger;

  constructor(loops: readonly Loop[] = [], logger: ILogger = getLogger('loop-pool')) {
    this.loops = [...loops];
    this.logger = logger;
  }

  get size(): number {
    return this.loops.length;
  }

  add(loop: Loop): void {
    this.loops.push(loop);
  }

  getLoops(): readonly Loop[] {
    return this.loops;
  }

  /**
   * Loops with their unit return, best first.
   */
  rankLoops(withFees = true): RankedLoop[] {
    const ranked = this.loops.map(loop => ({ loop, unitReturn: this.unitReturn(loop, withFees) }));
    ranked.sort(byUnitReturnDescending);
    this.loops = ranked.map(entry => entry.loop);
    return ranked;
  }

  /**
   * Reorder the pool best first and return the ordered loops.
   */
  sortLoops(withFees = true): Loop[] {
    return this.rankLoops(withFees).map(entry => entry.loop);
  }

  private unitReturn(loop: Loop, withFees: boolean): number {
    try {
      return loop.getUnitReturn(withFees);
    } catch (error) {
      if (!isLiquidityDepleted(error)) {
        throw error;
      }
      this.logger.debug('Unit trade depletes a pool, ranking loop last', { loop: loop.toString() });
      return -Infinity;
    }
  }
}
