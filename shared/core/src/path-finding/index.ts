/**
 * Path Finding Module
 *
 * - Arbitrator: combinatorial loop search over pairs or pools
 * - LoopPool: ranking by unit return
 * - combinations / permutations: lazy candidate generators
 *
 * @module path-finding
 */

export { Arbitrator } from './arbitrator';
export type { ArbitratorOptions, EvaluateOptions } from './arbitrator';
export { LoopPool } from './loop-pool';
export type { RankedLoop } from './loop-pool';
export { combinations, permutations, countPermutations } from './combinatorics';
