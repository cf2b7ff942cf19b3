/**
 * Simulation Module
 *
 * In-memory model of liquidity venues and conversion cycles:
 * - Converter: invariant formula plus fee and gas metadata
 * - Pool: assets, balances and a converter
 * - Pair: two assets of one pool
 * - Loop: closed cycle of pairs with profit search
 *
 * @module simulation
 */

export { Converter } from './converter';
export { Pool, GENERIC_POOL_NAME } from './pool';
export type { PoolOptions } from './pool';
export { Pair } from './pair';
export { Loop } from './loop';
export type { LoopRejection, LoopRejectionReason, ProfitSearchOptions } from './loop';
