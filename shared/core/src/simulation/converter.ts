/**
 * Converter
 *
 * One pricing invariant plus its fee and gas metadata. Converters are
 * immutable and may be shared by several pools; all mutable balances live
 * in the Pool.
 *
 * @module simulation
 */

import type { InvariantKind } from '@loop-arb/types';
import { FeePercentSchema, GasCostSchema } from '@loop-arb/config';
import type { InvariantFormula } from '../utils/amm-math';
import { assertValid } from '../validation';

export class Converter {
  readonly name: string;
  readonly formula: InvariantFormula;
  /** Fee in percent (10 = 10%) */
  readonly feePercent: number;
  /** Gas units per conversion. Metadata only; not used by the invariant math. */
  readonly gasCost: number;

  constructor(
    name: string,
    formula: InvariantFormula,
    feePercent = 0,
    gasCost = 0
  ) {
    this.name = name;
    this.formula = formula;
    this.feePercent = assertValid(FeePercentSchema, feePercent, 'feePercent');
    this.gasCost = assertValid(GasCostSchema, gasCost, 'gasCost');
  }

  /** Fee as a fraction (0.1 for 10%). */
  get fee(): number {
    return this.feePercent / 100;
  }

  get kind(): InvariantKind {
    return this.formula.kind;
  }

  /**
   * Run the raw invariant. Mutates `state`.
   */
  apply(i: number, j: number, amount: number, state: number[]): number {
    return this.formula.apply(i, j, amount, state);
  }

  /**
   * Amount delivered to the trader once the fee is taken.
   */
  applyFee(amountOut: number): number {
    return amountOut * (1 - this.fee);
  }

  toString(): string {
    return this.name;
  }
}
