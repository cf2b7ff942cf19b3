/**
 * Pool & Pair Tests
 */

import { describe, it, expect } from '@jest/globals';
import { Pool, GENERIC_POOL_NAME } from '../../src/simulation/pool';
import { Converter } from '../../src/simulation/converter';
import { CONSTANT_PRODUCT_FORMULA, CONSTANT_SUM_FORMULA } from '../../src/utils/amm-math';
import { ImpossibleConversionError, InvalidPoolError } from '../../src/error-handling';

const stable = (feePercent = 0): Converter => new Converter('STABLE', CONSTANT_SUM_FORMULA, feePercent);

function createStablePool(feePercent = 0): Pool {
  return new Pool({
    name: 'stable',
    assets: ['A', 'B', 'C'],
    amounts: [100, 200, 300],
    converter: stable(feePercent),
  });
}

describe('Pool', () => {
  describe('construction', () => {
    it('should reject fewer than 2 assets', () => {
      expect(() => new Pool({ name: 'P', assets: ['A'], rate: 1 })).toThrow(
        'Invalid pool P: A pool needs at least 2 assets'
      );
    });

    it('should reject duplicate assets', () => {
      expect(() => new Pool({ name: 'P', assets: ['A', 'A'], rate: 1 })).toThrow(
        'Invalid pool P: Pool assets must be unique'
      );
    });

    it('should reject amounts that do not match the assets', () => {
      expect(() => new Pool({
        name: 'P',
        assets: ['A', 'B', 'C'],
        amounts: [1, 2],
        converter: stable(),
      })).toThrow('Invalid pool P: got 2 amounts for 3 assets');
    });

    it('should require amounts for pools of more than 2 assets', () => {
      expect(() => new Pool({ name: 'P', assets: ['A', 'B', 'C'], converter: stable() })).toThrow(
        'Invalid pool P: a pool of 3 assets needs one amount per asset'
      );
    });

    it('should require balances for a two-asset pool with a stateful converter', () => {
      const product = new Converter('CP', CONSTANT_PRODUCT_FORMULA);

      expect(() => new Pool({ name: 'P', assets: ['A', 'B'], converter: product })).toThrow(
        'Invalid pool P: a constant-product pool needs one amount per asset'
      );
      expect(() => new Pool({ name: 'P', assets: ['A', 'B'], converter: stable() })).toThrow(InvalidPoolError);
    });

        it('should require a rate when no converter is given', () => {
      expect(() => new Pool({ name: 'P', assets: ['A', 'B'] })).toThrow(
        'Invalid pool P: without a converter a pool needs exactly 2 assets and a rate'
      );
      expect(() => new Pool({ name: 'P', assets: ['A', 'B', 'C'], amounts: [1, 1, 1], rate: 2 })).toThrow(
        InvalidPoolError
      );
    });

    it('should reject a non-positive rate', () => {
      expect(() => new Pool({ name: 'P', assets: ['A', 'B'], rate: 0 })).toThrow(
        'Invalid pool P: Rate must be positive'
      );
    });

    it('should reject negative balances', () => {
      expect(() => new Pool({
        name: 'P',
        assets: ['A', 'B'],
        amounts: [100, -1],
        converter: stable(),
      })).toThrow('Invalid pool P: 1: Amount cannot be negative');
    });

    it('should synthesize a fixed-rate converter from a rate', () => {
      const pool = new Pool({ name: 'fx', assets: ['A', 'B'], rate: 2 });

      expect(pool.converter.name).toBe(GENERIC_POOL_NAME);
      expect(pool.converter.kind).toBe('fixed-rate');
      expect(pool.converter.fee).toBe(0);
      expect(pool.isStateful).toBe(false);
      expect(pool.amounts).toEqual([]);
      expect(pool.initialAmounts).toBeUndefined();
    });
  });

  describe('convert', () => {
    it('should convert both directions at a fixed rate', () => {
      const pool = new Pool({ name: 'fx', assets: ['A', 'B'], rate: 2 });

      expect(pool.convert('A', 10, 'B')).toBe(20);
      expect(pool.convert('B', 10, 'A')).toBe(5);
    });

    it('should apply the fee after the invariant', () => {
      const pool = createStablePool(10);

      expect(pool.convert('A', 10, 'B')).toBe(9);
      expect(pool.amounts).toEqual([110, 190, 300]);
    });

    it('should skip the fee on request', () => {
      const pool = createStablePool(10);
      expect(pool.convert('A', 10, 'B', false)).toBe(10);
    });

    it('should reject converting an asset into itself', () => {
      const pool = createStablePool();
      expect(() => pool.convert('A', 1, 'A')).toThrow(ImpossibleConversionError);
    });

    it('should reject assets outside the pool', () => {
      const pool = createStablePool();
      expect(() => pool.convert('A', 1, 'Z')).toThrow('Invalid conversion: A -> Z on stable');
    });
  });

  describe('reset', () => {
    it('should restore the initial balances and be idempotent', () => {
      const pool = createStablePool();
      pool.convert('A', 50, 'C');
      expect(pool.amounts).toEqual([150, 200, 250]);

      pool.reset();
      expect(pool.amounts).toEqual([100, 200, 300]);
      pool.reset();
      expect(pool.amounts).toEqual([100, 200, 300]);
    });
  });

  describe('clone', () => {
    it('should start from the initial balances with independent state', () => {
      const pool = createStablePool();
      pool.convert('A', 50, 'C');

      const copy = pool.clone('stable-copy');
      expect(copy.name).toBe('stable-copy');
      expect(copy.amounts).toEqual([100, 200, 300]);

      copy.convert('B', 20, 'A');
      expect(copy.amounts).toEqual([80, 220, 300]);
      expect(pool.amounts).toEqual([150, 200, 250]);
      expect(copy.converter).toBe(pool.converter);
    });
  });

  describe('getPairs', () => {
    it('should return every unordered asset combination in asset order', () => {
      const pool = createStablePool();
      expect(pool.getPairs().map(String)).toEqual(['A/B', 'A/C', 'B/C']);
    });

    it('should return a single pair for a two-asset pool', () => {
      const pool = new Pool({ name: 'fx', assets: ['A', 'B'], rate: 2 });
      expect(pool.getPairs()).toHaveLength(1);
    });
  });

  it('should index assets and describe itself', () => {
    const pool = new Pool({
      name: 'cp',
      assets: ['X', 'Y'],
      amounts: [10, 10],
      converter: new Converter('CP', CONSTANT_PRODUCT_FORMULA),
    });

    expect(pool.indexOf('Y')).toBe(1);
    expect(pool.indexOf('Z')).toBeUndefined();
    expect(pool.isStateful).toBe(true);
    expect(pool.toString()).toBe('X-Y CP');
  });
});

describe('Pair', () => {
  it('should convert through the parent pool in either direction', () => {
    const pool = createStablePool();
    const [, ac] = pool.getPairs();

    expect(ac.convert('A', 10)).toEqual({ asset: 'C', amount: 10 });
    expect(ac.convert('C', 4)).toEqual({ asset: 'A', amount: 4 });
    expect(pool.amounts).toEqual([106, 200, 294]);
  });

  it('should reject an asset outside the pair', () => {
    const pool = createStablePool();
    const [ab] = pool.getPairs();

    expect(() => ab.convert('C', 1)).toThrow('Invalid conversion: C on A/B');
  });

  it('should report membership and counterparts without touching state', () => {
    const pool = createStablePool();
    const [, , bc] = pool.getPairs();

    expect(bc.has('B')).toBe(true);
    expect(bc.has('A')).toBe(false);
    expect(bc.counterpart('C')).toBe('B');
    expect(bc.counterpart('A')).toBeUndefined();
    expect(bc.index0).toBe(1);
    expect(bc.index1).toBe(2);
    expect(pool.amounts).toEqual([100, 200, 300]);
  });
});
