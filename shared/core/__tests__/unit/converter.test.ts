import { describe, it, expect } from '@jest/globals';
import { Converter } from '../../src/simulation/converter';
import { CONSTANT_SUM_FORMULA, createFixedRateFormula } from '../../src/utils/amm-math';
import { ValidationError } from '../../src/error-handling';

describe('Converter', () => {
  it('should default to no fee and no gas', () => {
    const converter = new Converter('STABLE', CONSTANT_SUM_FORMULA);

    expect(converter.feePercent).toBe(0);
    expect(converter.fee).toBe(0);
    expect(converter.gasCost).toBe(0);
    expect(converter.kind).toBe('constant-sum');
    expect(converter.toString()).toBe('STABLE');
  });

  it('should express the fee as a fraction', () => {
    const converter = new Converter('STABLE', CONSTANT_SUM_FORMULA, 10, 50_000);

    expect(converter.fee).toBe(0.1);
    expect(converter.applyFee(10)).toBe(9);
    expect(converter.gasCost).toBe(50_000);
  });

  it('should delegate to the formula', () => {
    const converter = new Converter('FX', createFixedRateFormula(3));
    expect(converter.apply(0, 1, 2, [])).toBe(6);
  });

  it.each<[number, string]>([
    [-1, 'feePercent: Fee cannot be negative'],
    [101, 'feePercent: Fee cannot exceed 100%'],
  ])('should reject fee %p', (feePercent, issue) => {
    try {
      new Converter('BAD', CONSTANT_SUM_FORMULA, feePercent);
      throw new Error('expected ValidationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.field).toBe('feePercent');
        expect(error.issues).toEqual([issue]);
      }
    }
  });

  it('should reject fractional or negative gas', () => {
    expect(() => new Converter('BAD', CONSTANT_SUM_FORMULA, 0, 1.5)).toThrow(ValidationError);
    expect(() => new Converter('BAD', CONSTANT_SUM_FORMULA, 0, -1)).toThrow(
      'Invalid gasCost: gasCost: Value cannot be negative'
    );
  });
});
