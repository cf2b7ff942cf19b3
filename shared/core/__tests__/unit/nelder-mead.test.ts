import { describe, it, expect } from '@jest/globals';
import { minimizeNelderMead } from '../../src/utils/nelder-mead';
import type { NelderMeadOptions } from '../../src/utils/nelder-mead';
import { ValidationError } from '../../src/error-handling';

const OPTIONS: NelderMeadOptions = {
  xtol: 1e-4,
  ftol: 1e-4,
  maxIterations: 200,
  maxEvaluations: 400,
};

describe('minimizeNelderMead', () => {
  it('should find the minimum of a one-dimensional quadratic', () => {
    const result = minimizeNelderMead(([x]) => (x - 3) ** 2, [1], OPTIONS);

    expect(result.converged).toBe(true);
    expect(result.x[0]).toBeCloseTo(3, 2);
    expect(result.fx).toBeLessThan(1e-4);
  });

  it('should find the minimum of a two-dimensional bowl', () => {
    const result = minimizeNelderMead(
      ([x, y]) => (x - 1) ** 2 + (y + 2) ** 2,
      [0, 0],
      { ...OPTIONS, maxIterations: 400, maxEvaluations: 800 }
    );

    expect(result.converged).toBe(true);
    expect(result.x[0]).toBeCloseTo(1, 2);
    expect(result.x[1]).toBeCloseTo(-2, 2);
  });

  it('should back off points scored as infinite', () => {
    const result = minimizeNelderMead(([x]) => (x > 2 ? Infinity : -x), [1], OPTIONS);

    expect(result.x[0]).toBeLessThanOrEqual(2);
    expect(result.x[0]).toBeCloseTo(2, 3);
  });

  it('should treat NaN like an infeasible point', () => {
    const result = minimizeNelderMead(([x]) => (x > 2 ? NaN : -x), [1], OPTIONS);
    expect(result.x[0]).toBeLessThanOrEqual(2);
    expect(Number.isNaN(result.fx)).toBe(false);
  });

  it('should stop at the iteration cap without converging', () => {
    const result = minimizeNelderMead(([x]) => (x - 3) ** 2, [1], { ...OPTIONS, maxIterations: 3 });

    expect(result.iterations).toBe(3);
    expect(result.converged).toBe(false);
  });

  it('should stop once the evaluation budget is spent', () => {
    const result = minimizeNelderMead(([x]) => (x - 3) ** 2, [1], { ...OPTIONS, maxEvaluations: 5 });

    expect(result.converged).toBe(false);
    expect(result.evaluations).toBeGreaterThanOrEqual(5);
    expect(result.evaluations).toBeLessThanOrEqual(6);
  });

  it('should start from a small absolute step at zero', () => {
    const visited: number[] = [];
    minimizeNelderMead(([x]) => {
      visited.push(x);
      return x * x;
    }, [0], { ...OPTIONS, maxIterations: 1 });

    expect(visited.slice(0, 2)).toEqual([0, 0.00025]);
  });

  it('should reject an empty starting point', () => {
    expect(() => minimizeNelderMead(() => 0, [], OPTIONS)).toThrow(ValidationError);
  });
});
