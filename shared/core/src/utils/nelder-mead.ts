/**
 * Nelder-Mead simplex minimizer.
 *
 * Derivative-free, unconstrained. Used to find the trade size that maximizes
 * loop profit. An objective may return +Infinity for an infeasible point
 * (depleted pool); the simplex then contracts back toward feasible points.
 *
 * @module utils/nelder-mead
 */

import { ValidationError } from '../error-handling';

/** Relative step for non-zero starting coordinates */
const NONZERO_DELTA = 0.05;
/** Absolute step for zero starting coordinates */
const ZERO_DELTA = 0.00025;

const REFLECTION = 1;
const EXPANSION = 2;
const CONTRACTION = 0.5;
const SHRINK = 0.5;

export type Objective = (x: readonly number[]) => number;

export interface NelderMeadOptions {
  xtol: number;
  ftol: number;
  maxIterations: number;
  maxEvaluations: number;
}

export interface NelderMeadResult {
  x: number[];
  fx: number;
  iterations: number;
  evaluations: number;
  /** Both simplex spreads fell under tolerance before a cap was hit */
  converged: boolean;
}

interface Vertex {
  x: number[];
  f: number;
}

function byValue(a: Vertex, b: Vertex): number {
  if (a.f === b.f) return 0;
  return a.f < b.f ? -1 : 1;
}

function combine(origin: readonly number[], direction: readonly number[], scale: number): number[] {
  return origin.map((value, k) => value + scale * (value - direction[k]));
}

function hasConverged(simplex: readonly Vertex[], xtol: number, ftol: number): boolean {
  const best = simplex[0];
  let xSpread = 0;
  let fSpread = 0;
  for (let v = 1; v < simplex.length; v++) {
    const vertex = simplex[v];
    for (let k = 0; k < best.x.length; k++) {
      xSpread = Math.max(xSpread, Math.abs(vertex.x[k] - best.x[k]));
    }
    fSpread = Math.max(fSpread, Math.abs(vertex.f - best.f));
  }
  // NaN spreads (Infinity - Infinity) fail both comparisons
  return xSpread <= xtol && fSpread <= ftol;
}

/**
 * Minimize `objective` starting from `x0`.
 *
 * Convergence requires every vertex to sit within `xtol` of the best vertex
 * on every coordinate and within `ftol` of its value.
 */
export function minimizeNelderMead(
  objective: Objective,
  x0: readonly number[],
  options: NelderMeadOptions
): NelderMeadResult {
  const n = x0.length;
  if (n === 0) {
    throw new ValidationError('Starting point needs at least one coordinate', { field: 'x0' });
  }

  let evaluations = 0;
  const evaluate = (x: number[]): Vertex => {
    evaluations++;
    const f = objective(x);
    return { x, f: Number.isNaN(f) ? Infinity : f };
  };

  const simplex: Vertex[] = [evaluate([...x0])];
  for (let k = 0; k < n; k++) {
    const point = [...x0];
    point[k] = point[k] !== 0 ? point[k] * (1 + NONZERO_DELTA) : ZERO_DELTA;
    simplex.push(evaluate(point));
  }
  simplex.sort(byValue);

  let iterations = 0;
  let converged = hasConverged(simplex, options.xtol, options.ftol);

  while (!converged && iterations < options.maxIterations && evaluations < options.maxEvaluations) {
    iterations++;

    const worst = simplex[n];
    const centroid = new Array<number>(n).fill(0);
    for (let v = 0; v < n; v++) {
      for (let k = 0; k < n; k++) {
        centroid[k] += simplex[v].x[k] / n;
      }
    }

    const reflected = evaluate(combine(centroid, worst.x, REFLECTION));
    let shrink = false;

    if (reflected.f < simplex[0].f) {
      const expanded = evaluate(combine(centroid, worst.x, REFLECTION * EXPANSION));
      simplex[n] = expanded.f < reflected.f ? expanded : reflected;
    } else if (reflected.f < simplex[n - 1].f) {
      simplex[n] = reflected;
    } else if (reflected.f < worst.f) {
      const outside = evaluate(combine(centroid, worst.x, CONTRACTION * REFLECTION));
      if (outside.f <= reflected.f) {
        simplex[n] = outside;
      } else {
        shrink = true;
      }
    } else {
      const inside = evaluate(combine(centroid, worst.x, -CONTRACTION));
      if (inside.f < worst.f) {
        simplex[n] = inside;
      } else {
        shrink = true;
      }
    }

    if (shrink) {
      const best = simplex[0];
      for (let v = 1; v <= n; v++) {
        const point = best.x.map((value, k) => value + SHRINK * (simplex[v].x[k] - value));
        simplex[v] = evaluate(point);
      }
    }

    simplex.sort(byValue);
    converged = hasConverged(simplex, options.xtol, options.ftol);
  }

  const best = simplex[0];
  return {
    x: [...best.x],
    fx: best.f,
    iterations,
    evaluations,
    converged,
  };
}
