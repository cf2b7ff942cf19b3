/**
 * Lazy combination and permutation generators.
 *
 * Both yield index-lexicographic order, so for a fixed input the sequence of
 * candidates (and with it the order of discovered loops) is deterministic.
 */

/**
 * Every `size`-element subset of `items`, preserving input order inside each subset.
 */
export function* combinations<T>(items: readonly T[], size: number): Generator<T[]> {
  const n = items.length;
  if (!Number.isInteger(size) || size < 0 || size > n) {
    return;
  }

  const indices = Array.from({ length: size }, (_, k) => k);
  yield indices.map(index => items[index]);

  for (;;) {
    let k = size - 1;
    while (k >= 0 && indices[k] === k + n - size) {
      k--;
    }
    if (k < 0) {
      return;
    }
    indices[k]++;
    for (let m = k + 1; m < size; m++) {
      indices[m] = indices[m - 1] + 1;
    }
    yield indices.map(index => items[index]);
  }
}

/**
 * Every ordering of `items`.
 */
export function* permutations<T>(items: readonly T[]): Generator<T[]> {
  const n = items.length;
  const indices = Array.from({ length: n }, (_, k) => k);
  yield indices.map(index => items[index]);

  for (;;) {
    // Next permutation: find the rightmost ascent, swap with the smallest larger suffix element, reverse the suffix
    let i = n - 2;
    while (i >= 0 && indices[i] > indices[i + 1]) {
      i--;
    }
    if (i < 0) {
      return;
    }
    let j = n - 1;
    while (indices[j] < indices[i]) {
      j--;
    }
    [indices[i], indices[j]] = [indices[j], indices[i]];
    for (let left = i + 1, right = n - 1; left < right; left++, right--) {
      [indices[left], indices[right]] = [indices[right], indices[left]];
    }
    yield indices.map(index => items[index]);
  }
}

/**
 * Number of ordered selections of `size` out of `n` (n! / (n - size)!).
 */
export function countPermutations(n: number, size: number): number {
  if (size < 0 || size > n) {
    return 0;
  }
  let count = 1;
  for (let k = 0; k < size; k++) {
    count *= n - k;
  }
  return count;
}
