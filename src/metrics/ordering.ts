/**
 * Index orderings shared by the metric engines.
 *
 * Descending rankings are produced by reversing a stable ascending argsort.
 * Tied values therefore come out in reverse original order, which differs
 * from a direct descending sort; the metrics depend on it.
 */

/**
 * Indices of `values` ordered by ascending value. Equal values keep their
 * original relative order.
 */
export function stableArgsort(values: readonly number[]): number[] {
  const indices = values.map((_, i) => i);
  // ties (and NaN comparisons) fall back to index order
  indices.sort((a, b) => values[a] - values[b] || a - b);
  return indices;
}

/** Indices of `values` ordered by descending value, ties in reverse original order. */
export function descendingRank(values: readonly number[]): number[] {
  return stableArgsort(values).reverse();
}
