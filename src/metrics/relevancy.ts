/**
 * Gain weighting for discounted cumulative gain.
 */

/**
 * Maps a raw relevance grade to the gain it contributes at a rank.
 * Must be pure; any numeric transform may be supplied.
 */
export type RelevancyFunction = (relevance: number) => number;

/** Uses the degree of relevance directly. */
export const traditionalRelevancy: RelevancyFunction = (r) => r;

/**
 * `2^r - 1`: widens the gap between low and high relevance grades.
 * Identical to {@link traditionalRelevancy} for binary labels.
 */
export const emphasisedRelevancy: RelevancyFunction = (r) => 2 ** r - 1;
