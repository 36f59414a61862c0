/**
 * Cumulative gain metrics for a ranking: CG, DCG and normalised DCG.
 */

import { assertRankInRange, assertSameLength } from './errors.js';
import { descendingRank } from './ordering.js';
import { type RelevancyFunction, traditionalRelevancy } from './relevancy.js';

/**
 * Evaluates how well predicted scores rank items compared with a perfect
 * ranking by ground-truth relevance.
 */
export class RankingEvaluation {
  /** Ground-truth relevance values in their original order. */
  readonly relevancies: readonly number[];
  /** Indices into `relevancies`, ordered by descending predicted score. */
  readonly predictedRank: readonly number[];
  /** Indices into `relevancies`, ordered by descending relevance (the ideal ranking). */
  readonly perfectRank: readonly number[];

  private constructor(
    relevancies: readonly number[],
    predictedRank: readonly number[],
    perfectRank: readonly number[],
  ) {
    this.relevancies = relevancies;
    this.predictedRank = predictedRank;
    this.perfectRank = perfectRank;
    Object.freeze(this);
  }

  /**
   * Build an evaluation from predicted scores and ground-truth relevance
   * labels. `scores[i]` must correspond to `labels[i]`.
   */
  static build(scores: readonly number[], labels: readonly number[]): RankingEvaluation {
    assertSameLength(scores, labels);
    return new RankingEvaluation(
      Object.freeze([...labels]),
      Object.freeze(descendingRank(scores)),
      Object.freeze(descendingRank(labels)),
    );
  }

  /**
   * Sum of the relevance values of the top `k` ranked items.
   * Pass `relevancies.length` for no cut-off.
   */
  cumulativeGain(k: number): number {
    this.checkCutoff(k);
    let sum = 0;
    for (let i = 0; i < k; i++) {
      sum += this.relevancies[this.predictedRank[i]];
    }
    return sum;
  }

  /**
   * Cumulative gain of the top `k` items with each gain divided by
   * `log2(rank + 2)`, so lower ranks contribute less. `rel` weights the raw
   * relevance values (see {@link traditionalRelevancy} and `emphasisedRelevancy`).
   */
  discountedCumulativeGain(k: number, rel: RelevancyFunction = traditionalRelevancy): number {
    this.checkCutoff(k);
    return this.discountedGain(k, rel, this.predictedRank);
  }

  /**
   * DCG of the predicted ranking relative to the DCG of the perfect ranking.
   * Returns 1 when no item is relevant: every ordering is then perfect.
   */
  normalisedDiscountedCumulativeGain(
    k: number,
    rel: RelevancyFunction = traditionalRelevancy,
  ): number {
    this.checkCutoff(k);
    if (this.relevancies.reduce((max, r) => Math.max(max, r), -Infinity) === 0) {
      return 1;
    }
    return this.discountedGain(k, rel, this.predictedRank) / this.discountedGain(k, rel, this.perfectRank);
  }

  private discountedGain(k: number, rel: RelevancyFunction, ranking: readonly number[]): number {
    let sum = 0;
    for (let i = 0; i < k; i++) {
      sum += rel(this.relevancies[ranking[i]]) / Math.log2(i + 2);
    }
    return sum;
  }

  private checkCutoff(k: number): void {
    assertRankInRange(k, 1, this.relevancies.length);
  }
}
