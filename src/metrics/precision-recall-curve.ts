/**
 * Precision-recall curve over a ranking, with its scalar summaries.
 */

import { assertRankInRange, assertSameLength } from './errors.js';
import { stableArgsort } from './ordering.js';

/** A single ranked point on the curve. */
export interface CurvePoint {
  threshold: number;
  precision: number;
  recall: number;
}

/**
 * Precision and recall at each rank of the predictions, from the rank at
 * which every positive item has been found (recall 1) up to the top ranked
 * item, followed by the anchor point `precision = 1, recall = 0`.
 *
 * Any label greater than 0 counts as positive/relevant, so graded relevance
 * labels may be used as well as binary ones.
 */
export class PrecisionRecallCurve {
  readonly precision: readonly number[];
  readonly recall: readonly number[];
  /**
   * The scores at which each non-anchor point was measured, in ascending
   * order. One entry shorter than `precision` and `recall`.
   */
  readonly thresholds: readonly number[];

  private readonly positives: number;

  private constructor(
    precision: number[],
    recall: number[],
    thresholds: number[],
    positives: number,
  ) {
    this.precision = Object.freeze(precision);
    this.recall = Object.freeze(recall);
    this.thresholds = Object.freeze(thresholds);
    this.positives = positives;
    Object.freeze(this);
  }

  /**
   * Build the curve from predicted scores and ground-truth labels.
   * `scores[i]` must correspond to `labels[i]`.
   */
  static build(scores: readonly number[], labels: readonly number[]): PrecisionRecallCurve {
    assertSameLength(scores, labels);

    const positives = labels.filter((label) => label > 0).length;
    if (positives === 0) {
      // nothing to find, so any ranking is perfect
      return new PrecisionRecallCurve([1], [0], [], 0);
    }

    const order = stableArgsort(scores);
    const precision: number[] = [];
    const recall: number[] = [];

    let hits = 0;
    for (let i = order.length - 1, k = 0; i >= 0; i--, k++) {
      if (labels[order[i]] > 0) {
        hits++;
      }
      recall[k] = hits / positives;
      precision[k] = hits / (k + 1);
      if (recall[k] === 1) {
        break;
      }
    }
    const m = recall.length;

    precision.reverse().push(1);
    recall.reverse().push(0);

    const thresholds = order.slice(order.length - m).map((i) => scores[i]);
    return new PrecisionRecallCurve(precision, recall, thresholds, positives);
  }

  /**
   * Area under the curve. `recall` decreases towards the anchor, so each step
   * is taken as `recall[i] - recall[i + 1]` to keep the area non-negative.
   */
  averagePrecision(): number {
    let sum = 0;
    for (let i = 0; i < this.precision.length - 1; i++) {
      sum += (this.recall[i] - this.recall[i + 1]) * this.precision[i];
    }
    return sum;
  }

  /** Mean interpolated precision over the recall levels 0.0, 0.1, ... 1.0. */
  averageInterpolatedPrecision(): number {
    let sum = 0;
    for (let i = 0; i <= 10; i++) {
      sum += this.interpolatedPrecisionAt(i / 10);
    }
    return sum / 11;
  }

  /** Precision at a cut-off equal to the number of relevant items. */
  rPrecision(): number {
    return this.precision[this.precision.length - 1 - this.positives];
  }

  /**
   * Precision of the top `k` ranked items. `k = 0` is the anchor point and
   * always 1. The curve stops where recall reaches 1, so `k` may not exceed
   * that rank.
   */
  precisionAt(k: number): number {
    assertRankInRange(k, 0, this.precision.length - 1);
    return this.precision[this.precision.length - 1 - k];
  }

  /**
   * Maximum precision over every point with recall of at least `r`, or 0 if
   * no point reaches it.
   */
  interpolatedPrecisionAt(r: number): number {
    let max = 0;
    for (let i = 0; i < this.recall.length; i++) {
      if (this.recall[i] >= r && this.precision[i] > max) {
        max = this.precision[i];
      }
    }
    return max;
  }

  /** The measured points (everything but the anchor), in curve order. */
  points(): CurvePoint[] {
    return this.thresholds.map((threshold, i) => ({
      threshold,
      precision: this.precision[i],
      recall: this.recall[i],
    }));
  }
}
