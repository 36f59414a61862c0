/**
 * Binary confusion matrix at a fixed decision threshold.
 */

import { assertSameLength } from './errors.js';

/**
 * Counts of correct and incorrect binary predictions. A prediction is positive
 * when its score is at least the threshold; an observation is actually
 * positive when its label is exactly 1.
 *
 * The ratio accessors divide by counts that may be zero (e.g. `precision()`
 * with no positive predictions) and return `NaN` in that case.
 */
export class ConfusionMatrix {
  readonly observations: number;
  readonly pos: number;
  readonly neg: number;
  readonly truePos: number;
  readonly trueNeg: number;
  readonly falsePos: number;
  readonly falseNeg: number;

  private constructor(counts: Omit<ConfusionMatrixCounts, 'observations' | 'pos' | 'neg'>) {
    this.truePos = counts.truePos;
    this.trueNeg = counts.trueNeg;
    this.falsePos = counts.falsePos;
    this.falseNeg = counts.falseNeg;
    this.pos = counts.truePos + counts.falseNeg;
    this.neg = counts.trueNeg + counts.falsePos;
    this.observations = this.pos + this.neg;
    Object.freeze(this);
  }

  static build(
    scores: readonly number[],
    labels: readonly number[],
    threshold: number,
  ): ConfusionMatrix {
    assertSameLength(scores, labels);

    let truePos = 0;
    let trueNeg = 0;
    let falsePos = 0;
    let falseNeg = 0;
    for (let i = 0; i < labels.length; i++) {
      const predicted = scores[i] >= threshold;
      if (labels[i] === 1) {
        if (predicted) truePos++;
        else falseNeg++;
      } else if (predicted) {
        falsePos++;
      } else {
        trueNeg++;
      }
    }
    return new ConfusionMatrix({ truePos, trueNeg, falsePos, falseNeg });
  }

  /** Fraction of positive predictions that are actually positive. */
  precision(): number {
    return this.truePos / (this.truePos + this.falsePos);
  }

  /** Fraction of actual positives that were predicted positive. */
  recall(): number {
    return this.truePos / (this.truePos + this.falseNeg);
  }

  accuracy(): number {
    return (this.trueNeg + this.truePos) / this.observations;
  }

  /** Harmonic mean of precision and recall. */
  f1(): number {
    const precision = this.precision();
    const recall = this.recall();
    return 2 * ((precision * recall) / (precision + recall));
  }

  counts(): ConfusionMatrixCounts {
    return {
      observations: this.observations,
      pos: this.pos,
      neg: this.neg,
      truePos: this.truePos,
      trueNeg: this.trueNeg,
      falsePos: this.falsePos,
      falseNeg: this.falseNeg,
    };
  }
}

export interface ConfusionMatrixCounts {
  observations: number;
  pos: number;
  neg: number;
  truePos: number;
  trueNeg: number;
  falsePos: number;
  falseNeg: number;
}
