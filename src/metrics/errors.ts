/**
 * Raised when two sequences that must be index-aligned differ in length,
 * e.g. a score array and its label array.
 */
export class LengthMismatchError extends Error {
  readonly expected: number;
  readonly actual: number;

  constructor(message: string, expected: number, actual: number) {
    super(`${message}: expected ${expected}, got ${actual}`);
    this.name = 'LengthMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Raised when a rank cut-off lies outside the range a metric is defined for.
 */
export class RankOutOfRangeError extends Error {
  readonly k: number;

  constructor(k: number, min: number, max: number) {
    super(`index k is out of bounds: ${k} not in [${min}, ${max}]`);
    this.name = 'RankOutOfRangeError';
    this.k = k;
  }
}

export function assertSameLength(
  scores: readonly number[],
  labels: readonly number[],
): void {
  if (scores.length !== labels.length) {
    throw new LengthMismatchError('Score/label length mismatch', scores.length, labels.length);
  }
}

export function assertRankInRange(k: number, min: number, max: number): void {
  if (!Number.isInteger(k) || k < min || k > max) {
    throw new RankOutOfRangeError(k, min, max);
  }
}
