export { ConfusionMatrix, type ConfusionMatrixCounts } from './confusion-matrix.js';
export {
  assertRankInRange,
  assertSameLength,
  LengthMismatchError,
  RankOutOfRangeError,
} from './errors.js';
export { descendingRank, stableArgsort } from './ordering.js';
export { type CurvePoint, PrecisionRecallCurve } from './precision-recall-curve.js';
export { RankingEvaluation } from './ranking-evaluation.js';
export { emphasisedRelevancy, type RelevancyFunction, traditionalRelevancy } from './relevancy.js';
