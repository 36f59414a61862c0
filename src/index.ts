/**
 * ranking-metrics: evaluation metrics for ranking and binary classification.
 *
 * @example
 * ```ts
 * import { PrecisionRecallCurve, RankingEvaluation, emphasisedRelevancy } from 'ranking-metrics';
 *
 * const scores = [0.1, 0.4, 0.35, 0.8];
 * const labels = [0, 0, 1, 1];
 *
 * const curve = PrecisionRecallCurve.build(scores, labels);
 * curve.averagePrecision(); // 0.8333...
 *
 * const ranking = RankingEvaluation.build(scores, labels);
 * ranking.normalisedDiscountedCumulativeGain(4, emphasisedRelevancy);
 * ```
 */

// Metric engines
export type { ConfusionMatrixCounts, CurvePoint, RelevancyFunction } from './metrics/index.js';
export {
  ConfusionMatrix,
  descendingRank,
  emphasisedRelevancy,
  LengthMismatchError,
  PrecisionRecallCurve,
  RankingEvaluation,
  RankOutOfRangeError,
  stableArgsort,
  traditionalRelevancy,
} from './metrics/index.js';
// Dataset
export type { DatasetOptions, EvaluateOptions } from './dataset.js';
export { ScoredDataset } from './dataset.js';
// Evaluators
export type {
  EvaluatorRegistryEntry,
  RelevancyName,
  ReportEvaluatorContext,
} from './evaluators/index.js';
export {
  BaseEvaluator,
  ConfusionMatrixEvaluator,
  DEFAULT_REPORT_EVALUATORS,
  deserializeEvaluatorSpec,
  PrecisionRecallEvaluator,
  RankingGainEvaluator,
  registryEntry,
  ReportEvaluator,
  RetrievalSummaryEvaluator,
  serializeEvaluatorSpec,
  ThresholdMetricsEvaluator,
} from './evaluators/index.js';
// Reporting
export type {
  AnalysisOptions,
  HeatMap,
  MatrixGrid,
  MetricsReport,
  PrecisionRecall,
  PrecisionRecallCurveData,
  PrecisionRecallPoint,
  RenderOptions,
  ReportAnalysis,
  ScalarResult,
  TableResult,
} from './reporting/index.js';
export {
  confusionMatrixAnalysis,
  createMetricsReport,
  gridFromRows,
  heatMapAnalysis,
  precisionRecallAnalysis,
  renderAnalysis,
  renderConfusionMatrix,
  renderNumber,
  renderPercentage,
} from './reporting/index.js';
// Serialization
export type { DatasetFormat, LoadOptions } from './serialization/index.js';
export {
  datasetSchema,
  evaluatorSpecSchema,
  loadDatasetFromFile,
  loadDatasetFromObject,
  loadDatasetFromText,
  saveDatasetToFile,
  scoredCaseSchema,
} from './serialization/index.js';
// Core types
export type { EvaluatorFailure, EvaluatorSpec, ScoredCase } from './types.js';
