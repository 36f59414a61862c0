export { BaseEvaluator } from './base.js';
export type { EvaluatorRegistryEntry, RelevancyName } from './report-common.js';
export {
  ConfusionMatrixEvaluator,
  DEFAULT_REPORT_EVALUATORS,
  PrecisionRecallEvaluator,
  RankingGainEvaluator,
  RELEVANCY_FUNCTIONS,
  RetrievalSummaryEvaluator,
  registryEntry,
  ThresholdMetricsEvaluator,
} from './report-common.js';
export type { ReportEvaluatorContext } from './report-evaluator.js';
export { ReportEvaluator } from './report-evaluator.js';
export { deserializeEvaluatorSpec, serializeEvaluatorSpec, specOptions } from './spec.js';
