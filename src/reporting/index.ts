export type {
  AnalysisOptions,
  HeatMap,
  MatrixGrid,
  PrecisionRecall,
  PrecisionRecallCurveData,
  PrecisionRecallPoint,
  ReportAnalysis,
  ScalarResult,
  TableResult,
} from './analyses.js';
export {
  confusionMatrixAnalysis,
  gridFromRows,
  heatMapAnalysis,
  precisionRecallAnalysis,
} from './analyses.js';
export { renderNumber, renderPercentage } from './render-numbers.js';
export { renderAnalysis, renderConfusionMatrix } from './renderer.js';
export type { MetricsReport, RenderOptions } from './report.js';
export { createMetricsReport } from './report.js';
