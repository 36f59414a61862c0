/**
 * ReportEvaluator: base class for dataset-wide evaluators.
 *
 * A report evaluator sees every scored case of a dataset at once and produces
 * analyses such as precision-recall curves or confusion matrices.
 */

import type { ReportAnalysis } from '../reporting/analyses.js';
import { BaseEvaluator } from './base.js';

export interface ReportEvaluatorContext {
  /** The evaluation run name. */
  name: string;
  /** Model scores, index-aligned with `labels`. */
  scores: readonly number[];
  /** Ground-truth labels. */
  labels: readonly number[];
  /** Run-level metadata. */
  metadata: Record<string, unknown> | null;
}

export abstract class ReportEvaluator extends BaseEvaluator {
  abstract evaluate(ctx: ReportEvaluatorContext): ReportAnalysis | ReportAnalysis[];
}
