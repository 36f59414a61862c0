/**
 * Built-in report evaluators.
 */

import { z } from 'zod';
import { ConfusionMatrix } from '../metrics/confusion-matrix.js';
import { PrecisionRecallCurve } from '../metrics/precision-recall-curve.js';
import { RankingEvaluation } from '../metrics/ranking-evaluation.js';
import {
  emphasisedRelevancy,
  type RelevancyFunction,
  traditionalRelevancy,
} from '../metrics/relevancy.js';
import {
  confusionMatrixAnalysis,
  type HeatMap,
  type PrecisionRecall,
  precisionRecallAnalysis,
  type ScalarResult,
  type TableResult,
} from '../reporting/analyses.js';
import type { EvaluatorSpec } from '../types.js';
import { specOptions } from './spec.js';
import { ReportEvaluator, type ReportEvaluatorContext } from './report-evaluator.js';

const DEFAULT_THRESHOLD = 0.5;

export const RELEVANCY_FUNCTIONS = {
  traditional: traditionalRelevancy,
  emphasised: emphasisedRelevancy,
} as const satisfies Record<string, RelevancyFunction>;

export type RelevancyName = keyof typeof RELEVANCY_FUNCTIONS;

/**
 * Precision-recall curve of the run's scores, with its average precision.
 */
export class PrecisionRecallEvaluator extends ReportEvaluator {
  readonly title: string;

  constructor(opts?: { title?: string }) {
    super();
    this.title = opts?.title ?? 'Precision-Recall Curve';
  }

  protected getFields() {
    return { title: this.title };
  }
  protected getDefaults() {
    return { title: 'Precision-Recall Curve' };
  }

  evaluate(ctx: ReportEvaluatorContext): PrecisionRecall {
    const curve = PrecisionRecallCurve.build(ctx.scores, ctx.labels);
    return precisionRecallAnalysis([{ name: ctx.name, curve }], { title: this.title });
  }
}

/**
 * Binary confusion matrix at a decision threshold, as a heat map.
 */
export class ConfusionMatrixEvaluator extends ReportEvaluator {
  readonly threshold: number;
  readonly title: string;

  constructor(opts?: { threshold?: number; title?: string }) {
    super();
    this.threshold = opts?.threshold ?? DEFAULT_THRESHOLD;
    this.title = opts?.title ?? 'Confusion Matrix';
  }

  protected getFields() {
    return { threshold: this.threshold, title: this.title };
  }
  protected getDefaults() {
    return { threshold: DEFAULT_THRESHOLD, title: 'Confusion Matrix' };
  }

  evaluate(ctx: ReportEvaluatorContext): HeatMap {
    const matrix = ConfusionMatrix.build(ctx.scores, ctx.labels, this.threshold);
    return confusionMatrixAnalysis(matrix, {
      title: this.title,
      description: `threshold = ${this.threshold}`,
    });
  }
}

/**
 * Precision, recall, accuracy and F1 at a decision threshold.
 * Ratios with an empty denominator are reported as NaN.
 */
export class ThresholdMetricsEvaluator extends ReportEvaluator {
  readonly threshold: number;

  constructor(opts?: { threshold?: number }) {
    super();
    this.threshold = opts?.threshold ?? DEFAULT_THRESHOLD;
  }

  protected getFields() {
    return { threshold: this.threshold };
  }
  protected getDefaults() {
    return { threshold: DEFAULT_THRESHOLD };
  }

  evaluate(ctx: ReportEvaluatorContext): ScalarResult[] {
    const matrix = ConfusionMatrix.build(ctx.scores, ctx.labels, this.threshold);
    const description = `threshold = ${this.threshold}`;
    return [
      { type: 'scalar', title: 'Precision', description, value: matrix.precision() },
      { type: 'scalar', title: 'Recall', description, value: matrix.recall() },
      { type: 'scalar', title: 'Accuracy', description, value: matrix.accuracy() },
      { type: 'scalar', title: 'F1', description, value: matrix.f1() },
    ];
  }
}

/**
 * CG, DCG and NDCG of the ranking induced by the scores, cut off at `k`
 * (all items when `k` is null).
 */
export class RankingGainEvaluator extends ReportEvaluator {
  readonly k: number | null;
  readonly relevancy: RelevancyName;
  readonly title: string;

  constructor(opts?: { k?: number | null; relevancy?: RelevancyName; title?: string }) {
    super();
    this.k = opts?.k ?? null;
    this.relevancy = opts?.relevancy ?? 'traditional';
    this.title = opts?.title ?? 'Ranking Gain';
  }

  protected getFields() {
    return { k: this.k, relevancy: this.relevancy, title: this.title };
  }
  protected getDefaults() {
    return { k: null, relevancy: 'traditional', title: 'Ranking Gain' };
  }

  evaluate(ctx: ReportEvaluatorContext): TableResult {
    const evaluation = RankingEvaluation.build(ctx.scores, ctx.labels);
    const k = this.k ?? evaluation.relevancies.length;
    const rel = RELEVANCY_FUNCTIONS[this.relevancy];
    return {
      type: 'table',
      title: this.title,
      description: `relevancy = ${this.relevancy}`,
      columns: ['Metric', 'Value'],
      rows: [
        [`CG@${k}`, evaluation.cumulativeGain(k)],
        [`DCG@${k}`, evaluation.discountedCumulativeGain(k, rel)],
        [`NDCG@${k}`, evaluation.normalisedDiscountedCumulativeGain(k, rel)],
      ],
    };
  }
}

/**
 * Scalar summaries of the precision-recall curve: average precision,
 * 11-point interpolated average precision, R-precision and precision@k.
 */
export class RetrievalSummaryEvaluator extends ReportEvaluator {
  readonly k: number;
  readonly title: string;

  constructor(opts?: { k?: number; title?: string }) {
    super();
    this.k = opts?.k ?? 10;
    this.title = opts?.title ?? 'Retrieval Summary';
  }

  protected getFields() {
    return { k: this.k, title: this.title };
  }
  protected getDefaults() {
    return { k: 10, title: 'Retrieval Summary' };
  }

  evaluate(ctx: ReportEvaluatorContext): TableResult {
    const curve = PrecisionRecallCurve.build(ctx.scores, ctx.labels);
    // the curve ends where recall reaches 1
    const k = Math.min(this.k, curve.precision.length - 1);
    return {
      type: 'table',
      title: this.title,
      columns: ['Metric', 'Value'],
      rows: [
        ['Average Precision', curve.averagePrecision()],
        ['Interpolated Average Precision', curve.averageInterpolatedPrecision()],
        ['R-Precision', curve.rPrecision()],
        [`P@${k}`, curve.precisionAt(k)],
      ],
    };
  }
}

// -- Registry --

/**
 * Maps a serialization name to a factory that builds the evaluator from a
 * spec, validating its arguments.
 */
export interface EvaluatorRegistryEntry {
  name: string;
  create: (spec: EvaluatorSpec) => ReportEvaluator;
}

const relevancySchema = z.enum(['traditional', 'emphasised']);

/** Build a registry entry whose arguments are checked against `schema`. */
export function registryEntry<TOpts>(
  cls: { new (opts?: TOpts): ReportEvaluator; getSerializationName(): string },
  schema: z.ZodType<TOpts, z.ZodTypeDef, unknown>,
  positionalField: string,
): EvaluatorRegistryEntry {
  return {
    name: cls.getSerializationName(),
    create: (spec) => new cls(schema.parse(specOptions(spec, positionalField))),
  };
}

/** Default report evaluators for the registry. */
export const DEFAULT_REPORT_EVALUATORS: EvaluatorRegistryEntry[] = [
  registryEntry(PrecisionRecallEvaluator, z.object({ title: z.string().optional() }).strict(), 'title'),
  registryEntry(
    ConfusionMatrixEvaluator,
    z.object({ threshold: z.number().optional(), title: z.string().optional() }).strict(),
    'threshold',
  ),
  registryEntry(
    ThresholdMetricsEvaluator,
    z.object({ threshold: z.number().optional() }).strict(),
    'threshold',
  ),
  registryEntry(
    RankingGainEvaluator,
    z
      .object({
        k: z.number().int().positive().nullable().optional(),
        relevancy: relevancySchema.optional(),
        title: z.string().optional(),
      })
      .strict(),
    'k',
  ),
  registryEntry(
    RetrievalSummaryEvaluator,
    z.object({ k: z.number().int().nonnegative().optional(), title: z.string().optional() }).strict(),
    'k',
  ),
];
