/**
 * ScoredDataset: scored cases plus the report evaluators to run over them.
 */

import type { ReportEvaluator, ReportEvaluatorContext } from './evaluators/report-evaluator.js';
import { createMetricsReport, type MetricsReport } from './reporting/report.js';
import type { ScoredCase } from './types.js';

export interface DatasetOptions {
  /** Optional name for the dataset. */
  name?: string | null;
  cases: ScoredCase[];
  /** Report evaluators that run over all cases. */
  reportEvaluators?: ReportEvaluator[];
}

export interface EvaluateOptions {
  /** Name for the evaluation run. Defaults to the dataset name. */
  name?: string;
  /** Run-level metadata, passed to every report evaluator. */
  metadata?: Record<string, unknown>;
}

/**
 * A dataset of model scores with their ground-truth labels.
 */
export class ScoredDataset {
  name: string | null;
  cases: ScoredCase[];
  reportEvaluators: ReportEvaluator[];

  constructor(opts: DatasetOptions) {
    const names = new Set<string>();
    for (const c of opts.cases) {
      if (c.name != null) {
        if (names.has(c.name)) {
          throw new Error(`Duplicate case name: '${c.name}'`);
        }
        names.add(c.name);
      }
    }

    this.name = opts.name ?? null;
    this.cases = [...opts.cases];
    this.reportEvaluators = [...(opts.reportEvaluators ?? [])];
  }

  addCase(c: ScoredCase): void {
    if (c.name != null && this.cases.some((existing) => existing.name === c.name)) {
      throw new Error(`Duplicate case name: '${c.name}'`);
    }
    this.cases.push(c);
  }

  addReportEvaluator(evaluator: ReportEvaluator): void {
    this.reportEvaluators.push(evaluator);
  }

  scores(): number[] {
    return this.cases.map((c) => c.score);
  }

  labels(): number[] {
    return this.cases.map((c) => c.label);
  }

  /**
   * Run every report evaluator over the dataset. An evaluator that throws is
   * recorded in `reportEvaluatorFailures`; the others still run.
   */
  evaluate(opts?: EvaluateOptions): MetricsReport {
    const name = opts?.name ?? this.name ?? 'dataset';
    const report = createMetricsReport({
      name,
      caseCount: this.cases.length,
      metadata: opts?.metadata ?? null,
    });

    const ctx: ReportEvaluatorContext = {
      name,
      scores: this.scores(),
      labels: this.labels(),
      metadata: opts?.metadata ?? null,
    };

    for (const reportEval of this.reportEvaluators) {
      try {
        const result = reportEval.evaluate(ctx);
        if (Array.isArray(result)) {
          report.analyses.push(...result);
        } else {
          report.analyses.push(result);
        }
      } catch (e) {
        const error = e instanceof Error ? e : new Error(String(e));
        report.reportEvaluatorFailures.push({
          name: reportEval.getSerializationName(),
          errorMessage: `${error.name}: ${error.message}`,
          errorStacktrace: error.stack ?? '',
          source: reportEval.asSpec(),
        });
      }
    }

    return report;
  }
}
