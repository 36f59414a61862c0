/**
 * MetricsReport: the analyses produced by evaluating one scored dataset.
 */

import type { EvaluatorFailure } from '../types.js';
import type { ReportAnalysis } from './analyses.js';
import { renderAnalysis } from './renderer.js';

export interface MetricsReport {
  name: string;
  /** Number of scored cases the analyses were computed from. */
  caseCount: number;
  analyses: ReportAnalysis[];
  reportEvaluatorFailures: EvaluatorFailure[];
  metadata: Record<string, unknown> | null;

  /** Render the report as a formatted string. */
  render(opts?: RenderOptions): string;
  /** Print the report to the console. */
  print(opts?: RenderOptions): void;
}

export interface RenderOptions {
  includeAnalyses?: boolean;
  includeErrors?: boolean;
}

export function createMetricsReport(opts: {
  name: string;
  caseCount: number;
  analyses?: ReportAnalysis[];
  metadata?: Record<string, unknown> | null;
}): MetricsReport {
  const report: MetricsReport = {
    name: opts.name,
    caseCount: opts.caseCount,
    analyses: [...(opts.analyses ?? [])],
    reportEvaluatorFailures: [],
    metadata: opts.metadata ?? null,

    render(renderOpts) {
      return renderReport(report, renderOpts);
    },

    print(renderOpts) {
      // eslint-disable-next-line no-console
      console.log(report.render(renderOpts));
    },
  };

  return report;
}

function renderReport(report: MetricsReport, opts?: RenderOptions): string {
  const includeAnalyses = opts?.includeAnalyses ?? true;
  const includeErrors = opts?.includeErrors ?? true;

  const lines: string[] = [];
  lines.push(`Metrics Summary: ${report.name}`);
  lines.push('='.repeat(60));
  lines.push(`  cases: ${report.caseCount}`);

  if (includeAnalyses) {
    for (const analysis of report.analyses) {
      lines.push('');
      lines.push(renderAnalysis(analysis));
    }
  }

  if (includeErrors && report.reportEvaluatorFailures.length > 0) {
    lines.push('');
    lines.push('Report Evaluator Failures:');
    for (const f of report.reportEvaluatorFailures) {
      lines.push(`  ${f.name}: ${f.errorMessage}`);
    }
  }

  return lines.join('\n');
}
