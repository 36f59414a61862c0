import { stripVTControlCharacters } from 'node:util';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfusionMatrix } from '../src/metrics/confusion-matrix.js';
import { PrecisionRecallCurve } from '../src/metrics/precision-recall-curve.js';
import {
  confusionMatrixAnalysis,
  precisionRecallAnalysis,
  type ScalarResult,
} from '../src/reporting/analyses.js';
import { renderNumber, renderPercentage } from '../src/reporting/render-numbers.js';
import { renderAnalysis, renderConfusionMatrix } from '../src/reporting/renderer.js';
import { createMetricsReport } from '../src/reporting/report.js';

function plain(text: string): string[] {
  return stripVTControlCharacters(text).split('\n');
}

function lineWith(lines: string[], needle: string): string {
  const line = lines.find((l) => l.includes(needle));
  if (line === undefined) {
    throw new Error(`no line contains '${needle}'`);
  }
  return line;
}

describe('renderNumber', () => {
  it('groups integers with commas', () => {
    expect(renderNumber(0)).toBe('0');
    expect(renderNumber(1234)).toBe('1,234');
  });

  it('shows at least 3 significant figures and 1 decimal', () => {
    expect(renderNumber(0.8333333333333333)).toBe('0.833');
    expect(renderNumber(0.5)).toBe('0.500');
    expect(renderNumber(1.5)).toBe('1.50');
    expect(renderNumber(-0.25)).toBe('-0.250');
    expect(renderNumber(0.0012345)).toBe('0.00123');
    expect(renderNumber(1234.5678)).toBe('1,234.6');
  });

  it('prints non-finite values as-is', () => {
    expect(renderNumber(Number.NaN)).toBe('NaN');
    expect(renderNumber(Number.POSITIVE_INFINITY)).toBe('Infinity');
  });
});

describe('renderPercentage', () => {
  it('formats ratios with one decimal', () => {
    expect(renderPercentage(0.75)).toBe('75.0%');
    expect(renderPercentage(1 / 3)).toBe('33.3%');
    expect(renderPercentage(Number.NaN)).toBe('NaN');
  });
});

describe('renderConfusionMatrix', () => {
  it('renders quadrant counts and ratios', () => {
    const matrix = ConfusionMatrix.build([0.1, 0.9, 0.6, 0.3], [0, 1, 1, 0], 0.7);
    const lines = plain(renderConfusionMatrix(matrix));

    expect(lineWith(lines, 'Observations = 4')).toContain('Predicted Yes');
    const actualNo = lineWith(lines, 'Actual No');
    expect(actualNo).toContain('TN = 2');
    expect(actualNo).toContain('FP = 0');
    const actualYes = lineWith(lines, 'Actual Yes');
    expect(actualYes).toContain('FN = 1');
    expect(actualYes).toContain('TP = 1');
    expect(lines.slice(-4)).toEqual([
      'Recall = 0.500',
      'Precision = 1',
      'Accuracy = 0.750',
      'F1 Score = 0.667',
    ]);
  });

  it('shows undefined ratios as NaN', () => {
    const matrix = ConfusionMatrix.build([0.1, 0.2], [0, 0], 0.5);
    const lines = plain(renderConfusionMatrix(matrix));
    expect(lines.slice(-4)).toEqual([
      'Recall = NaN',
      'Precision = NaN',
      'Accuracy = 1',
      'F1 Score = NaN',
    ]);
  });
});

describe('renderAnalysis', () => {
  it('renders a precision-recall curve as a table per curve', () => {
    const curve = PrecisionRecallCurve.build([0.1, 0.4, 0.35, 0.8], [0, 0, 1, 1]);
    const lines = plain(renderAnalysis(precisionRecallAnalysis([{ name: 'run', curve }])));

    expect(lines[0]).toBe('Precision-Recall Curve');
    expect(lines[1]).toBe('run (AP = 0.833)');
    const first = lineWith(lines, '0.350');
    expect(first).toContain('1');
    expect(first).toContain('0.667');
    // the anchor point has no threshold
    expect(lines.some((l) => /│\s*-\s*│\s*0\s*│\s*1\s*│/.test(l))).toBe(true);
  });

  it('renders a heat map with row and column labels', () => {
    const matrix = ConfusionMatrix.build([0.1, 0.9, 0.6, 0.3], [0, 1, 1, 0], 0.7);
    const lines = plain(
      renderAnalysis(confusionMatrixAnalysis(matrix, { description: 'threshold = 0.7' })),
    );
    expect(lines[0]).toBe('Confusion Matrix (threshold = 0.7)');
    expect(lineWith(lines, 'Predicted No')).toContain('Predicted Yes');
    expect(lineWith(lines, 'Actual Yes')).toMatch(/Actual Yes\s*│\s*1\s*│\s*1\s*│/);
    expect(lineWith(lines, 'Actual No')).toMatch(/Actual No\s*│\s*2\s*│\s*0\s*│/);
  });

  it('renders scalars on one line', () => {
    const scalar: ScalarResult = {
      type: 'scalar',
      title: 'Precision',
      description: 'threshold = 0.5',
      value: Number.NaN,
    };
    expect(plain(renderAnalysis(scalar))).toEqual(['Precision: NaN (threshold = 0.5)']);
    expect(
      plain(renderAnalysis({ type: 'scalar', title: 'Hits', value: 12, unit: 'items' })),
    ).toEqual(['Hits: 12 items']);
  });

  it('renders tables with formatted cells', () => {
    const lines = plain(
      renderAnalysis({
        type: 'table',
        title: 'Summary',
        columns: ['Metric', 'Value'],
        rows: [
          ['AP', 0.5],
          ['Note', null],
        ],
      }),
    );
    expect(lines[0]).toBe('Summary');
    expect(lineWith(lines, 'AP')).toMatch(/AP\s*│\s*0\.500\s*│/);
    expect(lineWith(lines, 'Note')).toMatch(/Note\s*│\s*-\s*│/);
  });
});

describe('MetricsReport', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('renders a header, analyses and failures', () => {
    const report = createMetricsReport({
      name: 'run',
      caseCount: 4,
      analyses: [{ type: 'scalar', title: 'Recall', value: 1 }],
    });
    report.reportEvaluatorFailures.push({
      name: 'RankingGainEvaluator',
      errorMessage: 'RankOutOfRangeError: index k is out of bounds: 1 not in [1, 0]',
      errorStacktrace: '',
      source: { name: 'RankingGainEvaluator', arguments: null },
    });

    expect(plain(report.render())).toEqual([
      'Metrics Summary: run',
      '='.repeat(60),
      '  cases: 4',
      '',
      'Recall: 1',
      '',
      'Report Evaluator Failures:',
      '  RankingGainEvaluator: RankOutOfRangeError: index k is out of bounds: 1 not in [1, 0]',
    ]);
  });

  it('omits analyses and failures on request', () => {
    const report = createMetricsReport({
      name: 'run',
      caseCount: 0,
      analyses: [{ type: 'scalar', title: 'Recall', value: 1 }],
    });
    expect(plain(report.render({ includeAnalyses: false, includeErrors: false }))).toEqual([
      'Metrics Summary: run',
      '='.repeat(60),
      '  cases: 0',
    ]);
  });

  it('prints the rendered report', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const report = createMetricsReport({ name: 'run', caseCount: 1 });
    report.print();
    expect(log).toHaveBeenCalledWith(report.render());
  });
});
