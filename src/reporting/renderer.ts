/**
 * Terminal rendering with chalk + cli-table3.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { ConfusionMatrix } from '../metrics/confusion-matrix.js';
import type {
  HeatMap,
  PrecisionRecall,
  ReportAnalysis,
  ScalarResult,
  TableResult,
} from './analyses.js';
import { renderNumber } from './render-numbers.js';

/**
 * Render a binary confusion matrix as a table of the four quadrant counts,
 * followed by its derived ratios.
 */
export function renderConfusionMatrix(matrix: ConfusionMatrix): string {
  const table = new Table({
    head: [
      chalk.bold(`Observations = ${renderNumber(matrix.observations)}`),
      chalk.bold('Predicted No'),
      chalk.bold('Predicted Yes'),
    ],
    style: { head: [], border: [] },
  });
  table.push(
    [chalk.bold('Actual No'), `TN = ${matrix.trueNeg}`, `FP = ${matrix.falsePos}`],
    [chalk.bold('Actual Yes'), `FN = ${matrix.falseNeg}`, `TP = ${matrix.truePos}`],
  );

  return [
    table.toString(),
    `Recall = ${renderNumber(matrix.recall())}`,
    `Precision = ${renderNumber(matrix.precision())}`,
    `Accuracy = ${renderNumber(matrix.accuracy())}`,
    `F1 Score = ${renderNumber(matrix.f1())}`,
  ].join('\n');
}

/**
 * Render any report analysis as text.
 */
export function renderAnalysis(analysis: ReportAnalysis): string {
  switch (analysis.type) {
    case 'precision_recall':
      return renderPrecisionRecall(analysis);
    case 'heat_map':
      return renderHeatMap(analysis);
    case 'scalar':
      return renderScalar(analysis);
    case 'table':
      return renderTableResult(analysis);
  }
}

function renderPrecisionRecall(analysis: PrecisionRecall): string {
  const sections = [withDescription(chalk.bold(analysis.title), analysis.description)];
  for (const curve of analysis.curves) {
    const table = new Table({
      head: ['Threshold', 'Recall', 'Precision'].map((h) => chalk.bold(h)),
      style: { head: [], border: [] },
    });
    for (const p of curve.points) {
      table.push([
        p.threshold === null ? '-' : renderNumber(p.threshold),
        renderNumber(p.recall),
        renderNumber(p.precision),
      ]);
    }
    sections.push(`${curve.name} (AP = ${renderNumber(curve.averagePrecision)})`);
    sections.push(table.toString());
  }
  return sections.join('\n');
}

function renderHeatMap(analysis: HeatMap): string {
  const table = new Table({
    head: ['', ...analysis.xLabels].map((h) => chalk.bold(h)),
    style: { head: [], border: [] },
  });
  analysis.cells.forEach((row, i) => {
    table.push([chalk.bold(analysis.yLabels[i]), ...row.map(renderNumber)]);
  });
  return `${withDescription(chalk.bold(analysis.title), analysis.description)}\n${table.toString()}`;
}

function renderScalar(analysis: ScalarResult): string {
  const unit = analysis.unit ? ` ${analysis.unit}` : '';
  return withDescription(
    `${chalk.bold(analysis.title)}: ${renderNumber(analysis.value)}${unit}`,
    analysis.description,
  );
}

function renderTableResult(analysis: TableResult): string {
  const table = new Table({
    head: analysis.columns.map((c) => chalk.bold(c)),
    style: { head: [], border: [] },
  });
  for (const row of analysis.rows) {
    table.push(row.map(formatCell));
  }
  return `${withDescription(chalk.bold(analysis.title), analysis.description)}\n${table.toString()}`;
}

function formatCell(value: string | number | boolean | null): string {
  if (value === null) return '-';
  if (typeof value === 'number') return renderNumber(value);
  return String(value);
}

function withDescription(line: string, description: string | null | undefined): string {
  return description ? `${line} (${description})` : line;
}
