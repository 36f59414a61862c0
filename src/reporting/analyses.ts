/**
 * Report-level analysis types: precision-recall, heat map, scalar, table.
 *
 * These are plain data for a charting or rendering collaborator; nothing here
 * draws anything.
 */

import type { ConfusionMatrix } from '../metrics/confusion-matrix.js';
import { LengthMismatchError } from '../metrics/errors.js';
import type { PrecisionRecallCurve } from '../metrics/precision-recall-curve.js';

export interface PrecisionRecallPoint {
  /** Score at which the point was measured; null for the anchor point. */
  threshold: number | null;
  precision: number;
  recall: number;
}

export interface PrecisionRecallCurveData {
  /** Name of this curve (e.g., dataset or model name). */
  name: string;
  /** Points in curve order, ending with the anchor (precision 1, recall 0). */
  points: PrecisionRecallPoint[];
  averagePrecision: number;
}

export interface PrecisionRecall {
  type: 'precision_recall';
  title: string;
  description?: string | null;
  curves: PrecisionRecallCurveData[];
}

export interface HeatMap {
  type: 'heat_map';
  title: string;
  description?: string | null;
  /** Column labels. */
  xLabels: string[];
  /** Row labels. */
  yLabels: string[];
  /** cells[row][column]. */
  cells: number[][];
}

export interface ScalarResult {
  type: 'scalar';
  title: string;
  description?: string | null;
  value: number;
  /** Optional unit label (e.g., '%'). */
  unit?: string | null;
}

export interface TableResult {
  type: 'table';
  title: string;
  description?: string | null;
  /** Column headers. */
  columns: string[];
  /** Row data, one array per row. */
  rows: (string | number | boolean | null)[][];
}

/** Discriminated union of all report-level analysis types. */
export type ReportAnalysis = PrecisionRecall | HeatMap | ScalarResult | TableResult;

/**
 * Any two-dimensional numeric grid a heat map can be read from.
 */
export interface MatrixGrid {
  readonly rows: number;
  readonly columns: number;
  at(row: number, column: number): number;
}

export interface AnalysisOptions {
  title?: string;
  description?: string | null;
}

/** Wrap a rectangular array of rows as a {@link MatrixGrid}. */
export function gridFromRows(cells: readonly (readonly number[])[]): MatrixGrid {
  const columns = cells.length > 0 ? cells[0].length : 0;
  for (const row of cells) {
    if (row.length !== columns) {
      throw new LengthMismatchError('Ragged grid row', columns, row.length);
    }
  }
  return {
    rows: cells.length,
    columns,
    at: (row, column) => cells[row][column],
  };
}

/**
 * One curve per named {@link PrecisionRecallCurve}, with its average precision.
 */
export function precisionRecallAnalysis(
  curves: readonly { name: string; curve: PrecisionRecallCurve }[],
  opts?: AnalysisOptions,
): PrecisionRecall {
  return {
    type: 'precision_recall',
    title: opts?.title ?? 'Precision-Recall Curve',
    description: opts?.description ?? null,
    curves: curves.map(({ name, curve }) => ({
      name,
      points: curve.precision.map((precision, i) => ({
        threshold: i < curve.thresholds.length ? curve.thresholds[i] : null,
        precision,
        recall: curve.recall[i],
      })),
      averagePrecision: curve.averagePrecision(),
    })),
  };
}

/**
 * Read a grid into a heat map. `xLabels` name the columns and `yLabels` the
 * rows; their lengths must match the grid.
 */
export function heatMapAnalysis(
  grid: MatrixGrid,
  xLabels: readonly string[],
  yLabels: readonly string[],
  opts?: AnalysisOptions,
): HeatMap {
  if (xLabels.length !== grid.columns) {
    throw new LengthMismatchError('Column label count mismatch', grid.columns, xLabels.length);
  }
  if (yLabels.length !== grid.rows) {
    throw new LengthMismatchError('Row label count mismatch', grid.rows, yLabels.length);
  }

  const cells: number[][] = [];
  for (let r = 0; r < grid.rows; r++) {
    const row: number[] = [];
    for (let c = 0; c < grid.columns; c++) {
      row.push(grid.at(r, c));
    }
    cells.push(row);
  }

  return {
    type: 'heat_map',
    title: opts?.title ?? 'Heat Map',
    description: opts?.description ?? null,
    xLabels: [...xLabels],
    yLabels: [...yLabels],
    cells,
  };
}

/**
 * The 2x2 counts of a binary confusion matrix as a heat map:
 * rows are the actual class, columns the predicted class.
 */
export function confusionMatrixAnalysis(
  matrix: ConfusionMatrix,
  opts?: AnalysisOptions,
): HeatMap {
  const grid = gridFromRows([
    [matrix.trueNeg, matrix.falsePos],
    [matrix.falseNeg, matrix.truePos],
  ]);
  return heatMapAnalysis(grid, ['Predicted No', 'Predicted Yes'], ['Actual No', 'Actual Yes'], {
    title: opts?.title ?? 'Confusion Matrix',
    description: opts?.description,
  });
}
