import { describe, expect, it } from 'vitest';
import { ConfusionMatrix } from '../src/metrics/confusion-matrix.js';
import { LengthMismatchError } from '../src/metrics/errors.js';
import { PrecisionRecallCurve } from '../src/metrics/precision-recall-curve.js';
import {
  confusionMatrixAnalysis,
  gridFromRows,
  heatMapAnalysis,
  type MatrixGrid,
  precisionRecallAnalysis,
} from '../src/reporting/analyses.js';

describe('precisionRecallAnalysis', () => {
  it('reads every point of each curve, anchor last', () => {
    const curve = PrecisionRecallCurve.build([0.1, 0.4, 0.35, 0.8], [0, 0, 1, 1]);
    const result = precisionRecallAnalysis([{ name: 'model-a', curve }]);

    expect(result.type).toBe('precision_recall');
    expect(result.title).toBe('Precision-Recall Curve');
    expect(result.curves).toHaveLength(1);
    expect(result.curves[0].name).toBe('model-a');
    expect(result.curves[0].averagePrecision).toBe(0.8333333333333333);
    expect(result.curves[0].points).toEqual([
      { threshold: 0.35, precision: 2 / 3, recall: 1 },
      { threshold: 0.4, precision: 0.5, recall: 0.5 },
      { threshold: 0.8, precision: 1, recall: 0.5 },
      { threshold: null, precision: 1, recall: 0 },
    ]);
  });

  it('keeps one curve per input in order', () => {
    const a = PrecisionRecallCurve.build([0.9, 0.1], [1, 0]);
    const b = PrecisionRecallCurve.build([0.02, 0.1], [0, 0]);
    const result = precisionRecallAnalysis(
      [
        { name: 'a', curve: a },
        { name: 'b', curve: b },
      ],
      { title: 'PR', description: 'two models' },
    );
    expect(result.title).toBe('PR');
    expect(result.description).toBe('two models');
    expect(result.curves.map((c) => c.name)).toEqual(['a', 'b']);
    expect(result.curves[1].points).toEqual([{ threshold: null, precision: 1, recall: 0 }]);
    expect(result.curves[1].averagePrecision).toBe(0);
  });
});

describe('heatMapAnalysis', () => {
  it('reads any grid through its accessor', () => {
    const identity: MatrixGrid = {
      rows: 2,
      columns: 3,
      at: (row, column) => (row === column ? 1 : 0),
    };
    const result = heatMapAnalysis(identity, ['x', 'y', 'z'], ['a', 'b'], { title: 'Identity' });
    expect(result).toEqual({
      type: 'heat_map',
      title: 'Identity',
      description: null,
      xLabels: ['x', 'y', 'z'],
      yLabels: ['a', 'b'],
      cells: [
        [1, 0, 0],
        [0, 1, 0],
      ],
    });
  });

  it('rejects label counts that do not match the grid', () => {
    const grid = gridFromRows([
      [1, 2],
      [3, 4],
    ]);
    expect(() => heatMapAnalysis(grid, ['x'], ['a', 'b'])).toThrow(LengthMismatchError);
    expect(() => heatMapAnalysis(grid, ['x', 'y'], ['a'])).toThrow(
      'Row label count mismatch: expected 2, got 1',
    );
  });
});

describe('gridFromRows', () => {
  it('exposes dimensions and cells', () => {
    const grid = gridFromRows([
      [1, 2, 3],
      [4, 5, 6],
    ]);
    expect(grid.rows).toBe(2);
    expect(grid.columns).toBe(3);
    expect(grid.at(1, 2)).toBe(6);
  });

  it('handles an empty grid', () => {
    const grid = gridFromRows([]);
    expect(grid.rows).toBe(0);
    expect(grid.columns).toBe(0);
  });

  it('rejects ragged rows', () => {
    expect(() => gridFromRows([[1, 2], [3]])).toThrow(LengthMismatchError);
  });
});

describe('confusionMatrixAnalysis', () => {
  it('lays out actual rows against predicted columns', () => {
    const matrix = ConfusionMatrix.build([0.1, 0.9, 0.6, 0.3], [0, 1, 1, 0], 0.7);
    const result = confusionMatrixAnalysis(matrix);
    expect(result.title).toBe('Confusion Matrix');
    expect(result.xLabels).toEqual(['Predicted No', 'Predicted Yes']);
    expect(result.yLabels).toEqual(['Actual No', 'Actual Yes']);
    // [[TN, FP], [FN, TP]]
    expect(result.cells).toEqual([
      [2, 0],
      [1, 1],
    ]);
  });
});
