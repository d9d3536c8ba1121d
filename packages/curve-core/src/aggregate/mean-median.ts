// ---------------------------------------------------------------------------
// Mean and median across curves with heterogeneous grids
// ---------------------------------------------------------------------------

import { makeCurve } from '../curve.js';
import { CurveError } from '../errors.js';
import type { Curve, CurveId, FrequencyTable, MeanAndMedian } from '../types.js';
import { buildFrequencyTable, presentValues } from './frequency-table.js';
import { mean, median } from './statistics.js';

export function assertCurveCount(curves: ReadonlyMap<CurveId, Curve>, minimum: number, operation: string): void {
  if (curves.size < minimum) {
    throw new CurveError(
      'InsufficientCurves',
      `A minimum of ${minimum} curves is needed for ${operation}, got ${curves.size}.`,
      { minimum, received: curves.size },
    );
  }
}

/**
 * Reduce every column of the table over its present values. Columns with no
 * present value are left out of the result grid.
 */
export function reduceColumns(
  table: FrequencyTable,
  reducers: ReadonlyArray<(values: number[]) => number>,
): Curve[] {
  const frequencies: number[] = [];
  const outputs = reducers.map((): number[] => []);

  for (const f of table.frequencies) {
    const values = presentValues(table, f);
    if (values.length === 0) continue;
    frequencies.push(f);
    reducers.forEach((reduce, r) => outputs[r].push(reduce(values)));
  }

  return outputs.map((amplitudes) => makeCurve(frequencies, amplitudes));
}

/**
 * Per-frequency arithmetic mean and median of dB values over the union grid.
 * @throws CurveError InsufficientCurves with fewer than 2 curves
 */
export function meanAndMedian(curves: ReadonlyMap<CurveId, Curve>): MeanAndMedian {
  assertCurveCount(curves, 2, 'mean and median');
  const [meanCurve, medianCurve] = reduceColumns(buildFrequencyTable(curves), [mean, median]);
  return { mean: meanCurve, median: medianCurve };
}
