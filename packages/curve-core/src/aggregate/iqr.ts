// ---------------------------------------------------------------------------
// Interquartile-range fences and outlier classification
// ---------------------------------------------------------------------------
// lower = Q1 − k·IQR, upper = Q3 + k·IQR per frequency column. A curve is an
// outlier if any value it actually has lies strictly outside its column's
// fences. Absent cells never count against a curve.

import { makeCurve } from '../curve.js';
import { CurveError } from '../errors.js';
import type { Curve, CurveId, IqrFences } from '../types.js';
import { buildFrequencyTable, presentValues } from './frequency-table.js';
import { assertCurveCount } from './mean-median.js';
import { quartiles } from './statistics.js';

interface ColumnFences {
  lower: number;
  median: number;
  upper: number;
}

/**
 * @throws CurveError InsufficientCurves with fewer than 3 curves,
 *   InvalidResolution for a negative or non-finite multiplier
 */
export function iqrFences(curves: ReadonlyMap<CurveId, Curve>, fenceMultiplier: number): IqrFences {
  assertCurveCount(curves, 3, 'outlier detection');
  if (!Number.isFinite(fenceMultiplier) || fenceMultiplier < 0) {
    throw new CurveError(
      'InvalidResolution',
      `Fence multiplier must be a finite number >= 0, got ${fenceMultiplier}.`,
      { fenceMultiplier },
    );
  }

  const table = buildFrequencyTable(curves);
  const columns = new Map<number, ColumnFences>();

  for (const f of table.frequencies) {
    const values = presentValues(table, f);
    if (values.length === 0) continue;
    const { q1, median, q3 } = quartiles(values);
    const iqr = q3 - q1;
    columns.set(f, {
      lower: q1 - fenceMultiplier * iqr,
      median,
      upper: q3 + fenceMultiplier * iqr,
    });
  }

  const outliers: CurveId[] = [];
  for (const id of table.ids) {
    const curve = curves.get(id);
    if (curve === undefined) continue;
    const outside = curve.frequencies.some((f, i) => {
      const fences = columns.get(f);
      const value = curve.amplitudes[i];
      return fences !== undefined && (value < fences.lower || value > fences.upper);
    });
    if (outside) outliers.push(id);
  }

  const frequencies = [...columns.keys()];
  const pick = (field: keyof ColumnFences): Curve =>
    makeCurve(frequencies, frequencies.map((f) => columns.get(f)?.[field] ?? Number.NaN));

  return {
    lowerFence: pick('lower'),
    median: pick('median'),
    upperFence: pick('upper'),
    outliers,
  };
}
