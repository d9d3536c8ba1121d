// ---------------------------------------------------------------------------
// Frequency ↔ curve table over ragged grids
// ---------------------------------------------------------------------------
// Columns are the union of every curve's frequencies. A cell is present only
// when that exact frequency is on the curve's own grid; nothing is
// interpolated here.

import type { Cell, Curve, CurveId, FrequencyTable } from '../types.js';

const ABSENT: Cell = { kind: 'absent' };

export function buildFrequencyTable(curves: ReadonlyMap<CurveId, Curve>): FrequencyTable {
  const ids = [...curves.keys()].sort();
  const union = new Set<number>();
  for (const curve of curves.values()) {
    for (const f of curve.frequencies) union.add(f);
  }
  const frequencies = [...union].sort((a, b) => a - b);

  const rows = new Map<number, Map<CurveId, Cell>>();
  for (const f of frequencies) {
    const row = new Map<CurveId, Cell>();
    for (const id of ids) row.set(id, ABSENT);
    rows.set(f, row);
  }

  for (const id of ids) {
    const curve = curves.get(id);
    if (curve === undefined) continue;
    curve.frequencies.forEach((f, i) => {
      rows.get(f)?.set(id, { kind: 'present', value: curve.amplitudes[i] });
    });
  }

  return { frequencies, ids, rows };
}

/** Present values of one column, in identifier order. */
export function presentValues(table: FrequencyTable, frequency: number): number[] {
  const row = table.rows.get(frequency);
  if (row === undefined) return [];
  const values: number[] = [];
  for (const id of table.ids) {
    const cell = row.get(id);
    if (cell?.kind === 'present') values.push(cell.value);
  }
  return values;
}

export function cellAt(table: FrequencyTable, frequency: number, id: CurveId): Cell {
  return table.rows.get(frequency)?.get(id) ?? ABSENT;
}
