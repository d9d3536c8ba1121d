// ---------------------------------------------------------------------------
// Column statistics
// ---------------------------------------------------------------------------
// Reducers sort their input first, so results depend only on the multiset of
// values and never on curve order.

export function sortAscending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/** Arithmetic mean (NaN for an empty input). */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return Number.NaN;
  let sum = 0;
  for (const v of sortAscending(values)) sum += v;
  return sum / values.length;
}

/**
 * Quantile of an ascending array by linear interpolation between order
 * statistics at position (n − 1)·p.
 */
export function quantile(sorted: readonly number[], p: number): number {
  const n = sorted.length;
  if (n === 0) return Number.NaN;
  if (n === 1) return sorted[0];

  const position = (n - 1) * p;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  if (lower === upper) return sorted[lower];

  const fraction = position - lower;
  return sorted[lower] + fraction * (sorted[upper] - sorted[lower]);
}

export function median(values: readonly number[]): number {
  return quantile(sortAscending(values), 0.5);
}

export interface Quartiles {
  q1: number;
  median: number;
  q3: number;
}

export function quartiles(values: readonly number[]): Quartiles {
  const sorted = sortAscending(values);
  return {
    q1: quantile(sorted, 0.25),
    median: quantile(sorted, 0.5),
    q3: quantile(sorted, 0.75),
  };
}
