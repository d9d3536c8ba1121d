// ---------------------------------------------------------------------------
// Curve construction
// ---------------------------------------------------------------------------
// Only the validator and the analysis operations build curves. Both already
// guarantee the axis invariants, so this module just copies and freezes.

import type { Curve } from './types.js';

/** Copy and freeze a pair that is already known to be valid. */
export function makeCurve(frequencies: ArrayLike<number>, amplitudes: ArrayLike<number>): Curve {
  return Object.freeze({
    frequencies: Object.freeze(Array.from(frequencies)),
    amplitudes: Object.freeze(Array.from(amplitudes)),
  });
}

/** Fresh, unaliased copy of a curve. */
export function copyCurve(curve: Curve): Curve {
  return makeCurve(curve.frequencies, curve.amplitudes);
}

export function pointCount(curve: Curve): number {
  return curve.frequencies.length;
}

/** [frequency, amplitude] rows, in frequency order. */
export function curvePoints(curve: Curve): Array<[number, number]> {
  return curve.frequencies.map((f, i): [number, number] => [f, curve.amplitudes[i]]);
}

export function frequencySpan(curve: Curve): [number, number] {
  const { frequencies } = curve;
  return [frequencies[0], frequencies[frequencies.length - 1]];
}
