// ---------------------------------------------------------------------------
// Interpolation linear in log-frequency
// ---------------------------------------------------------------------------

import type { Cell, Curve } from '../types.js';

/**
 * Index of the last source frequency <= target. Caller guarantees
 * frequencies[0] <= target < frequencies[last].
 */
function lowerIndex(frequencies: readonly number[], target: number): number {
  let low = 0;
  let high = frequencies.length - 1;
  while (high - low > 1) {
    const mid = Math.floor((low + high) / 2);
    if (frequencies[mid] <= target) low = mid;
    else high = mid;
  }
  return low;
}

function interpolateInside(frequencies: readonly number[], amplitudes: readonly number[], target: number): number {
  const last = frequencies.length - 1;
  if (target === frequencies[last]) return amplitudes[last];

  const low = lowerIndex(frequencies, target);
  const high = low + 1;
  const logF1 = Math.log(frequencies[low]);
  const logF2 = Math.log(frequencies[high]);
  const t = (Math.log(target) - logF1) / (logF2 - logF1);
  return amplitudes[low] + t * (amplitudes[high] - amplitudes[low]);
}

/**
 * Amplitude at a frequency, linear in log(f) between neighbouring samples.
 * Targets outside the span take the nearest endpoint's amplitude.
 */
export function interpolateAt(curve: Curve, target: number): number {
  const { frequencies, amplitudes } = curve;
  if (target <= frequencies[0]) return amplitudes[0];
  if (target >= frequencies[frequencies.length - 1]) return amplitudes[amplitudes.length - 1];
  return interpolateInside(frequencies, amplitudes, target);
}

export function interpolateLogFrequency(curve: Curve, targets: readonly number[]): number[] {
  return targets.map((target) => interpolateAt(curve, target));
}

/**
 * Like interpolateLogFrequency, but targets outside the curve's own span
 * are absent instead of clamped.
 */
export function sampleWithinSpan(curve: Curve, targets: readonly number[]): Cell[] {
  const { frequencies, amplitudes } = curve;
  const first = frequencies[0];
  const last = frequencies[frequencies.length - 1];
  return targets.map((target): Cell => {
    if (!(target >= first && target <= last)) return { kind: 'absent' };
    return { kind: 'present', value: interpolateInside(frequencies, amplitudes, target) };
  });
}
