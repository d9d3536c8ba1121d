// ---------------------------------------------------------------------------
// Resampler: curve → log-spaced grid pinned to a frequency
// ---------------------------------------------------------------------------

import { copyCurve, frequencySpan, makeCurve } from '../curve.js';
import { CurveError } from '../errors.js';
import type { Curve } from '../types.js';
import { interpolateLogFrequency } from './interpolate.js';
import { DEFAULT_PINNED_FREQUENCY, gridsMatch, logFrequencyGrid } from './log-grid.js';

export function assertPointsPerOctave(pointsPerOctave: number, label = 'pointsPerOctave'): void {
  if (!Number.isFinite(pointsPerOctave) || pointsPerOctave < 0) {
    throw new CurveError(
      'InvalidResolution',
      `${label} must be a finite number >= 0, got ${pointsPerOctave}.`,
      { [label]: pointsPerOctave },
    );
  }
}

/**
 * Resample onto a log-spaced grid with `pointsPerOctave` points per octave,
 * clipped to the curve's own span and containing `pinnedFrequency` whenever
 * it falls inside that span.
 *
 * - `pointsPerOctave === 0` returns the pair unchanged.
 * - A grid equal to the curve's current grid returns the original amplitudes,
 *   so repeated passes do not re-interpolate.
 *
 * @throws CurveError InvalidResolution | InsufficientData
 */
export function resampleToGrid(
  curve: Curve,
  pointsPerOctave: number,
  pinnedFrequency: number = DEFAULT_PINNED_FREQUENCY,
): Curve {
  assertPointsPerOctave(pointsPerOctave);
  if (pointsPerOctave === 0) return copyCurve(curve);

  if (!Number.isFinite(pinnedFrequency) || pinnedFrequency <= 0) {
    throw new CurveError(
      'InvalidResolution',
      `pinnedFrequency must be a positive frequency, got ${pinnedFrequency}.`,
      { pinnedFrequency },
    );
  }

  const [fMin, fMax] = frequencySpan(curve);
  const grid = logFrequencyGrid(fMin, fMax, pointsPerOctave, pinnedFrequency);
  if (grid.length === 0) {
    throw new CurveError(
      'InsufficientData',
      `Span ${fMin}..${fMax} Hz holds no grid point at ${pointsPerOctave} points per octave.`,
      { fMin, fMax, pointsPerOctave },
    );
  }

  if (gridsMatch(grid, curve.frequencies)) return copyCurve(curve);

  return makeCurve(grid, interpolateLogFrequency(curve, grid));
}
