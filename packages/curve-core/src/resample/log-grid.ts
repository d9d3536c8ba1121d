// ---------------------------------------------------------------------------
// Log-spaced frequency grids
// ---------------------------------------------------------------------------
// f_k = pinned · 2^(k / ppo). The pinned frequency is k = 0, so it is always
// an exact grid value when it lies inside the span.

/** Slack on the octave exponent so span endpoints that sit on the lattice are kept. */
const EXPONENT_TOLERANCE = 1e-9;

/** Relative tolerance when comparing two grids value by value. */
export const GRID_MATCH_TOLERANCE = 1e-9;

export const DEFAULT_PINNED_FREQUENCY = 1000;

/**
 * Grid points between fMin and fMax (inclusive) with `pointsPerOctave`
 * points per octave, aligned so that `pinnedFrequency` is a grid value.
 * May be empty when the span is narrower than one step.
 */
export function logFrequencyGrid(
  fMin: number,
  fMax: number,
  pointsPerOctave: number,
  pinnedFrequency: number = DEFAULT_PINNED_FREQUENCY,
): number[] {
  const kStart = Math.ceil(pointsPerOctave * Math.log2(fMin / pinnedFrequency) - EXPONENT_TOLERANCE);
  const kEnd = Math.floor(pointsPerOctave * Math.log2(fMax / pinnedFrequency) + EXPONENT_TOLERANCE);

  const grid: number[] = [];
  for (let k = kStart; k <= kEnd; k++) {
    const f = k === 0 ? pinnedFrequency : pinnedFrequency * 2 ** (k / pointsPerOctave);
    // Points kept only by the tolerance land a hair outside; clamp them onto the span.
    grid.push(Math.min(fMax, Math.max(fMin, f)));
  }
  return grid;
}

/** True when both grids have the same length and agree value by value. */
export function gridsMatch(a: readonly number[], b: readonly number[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    const scale = Math.max(Math.abs(a[i]), Math.abs(b[i]));
    if (Math.abs(a[i] - b[i]) > GRID_MATCH_TOLERANCE * scale) return false;
  }
  return true;
}
