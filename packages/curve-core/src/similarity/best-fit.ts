// ---------------------------------------------------------------------------
// Best fit to a reference: weighted residual standard deviation
// ---------------------------------------------------------------------------
// 1. Resample the reference to `resolution` points per octave.
// 2. Sample each candidate on that grid; columns outside its span are absent.
// 3. Square the residuals.
// 4. Critical-band weighting, in two literal steps:
//      normalizer          = (n + c·(w − 1)) / n
//      criticalMultiplier  = w / normalizer
//    every residual is divided by normalizer, and residuals in [start, end)
//    are also multiplied by criticalMultiplier. c = 0 skips weighting.
// 5. Unbiased variance over present columns, then its square root.
// 6. Ascending order; the reference wins ties.

import { CurveError } from '../errors.js';
import { DEFAULT_PINNED_FREQUENCY, resampleToGrid, sampleWithinSpan } from '../resample/index.js';
import type {
  BestFitEntry,
  BestFitOptions,
  BestFitReport,
  Cell,
  CriticalBand,
  Curve,
  CurveId,
  WeightingOutcome,
} from '../types.js';

function assertCriticalBand(band: CriticalBand): void {
  const { start, end, weight } = band;
  if (!Number.isFinite(start) || !Number.isFinite(end) || start >= end) {
    throw new CurveError('InvalidResolution', `Critical band [${start}, ${end}) is empty or not finite.`, { start, end });
  }
  if (!Number.isFinite(weight) || weight <= 0) {
    throw new CurveError('InvalidResolution', `Critical band weight must be positive, got ${weight}.`, { weight });
  }
}

/** Column-wise scale factors for a grid; all ones when no column is in the band. */
export function criticalBandWeights(
  frequencies: readonly number[],
  band: CriticalBand,
): { factors: number[]; outcome: WeightingOutcome } {
  const n = frequencies.length;
  const inBand = frequencies.map((f) => f >= band.start && f < band.end);
  const c = inBand.filter(Boolean).length;

  if (c === 0) {
    return { factors: frequencies.map(() => 1), outcome: { applied: false, columns: n, criticalColumns: 0 } };
  }

  const normalizer = (n + c * (band.weight - 1)) / n;
  const criticalMultiplier = band.weight / normalizer;
  const factors = inBand.map((critical) => (critical ? criticalMultiplier / normalizer : 1 / normalizer));

  return {
    factors,
    outcome: { applied: true, columns: n, criticalColumns: c, normalizer, criticalMultiplier },
  };
}

/** Standard deviation of weighted squared residuals; null below two present columns. */
export function weightedResidualDeviation(
  cells: readonly Cell[],
  referenceAmplitudes: readonly number[],
  factors: readonly number[],
): number | null {
  let sum = 0;
  let present = 0;
  cells.forEach((cell, i) => {
    if (cell.kind !== 'present') return;
    const residual = cell.value - referenceAmplitudes[i];
    sum += residual * residual * factors[i];
    present++;
  });
  if (present < 2) return null;
  return Math.sqrt(sum / (present - 1));
}

function compareEntries(referenceId: CurveId | undefined) {
  return (a: BestFitEntry, b: BestFitEntry): number => {
    if (a.standardDeviation === null || b.standardDeviation === null) {
      if (a.standardDeviation !== b.standardDeviation) return a.standardDeviation === null ? 1 : -1;
    } else if (a.standardDeviation !== b.standardDeviation) {
      return a.standardDeviation - b.standardDeviation;
    }
    if (a.id === referenceId) return -1;
    if (b.id === referenceId) return 1;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  };
}

/**
 * Rank candidates by how closely they follow the reference curve.
 * Smaller standard deviation ranks first.
 *
 * @throws CurveError InvalidResolution | InsufficientData
 */
export function rankBestFit(
  reference: Curve,
  candidates: ReadonlyMap<CurveId, Curve>,
  options: BestFitOptions,
): BestFitReport {
  assertCriticalBand(options.criticalBand);
  if (!(options.resolution > 0)) {
    throw new CurveError(
      'InvalidResolution',
      `Best-fit resolution must be a positive number of points per octave, got ${options.resolution}.`,
      { resolution: options.resolution },
    );
  }

  const resampled = resampleToGrid(
    reference,
    options.resolution,
    options.pinnedFrequency ?? DEFAULT_PINNED_FREQUENCY,
  );
  const { factors, outcome } = criticalBandWeights(resampled.frequencies, options.criticalBand);

  const entries: BestFitEntry[] = [];
  for (const [id, candidate] of candidates) {
    const cells = sampleWithinSpan(candidate, resampled.frequencies);
    entries.push({ id, standardDeviation: weightedResidualDeviation(cells, resampled.amplitudes, factors) });
  }
  entries.sort(compareEntries(options.referenceId));

  const report: BestFitReport = {
    entries,
    referencePointCount: resampled.frequencies.length,
    referenceFrequencies: resampled.frequencies,
    weighting: outcome,
  };
  if (options.referenceId !== undefined) report.referenceId = options.referenceId;
  return report;
}
