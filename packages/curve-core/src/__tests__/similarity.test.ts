// ---------------------------------------------------------------------------
// Similarity Scorer Tests
// ---------------------------------------------------------------------------
import { describe, it, expect } from 'vitest';
import { criticalBandWeights, rankBestFit, weightedResidualDeviation } from '../similarity/index.js';
import { logFrequencyGrid } from '../resample/index.js';
import { validateCurve } from '../validator.js';
import type { BestFitOptions, Curve } from '../types.js';
import { failureKind } from './helpers.js';

const grid = logFrequencyGrid(20, 20000, 12, 1000);
const shape = grid.map((f) => 80 + 5 * Math.sin(Math.log2(f)));

function shifted(offset: number, keep: (f: number) => boolean = () => true): Curve {
  const frequencies = grid.filter(keep);
  return validateCurve(
    frequencies,
    frequencies.map((f) => shape[grid.indexOf(f)] + offset),
  );
}

const reference = shifted(0);
const options: BestFitOptions = {
  referenceId: 'ref',
  resolution: 12,
  pinnedFrequency: 1000,
  criticalBand: { start: 200, end: 5000, weight: 1 },
};

describe('criticalBandWeights', () => {
  it('divides by the normalizer and boosts the band by the critical multiplier', () => {
    const { factors, outcome } = criticalBandWeights([100, 200, 300, 400], { start: 200, end: 400, weight: 3 });
    // n = 4, c = 2: normalizer = (4 + 2·2) / 4 = 2, multiplier = 3 / 2
    expect(factors).toEqual([0.5, 0.75, 0.75, 0.5]);
    expect(outcome).toEqual({ applied: true, columns: 4, criticalColumns: 2, normalizer: 2, criticalMultiplier: 1.5 });
  });

  it('skips weighting when the band holds no column', () => {
    const { factors, outcome } = criticalBandWeights([100, 200], { start: 10, end: 15, weight: 4 });
    expect(factors).toEqual([1, 1]);
    expect(outcome).toEqual({ applied: false, columns: 2, criticalColumns: 0 });
  });
});

describe('weightedResidualDeviation', () => {
  it('uses the unbiased variance over present columns', () => {
    const deviation = weightedResidualDeviation(
      [{ kind: 'present', value: 2 }, { kind: 'absent' }, { kind: 'present', value: 4 }],
      [0, 0, 0],
      [1, 1, 1],
    );
    // (4 + 16) / (2 − 1)
    expect(deviation).toBeCloseTo(Math.sqrt(20), 12);
  });

  it('is null with fewer than two present columns', () => {
    expect(weightedResidualDeviation([{ kind: 'present', value: 1 }], [0], [1])).toBeNull();
  });
});

describe('rankBestFit', () => {
  it('ranks the reference first with zero deviation', () => {
    const report = rankBestFit(reference, new Map([['plus3', shifted(3)], ['ref', reference]]), options);
    expect(report.entries[0]).toEqual({ id: 'ref', standardDeviation: 0 });
    expect(report.referenceId).toBe('ref');
    expect(report.referencePointCount).toBe(grid.length);
  });

  it('reflects a constant offset in the deviation', () => {
    const report = rankBestFit(reference, new Map([['ref', reference], ['plus3', shifted(3)]]), options);
    const m = report.referencePointCount;
    expect(report.entries[1].id).toBe('plus3');
    expect(report.entries[1].standardDeviation).toBeCloseTo(Math.sqrt((9 * m) / (m - 1)), 10);
  });

  it('leaves columns outside a candidate span out of its deviation', () => {
    const upper = shifted(3, (f) => f >= 1000);
    const present = grid.filter((f) => f >= 1000).length;
    const report = rankBestFit(reference, new Map([['ref', reference], ['upper', upper]]), options);
    expect(report.entries[1].standardDeviation).toBeCloseTo(Math.sqrt((9 * present) / (present - 1)), 10);
  });

  it('orders candidates by deviation and puts non-overlapping ones last', () => {
    const outside = validateCurve([30000, 40000], [80, 80]);
    const report = rankBestFit(
      reference,
      new Map([['far', shifted(6)], ['none', outside], ['near', shifted(1)], ['ref', reference]]),
      options,
    );
    expect(report.entries.map((e) => e.id)).toEqual(['ref', 'near', 'far', 'none']);
    expect(report.entries[3].standardDeviation).toBeNull();
  });

  it('lets the reference win a tie', () => {
    const report = rankBestFit(reference, new Map([['a-copy', shifted(0)], ['ref', reference]]), options);
    expect(report.entries.map((e) => e.id)).toEqual(['ref', 'a-copy']);
  });

  it('reports skipped weighting when the band misses the grid', () => {
    const report = rankBestFit(reference, new Map([['ref', reference]]), {
      ...options,
      criticalBand: { start: 30000, end: 40000, weight: 5 },
    });
    expect(report.weighting.applied).toBe(false);
    expect(report.entries[0].standardDeviation).toBe(0);
  });

  it('applies the critical weight to the residuals', () => {
    const weighted = rankBestFit(reference, new Map([['plus3', shifted(3)]]), {
      ...options,
      criticalBand: { start: 200, end: 5000, weight: 2 },
    });
    if (!weighted.weighting.applied) throw new Error('expected weighting');
    const { normalizer, criticalMultiplier, criticalColumns, columns } = weighted.weighting;
    const sum = 9 * ((columns - criticalColumns) / normalizer + (criticalColumns * criticalMultiplier) / normalizer);
    expect(weighted.entries[0].standardDeviation).toBeCloseTo(Math.sqrt(sum / (columns - 1)), 10);
  });

  it('rejects an empty critical band and a bad resolution', () => {
    const candidates = new Map([['ref', reference]]);
    expect(
      failureKind(() => rankBestFit(reference, candidates, { ...options, criticalBand: { start: 5000, end: 200, weight: 1 } })),
    ).toBe('InvalidResolution');
    expect(failureKind(() => rankBestFit(reference, candidates, { ...options, resolution: 0 }))).toBe(
      'InvalidResolution',
    );
  });
});
