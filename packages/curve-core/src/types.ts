// ---------------------------------------------------------------------------
// @curvelab/curve-core — Curve Analysis Types
// ---------------------------------------------------------------------------

/** Opaque identifier the caller uses to key curves in multi-curve operations. */
export type CurveId = string;

// ---------------------------------------------------------------------------
// Curve model
// ---------------------------------------------------------------------------

/**
 * Validated frequency response. Frequencies are strictly ascending and > 0,
 * amplitudes are dB values paired by position. Instances are frozen.
 */
export interface Curve {
  readonly frequencies: readonly number[];
  readonly amplitudes: readonly number[];
}

/** Display name of a curve: "<prefix>. <base> - <suffix> - <suffix>". */
export interface CurveName {
  readonly prefix?: string;
  readonly base: string;
  readonly suffixes: readonly string[];
}

// ---------------------------------------------------------------------------
// Smoothing
// ---------------------------------------------------------------------------

export interface ButterworthSmoothing {
  kind: 'butterworth';
  order: number;
  /** Octaves between the filter's -3 dB points. */
  bandwidth: number;
  /** Points per octave of the grid the filter runs on. */
  resolution: number;
  pinnedFrequency?: number;
}

export interface RectangularSmoothing {
  kind: 'rectangular';
  bandwidth: number;
}

export interface GaussianSmoothing {
  kind: 'gaussian';
  /** Twice the kernel's standard deviation, in octaves. */
  bandwidth: number;
  resolution: number;
  pinnedFrequency?: number;
}

export type SmoothingAlgorithm =
  | ButterworthSmoothing
  | RectangularSmoothing
  | GaussianSmoothing;

export type SmoothingKind = SmoothingAlgorithm['kind'];

export type SmoothingPreset = 'butterworth-8' | 'butterworth-4' | 'rectangular' | 'gaussian';

/** Second-order section: [b0, b1, b2, a0, a1, a2] */
export type SOSSection = [number, number, number, number, number, number];

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

/** A table cell is either a value the curve actually has, or nothing. */
export type Cell =
  | { kind: 'present'; value: number }
  | { kind: 'absent' };

export interface FrequencyTable {
  /** Union of all frequencies, ascending. */
  frequencies: number[];
  /** Curve identifiers, ascending. */
  ids: CurveId[];
  /** frequency → curve id → cell */
  rows: Map<number, Map<CurveId, Cell>>;
}

export interface MeanAndMedian {
  mean: Curve;
  median: Curve;
}

export interface IqrFences {
  lowerFence: Curve;
  median: Curve;
  upperFence: Curve;
  outliers: CurveId[];
}

// ---------------------------------------------------------------------------
// Similarity
// ---------------------------------------------------------------------------

export interface CriticalBand {
  /** Inclusive lower bound in Hz. */
  start: number;
  /** Exclusive upper bound in Hz. */
  end: number;
  weight: number;
}

export interface BestFitOptions {
  referenceId?: CurveId;
  resolution: number;
  pinnedFrequency?: number;
  criticalBand: CriticalBand;
}

export type WeightingOutcome =
  | { applied: true; columns: number; criticalColumns: number; normalizer: number; criticalMultiplier: number }
  | { applied: false; columns: number; criticalColumns: 0 };

export interface BestFitEntry {
  id: CurveId;
  /** null when the candidate overlaps fewer than two reference columns. */
  standardDeviation: number | null;
}

export interface BestFitReport {
  entries: BestFitEntry[];
  referenceId?: CurveId;
  referencePointCount: number;
  referenceFrequencies: readonly number[];
  weighting: WeightingOutcome;
}
