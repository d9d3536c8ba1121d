// ---------------------------------------------------------------------------
// @curvelab/curve-core — Barrel Export
// ---------------------------------------------------------------------------
// Frequency-response analysis engine. Synchronous, pure functions over frozen
// curves; every operation returns new values or throws a CurveError.

export type {
  CurveId,
  Curve,
  CurveName,
  ButterworthSmoothing,
  RectangularSmoothing,
  GaussianSmoothing,
  SmoothingAlgorithm,
  SmoothingKind,
  SmoothingPreset,
  SOSSection,
  Cell,
  FrequencyTable,
  MeanAndMedian,
  IqrFences,
  CriticalBand,
  BestFitOptions,
  WeightingOutcome,
  BestFitEntry,
  BestFitReport,
} from './types.js';

export { CurveError, isCurveError, type CurveErrorKind } from './errors.js';

export { makeCurve, copyCurve, pointCount, curvePoints, frequencySpan } from './curve.js';

export {
  curveName,
  fullName,
  baseAndSuffixes,
  addSuffix,
  clearSuffixes,
  withBase,
  withPrefix,
  derivedName,
  longestCommonSubstring,
  representativeBaseName,
} from './naming.js';

export {
  validateCurve,
  curveFromPairs,
  sortPairsByFrequency,
  assertFrequencyAxis,
} from './validator.js';

// Resampler
export * from './resample/index.js';

// Smoothing Engine
export * from './smoothing/index.js';

// Aggregator
export * from './aggregate/index.js';

// Similarity Scorer
export * from './similarity/index.js';
