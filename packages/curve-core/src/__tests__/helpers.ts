import { isCurveError, type CurveErrorKind } from '../errors.js';

/** Kind of CurveError thrown by `fn`, 'none' when it returns, 'other' for foreign errors. */
export function failureKind(fn: () => unknown): CurveErrorKind | 'none' | 'other' {
  try {
    fn();
  } catch (error) {
    return isCurveError(error) ? error.kind : 'other';
  }
  return 'none';
}

export function maxAbsDeviation(values: readonly number[], target: number, from = 0, to = values.length): number {
  let worst = 0;
  for (let i = from; i < to; i++) worst = Math.max(worst, Math.abs(values[i] - target));
  return worst;
}
