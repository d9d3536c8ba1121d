// ---------------------------------------------------------------------------
// Validator: raw numbers → Curve
// ---------------------------------------------------------------------------
// Accepts two parallel sequences or a sequence of [frequency, amplitude]
// pairs. Checks run in a fixed order: shape, point count, numeric content,
// frequency axis. Unsorted input is rejected, never reordered.

import { z } from 'zod';
import { makeCurve } from './curve.js';
import { CurveError } from './errors.js';
import type { Curve } from './types.js';

/** A finite real, given as a number or a numeric string. */
const finiteNumber = z
  .union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
  .pipe(z.number().finite());

const pairSchema = z.tuple([z.unknown(), z.unknown()]);

function toSequence(value: unknown, label: string): unknown[] {
  if (Array.isArray(value)) return value;
  if (value instanceof Float64Array || value instanceof Float32Array) return Array.from(value);
  throw new CurveError('ShapeMismatch', `${label} must be a sequence of numbers.`, { label });
}

function toNumbers(values: unknown[], label: string): number[] {
  return values.map((value, index) => {
    const parsed = finiteNumber.safeParse(value);
    if (!parsed.success) {
      throw new CurveError(
        'NonNumeric',
        `${label}[${index}] is not a finite real number: ${String(value)}`,
        { label, index },
      );
    }
    return parsed.data;
  });
}

/** Frequencies must be > 0 and strictly increasing. Throws InvalidAxis otherwise. */
export function assertFrequencyAxis(frequencies: readonly number[]): void {
  for (let i = 0; i < frequencies.length; i++) {
    const f = frequencies[i];
    if (f <= 0) {
      throw new CurveError('InvalidAxis', `Frequency at index ${i} must be positive, got ${f}.`, { index: i });
    }
    if (i > 0) {
      const prev = frequencies[i - 1];
      if (f === prev) {
        throw new CurveError('InvalidAxis', `Duplicate frequency ${f} at index ${i}.`, { index: i });
      }
      if (f < prev) {
        throw new CurveError(
          'InvalidAxis',
          `Frequencies must be strictly increasing: ${f} at index ${i} follows ${prev}.`,
          { index: i },
        );
      }
    }
  }
}

/**
 * Validate two parallel sequences into a Curve.
 * @throws CurveError ShapeMismatch | InsufficientData | NonNumeric | InvalidAxis
 */
export function validateCurve(frequencies: unknown, amplitudes: unknown): Curve {
  const rawX = toSequence(frequencies, 'frequencies');
  const rawY = toSequence(amplitudes, 'amplitudes');

  if (rawX.length !== rawY.length) {
    throw new CurveError(
      'ShapeMismatch',
      `Got ${rawX.length} frequencies but ${rawY.length} amplitudes.`,
      { frequencies: rawX.length, amplitudes: rawY.length },
    );
  }
  if (rawX.length === 0) {
    throw new CurveError('InsufficientData', 'A curve needs at least one point.');
  }

  const x = toNumbers(rawX, 'frequencies');
  const y = toNumbers(rawY, 'amplitudes');
  assertFrequencyAxis(x);

  return makeCurve(x, y);
}

function splitPairs(pairs: unknown): [unknown[], unknown[]] {
  const rows = toSequence(pairs, 'pairs');
  const xs: unknown[] = [];
  const ys: unknown[] = [];
  rows.forEach((row, index) => {
    const parsed = pairSchema.safeParse(row);
    if (!parsed.success) {
      throw new CurveError('ShapeMismatch', `pairs[${index}] is not a [frequency, amplitude] pair.`, { index });
    }
    xs.push(parsed.data[0]);
    ys.push(parsed.data[1]);
  });
  return [xs, ys];
}

/** Validate a sequence of [frequency, amplitude] pairs into a Curve. */
export function curveFromPairs(pairs: unknown): Curve {
  const [xs, ys] = splitPairs(pairs);
  return validateCurve(xs, ys);
}

/**
 * Explicit opt-in sort for callers holding unordered pairs. Returns a new
 * array; validation still rejects duplicates afterwards.
 */
export function sortPairsByFrequency<T extends readonly [number, number]>(pairs: readonly T[]): T[] {
  return [...pairs].sort((a, b) => a[0] - b[0]);
}
