// ---------------------------------------------------------------------------
// Smoothing Engine: algorithm selection and dispatch
// ---------------------------------------------------------------------------

import { z } from 'zod';
import { CurveError } from '../errors.js';
import type { Curve, SmoothingAlgorithm, SmoothingKind, SmoothingPreset } from '../types.js';
import { smoothButterworth } from './butterworth.js';
import { smoothGaussian } from './gaussian.js';
import { smoothRectangular } from './rectangular.js';

export {
  designButterworthLowpass,
  sosfilt,
  sosfiltfilt,
  smoothButterworth,
  type ButterworthDesign,
} from './butterworth.js';
export { gaussianKernel, convolveReflect, smoothGaussian } from './gaussian.js';
export { smoothRectangular } from './rectangular.js';

export const SMOOTHING_KINDS: readonly SmoothingKind[] = ['butterworth', 'rectangular', 'gaussian'];

export const SMOOTHING_PRESETS: readonly SmoothingPreset[] = [
  'butterworth-8',
  'butterworth-4',
  'rectangular',
  'gaussian',
];

const positive = z.number().finite().positive();
const pointsPerOctave = z.number().int().positive();

const smoothingAlgorithmSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('butterworth'),
    order: z.number().int().positive(),
    bandwidth: positive,
    resolution: pointsPerOctave,
    pinnedFrequency: positive.optional(),
  }),
  z.object({
    kind: z.literal('rectangular'),
    bandwidth: positive,
  }),
  z.object({
    kind: z.literal('gaussian'),
    bandwidth: positive,
    resolution: pointsPerOctave,
    pinnedFrequency: positive.optional(),
  }),
]);

function isSmoothingKind(kind: string): kind is SmoothingKind {
  return SMOOTHING_KINDS.some((known) => known === kind);
}

function isSmoothingPreset(name: string): name is SmoothingPreset {
  return SMOOTHING_PRESETS.some((known) => known === name);
}

function unsupported(name: string): CurveError {
  return new CurveError('UnsupportedAlgorithm', `Smoothing type "${name}" is not available.`, { type: name });
}

/**
 * Validate an untyped algorithm description.
 * @throws CurveError UnsupportedAlgorithm for an unknown kind, InvalidResolution for bad parameters
 */
export function parseSmoothingAlgorithm(input: unknown): SmoothingAlgorithm {
  const kind = z.object({ kind: z.string() }).safeParse(input);
  if (!kind.success) throw unsupported(String(input));
  if (!isSmoothingKind(kind.data.kind)) throw unsupported(kind.data.kind);

  const parsed = smoothingAlgorithmSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CurveError(
      'InvalidResolution',
      `Invalid ${kind.data.kind} smoothing parameters: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown'}`,
      { kind: kind.data.kind },
    );
  }
  return parsed.data;
}

export interface SmoothingParameters {
  bandwidth: number;
  resolution: number;
  pinnedFrequency?: number;
}

/** Build an algorithm from one of the named presets. */
export function smoothingAlgorithm(preset: string, params: SmoothingParameters): SmoothingAlgorithm {
  if (!isSmoothingPreset(preset)) throw unsupported(preset);
  const { bandwidth, resolution, pinnedFrequency } = params;
  const pinned = pinnedFrequency === undefined ? {} : { pinnedFrequency };

  switch (preset) {
    case 'butterworth-8':
      return { kind: 'butterworth', order: 8, bandwidth, resolution, ...pinned };
    case 'butterworth-4':
      return { kind: 'butterworth', order: 4, bandwidth, resolution, ...pinned };
    case 'rectangular':
      return { kind: 'rectangular', bandwidth };
    case 'gaussian':
      return { kind: 'gaussian', bandwidth, resolution, ...pinned };
  }
}

function formatBandwidth(bandwidth: number): string {
  const denominator = 1 / bandwidth;
  const rounded = Math.round(denominator);
  if (rounded >= 1 && Math.abs(denominator - rounded) < 1e-9) return `1/${rounded} oct`;
  return `${Number(bandwidth.toFixed(3))} oct`;
}

/** Suffix text a caller appends to the name of a smoothed curve. */
export function smoothingDescriptor(algorithm: SmoothingAlgorithm): string {
  const width = formatBandwidth(algorithm.bandwidth);
  switch (algorithm.kind) {
    case 'butterworth':
      return `smoothed ${width}, butterworth order ${algorithm.order}`;
    case 'rectangular':
      return `smoothed ${width}, rectangular`;
    case 'gaussian':
      return `smoothed ${width}, gaussian`;
  }
}

/**
 * Smooth a curve with the given algorithm. Returns the new pair only; naming
 * the result is up to the caller (see smoothingDescriptor).
 *
 * @throws CurveError UnsupportedAlgorithm | InvalidResolution | InsufficientData
 */
export function smoothCurve(curve: Curve, algorithm: SmoothingAlgorithm): Curve {
  const checked = parseSmoothingAlgorithm(algorithm);
  switch (checked.kind) {
    case 'butterworth':
      return smoothButterworth(curve, checked);
    case 'rectangular':
      return smoothRectangular(curve, checked);
    case 'gaussian':
      return smoothGaussian(curve, checked);
    default: {
      const unreachable: never = checked;
      throw unsupported(String(unreachable));
    }
  }
}
