// ---------------------------------------------------------------------------
// Butterworth lowpass on a log-spaced curve
// ---------------------------------------------------------------------------
// Maximally flat passband, monotonic rolloff.
// IIR design via bilinear transform: s → 2·(z-1)/((z+1)·T)
// Always use second-order sections (SOS) for numerical stability.
// Here the "signal" is the amplitude sequence of a curve resampled at
// `resolution` points per octave, so sample rate and cutoff are measured
// per octave rather than per second.

import { makeCurve } from '../curve.js';
import { CurveError } from '../errors.js';
import { DEFAULT_PINNED_FREQUENCY, resampleToGrid } from '../resample/index.js';
import type { ButterworthSmoothing, Curve, SOSSection } from '../types.js';

export interface ButterworthDesign {
  order: number;
  cutoff: number;
  fs: number;
}

/**
 * Pre-warp analog cutoff frequency for bilinear transform.
 * Ωₐ = 2·fs·tan(π·fc/fs)
 */
function prewarp(fc: number, fs: number): number {
  return 2 * fs * Math.tan((Math.PI * fc) / fs);
}

/**
 * Compute Butterworth analog prototype poles.
 * Poles of Nth-order Butterworth lie on unit circle at angles:
 * θ_k = π(2k+N+1)/(2N) for k = 0,...,N-1
 */
function butterworthPoles(order: number): Array<{ re: number; im: number }> {
  const poles: Array<{ re: number; im: number }> = [];
  for (let k = 0; k < order; k++) {
    const theta = (Math.PI * (2 * k + order + 1)) / (2 * order);
    poles.push({ re: Math.cos(theta), im: Math.sin(theta) });
  }
  return poles;
}

/**
 * Bilinear transform of one conjugate pole pair into a lowpass biquad
 * with unity gain at DC.
 */
function bilinearTransformSOS(
  poleRe: number,
  poleIm: number,
  prewarpedCutoff: number,
  fs: number,
): SOSSection {
  const sRe = poleRe * prewarpedCutoff;
  const sIm = poleIm * prewarpedCutoff;

  // z-pole = (2fs + s) / (2fs - s)
  const numRe = 2 * fs + sRe;
  const numIm = sIm;
  const denRe = 2 * fs - sRe;
  const denIm = -sIm;
  const denMag2 = denRe * denRe + denIm * denIm;
  const zRe = (numRe * denRe + numIm * denIm) / denMag2;
  const zIm = (numIm * denRe - numRe * denIm) / denMag2;

  // a0 = 1, a1 = -2·Re(z_pole), a2 = |z_pole|²
  const a1 = -2 * zRe;
  const a2 = zRe * zRe + zIm * zIm;

  // Zeros at z = -1: b(z) = (1 + z⁻¹)², normalized at DC
  const gain = (1 + a1 + a2) / 4;
  return [gain, 2 * gain, gain, 1, a1, a2];
}

/**
 * Design a lowpass Butterworth filter as a cascade of second-order sections,
 * each with unity DC gain.
 */
export function designButterworthLowpass(design: ButterworthDesign): SOSSection[] {
  const { order, cutoff, fs } = design;
  if (!Number.isInteger(order) || order < 1) {
    throw new CurveError('InvalidResolution', `Filter order must be a positive integer, got ${order}.`, { order });
  }
  if (!(cutoff > 0 && cutoff < fs / 2)) {
    throw new CurveError(
      'InvalidResolution',
      `Cutoff ${cutoff} must lie between 0 and the Nyquist rate ${fs / 2}.`,
      { cutoff, fs },
    );
  }

  const sections: SOSSection[] = [];
  const poles = butterworthPoles(order);
  const omega = prewarp(cutoff, fs);

  for (let i = 0; i < Math.floor(order / 2); i++) {
    sections.push(bilinearTransformSOS(poles[i].re, poles[i].im, omega, fs));
  }
  if (order % 2 === 1) {
    // The middle pole is real: θ = π
    const sReal = -omega;
    const zReal = (2 * fs + sReal) / (2 * fs - sReal);
    const a1 = -zReal;
    const gainDC = (1 + a1) / 2;
    sections.push([gainDC, gainDC, 0, 1, a1, 0]);
  }

  return sections;
}

/**
 * Apply SOS filter (direct form II) — forward pass only.
 * With `steadyState`, every section starts as if the first sample had been
 * present forever, so a constant input passes through without a transient.
 */
export function sosfilt(sections: SOSSection[], signal: Float64Array, steadyState = false): Float64Array {
  let output = new Float64Array(signal);
  const initial = signal.length > 0 ? signal[0] : 0;

  for (const [b0, b1, b2, , a1, a2] of sections) {
    const x = output;
    const y = new Float64Array(x.length);
    // Sections have unity DC gain, so each one sees `initial` at its input too.
    let w1 = steadyState ? initial / (1 + a1 + a2) : 0;
    let w2 = w1;

    for (let n = 0; n < x.length; n++) {
      const w0 = x[n] - a1 * w1 - a2 * w2;
      y[n] = b0 * w0 + b1 * w1 + b2 * w2;
      w2 = w1;
      w1 = w0;
    }
    output = y;
  }

  return output;
}

function reversed(signal: Float64Array): Float64Array {
  const out = new Float64Array(signal.length);
  for (let i = 0; i < signal.length; i++) out[i] = signal[signal.length - 1 - i];
  return out;
}

/** Odd extension: mirror `padLength` samples about each endpoint. */
function oddExtend(signal: Float64Array, padLength: number): Float64Array {
  const n = signal.length;
  const out = new Float64Array(n + 2 * padLength);
  const first = signal[0];
  const last = signal[n - 1];
  for (let i = 0; i < padLength; i++) {
    out[i] = 2 * first - signal[padLength - i];
    out[padLength + n + i] = 2 * last - signal[n - 2 - i];
  }
  out.set(signal, padLength);
  return out;
}

/**
 * Zero-phase SOS filter: forward pass + backward pass over an odd-extended
 * signal, both passes starting from steady state.
 */
export function sosfiltfilt(sections: SOSSection[], signal: Float64Array): Float64Array {
  const n = signal.length;
  if (n === 0) return new Float64Array(0);

  const padLength = Math.min(3 * (2 * sections.length + 1), n - 1);
  const extended = oddExtend(signal, padLength);

  const forward = sosfilt(sections, extended, true);
  const backward = reversed(sosfilt(sections, reversed(forward), true));

  return backward.slice(padLength, padLength + n);
}

/**
 * Smooth a curve with a zero-phase Butterworth lowpass run on its
 * log-spaced resampling. Cutoff is 1/bandwidth cycles per octave.
 */
export function smoothButterworth(curve: Curve, algorithm: ButterworthSmoothing): Curve {
  const { order, bandwidth, resolution } = algorithm;
  const resampled = resampleToGrid(curve, resolution, algorithm.pinnedFrequency ?? DEFAULT_PINNED_FREQUENCY);
  const sections = designButterworthLowpass({ order, cutoff: 1 / bandwidth, fs: resolution });
  const filtered = sosfiltfilt(sections, Float64Array.from(resampled.amplitudes));
  return makeCurve(resampled.frequencies, filtered);
}
