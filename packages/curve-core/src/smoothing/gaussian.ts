// ---------------------------------------------------------------------------
// Gaussian smoothing on a log-spaced grid
// ---------------------------------------------------------------------------
// σ = bandwidth / 2 octaves, kernel truncated at 4σ, reflect-mode edges
// (d c b a | a b c d | d c b a).

import { makeCurve } from '../curve.js';
import { DEFAULT_PINNED_FREQUENCY, resampleToGrid } from '../resample/index.js';
import type { Curve, GaussianSmoothing } from '../types.js';

const TRUNCATE_SIGMAS = 4;

/** Normalized kernel of length 2·radius + 1 for a σ measured in samples. */
export function gaussianKernel(sigma: number): Float64Array {
  const radius = Math.ceil(TRUNCATE_SIGMAS * sigma);
  const kernel = new Float64Array(2 * radius + 1);
  let total = 0;
  for (let j = -radius; j <= radius; j++) {
    const w = Math.exp(-0.5 * (j / sigma) ** 2);
    kernel[j + radius] = w;
    total += w;
  }
  for (let j = 0; j < kernel.length; j++) kernel[j] /= total;
  return kernel;
}

function reflectIndex(index: number, n: number): number {
  let i = index;
  while (i < 0 || i >= n) {
    if (i < 0) i = -i - 1;
    if (i >= n) i = 2 * n - i - 1;
  }
  return i;
}

export function convolveReflect(signal: Float64Array, kernel: Float64Array): Float64Array {
  const n = signal.length;
  const radius = (kernel.length - 1) / 2;
  const out = new Float64Array(n);
  for (let i = 0; i < n; i++) {
    let acc = 0;
    for (let j = -radius; j <= radius; j++) {
      acc += kernel[j + radius] * signal[reflectIndex(i + j, n)];
    }
    out[i] = acc;
  }
  return out;
}

export function smoothGaussian(curve: Curve, algorithm: GaussianSmoothing): Curve {
  const { bandwidth, resolution } = algorithm;
  const resampled = resampleToGrid(curve, resolution, algorithm.pinnedFrequency ?? DEFAULT_PINNED_FREQUENCY);
  const kernel = gaussianKernel((bandwidth / 2) * resolution);
  const smoothed = convolveReflect(Float64Array.from(resampled.amplitudes), kernel);
  return makeCurve(resampled.frequencies, smoothed);
}
