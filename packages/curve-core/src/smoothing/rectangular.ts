// ---------------------------------------------------------------------------
// Rectangular (moving-average) smoothing on the original points
// ---------------------------------------------------------------------------
// Window is symmetric in log2(f): every sample within ±bandwidth/2 octaves of
// the output point counts equally. Spacing may be irregular, and the window
// simply holds fewer samples near the ends of the curve.

import { makeCurve } from '../curve.js';
import type { Curve, RectangularSmoothing } from '../types.js';

const WINDOW_EDGE_TOLERANCE = 1e-12;

export function smoothRectangular(curve: Curve, algorithm: RectangularSmoothing): Curve {
  const { frequencies, amplitudes } = curve;
  const n = frequencies.length;
  const halfWidth = algorithm.bandwidth / 2 + WINDOW_EDGE_TOLERANCE;
  const octaves = frequencies.map((f) => Math.log2(f));

  const smoothed = new Float64Array(n);
  let start = 0;
  let end = 0; // exclusive
  let sum = 0;

  for (let i = 0; i < n; i++) {
    while (end < n && octaves[end] - octaves[i] <= halfWidth) {
      sum += amplitudes[end];
      end++;
    }
    while (octaves[i] - octaves[start] > halfWidth) {
      sum -= amplitudes[start];
      start++;
    }
    smoothed[i] = sum / (end - start);
  }

  return makeCurve(frequencies, smoothed);
}
