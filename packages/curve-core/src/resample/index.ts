export {
  DEFAULT_PINNED_FREQUENCY,
  GRID_MATCH_TOLERANCE,
  logFrequencyGrid,
  gridsMatch,
} from './log-grid.js';

export {
  interpolateAt,
  interpolateLogFrequency,
  sampleWithinSpan,
} from './interpolate.js';

export { resampleToGrid, assertPointsPerOctave } from './resampler.js';
