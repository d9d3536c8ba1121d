export { rankBestFit, criticalBandWeights, weightedResidualDeviation } from './best-fit.js';
