export { buildFrequencyTable, presentValues, cellAt } from './frequency-table.js';
export { mean, median, quantile, quartiles, sortAscending, type Quartiles } from './statistics.js';
export { meanAndMedian, reduceColumns, assertCurveCount } from './mean-median.js';
export { iqrFences } from './iqr.js';
