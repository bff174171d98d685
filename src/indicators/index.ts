export { mean, median, mode, reachQuantile, winningSamples } from './outcomeStats.js';
