export { runBenchmark } from './runner.js';
export type { BenchmarkOptions, BenchmarkReport, BenchmarkRow, StrategyResult } from './runner.js';
export { seededRandom, generateWeights } from './random.js';
