export {
  pack,
  greedyPack,
  BoxAccumulator,
  BinaryHeap,
  WorkingSet,
  runDifferencing,
  createNode,
  mergeNodes,
  seedNodes,
  greedyBoxes,
} from './packing/index.js';

export type {
  PackOptions,
  PackStrategy,
  PackedBox,
  Packing,
  PartitionNode,
  SeedingPolicy,
  DifferencingResult,
} from './packing/index.js';

export { createArticle, toArticles } from './model/index.js';
export type { Article, ArticleInput } from './model/index.js';

export {
  BoxpackError,
  ConfigError,
  ParseError,
  InvalidWeightError,
  InvalidArticleIdError,
  InvalidBoxCountError,
  EmptyInputError,
  exitCodeFor,
  formatError,
} from './errors/index.js';

// Reporting and benchmarking helpers
export { summarizePacking, formatPackingText, packingToJson } from './report/index.js';
export type { PackingSummary } from './report/index.js';
export { runBenchmark, seededRandom, generateWeights } from './bench/index.js';
export type { BenchmarkOptions, BenchmarkReport, BenchmarkRow, StrategyResult } from './bench/index.js';
