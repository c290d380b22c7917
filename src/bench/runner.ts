import { performance } from 'perf_hooks';
import { ConfigError } from '../errors/index.js';
import { pack, type PackStrategy, type Packing, type SeedingPolicy } from '../packing/index.js';
import { generateWeights, seededRandom } from './random.js';

export interface BenchmarkOptions {
  /** Article counts to run; each gets its own generated input. */
  sizes: number[];
  boxes: number;
  smallestWeight: number;
  largestWeight: number;
  seed: number;
  runs: number;
  seeding: SeedingPolicy;
}

export interface StrategyResult {
  strategy: PackStrategy;
  sums: number[];
  spread: number;
  bestMs: number;
  meanMs: number;
}

export interface BenchmarkRow {
  articles: number;
  results: StrategyResult[];
}

export interface BenchmarkReport {
  options: BenchmarkOptions;
  rows: BenchmarkRow[];
}

const STRATEGIES: readonly PackStrategy[] = ['greedy', 'ldm'];

function validateOptions(options: BenchmarkOptions): void {
  if (options.sizes.length === 0 || options.sizes.some(n => !Number.isInteger(n) || n < 1)) {
    throw new ConfigError(`Benchmark sizes must be positive integers (got ${options.sizes.join(', ')})`);
  }
  if (!Number.isInteger(options.runs) || options.runs < 1) {
    throw new ConfigError(`Benchmark runs must be a positive integer (got ${options.runs})`);
  }
  if (options.smallestWeight < 0 || options.largestWeight < options.smallestWeight) {
    throw new ConfigError(
      `Invalid weight range [${options.smallestWeight}, ${options.largestWeight}]`
    );
  }
}

/**
 * Packs generated inputs with every strategy and times each `runs` times.
 * Inputs depend only on the seed and the size, so reports are comparable
 * across invocations (apart from the timings).
 */
export function runBenchmark(options: BenchmarkOptions): BenchmarkReport {
  validateOptions(options);

  const rows = options.sizes.map(size => {
    const weights = generateWeights(
      size,
      options.smallestWeight,
      options.largestWeight,
      seededRandom(options.seed)
    );

    const results = STRATEGIES.map(strategy => {
      const timings: number[] = [];
      let packing: Packing | undefined;
      for (let run = 0; run < options.runs; run++) {
        const start = performance.now();
        packing = pack(weights, options.boxes, { strategy, seeding: options.seeding });
        timings.push(performance.now() - start);
      }
      if (!packing) {
        throw new ConfigError('Benchmark made no runs');
      }
      return {
        strategy,
        sums: packing.boxes.map(box => box.sum),
        spread: packing.spread,
        bestMs: Math.min(...timings),
        meanMs: timings.reduce((a, b) => a + b, 0) / timings.length,
      };
    });

    return { articles: size, results };
  });

  return { options, rows };
}
