import { Command, Option } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../model/index.js';
import { runBenchmark, type BenchmarkReport } from '../bench/index.js';
import type { SeedingPolicy } from '../packing/index.js';
import { exitCodeFor, formatError } from '../errors/index.js';
import { canonicalizeOutput } from '../utils/index.js';
import { parseInteger, parseNonNegativeInt, parsePositiveInt, parseSizeList } from './options.js';

export interface BenchCommandOptions {
  articles?: number;
  sizes?: number[];
  boxes?: number;
  minWeight?: number;
  maxWeight?: number;
  seed?: number;
  runs?: number;
  seeding?: SeedingPolicy;
  json?: boolean;
}

export function runBench(projectPath: string, options: BenchCommandOptions): BenchmarkReport {
  const { benchmark, packing } = loadConfig(projectPath);

  return runBenchmark({
    sizes: options.sizes ?? [options.articles ?? benchmark.articles],
    boxes: options.boxes ?? benchmark.boxes,
    smallestWeight: options.minWeight ?? benchmark.smallest_weight,
    largestWeight: options.maxWeight ?? benchmark.largest_weight,
    seed: options.seed ?? benchmark.seed,
    runs: options.runs ?? benchmark.runs,
    seeding: options.seeding ?? packing.seeding,
  });
}

export const benchCommand = new Command('bench')
  .description('Compare greedy and largest differencing packing on generated articles')
  .option('--articles <count>', 'Number of generated articles', parsePositiveInt)
  .option('--sizes <counts>', 'Comma-separated article counts (overrides --articles)', parseSizeList)
  .option('-k, --boxes <count>', 'Number of boxes', parsePositiveInt)
  .option('--min-weight <grams>', 'Smallest generated weight', parseNonNegativeInt)
  .option('--max-weight <grams>', 'Largest generated weight', parseNonNegativeInt)
  .option('--seed <n>', 'Random seed', parseInteger)
  .option('--runs <count>', 'Timed runs per strategy', parsePositiveInt)
  .addOption(new Option('--seeding <policy>', 'Seeding for largest differencing').choices(['batch', 'single']))
  .option('--json', 'Output as JSON')
  .action((options: BenchCommandOptions) => {
    try {
      const report = runBench(process.cwd(), options);

      if (options.json) {
        console.log(canonicalizeOutput(report));
        return;
      }

      printReport(report);
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(formatError(error)));
        process.exit(exitCodeFor(error));
      }
      throw error;
    }
  });

function printReport(report: BenchmarkReport): void {
  const o = report.options;

  console.log(chalk.bold('\n⏱  Packing Benchmark\n'));
  console.log(chalk.dim(
    `Boxes: ${o.boxes} | Weights: ${o.smallestWeight}-${o.largestWeight} | Seed: ${o.seed} | Runs: ${o.runs} | Seeding: ${o.seeding}`
  ));

  for (const row of report.rows) {
    console.log(chalk.cyan(`\n${row.articles.toLocaleString()} articles`));
    for (const r of row.results) {
      const label = r.strategy === 'ldm' ? 'Largest differencing' : 'Greedy';
      console.log(`  ${chalk.bold(label)}`);
      console.log(`    Sums:   ${r.sums.join(', ')}`);
      console.log(`    Spread: ${r.spread}`);
      console.log(chalk.dim(`    Time:   best ${r.bestMs.toFixed(3)} ms, mean ${r.meanMs.toFixed(3)} ms`));
    }
  }
  console.log('');
}
