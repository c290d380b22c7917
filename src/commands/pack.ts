import { Command, Option } from 'commander';
import chalk from 'chalk';
import { loadArticlesFile, loadConfig, parseWeightList } from '../model/index.js';
import type { ArticleInput } from '../model/index.js';
import { pack, type PackStrategy, type Packing, type SeedingPolicy } from '../packing/index.js';
import { formatPackingText, packingToJson } from '../report/index.js';
import { exitCodeFor, formatError, ParseError } from '../errors/index.js';
import { parsePositiveInt } from './options.js';

export interface PackCommandOptions {
  file?: string;
  boxes?: number;
  strategy?: PackStrategy;
  seeding?: SeedingPolicy;
  allowEmpty?: boolean;
  json?: boolean;
  verbose?: boolean;
}

export interface PackRun {
  packing: Packing;
  format: 'text' | 'json';
  source: string;
}

/**
 * Resolves inputs and settings (flags over `.boxpack/config.yaml` over
 * defaults) and packs.
 */
export function runPack(projectPath: string, weights: string[], options: PackCommandOptions): PackRun {
  const config = loadConfig(projectPath);

  if (options.file && weights.length > 0) {
    throw new ParseError('Pass weights as arguments or with --file, not both');
  }

  let inputs: ArticleInput[];
  let source: string;
  if (options.file) {
    inputs = loadArticlesFile(options.file);
    source = options.file;
  } else {
    inputs = parseWeightList(weights);
    source = 'arguments';
  }

  const packing = pack(inputs, options.boxes ?? config.packing.boxes, {
    strategy: options.strategy ?? config.packing.strategy,
    seeding: options.seeding ?? config.packing.seeding,
    allowEmpty: options.allowEmpty ?? config.packing.allow_empty,
  });

  return {
    packing,
    format: options.json ? 'json' : config.output.format,
    source,
  };
}

export const packCommand = new Command('pack')
  .description('Pack weighted articles into boxes as evenly as possible')
  .argument('[weights...]', 'Article weights (ids are their positions)')
  .option('--file <path>', 'Read articles from a YAML, JSON or .txt file')
  .option('-k, --boxes <count>', 'Number of boxes', parsePositiveInt)
  .addOption(new Option('--strategy <name>', 'Packing strategy').choices(['ldm', 'greedy']))
  .addOption(new Option('--seeding <policy>', 'Seed nodes per k articles or per article').choices(['batch', 'single']))
  .option('--allow-empty', 'Return empty boxes when there are no articles')
  .option('--json', 'Output as JSON')
  .option('--verbose', 'Show differencing statistics')
  .action((weights: string[], options: PackCommandOptions) => {
    try {
      const run = runPack(process.cwd(), weights, options);

      if (run.format === 'json') {
        console.log(packingToJson(run.packing));
        return;
      }

      printPacking(run, options.verbose ?? false);
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(formatError(error)));
        process.exit(exitCodeFor(error));
      }
      throw error;
    }
  });

function printPacking(run: PackRun, verbose: boolean): void {
  const { packing } = run;
  const lines = formatPackingText(packing);
  const boxLines = lines.slice(0, packing.boxCount);
  const [totalLine, spreadLine] = lines.slice(packing.boxCount);

  console.log(chalk.bold(`\n📦 ${packing.boxCount} boxes (${packing.strategy})\n`));
  for (const line of boxLines) {
    console.log(`  ${line}`);
  }
  console.log('');
  console.log(chalk.cyan(totalLine));
  console.log((packing.spread === 0 ? chalk.green : chalk.yellow)(spreadLine));

  if (verbose) {
    console.log(chalk.dim(`\nSource: ${run.source}`));
    if (packing.strategy === 'ldm') {
      console.log(chalk.dim(`Seed nodes: ${packing.stats.seedNodes} | Merges: ${packing.stats.merges}`));
    }
    for (const [i, box] of packing.boxes.entries()) {
      console.log(chalk.dim(`  Box ${i + 1} ids: ${box.articles.join(', ')}`));
    }
  }
  console.log('');
}
