import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { ConfigError } from '../errors/index.js';
import { CONFIG_DIR, CONFIG_FILE } from '../model/index.js';

interface InitOptions {
  force?: boolean;
}

export interface InitResult {
  created: string[];
  failed: { path: string; message: string }[];
}

const DEFAULT_CONFIG = {
  version: '1.0.0',
  packing: {
    boxes: 3,
    strategy: 'ldm',
    seeding: 'batch',
    allow_empty: false,
  },
  benchmark: {
    articles: 35,
    boxes: 3,
    smallest_weight: 100,
    largest_weight: 1000,
    seed: 42,
    runs: 5,
  },
  output: {
    format: 'text',
  },
};

const EXAMPLE_ARTICLES = {
  articles: [
    { id: 1, weight: 400 },
    { id: 2, weight: 500 },
    { id: 3, weight: 600 },
    { id: 4, weight: 700 },
    { id: 5, weight: 800 },
  ],
};

export const EXAMPLE_ARTICLES_FILE = 'articles.example.yaml';

/**
 * Writes `.boxpack/config.yaml` and an example articles file under
 * `projectPath`. Individual write failures are collected, not thrown.
 */
export function runInit(projectPath: string, force = false): InitResult {
  const dir = join(projectPath, CONFIG_DIR);

  if (existsSync(dir) && !force) {
    throw new ConfigError(`${CONFIG_DIR} directory already exists. Use --force to overwrite.`);
  }

  const result: InitResult = { created: [], failed: [] };

  try {
    mkdirSync(dir, { recursive: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    result.failed.push({ path: `${CONFIG_DIR}/`, message });
    return result;
  }

  const files: [string, unknown][] = [
    [CONFIG_FILE, DEFAULT_CONFIG],
    [EXAMPLE_ARTICLES_FILE, EXAMPLE_ARTICLES],
  ];

  for (const [name, content] of files) {
    const displayName = `${CONFIG_DIR}/${name}`;
    try {
      writeFileSync(join(dir, name), yaml.dump(content, { lineWidth: 80 }));
      result.created.push(displayName);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      result.failed.push({ path: displayName, message });
    }
  }

  return result;
}

export const initCommand = new Command('init')
  .description('Create a boxpack config in the current directory')
  .option('--force', `Overwrite existing ${CONFIG_DIR} directory`)
  .action((options: InitOptions) => {
    let result: InitResult;
    try {
      result = runInit(process.cwd(), options.force);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`Error: ${message}`));
      process.exit(1);
    }

    console.log(chalk.blue('Initializing boxpack...'));
    for (const path of result.created) {
      console.log(chalk.gray(`  Created ${path}`));
    }
    for (const { path, message } of result.failed) {
      console.error(chalk.red(`  Failed to create ${path}: ${message}`));
    }

    if (result.failed.length > 0) {
      console.error(chalk.yellow('\n⚠ boxpack initialized with some errors. Please check the messages above.'));
      process.exit(1);
    }

    console.log(chalk.green('\n✓ boxpack initialized successfully!'));
    console.log(chalk.cyan('\nNext steps:'));
    console.log(`  1. Adjust ${CONFIG_DIR}/${CONFIG_FILE} (box count, strategy, benchmark settings)`);
    console.log(`  2. Run \`boxpack pack --file ${CONFIG_DIR}/${EXAMPLE_ARTICLES_FILE} --boxes 2\``);
    console.log('  3. Run `boxpack bench` to compare strategies');
  });
