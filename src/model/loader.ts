import { readFileSync, existsSync } from 'fs';
import { extname, join } from 'path';
import yaml from 'js-yaml';
import { ZodError } from 'zod';
import { ConfigError, ParseError } from '../errors/index.js';
import { parseConfig, Config } from '../schemas/config.js';
import { parseArticleFile } from '../schemas/articles.js';
import type { ArticleInput } from './article.js';

export const CONFIG_DIR = '.boxpack';
export const CONFIG_FILE = 'config.yaml';

function describeZodError(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return error.message;
  }
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

/**
 * Reads `.boxpack/config.yaml` under `projectPath`. A missing file yields the
 * defaults.
 */
export function loadConfig(projectPath: string): Config {
  const configPath = join(projectPath, CONFIG_DIR, CONFIG_FILE);
  if (!existsSync(configPath)) {
    return parseConfig({});
  }

  let data: unknown;
  try {
    data = yaml.load(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read ${configPath}: ${message}`);
  }

  try {
    return parseConfig(data);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(`Invalid config ${configPath}: ${describeZodError(error)}`);
    }
    throw error;
  }
}

/**
 * Loads articles from a file. `.txt` holds whitespace-separated weights;
 * anything else is read as YAML (which includes JSON).
 */
export function loadArticlesFile(filePath: string): ArticleInput[] {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Cannot read articles: ${message}`, filePath);
  }

  if (extname(filePath).toLowerCase() === '.txt') {
    return parseWeightList(content.split(/\s+/).filter(token => token.length > 0), filePath);
  }

  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Malformed articles file: ${message}`, filePath);
  }

  try {
    return parseArticleFile(data);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ParseError(`Malformed articles file: ${describeZodError(error)}`, filePath);
    }
    throw error;
  }
}

/**
 * Parses weights given as strings, e.g. command-line arguments.
 */
export function parseWeightList(tokens: readonly string[], file?: string): number[] {
  return tokens.map((token, index) => {
    const weight = Number(token);
    if (token.trim() === '' || Number.isNaN(weight)) {
      throw new ParseError(`Weight #${index + 1} is not a number: "${token}"`, file);
    }
    return weight;
  });
}
