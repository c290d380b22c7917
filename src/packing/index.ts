import { EmptyInputError, InvalidBoxCountError } from '../errors/index.js';
import { toArticles, type ArticleInput } from '../model/article.js';
import { stableSortBy } from '../utils/index.js';
import type { BoxAccumulator } from './box.js';
import { greedyBoxes } from './greedy.js';
import { runDifferencing } from './ldm.js';
import type { SeedingPolicy } from './partition.js';

export { BoxAccumulator } from './box.js';
export { BinaryHeap } from './heap.js';
export { WorkingSet, runDifferencing } from './ldm.js';
export type { DifferencingResult } from './ldm.js';
export { createNode, mergeNodes, seedNodes } from './partition.js';
export type { PartitionNode, SeedingPolicy } from './partition.js';
export { greedyBoxes } from './greedy.js';

export type PackStrategy = 'ldm' | 'greedy';

export interface PackOptions {
  /** Defaults to `ldm`. */
  strategy?: PackStrategy;
  /** Seeding for `ldm`. Defaults to `batch`. */
  seeding?: SeedingPolicy;
  /** Return `boxCount` empty boxes for an empty input instead of throwing. */
  allowEmpty?: boolean;
}

export interface PackedBox {
  articles: number[];
  weights: number[];
  sum: number;
}

export interface Packing {
  strategy: PackStrategy;
  boxCount: number;
  /** Exactly `boxCount` boxes, heaviest first. */
  boxes: PackedBox[];
  total: number;
  spread: number;
  stats: {
    seedNodes: number;
    merges: number;
  };
}

/**
 * Packs articles into `boxCount` boxes with weight spread as evenly as the
 * chosen heuristic manages.
 *
 * @throws InvalidBoxCountError when `boxCount` is not a positive integer
 * @throws EmptyInputError when there are no articles and `allowEmpty` is off
 * @throws InvalidWeightError when a weight is negative or not finite
 *
 * @example
 * pack([8, 7, 6, 5, 4], 2).boxes.map(b => b.sum); // [16, 14]
 */
export function pack(
  inputs: readonly ArticleInput[],
  boxCount: number,
  options: PackOptions = {}
): Packing {
  const strategy = options.strategy ?? 'ldm';

  if (!Number.isInteger(boxCount) || boxCount < 1) {
    throw new InvalidBoxCountError(boxCount);
  }
  if (inputs.length === 0) {
    if (!options.allowEmpty) {
      throw new EmptyInputError();
    }
    return buildPacking(strategy, boxCount, [], { seedNodes: 0, merges: 0 });
  }

  const articles = toArticles(inputs);
  // Heaviest first; equal weights keep input order
  const sorted = stableSortBy(articles, a => -a.weight);

  if (strategy === 'greedy') {
    return buildPacking(strategy, boxCount, greedyBoxes(sorted, boxCount), { seedNodes: 0, merges: 0 });
  }

  const result = runDifferencing(sorted, boxCount, options.seeding ?? 'batch');
  return buildPacking(strategy, boxCount, result.boxes, {
    seedNodes: result.seedNodes,
    merges: result.merges,
  });
}

/**
 * Greedy baseline with the same contract as {@link pack}.
 */
export function greedyPack(inputs: readonly ArticleInput[], boxCount: number): Packing {
  return pack(inputs, boxCount, { strategy: 'greedy' });
}

function buildPacking(
  strategy: PackStrategy,
  boxCount: number,
  boxes: readonly BoxAccumulator[],
  stats: Packing['stats']
): Packing {
  const packed: PackedBox[] = boxes.map(box => ({
    articles: [...box.members],
    weights: [...box.memberWeights],
    sum: box.sum,
  }));
  while (packed.length < boxCount) {
    packed.push({ articles: [], weights: [], sum: 0 });
  }

  const ordered = stableSortBy(packed, box => -box.sum);
  const total = ordered.reduce((acc, box) => acc + box.sum, 0);

  return {
    strategy,
    boxCount,
    boxes: ordered,
    total,
    spread: ordered[0].sum - ordered[ordered.length - 1].sum,
    stats,
  };
}
