import type { Article } from '../model/article.js';
import { stableSortBy } from '../utils/index.js';
import { BoxAccumulator } from './box.js';

export type SeedingPolicy = 'batch' | 'single';

/**
 * A partial solution: exactly k boxes, heaviest first.
 * `spread` is the heaviest sum minus the lightest.
 */
export interface PartitionNode {
  readonly boxes: readonly BoxAccumulator[];
  readonly spread: number;
}

export function createNode(boxes: readonly BoxAccumulator[]): PartitionNode {
  if (boxes.length === 0) {
    throw new Error('A partition node needs at least one box');
  }
  const sorted = stableSortBy(boxes, box => -box.sum);
  return {
    boxes: sorted,
    spread: sorted[0].sum - sorted[sorted.length - 1].sum,
  };
}

/**
 * Turns articles (already sorted heaviest first) into seed nodes of
 * `boxCount` boxes each.
 *
 * - `batch`: every run of `boxCount` consecutive articles becomes one node,
 *   article i of the run in box i. A short final run leaves its remaining
 *   boxes empty.
 * - `single`: one node per article, the article alone in the first box.
 */
export function seedNodes(
  sortedArticles: readonly Article[],
  boxCount: number,
  seeding: SeedingPolicy
): PartitionNode[] {
  const step = seeding === 'batch' ? boxCount : 1;
  const nodes: PartitionNode[] = [];

  for (let start = 0; start < sortedArticles.length; start += step) {
    const batch = sortedArticles.slice(start, start + step);
    const boxes: BoxAccumulator[] = [];
    for (let i = 0; i < boxCount; i++) {
      boxes.push(i < batch.length ? BoxAccumulator.seed(batch[i]) : BoxAccumulator.empty());
    }
    nodes.push(createNode(boxes));
  }

  return nodes;
}

/**
 * Combines two nodes by pairing the i-th heaviest box of `a` with the i-th
 * lightest box of `b`. The boxes of both operands are spent.
 */
export function mergeNodes(a: PartitionNode, b: PartitionNode): PartitionNode {
  const k = a.boxes.length;
  if (b.boxes.length !== k) {
    throw new Error(`Cannot merge nodes with ${k} and ${b.boxes.length} boxes`);
  }

  const combined: BoxAccumulator[] = [];
  for (let i = 0; i < k; i++) {
    const target = a.boxes[i];
    target.absorb(b.boxes[k - 1 - i]);
    combined.push(target);
  }

  return createNode(combined);
}
