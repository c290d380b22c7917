import type { Article } from '../model/article.js';
import type { BoxAccumulator } from './box.js';
import { BinaryHeap } from './heap.js';
import { mergeNodes, seedNodes, type PartitionNode, type SeedingPolicy } from './partition.js';

interface QueuedNode {
  node: PartitionNode;
  seq: number;
}

/**
 * The differencing working set: nodes come out largest spread first, and on
 * equal spread in insertion order.
 */
export class WorkingSet {
  private readonly heap = new BinaryHeap<QueuedNode>(
    (a, b) => a.node.spread > b.node.spread || (a.node.spread === b.node.spread && a.seq < b.seq)
  );
  private nextSeq = 0;

  get size(): number {
    return this.heap.size();
  }

  insert(node: PartitionNode): void {
    this.heap.push({ node, seq: this.nextSeq++ });
  }

  takeMostUnbalanced(): PartitionNode | undefined {
    return this.heap.pop()?.node;
  }
}

export interface DifferencingResult {
  /** Final boxes, heaviest first. */
  boxes: readonly BoxAccumulator[];
  seedNodes: number;
  merges: number;
}

/**
 * Largest differencing method over k boxes.
 *
 * `sortedArticles` must be ordered heaviest first and be non-empty.
 */
export function runDifferencing(
  sortedArticles: readonly Article[],
  boxCount: number,
  seeding: SeedingPolicy
): DifferencingResult {
  const workingSet = new WorkingSet();
  const seeds = seedNodes(sortedArticles, boxCount, seeding);
  for (const node of seeds) {
    workingSet.insert(node);
  }

  let merges = 0;
  while (workingSet.size > 1) {
    const first = workingSet.takeMostUnbalanced();
    const second = workingSet.takeMostUnbalanced();
    if (!first || !second) break;
    workingSet.insert(mergeNodes(first, second));
    merges++;
  }

  const last = workingSet.takeMostUnbalanced();
  if (!last) {
    throw new Error('Differencing needs at least one article');
  }

  return { boxes: last.boxes, seedNodes: seeds.length, merges };
}
