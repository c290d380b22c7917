import type { Article } from '../model/article.js';
import { BoxAccumulator } from './box.js';

/**
 * Baseline packer: each article, heaviest first, goes into the lightest box
 * so far (the lowest-numbered one on ties). Boxes are returned in slot order.
 *
 * `sortedArticles` must be ordered heaviest first.
 */
export function greedyBoxes(sortedArticles: readonly Article[], boxCount: number): BoxAccumulator[] {
  const boxes = Array.from({ length: boxCount }, () => BoxAccumulator.empty());

  for (const article of sortedArticles) {
    let lightest = boxes[0];
    for (const box of boxes) {
      if (box.sum < lightest.sum) {
        lightest = box;
      }
    }
    lightest.absorb(BoxAccumulator.seed(article));
  }

  return boxes;
}
