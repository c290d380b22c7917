import type { Article } from '../model/article.js';

/**
 * One box slot inside a partition node: a running sum and the ids of the
 * articles assigned to it, in assignment order.
 *
 * Invariant: `sum` equals the total weight of `members`.
 */
export class BoxAccumulator {
  private consumed = false;

  private constructor(
    private total: number,
    private readonly ids: number[],
    private readonly weights: number[]
  ) {}

  static empty(): BoxAccumulator {
    return new BoxAccumulator(0, [], []);
  }

  static seed(article: Article): BoxAccumulator {
    return new BoxAccumulator(article.weight, [article.id], [article.weight]);
  }

  get sum(): number {
    return this.total;
  }

  get members(): readonly number[] {
    return this.ids;
  }

  /** Weight of each member, aligned with `members`. */
  get memberWeights(): readonly number[] {
    return this.weights;
  }

  /**
   * Moves every member of `other` to the end of this box. `other` is spent
   * afterwards and may not be absorbed or absorb again.
   */
  absorb(other: BoxAccumulator): void {
    if (other === this) {
      throw new Error('A box cannot absorb itself');
    }
    if (this.consumed || other.consumed) {
      throw new Error('Box has already been absorbed into another box');
    }
    for (let i = 0; i < other.ids.length; i++) {
      this.ids.push(other.ids[i]);
      this.weights.push(other.weights[i]);
    }
    this.total += other.total;
    other.consumed = true;
  }
}
