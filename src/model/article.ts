import { InvalidArticleIdError, InvalidWeightError } from '../errors/index.js';

/**
 * A weighted item to be packed. Owned by the caller; the packer only reads
 * `weight` and refers to the article by `id`.
 */
export interface Article {
  readonly id: number;
  readonly weight: number;
}

/** A bare weight, or a weight with a caller-assigned id. */
export type ArticleInput = number | { id?: number; weight: number };

export function createArticle(id: number, weight: number): Article {
  if (!Number.isSafeInteger(id)) {
    throw new InvalidArticleIdError(id);
  }
  if (!Number.isFinite(weight) || weight < 0) {
    throw new InvalidWeightError(weight, id);
  }
  return Object.freeze({ id, weight });
}

/**
 * Builds articles in input order. Inputs without an id get their position.
 */
export function toArticles(inputs: readonly ArticleInput[]): Article[] {
  return inputs.map((input, index) =>
    typeof input === 'number'
      ? createArticle(index, input)
      : createArticle(input.id ?? index, input.weight)
  );
}
