import { describe, it, expect } from 'vitest';
import { pack, greedyPack, type Packing } from '../src/packing/index.js';
import { EmptyInputError, InvalidBoxCountError, InvalidWeightError } from '../src/errors/index.js';
import { generateWeights, seededRandom } from '../src/bench/index.js';

const sums = (packing: Packing) => packing.boxes.map(box => box.sum);
const members = (packing: Packing) => packing.boxes.map(box => box.articles);

describe('pack (largest differencing)', () => {
  it('splits 8,7,6,5,4 into two boxes of 16 and 14', () => {
    const packing = pack([8, 7, 6, 5, 4], 2);

    expect(sums(packing)).toEqual([16, 14]);
    expect(members(packing)).toEqual([[4, 1, 3], [0, 2]]);
    expect(packing.boxes[0].weights).toEqual([4, 7, 5]);
    expect(packing.boxes[1].weights).toEqual([8, 6]);
    expect(packing.spread).toBe(2);
    expect(packing.total).toBe(30);
    expect(packing.stats).toEqual({ seedNodes: 3, merges: 2 });
  });

  it('reaches the same split with single seeding', () => {
    const packing = pack([8, 7, 6, 5, 4], 2, { seeding: 'single' });

    expect(members(packing)).toEqual([[4, 1, 3], [0, 2]]);
    expect(packing.stats).toEqual({ seedNodes: 5, merges: 4 });
  });

  it('isolates a dominant article with single seeding', () => {
    const packing = pack([10, 1, 1, 1], 2, { seeding: 'single' });

    expect(sums(packing)).toEqual([10, 3]);
    expect(members(packing)).toEqual([[0], [1, 2, 3]]);
    expect(packing.spread).toBe(7);
  });

  it('pairs the dominant article within its batch with batch seeding', () => {
    const packing = pack([10, 1, 1, 1], 2);

    expect(sums(packing)).toEqual([11, 2]);
    expect(members(packing)).toEqual([[0, 3], [1, 2]]);
    expect(packing.spread).toBe(9);
  });

  it('puts a single article in the first of k boxes', () => {
    const packing = pack([{ id: 1, weight: 5 }], 3);

    expect(members(packing)).toEqual([[1], [], []]);
    expect(sums(packing)).toEqual([5, 0, 0]);
    expect(packing.stats.merges).toBe(0);
  });

  it('splits four equal weights two and two', () => {
    const packing = pack([3, 3, 3, 3], 2);

    expect(members(packing)).toEqual([[0, 3], [1, 2]]);
    expect(sums(packing)).toEqual([6, 6]);
    expect(packing.spread).toBe(0);
  });

  it('puts everything in one box when k is 1', () => {
    const packing = pack([2, 9, 4], 1);

    expect(packing.boxes).toHaveLength(1);
    expect(packing.boxes[0]).toEqual({ articles: [0, 1, 2], weights: [2, 9, 4], sum: 15 });
    expect(packing.spread).toBe(0);
  });

  it('leaves extra boxes empty when k exceeds the article count', () => {
    const packing = pack([5, 3], 4);

    expect(packing.boxes).toHaveLength(4);
    expect(sums(packing)).toEqual([5, 3, 0, 0]);
    expect(members(packing)).toEqual([[0], [1], [], []]);
  });

  it('keeps caller ids, duplicates included', () => {
    const packing = pack([{ id: 7, weight: 2 }, { id: 7, weight: 3 }], 2);

    expect(packing.boxes).toEqual([
      { articles: [7], weights: [3], sum: 3 },
      { articles: [7], weights: [2], sum: 2 },
    ]);
  });

  it('conserves articles and weight on generated input', () => {
    const weights = generateWeights(200, 100, 1000, seededRandom(11));
    const total = weights.reduce((a, b) => a + b, 0);

    for (const seeding of ['batch', 'single'] as const) {
      for (const k of [1, 2, 3, 7, 250]) {
        const packing = pack(weights, k, { seeding });
        const ids = packing.boxes.flatMap(box => box.articles).sort((a, b) => a - b);

        expect(packing.boxes).toHaveLength(k);
        expect(ids).toEqual(weights.map((_, i) => i));
        expect(packing.total).toBe(total);
        for (const box of packing.boxes) {
          expect(box.sum).toBe(box.weights.reduce((a, b) => a + b, 0));
          expect(box.weights).toEqual(box.articles.map(id => weights[id]));
        }
        for (let i = 1; i < packing.boxes.length; i++) {
          expect(packing.boxes[i - 1].sum).toBeGreaterThanOrEqual(packing.boxes[i].sum);
        }
      }
    }
  });

  it('keeps the spread within the heaviest article', () => {
    const weights = generateWeights(300, 100, 1000, seededRandom(5));
    for (const seeding of ['batch', 'single'] as const) {
      const packing = pack(weights, 6, { seeding });
      expect(packing.spread).toBeLessThanOrEqual(Math.max(...weights));
    }
  });
});

describe('pack validation', () => {
  it('rejects a box count below 1', () => {
    expect(() => pack([1], 0)).toThrow(InvalidBoxCountError);
    expect(() => pack([1], -3)).toThrow(InvalidBoxCountError);
  });

  it('rejects a fractional box count', () => {
    expect(() => pack([1], 2.5)).toThrow(InvalidBoxCountError);
  });

  it('checks the box count before the input', () => {
    expect(() => pack([], 0)).toThrow(InvalidBoxCountError);
  });

  it('rejects empty input', () => {
    expect(() => pack([], 2)).toThrow(EmptyInputError);
  });

  it('returns k empty boxes for empty input when allowed', () => {
    const packing = pack([], 3, { allowEmpty: true });

    expect(packing.boxes).toEqual([
      { articles: [], weights: [], sum: 0 },
      { articles: [], weights: [], sum: 0 },
      { articles: [], weights: [], sum: 0 },
    ]);
    expect(packing.total).toBe(0);
    expect(packing.spread).toBe(0);
  });

  it('rejects negative weights', () => {
    expect(() => pack([1, -2], 2)).toThrow(InvalidWeightError);
  });
});

describe('greedyPack', () => {
  it('puts each article in the lightest box', () => {
    const packing = greedyPack([8, 7, 6, 5, 4], 2);

    expect(packing.strategy).toBe('greedy');
    expect(members(packing)).toEqual([[0, 3, 4], [1, 2]]);
    expect(sums(packing)).toEqual([17, 13]);
    expect(packing.spread).toBe(4);
    expect(packing.stats).toEqual({ seedNodes: 0, merges: 0 });
  });

  it('shares validation with pack', () => {
    expect(() => greedyPack([], 2)).toThrow(EmptyInputError);
    expect(() => greedyPack([1], 0)).toThrow(InvalidBoxCountError);
  });
});
