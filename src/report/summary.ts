import type { Packing } from '../packing/index.js';
import { canonicalizeOutput } from '../utils/index.js';

export interface PackingSummary {
  sums: number[];
  total: number;
  heaviest: number;
  lightest: number;
  /** Heaviest box sum minus lightest box sum. */
  spread: number;
  articleCount: number;
}

export function summarizePacking(packing: Packing): PackingSummary {
  const sums = packing.boxes.map(box => box.sum);
  const heaviest = Math.max(...sums);
  const lightest = Math.min(...sums);
  return {
    sums,
    total: sums.reduce((a, b) => a + b, 0),
    heaviest,
    lightest,
    spread: heaviest - lightest,
    articleCount: packing.boxes.reduce((n, box) => n + box.articles.length, 0),
  };
}

export function formatPackingText(packing: Packing): string[] {
  const summary = summarizePacking(packing);
  const lines = packing.boxes.map(
    (box, i) => `Box ${i + 1}: ${box.sum} [${box.weights.join(', ')}]`
  );
  lines.push(`Total: ${summary.total}`);
  lines.push(`Spread: ${summary.spread}`);
  return lines;
}

export function packingToJson(packing: Packing): string {
  return canonicalizeOutput({
    ...packing,
    summary: summarizePacking(packing),
  });
}
