/**
 * Deterministic linear congruential generator. Returns values in [0, 1).
 */
export function seededRandom(seed: number): () => number {
  const m = 233280;
  let s = ((Math.trunc(seed) % m) + m) % m;
  return () => {
    s = (s * 9301 + 49297) % m;
    return s / m;
  };
}

/** Integer weights drawn uniformly from [smallest, largest]. */
export function generateWeights(
  count: number,
  smallest: number,
  largest: number,
  random: () => number
): number[] {
  const span = largest - smallest + 1;
  return Array.from({ length: count }, () => smallest + Math.floor(random() * span));
}
