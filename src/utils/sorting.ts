type KeyExtractor<T> = (item: T) => string | number;

/**
 * Sorts a copy of `items` by the given keys, first key first. Items whose keys
 * all compare equal keep their input order.
 */
export function stableSortBy<T>(
  items: readonly T[],
  ...keyExtractors: KeyExtractor<T>[]
): T[] {
  return [...items].sort((a, b) => {
    for (const extractor of keyExtractors) {
      const aVal = extractor(a);
      const bVal = extractor(b);
      if (aVal < bVal) return -1;
      if (aVal > bVal) return 1;
    }
    return 0;
  });
}

export function canonicalizeOutput(obj: unknown): string {
  return JSON.stringify(sortObjectKeys(obj), null, 2);
}

function sortObjectKeys(obj: unknown): unknown {
  if (obj === null || typeof obj !== 'object') {
    return obj;
  }
  if (Array.isArray(obj)) {
    return obj.map(sortObjectKeys);
  }
  const entries = Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const sorted: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    sorted[key] = sortObjectKeys(value);
  }
  return sorted;
}
