// node/src/services/dedup-utils.ts

/**
 * Keeps the highest-scoring item for each key. Ties keep the earlier item;
 * the result follows the order in which keys were first seen.
 */
export function keepBestPerKey<T>(
  items: readonly T[],
  keyOf: (item: T) => string,
  scoreOf: (item: T) => number,
): T[] {
  const kept = new Map<string, T>();
  for (const candidate of items) {
    const key = keyOf(candidate);
    const current = kept.get(key);
    if (current === undefined || scoreOf(candidate) > scoreOf(current)) {
      kept.set(key, candidate);
    }
  }
  return [...kept.values()];
}
