export const defaultDedupeKeys: readonly string[] = ["url", "article"];

export type DedupeResult<T> = {
  items: T[];
  removed: number;
  /** Removed items relative to the retained ones, one decimal place. */
  removedPercent: number;
};

const keyPart = (value: unknown): string => (value == null ? "" : String(value));

export const compositeKey = (item: Record<string, unknown>, keys: readonly string[]): string =>
  keys.map((key) => keyPart(item[key])).join("_");

/**
 * Keeps the first item seen for each composite key, in input order.
 * An empty key list falls back to `defaultDedupeKeys`.
 */
export const dedupeRecords = <T extends Record<string, unknown>>(
  items: readonly T[],
  keys: readonly string[] = defaultDedupeKeys
): DedupeResult<T> => {
  const effectiveKeys = keys.length > 0 ? keys : defaultDedupeKeys;
  const seen = new Set<string>();
  const unique: T[] = [];

  for (const item of items) {
    const key = compositeKey(item, effectiveKeys);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(item);
  }

  const removed = items.length - unique.length;
  const removedPercent = unique.length === 0 ? 0 : Math.round((removed / unique.length) * 1000) / 10;
  return { items: unique, removed, removedPercent };
};
