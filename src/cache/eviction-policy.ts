import { CacheEntry } from './types';

/**
 * Bound the map to `maxEntries`, keeping the most recently created entries.
 *
 * Creation recency only: hit counts and access times play no part. The sort
 * is stable, so among equal `createdAt` the earlier-inserted entry survives.
 * Survivors keep their original insertion order.
 */
export function evict(entries: Map<string, CacheEntry>, maxEntries: number): Map<string, CacheEntry> {
  if (entries.size <= maxEntries) return entries;

  const survivors = new Set(
    [...entries.entries()]
      .sort(([, a], [, b]) => b.createdAt - a.createdAt)
      .slice(0, Math.max(0, maxEntries))
      .map(([key]) => key),
  );

  const kept = new Map<string, CacheEntry>();
  for (const [key, entry] of entries) {
    if (survivors.has(key)) kept.set(key, entry);
  }
  return kept;
}
