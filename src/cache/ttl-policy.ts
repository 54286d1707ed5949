import { CacheEntry } from './types';

/** Valid iff younger than the TTL. Always evaluated against the caller's `now`. */
export function isValid(entry: Pick<CacheEntry, 'createdAt'>, now: number, ttlSeconds: number): boolean {
  return now - entry.createdAt < ttlSeconds;
}

export function ageSeconds(entry: Pick<CacheEntry, 'createdAt'>, now: number): number {
  return Math.max(0, now - entry.createdAt);
}

/** Drop expired entries, keeping survivors in their original order. */
export function pruneExpired(
  entries: Map<string, CacheEntry>,
  now: number,
  ttlSeconds: number,
): { entries: Map<string, CacheEntry>; removed: number } {
  const kept = new Map<string, CacheEntry>();
  for (const [key, entry] of entries) {
    if (isValid(entry, now, ttlSeconds)) kept.set(key, entry);
  }
  return { entries: kept, removed: entries.size - kept.size };
}
