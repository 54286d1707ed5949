/**
 * Similarity Matcher
 *
 * Exact fingerprint match first, then token-overlap (Jaccard) across
 * same-scope, unexpired entries. Lexical only.
 */

import { evict } from './eviction-policy';
import { fingerprint } from './fingerprint';
import { isValid } from './ttl-policy';
import { CacheEntry, CacheStore, MatchResult } from './types';

export interface MatchOptions {
  now: number;
  ttlSeconds: number;
  /** A fuzzy candidate must score strictly above this */
  threshold: number;
  fuzzy: boolean;
  /** Only the most recently created in-scope candidates are scored */
  maxCandidates: number;
}

export function tokenize(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/\s+/)
      .filter((token) => token.length > 0),
  );
}

/** |a ∩ b| / |a ∪ b|, or null when both sets are empty. */
export function jaccard(a: Set<string>, b: Set<string>): number | null {
  let intersection = 0;
  for (const token of a) {
    if (b.has(token)) intersection++;
  }
  const union = a.size + b.size - intersection;
  if (union === 0) return null;
  return intersection / union;
}

export function findMatch(
  query: string,
  scope: string,
  store: CacheStore,
  options: MatchOptions,
): MatchResult | undefined {
  const { now, ttlSeconds, threshold } = options;

  const exact = store.entries.get(fingerprint(query, scope));
  if (exact && exact.scope === scope && isValid(exact, now, ttlSeconds)) {
    return { entry: exact, kind: 'exact', score: 1 };
  }

  if (!options.fuzzy) return undefined;

  const queryTokens = tokenize(query);
  if (queryTokens.size === 0) return undefined;

  const candidates = new Map<string, CacheEntry>();
  for (const [key, entry] of store.entries) {
    if (entry.scope === scope && isValid(entry, now, ttlSeconds)) candidates.set(key, entry);
  }

  let best: MatchResult | undefined;
  for (const entry of evict(candidates, options.maxCandidates).values()) {
    const score = jaccard(queryTokens, tokenize(entry.query));
    if (score === null || score <= threshold) continue;
    // Strict comparison: the first-seen candidate keeps a tie
    if (!best || score > best.score) {
      best = { entry, kind: 'fuzzy', score };
    }
  }

  return best;
}
