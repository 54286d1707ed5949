/**
 * Tool Result Cache Types
 *
 * One JSON snapshot per logical cache (exploration, research).
 * Timestamps are Unix epoch seconds.
 */

export interface CacheEntry {
  /** Fingerprint of (normalized query, scope) */
  key: string;
  /** Original query, truncated to maxQueryLength */
  query: string;
  /** Partition key (working directory, URL origin); compared exactly */
  scope: string;
  /** Cached payload, truncated to maxStoredResultLength */
  result: string;
  createdAt: number;
  /** Observability only, never used by eviction */
  hitCount: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  saves: number;
}

export interface CacheStore {
  entries: Map<string, CacheEntry>;
  stats: CacheStats;
}

export interface CacheConfig {
  /** Cache name, used in logs and stats */
  name: string;
  /** Snapshot file location */
  storagePath: string;
  ttlSeconds: number;
  maxEntries: number;
  /** Results longer than this are never cached */
  maxContentSize: number;
  /** Fuzzy hits need a token overlap strictly above this */
  similarityThreshold: number;
  /** Exact-key lookups only when false */
  fuzzyMatch: boolean;
  /** Cap on candidates scored per fuzzy lookup */
  maxFuzzyCandidates: number;
  maxQueryLength: number;
  maxStoredResultLength: number;
  /** Appended to a result cut at maxStoredResultLength */
  truncationSuffix: string;
  /** How long to wait for the advisory lock before working unlocked */
  lockTimeoutMs: number;
}

export type MatchKind = 'exact' | 'fuzzy';

export interface MatchResult {
  entry: CacheEntry;
  kind: MatchKind;
  score: number;
}

export type CacheLookup =
  | { found: true; entry: CacheEntry; match: MatchKind; score: number }
  | { found: false };

export interface CacheStatsReport extends CacheStats {
  name: string;
  entries: number;
  hitRate: number;
}

/** Seconds since the Unix epoch */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now() / 1000;
