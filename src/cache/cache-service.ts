/**
 * Cache Service
 *
 * One instance per logical cache (exploration, research), each with its
 * own snapshot file and limits. Every call is a locked
 * load → mutate → save cycle against the snapshot; nothing is kept in
 * memory between calls.
 *
 * Never throws: storage trouble degrades to behaving like an empty cache.
 */

import type { Logger } from 'pino';
import { EntryStore, SnapshotLoad } from './entry-store';
import { evict } from './eviction-policy';
import { fingerprint } from './fingerprint';
import { withFileLock } from './file-lock';
import { findMatch } from './similarity-matcher';
import { CacheConfig, CacheEntry, CacheLookup, CacheStatsReport, CacheStore, Clock, systemClock } from './types';
import { componentLogger } from '../observability/logger';

export interface CacheServiceOptions {
  /** Epoch-seconds clock; defaults to wall time */
  clock?: Clock;
}

export class CacheService {
  private readonly entryStore: EntryStore;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(
    readonly config: CacheConfig,
    options: CacheServiceOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.entryStore = new EntryStore(config.storagePath, config.ttlSeconds, this.clock);
    this.log = componentLogger('tool-cache', { cache: config.name });
  }

  get name(): string {
    return this.config.name;
  }

  now(): number {
    return this.clock();
  }

  // ───── Lookup ───────────────────────────────────────────────────

  async lookup(query: string, scope: string): Promise<CacheLookup> {
    return this.transaction<CacheLookup>({ found: false }, (store) => {
      const match = findMatch(query, scope, store, {
        now: this.clock(),
        ttlSeconds: this.config.ttlSeconds,
        threshold: this.config.similarityThreshold,
        fuzzy: this.config.fuzzyMatch,
        maxCandidates: this.config.maxFuzzyCandidates,
      });

      if (!match) {
        store.stats.misses++;
        this.log.debug({ scope }, 'Cache miss');
        return { found: false };
      }

      match.entry.hitCount++;
      store.stats.hits++;
      this.log.info({ key: match.entry.key, match: match.kind, score: match.score }, 'Cache hit');
      return { found: true, entry: { ...match.entry }, match: match.kind, score: match.score };
    });
  }

  /** Cached result text for a request, or undefined on a miss. */
  async lookupSummary(query: string, scope: string): Promise<string | undefined> {
    const result = await this.lookup(query, scope);
    return result.found ? result.entry.result : undefined;
  }

  // ───── Store ────────────────────────────────────────────────────

  async store(query: string, scope: string, result: string): Promise<void> {
    if (result.length > this.config.maxContentSize) {
      this.log.debug({ size: result.length, max: this.config.maxContentSize }, 'Result too large to cache');
      return;
    }

    const key = fingerprint(query, scope);
    await this.transaction<void>(undefined, (store) => {
      const entry: CacheEntry = {
        key,
        query: query.slice(0, this.config.maxQueryLength),
        scope,
        result: this.truncateResult(result),
        createdAt: this.clock(),
        hitCount: 0,
      };
      // Replace, not merge: a re-stored request starts a fresh lifetime
      store.entries.delete(key);
      store.entries.set(key, entry);

      const before = store.entries.size;
      store.entries = evict(store.entries, this.config.maxEntries);
      store.stats.saves++;

      this.log.info({ key, evicted: before - store.entries.size }, 'Cached result');
    });
  }

  // ───── Maintenance ──────────────────────────────────────────────

  async stats(): Promise<CacheStatsReport> {
    const { store } = await this.load();
    const { hits, misses, saves } = store.stats;
    const total = hits + misses;
    return {
      name: this.config.name,
      hits,
      misses,
      saves,
      entries: store.entries.size,
      hitRate: total > 0 ? hits / total : 0,
    };
  }

  /** Wholly reset the cache: entries and stats. */
  async clear(): Promise<void> {
    await withFileLock(this.entryStore.lockPath, { timeoutMs: this.config.lockTimeoutMs }, async () => {
      const saved = await this.entryStore.reset();
      if (saved.ok) {
        this.log.info('Cache cleared');
      } else {
        this.log.warn({ error: saved.error, path: this.config.storagePath }, 'Cache clear failed');
      }
    });
  }

  // ───── Internals ────────────────────────────────────────────────

  private truncateResult(result: string): string {
    if (result.length <= this.config.maxStoredResultLength) return result;
    return result.slice(0, this.config.maxStoredResultLength) + this.config.truncationSuffix;
  }

  private async load(): Promise<SnapshotLoad> {
    const loaded = await this.entryStore.load();
    switch (loaded.status) {
      case 'loaded':
        if (loaded.pruned > 0) this.log.debug({ pruned: loaded.pruned }, 'Pruned expired entries');
        break;
      case 'missing':
        this.log.debug({ path: this.config.storagePath }, 'No snapshot yet; starting empty');
        break;
      default:
        this.log.warn(
          { status: loaded.status, error: loaded.error, path: this.config.storagePath },
          'Snapshot unusable; starting empty',
        );
    }
    return loaded;
  }

  /**
   * Locked load → mutate → save. Resolves to `fallback` if anything
   * outside the entry store's own contract goes wrong.
   */
  private async transaction<T>(fallback: T, mutate: (store: CacheStore) => T): Promise<T> {
    try {
      return await withFileLock(this.entryStore.lockPath, { timeoutMs: this.config.lockTimeoutMs }, async () => {
        const { store } = await this.load();
        const result = mutate(store);
        const saved = await this.entryStore.save(store);
        if (!saved.ok) {
          this.log.warn({ error: saved.error, path: this.config.storagePath }, 'Snapshot save failed');
        }
        return result;
      });
    } catch (err) {
      this.log.error({ err }, 'Cache operation failed');
      return fallback;
    }
  }
}
