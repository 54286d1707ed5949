/**
 * Entry Store
 *
 * Loads and flushes one cache's JSON snapshot. Failures come back as
 * statuses, never as exceptions: an unreadable snapshot is an empty cache.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { isErrnoException } from './file-lock';
import { describeSnapshotErrors, PersistedEntry, PersistedSnapshot, validateSnapshot } from './snapshot-schema';
import { pruneExpired } from './ttl-policy';
import { CacheEntry, CacheStore, Clock } from './types';

export type SnapshotStatus = 'loaded' | 'missing' | 'corrupt' | 'unreadable';

export interface SnapshotLoad {
  status: SnapshotStatus;
  store: CacheStore;
  /** Expired entries dropped while loading */
  pruned: number;
  error?: string;
}

export type SnapshotSave = { ok: true } | { ok: false; error: string };

export function emptyStore(): CacheStore {
  return { entries: new Map(), stats: { hits: 0, misses: 0, saves: 0 } };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function fromSnapshot(snapshot: PersistedSnapshot): CacheStore {
  const entries = new Map<string, CacheEntry>();
  for (const [key, e] of Object.entries(snapshot.entries)) {
    entries.set(key, {
      key,
      query: e.query,
      scope: e.scope,
      result: e.result,
      createdAt: e.createdAt,
      hitCount: e.hitCount,
    });
  }
  const stats = snapshot.stats ?? { hits: 0, misses: 0, saves: 0 };
  return { entries, stats: { hits: stats.hits, misses: stats.misses, saves: stats.saves } };
}

function toSnapshot(store: CacheStore): Required<PersistedSnapshot> {
  const entries: Record<string, PersistedEntry> = {};
  for (const [key, e] of store.entries) {
    entries[key] = {
      query: e.query,
      result: e.result,
      scope: e.scope,
      createdAt: e.createdAt,
      hitCount: e.hitCount,
    };
  }
  return { entries, stats: { ...store.stats } };
}

export class EntryStore {
  constructor(
    readonly filePath: string,
    private readonly ttlSeconds: number,
    private readonly clock: Clock,
  ) {}

  get lockPath(): string {
    return `${this.filePath}.lock`;
  }

  async load(): Promise<SnapshotLoad> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return { status: 'missing', store: emptyStore(), pruned: 0 };
      }
      return { status: 'unreadable', store: emptyStore(), pruned: 0, error: errorMessage(err) };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      return { status: 'corrupt', store: emptyStore(), pruned: 0, error: errorMessage(err) };
    }

    if (!validateSnapshot(parsed)) {
      return { status: 'corrupt', store: emptyStore(), pruned: 0, error: describeSnapshotErrors() };
    }

    const store = fromSnapshot(parsed);
    const { entries, removed } = pruneExpired(store.entries, this.clock(), this.ttlSeconds);
    return { status: 'loaded', store: { entries, stats: store.stats }, pruned: removed };
  }

  /** Write to a temp file beside the snapshot, then rename it into place. */
  async save(store: CacheStore): Promise<SnapshotSave> {
    const tmpPath = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(toSnapshot(store), null, 2), 'utf-8');
      await fs.rename(tmpPath, this.filePath);
      return { ok: true };
    } catch (err) {
      const leftover = await fs.rm(tmpPath, { force: true }).then(
        () => '',
        (rmErr: unknown) => `; temp file left behind: ${errorMessage(rmErr)}`,
      );
      return { ok: false, error: `${errorMessage(err)}${leftover}` };
    }
  }

  /** Replace the snapshot with an empty store. */
  async reset(): Promise<SnapshotSave> {
    return this.save(emptyStore());
  }
}
