import * as path from 'path';
import { env } from './env';
import { CacheService, CacheServiceOptions } from '../cache/cache-service';
import { CacheConfig } from '../cache/types';

export type CacheName = 'exploration' | 'research';

const MAX_QUERY_LENGTH = 100;

/** Built-in profiles; `cacheDir` is overridable for tests and tooling. */
export function cacheProfile(name: CacheName, cacheDir: string = env.cacheDir): CacheConfig {
  const shared = {
    name,
    storagePath: path.join(cacheDir, `${name}.json`),
    maxContentSize: env.maxContentSize,
    maxQueryLength: MAX_QUERY_LENGTH,
    maxFuzzyCandidates: env.maxFuzzyCandidates,
    lockTimeoutMs: env.lockTimeoutMs,
  };

  switch (name) {
    case 'exploration':
      return {
        ...shared,
        ttlSeconds: env.exploration.ttlSeconds,
        maxEntries: env.exploration.maxEntries,
        similarityThreshold: env.exploration.similarityThreshold,
        fuzzyMatch: true,
        maxStoredResultLength: 500,
        truncationSuffix: '...',
      };
    case 'research':
      return {
        ...shared,
        ttlSeconds: env.research.ttlSeconds,
        maxEntries: env.research.maxEntries,
        similarityThreshold: env.research.similarityThreshold,
        // URLs are matched exactly
        fuzzyMatch: false,
        maxStoredResultLength: 2000,
        truncationSuffix: '',
      };
  }
}

export type CacheRegistry = Record<CacheName, CacheService>;

export function createCacheRegistry(cacheDir?: string, options?: CacheServiceOptions): CacheRegistry {
  return {
    exploration: new CacheService(cacheProfile('exploration', cacheDir), options),
    research: new CacheService(cacheProfile('research', cacheDir), options),
  };
}
