import { ageSeconds, isValid, pruneExpired } from '../../src/cache/ttl-policy';
import { CacheEntry } from '../../src/cache/types';

function entry(key: string, createdAt: number): CacheEntry {
  return { key, query: key, scope: '/p', result: 'r', createdAt, hitCount: 0 };
}

describe('TTL policy', () => {
  const now = 10_000;
  const ttl = 3600;

  describe('isValid', () => {
    it('should accept an entry younger than the TTL', () => {
      expect(isValid({ createdAt: now - ttl + 1 }, now, ttl)).toBe(true);
    });

    it('should reject an entry older than the TTL', () => {
      expect(isValid({ createdAt: now - ttl - 1 }, now, ttl)).toBe(false);
    });

    it('should reject an entry exactly at the TTL', () => {
      expect(isValid({ createdAt: now - ttl }, now, ttl)).toBe(false);
    });

    it('should accept an entry created just now', () => {
      expect(isValid({ createdAt: now }, now, ttl)).toBe(true);
    });
  });

  describe('pruneExpired', () => {
    it('should drop expired entries and count them', () => {
      const entries = new Map([
        ['a', entry('a', now - 10)],
        ['b', entry('b', now - ttl - 5)],
        ['c', entry('c', now - 20)],
      ]);

      const { entries: kept, removed } = pruneExpired(entries, now, ttl);

      expect(removed).toBe(1);
      expect([...kept.keys()]).toEqual(['a', 'c']);
    });

    it('should not modify the input map', () => {
      const entries = new Map([['b', entry('b', 0)]]);
      pruneExpired(entries, now, ttl);
      expect(entries.size).toBe(1);
    });
  });

  describe('ageSeconds', () => {
    it('should measure age from creation', () => {
      expect(ageSeconds({ createdAt: now - 120 }, now)).toBe(120);
    });

    it('should never be negative', () => {
      expect(ageSeconds({ createdAt: now + 5 }, now)).toBe(0);
    });
  });
});
