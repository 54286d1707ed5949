import { evict } from '../../src/cache/eviction-policy';
import { CacheEntry } from '../../src/cache/types';

function entries(...spec: Array<[string, number]>): Map<string, CacheEntry> {
  return new Map(
    spec.map(([key, createdAt]) => [key, { key, query: key, scope: '/p', result: 'r', createdAt, hitCount: 0 }]),
  );
}

describe('evict', () => {
  it('should return the map unchanged when within bounds', () => {
    const input = entries(['a', 1], ['b', 2]);
    expect(evict(input, 2)).toBe(input);
  });

  it('should keep exactly maxEntries of the most recently created', () => {
    const input = entries(['e1', 1], ['e2', 2], ['e3', 3], ['e4', 4], ['e5', 5]);

    const kept = evict(input, 3);

    expect(kept.size).toBe(3);
    expect([...kept.keys()]).toEqual(['e3', 'e4', 'e5']);
  });

  it('should keep survivors in their original insertion order', () => {
    const input = entries(['e5', 5], ['e1', 1], ['e4', 4], ['e2', 2], ['e3', 3]);
    expect([...evict(input, 3).keys()]).toEqual(['e5', 'e4', 'e3']);
  });

  it('should prefer the earlier-inserted entry on equal creation times', () => {
    const input = entries(['a', 7], ['b', 7], ['c', 7]);
    expect([...evict(input, 2).keys()]).toEqual(['a', 'b']);
  });

  it('should ignore hit counts', () => {
    const input = entries(['old', 1], ['new', 2]);
    const old = input.get('old');
    if (old) old.hitCount = 99;

    expect([...evict(input, 1).keys()]).toEqual(['new']);
  });

  it('should empty the map when maxEntries is zero', () => {
    expect(evict(entries(['a', 1]), 0).size).toBe(0);
  });
});
