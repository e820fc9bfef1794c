import { LRUCache } from '../utils/lruCache';

describe('LRUCache', () => {
  it('evicts the least recently used entry when full', () => {
    const cache = new LRUCache<string, number>({ maxSize: 2 });
    cache.set('a', 1);
    cache.set('b', 2);
    cache.get('a'); // a becomes most recent
    cache.set('c', 3);

    expect(cache.get('a')).toBe(1);
    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('c')).toBe(3);
  });

  it('expires entries after the TTL', () => {
    let now = 0;
    const cache = new LRUCache<string, string>({ ttlMs: 100, now: () => now });
    cache.set('k', 'v');

    now = 99;
    expect(cache.get('k')).toBe('v');
    now = 100;
    expect(cache.get('k')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('clear() empties the cache', () => {
    const cache = new LRUCache<string, number>();
    cache.set('x', 1);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
