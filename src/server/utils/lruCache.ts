// =============================================================================
// LRU Cache — Bounded in-memory cache with TTL eviction
// =============================================================================
// Holds at most `maxSize` entries, each for at most `ttlMs`. The oldest entry
// is dropped when full. Map insertion order gives O(1) get/set/delete.
// =============================================================================

interface CacheEntry<V> {
  value: V;
  /** Timestamp (ms) when this entry expires */
  expiresAt: number;
}

export interface LRUCacheOptions {
  maxSize?: number;
  ttlMs?: number;
  /** Clock source, overridable in tests */
  now?: () => number;
}

export class LRUCache<K, V> {
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly store = new Map<K, CacheEntry<V>>();

  constructor({ maxSize = 100, ttlMs = 60 * 60 * 1000, now = Date.now }: LRUCacheOptions = {}) {
    this.maxSize = maxSize;
    this.ttlMs = ttlMs;
    this.now = now;
  }

  /**
   * Returns `undefined` if the key is missing or expired.
   * On hit, the entry is moved to the "most recent" position.
   */
  get(key: K): V | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;

    if (this.now() >= entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }

    this.store.delete(key);
    this.store.set(key, entry);

    return entry.value;
  }

  set(key: K, value: V): void {
    if (this.store.has(key)) {
      this.store.delete(key);
    }

    if (this.store.size >= this.maxSize) {
      const oldestKey = this.store.keys().next().value;
      if (oldestKey !== undefined) {
        this.store.delete(oldestKey);
      }
    }

    this.store.set(key, {
      value,
      expiresAt: this.now() + this.ttlMs,
    });
  }

  delete(key: K): boolean {
    return this.store.delete(key);
  }

  clear(): void {
    this.store.clear();
  }

  /** Includes entries that have expired but not yet been touched */
  get size(): number {
    return this.store.size;
  }
}
