/**
 * @eventframe/core - Cache Manager
 *
 * LRU cache with per-entry TTL. Backs the query caching middleware and is
 * usable on its own for read models.
 */

/**
 * Minimal cache contract consumed by the caching middleware.
 */
export interface CacheProvider<K, V> {
  get(key: K): V | undefined;
  set(key: K, value: V, ttl?: number): void;
  delete(key: K): boolean;
  clear(): void;
}

/**
 * Cache entry with value and metadata
 */
interface CacheEntry<V> {
  value: V;
  expiresAt?: number;
}

/**
 * Cache statistics
 */
export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
  capacity: number;
  hitRate: number;
}

export interface CacheManagerOptions {
  /** Maximum number of entries before the least recently used is evicted. */
  capacity?: number;
  /** TTL in ms applied when `set` is called without one. `0` disables expiry. */
  defaultTtl?: number;
}

/**
 * CacheManager - LRU cache with TTL
 *
 * @template K - Key type
 * @template V - Value type
 *
 * @example
 * ```typescript
 * const cache = new CacheManager<string, OrderView>({ capacity: 500 });
 *
 * cache.set('order-1', view, 60000); // 60 seconds
 *
 * const view = await cache.getOrSet('order-2', () => readModel.find('order-2'));
 * ```
 */
export class CacheManager<K, V> implements CacheProvider<K, V> {
  private cache: Map<K, CacheEntry<V>> = new Map();
  private hits = 0;
  private misses = 0;
  private readonly capacity: number;
  private readonly defaultTtl: number;

  constructor(options: CacheManagerOptions = {}) {
    this.capacity = options.capacity ?? 1000;
    this.defaultTtl = options.defaultTtl ?? 0;
  }

  /**
   * Get value from cache. Counts a hit or a miss and refreshes recency.
   */
  get(key: K): V | undefined {
    const entry = this.cache.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.cache.delete(key);
      this.misses++;
      return undefined;
    }

    // Move to end (most recently used)
    this.cache.delete(key);
    this.cache.set(key, entry);

    this.hits++;
    return entry.value;
  }

  /**
   * Set value in cache
   *
   * @param ttl - Time to live in milliseconds; falls back to `defaultTtl`
   */
  set(key: K, value: V, ttl?: number): void {
    // Remove if exists (to update position)
    if (this.cache.has(key)) {
      this.cache.delete(key);
    }

    // Evict oldest if at capacity
    if (this.cache.size >= this.capacity) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey !== undefined) {
        this.cache.delete(firstKey);
      }
    }

    const effectiveTtl = ttl ?? this.defaultTtl;
    this.cache.set(key, {
      value,
      expiresAt: effectiveTtl > 0 ? Date.now() + effectiveTtl : undefined,
    });
  }

  /**
   * Check if key exists (without updating stats)
   */
  has(key: K): boolean {
    const entry = this.cache.get(key);
    if (!entry) return false;

    if (this.isExpired(entry)) {
      this.cache.delete(key);
      return false;
    }

    return true;
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  /**
   * Clear all entries and reset statistics
   */
  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.cache.size,
      capacity: this.capacity,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  /**
   * Get or compute and cache a value
   */
  async getOrSet(key: K, factory: () => V | Promise<V>, ttl?: number): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const value = await factory();
    this.set(key, value, ttl);
    return value;
  }

  keys(): K[] {
    return Array.from(this.cache.keys());
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * Remove expired entries
   *
   * @returns Number of entries removed
   */
  prune(): number {
    let pruned = 0;

    for (const [key, entry] of this.cache.entries()) {
      if (this.isExpired(entry)) {
        this.cache.delete(key);
        pruned++;
      }
    }

    return pruned;
  }

  /**
   * Restart the TTL of an entry
   *
   * @returns false when the key is absent
   */
  touch(key: K, ttl: number): boolean {
    const entry = this.cache.get(key);
    if (!entry) return false;

    entry.expiresAt = Date.now() + ttl;
    return true;
  }

  private isExpired(entry: CacheEntry<V>): boolean {
    return entry.expiresAt !== undefined && Date.now() > entry.expiresAt;
  }
}
