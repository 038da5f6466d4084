/**
 * Map-backed cache with least-recently-used eviction.
 * The default capacity is unbounded, which turns it into a plain memo table.
 */

export class LRUCache<K, V> {
  private readonly cache = new Map<K, V>();

  constructor(private readonly maxSize = Number.POSITIVE_INFINITY) {
    if (!(maxSize >= 1)) {
      throw new Error(`LRUCache: maxSize must be at least 1, got ${maxSize}`);
    }
  }

  get(key: K): V | undefined {
    const value = this.cache.get(key);
    if (value === undefined) return undefined;

    this.cache.delete(key);
    this.cache.set(key, value);
    return value;
  }

  set(key: K, value: V): this {
    if (this.cache.size >= this.maxSize && !this.cache.has(key)) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    this.cache.delete(key);
    this.cache.set(key, value);
    return this;
  }

  /**
   * Returns the cached value, computing and storing it on a miss.
   * An undefined value counts as a miss.
   */
  getOrCompute(key: K, compute: (key: K) => V): { value: V; hit: boolean } {
    const cached = this.get(key);
    if (cached !== undefined) return { value: cached, hit: true };

    const value = compute(key);
    this.set(key, value);
    return { value, hit: false };
  }

  has(key: K): boolean {
    return this.cache.has(key);
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  get capacity(): number {
    return this.maxSize;
  }
}
