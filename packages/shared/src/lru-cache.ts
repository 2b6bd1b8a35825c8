/**
 * A small LRU (Least Recently Used) cache.
 * Uses a Map, which keeps insertion order, and evicts the oldest entry
 * once the cache grows past `maxSize`. Stored values may be `null`,
 * which lets callers memoize negative lookups.
 */
export class LRUCache<K, V> {
  private cache = new Map<K, { value: V }>();
  private readonly maxSize: number;

  constructor(maxSize: number) {
    if (maxSize < 1) {
      throw new Error('LRU cache maxSize must be at least 1');
    }
    this.maxSize = maxSize;
  }

  get(key: K): V | undefined {
    const slot = this.cache.get(key);
    if (!slot) {
      return undefined;
    }
    // Move to end (most recently used) by re-inserting
    this.cache.delete(key);
    this.cache.set(key, slot);
    return slot.value;
  }

  has(key: K): boolean {
    return this.cache.has(key);
  }

  set(key: K, value: V): void {
    if (this.cache.has(key)) {
      this.cache.delete(key);
    } else if (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }
    this.cache.set(key, { value });
  }

  /**
   * Returns the cached value for `key`, computing and storing it on a miss.
   */
  async getOrCompute(key: K, compute: (key: K) => Promise<V>): Promise<V> {
    const slot = this.cache.get(key);
    if (slot) {
      this.cache.delete(key);
      this.cache.set(key, slot);
      return slot.value;
    }
    const value = await compute(key);
    this.set(key, value);
    return value;
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
