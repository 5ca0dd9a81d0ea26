/**
 * Bounded map that evicts the least recently used entry once full.
 * `get` and `set` refresh recency; `peek` does not.
 */

export type EvictionListener<K, V> = (key: K, value: V) => void;

export class LRUCache<K, V> {
  private cache = new Map<K, V>();

  constructor(
    private readonly maxSize = 1000,
    private readonly onEvict?: EvictionListener<K, V>
  ) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new Error(`LRUCache: maxSize must be a positive integer (got ${maxSize})`);
    }
  }

  get(key: K): V | undefined {
    const value = this.cache.get(key);
    if (value === undefined) return undefined;

    this.cache.delete(key);
    this.cache.set(key, value);
    return value;
  }

  peek(key: K): V | undefined {
    return this.cache.get(key);
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  set(key: K, value: V): this {
    this.cache.delete(key);
    if (this.cache.size >= this.maxSize) {
      const oldest = this.cache.entries().next();
      if (!oldest.done) {
        const [oldestKey, oldestValue] = oldest.value;
        this.cache.delete(oldestKey);
        this.onEvict?.(oldestKey, oldestValue);
      }
    }
    this.cache.set(key, value);
    return this;
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  has(key: K): boolean {
    return this.cache.has(key);
  }
}
