import type { CacheStats } from './types.js';

export const DEFAULT_CACHE_CAPACITY = 1000;

/**
 * Bounded key -> value map. When a new key would push it past capacity the
 * whole map is cleared instead of evicting single entries, so `size()` never
 * exceeds `capacity` and eviction stays O(1) amortized.
 */
export class BoundedCache<V> {
  private cache: Map<string, V>;
  private capacity: number;
  private hits = 0;
  private misses = 0;
  private clears = 0;

  constructor(capacity: number = DEFAULT_CACHE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
    this.cache = new Map();
    this.capacity = capacity;
  }

  get(key: string): V | undefined {
    const value = this.cache.get(key);
    if (value === undefined) {
      this.misses++;
    } else {
      this.hits++;
    }
    return value;
  }

  set(key: string, value: V): void {
    if (!this.cache.has(key) && this.cache.size >= this.capacity) {
      this.cache.clear();
      this.clears++;
    }
    this.cache.set(key, value);
  }

  clear(): void {
    this.cache.clear();
  }

  size(): number {
    return this.cache.size;
  }

  stats(): CacheStats {
    return {
      size: this.cache.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      clears: this.clears,
    };
  }
}
