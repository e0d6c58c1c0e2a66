import { describe, it, expect } from 'vitest';
import { BoundedCache, DEFAULT_CACHE_CAPACITY } from '../src/filters/cache.js';

describe('BoundedCache', () => {
  it('should store and return values', () => {
    const cache = new BoundedCache<boolean>(4);
    cache.set('a', true);
    cache.set('b', false);

    expect(cache.get('a')).toBe(true);
    expect(cache.get('b')).toBe(false);
    expect(cache.get('c')).toBeUndefined();
    expect(cache.size()).toBe(2);
  });

  it('should count hits and misses', () => {
    const cache = new BoundedCache<number>(4);
    cache.get('a');
    cache.set('a', 1);
    cache.get('a');
    cache.get('a');

    expect(cache.stats()).toEqual({ size: 1, capacity: 4, hits: 2, misses: 1, clears: 0 });
  });

  it('should never grow past its capacity', () => {
    const cache = new BoundedCache<number>(10);

    for (let i = 0; i < 2500; i++) {
      cache.set(`key-${i}`, i);
      expect(cache.size()).toBeLessThanOrEqual(10);
    }

    // Cleared on the 11th, 21st, ... insert
    expect(cache.stats().clears).toBe(249);
    expect(cache.size()).toBe(10);
    expect(cache.get('key-2499')).toBe(2499);
    expect(cache.get('key-2489')).toBeUndefined();
  });

  it('should not clear when overwriting an existing key at capacity', () => {
    const cache = new BoundedCache<number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('a', 3);

    expect(cache.size()).toBe(2);
    expect(cache.get('a')).toBe(3);
    expect(cache.stats().clears).toBe(0);
  });

  it('should empty on clear', () => {
    const cache = new BoundedCache<number>();
    cache.set('a', 1);
    cache.clear();

    expect(cache.size()).toBe(0);
    expect(cache.stats().capacity).toBe(DEFAULT_CACHE_CAPACITY);
  });

  it.each([0, -1, 1.5])('should reject capacity %s', (capacity) => {
    expect(() => new BoundedCache<number>(capacity)).toThrow(RangeError);
  });
});
