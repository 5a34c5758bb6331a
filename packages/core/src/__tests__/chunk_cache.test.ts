import { describe, expect, it, vi } from 'vitest';
import { ChunkCache } from '../chunk_cache.js';

describe('ChunkCache', () => {
  it('is unbounded by default', () => {
    const cache = new ChunkCache();
    for (let i = 0; i < 1000; i++) cache.insertIfAbsent(`chunk${i}`, [i]);
    expect(cache.size).toBe(1000);
    expect(cache.maxEntries).toBeNull();
    expect(new ChunkCache({ maxEntries: 0 }).maxEntries).toBeNull();
  });

  it('keeps the first entry for a key', () => {
    const cache = new ChunkCache();
    expect(cache.insertIfAbsent('abc', [1, 2])).toEqual([1, 2]);
    expect(cache.insertIfAbsent('abc', [3])).toEqual([1, 2]);
    expect(cache.get('abc')).toEqual([1, 2]);
  });

  it('stores frozen entries', () => {
    const cache = new ChunkCache();
    const source = [4, 5];
    const stored = cache.insertIfAbsent('k', source);
    source.push(6);
    expect(Object.isFrozen(stored)).toBe(true);
    expect(cache.get('k')).toEqual([4, 5]);
  });

  it('computes once per key', () => {
    const cache = new ChunkCache();
    const compute = vi.fn((key: string) => [key.length]);
    expect(cache.getOrCompute('hello', compute)).toEqual([5]);
    expect(cache.getOrCompute('hello', compute)).toEqual([5]);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('evicts the least recently used entry when bounded', () => {
    const cache = new ChunkCache({ maxEntries: 2 });
    cache.insertIfAbsent('a', [1]);
    cache.insertIfAbsent('b', [2]);
    cache.get('a');
    cache.insertIfAbsent('c', [3]);

    expect(cache.size).toBe(2);
    expect(cache.has('a')).toBe(true);
    expect(cache.has('b')).toBe(false);
    expect(cache.has('c')).toBe(true);
  });

  it('tracks hits and misses', () => {
    const cache = new ChunkCache({ maxEntries: 10 });
    cache.get('x');
    cache.insertIfAbsent('x', [1]);
    cache.get('x');
    cache.get('x');

    expect(cache.getStats()).toEqual({ size: 1, maxEntries: 10, hits: 2, misses: 1, hitRatio: 66.7 });

    cache.clear();
    expect(cache.getStats()).toEqual({ size: 0, maxEntries: 10, hits: 0, misses: 0, hitRatio: 0 });
  });

  it('rejects invalid limits', () => {
    expect(() => new ChunkCache({ maxEntries: -1 })).toThrow(RangeError);
    expect(() => new ChunkCache({ maxEntries: 1.5 })).toThrow(RangeError);
  });
});
