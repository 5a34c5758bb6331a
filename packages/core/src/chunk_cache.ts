// ============================================================================
// @ranktok/core — Chunk Cache
// ============================================================================
//
// Memo from chunk bytes to the ranks the merge engine produced for them.
//
//   - Key   = chunk as a byte string (value equality)
//   - Value = frozen rank array, never mutated after insertion
//   - Insert-if-absent: a second computation of the same chunk keeps the
//     entry that is already there
//   - Unbounded by default; with `maxEntries` it evicts the least recently
//     used entry (Map preserves insertion order)
// ============================================================================

import type { CacheStats, Rank } from './types.js';

export interface ChunkCacheOptions {
  /** Entry limit; null, undefined or 0 means unbounded. */
  maxEntries?: number | null;
}

/**
 * @example
 * ```ts
 * const cache = new ChunkCache({ maxEntries: 50_000 });
 * const ranks = cache.getOrCompute(chunk, (bytes) => bytePairEncode(bytes, table));
 * ```
 */
export class ChunkCache {
  private map = new Map<string, readonly Rank[]>();
  readonly maxEntries: number | null;
  private hits = 0;
  private misses = 0;

  constructor(options: ChunkCacheOptions = {}) {
    const max = options.maxEntries ?? 0;
    if (!Number.isSafeInteger(max) || max < 0) {
      throw new RangeError(`maxEntries must be a non-negative integer, got ${max}`);
    }
    this.maxEntries = max === 0 ? null : max;
  }

  /**
   * Look up a chunk. On a hit in a bounded cache the entry becomes the
   * most recently used.
   */
  get(key: string): readonly Rank[] | undefined {
    const value = this.map.get(key);
    if (value === undefined) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    if (this.maxEntries !== null) {
      this.map.delete(key);
      this.map.set(key, value);
    }
    return value;
  }

  /**
   * Insert unless the key is already present. Returns the stored entry.
   */
  insertIfAbsent(key: string, ranks: readonly Rank[]): readonly Rank[] {
    const existing = this.map.get(key);
    if (existing !== undefined) return existing;

    if (this.maxEntries !== null) {
      while (this.map.size >= this.maxEntries) {
        const oldest = this.map.keys().next().value;
        if (oldest === undefined) break;
        this.map.delete(oldest);
      }
    }

    const frozen = Object.isFrozen(ranks) ? ranks : Object.freeze([...ranks]);
    this.map.set(key, frozen);
    return frozen;
  }

  /** Cached ranks for `key`, computing and inserting them on a miss. */
  getOrCompute(key: string, compute: (key: string) => readonly Rank[]): readonly Rank[] {
    return this.get(key) ?? this.insertIfAbsent(key, compute(key));
  }

  has(key: string): boolean {
    return this.map.has(key);
  }

  get size(): number {
    return this.map.size;
  }

  getStats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.map.size,
      maxEntries: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
      hitRatio: lookups === 0 ? 0 : Math.round((this.hits / lookups) * 1000) / 10,
    };
  }

  clear(): void {
    this.map.clear();
    this.hits = 0;
    this.misses = 0;
  }
}
