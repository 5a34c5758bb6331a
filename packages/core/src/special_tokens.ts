// ============================================================================
// @ranktok/core — Special Token Table
// ============================================================================

import { VocabularyError } from './errors.js';
import { type RankTable, fromByteString, utf8ByteString } from './rank_table.js';
import type { Rank } from './types.js';

/**
 * Immutable mapping from reserved literal strings to their ranks.
 *
 * Validated against the ordinary rank table at construction: names are
 * non-empty, ranks are unique, no special rank is also an ordinary rank,
 * and no special string is itself an ordinary token.
 */
export class SpecialTokenTable {
  private readonly encoder: ReadonlyMap<string, Rank>;
  private readonly decoder: ReadonlyMap<Rank, Uint8Array>;

  /** Largest special rank, or -1 for an empty table. */
  readonly maxRank: Rank;

  private constructor(encoder: Map<string, Rank>, decoder: Map<Rank, Uint8Array>, maxRank: Rank) {
    this.encoder = encoder;
    this.decoder = decoder;
    this.maxRank = maxRank;
    Object.freeze(this);
  }

  /**
   * @param tokens - `[string, rank]` pairs, e.g. `Object.entries(record)`
   */
  static from(
    tokens: Iterable<readonly [string, Rank]>,
    ranks: RankTable,
    source?: string,
  ): SpecialTokenTable {
    const encoder = new Map<string, Rank>();
    const decoder = new Map<Rank, Uint8Array>();
    let maxRank = -1;

    for (const [name, rank] of tokens) {
      if (name.length === 0) {
        throw new VocabularyError('Special token strings must be non-empty', source);
      }
      if (!Number.isSafeInteger(rank) || rank < 0) {
        throw new VocabularyError(`Invalid rank ${rank} for special token "${name}"`, source);
      }
      if (ranks.hasRank(rank)) {
        throw new VocabularyError(`Special token "${name}" reuses ordinary rank ${rank}`, source);
      }
      if (decoder.has(rank)) {
        throw new VocabularyError(`Duplicate special rank ${rank}`, source);
      }
      const bytes = utf8ByteString(name);
      if (ranks.has(bytes)) {
        throw new VocabularyError(`Special token "${name}" is also an ordinary token`, source);
      }
      encoder.set(name, rank);
      decoder.set(rank, fromByteString(bytes));
      if (rank > maxRank) maxRank = rank;
    }

    return new SpecialTokenTable(encoder, decoder, maxRank);
  }

  get size(): number {
    return this.encoder.size;
  }

  get(name: string): Rank | undefined {
    return this.encoder.get(name);
  }

  has(name: string): boolean {
    return this.encoder.has(name);
  }

  hasRank(rank: Rank): boolean {
    return this.decoder.has(rank);
  }

  /** UTF-8 bytes of a special rank. Shared with the table. */
  bytesOf(rank: Rank): Uint8Array | undefined {
    return this.decoder.get(rank);
  }

  names(): string[] {
    return [...this.encoder.keys()];
  }

  entries(): Array<[string, Rank]> {
    return [...this.encoder.entries()];
  }
}
