// ============================================================================
// @ranktok/core — Rank Table
// ============================================================================
//
// Immutable bidirectional mapping between byte sequences and merge ranks.
//
// Byte sequences are keyed as "byte strings": JS strings whose code units are
// the raw byte values 0–255 (latin1). Map lookups then compare by value, and
// a sub-span of a chunk is a String#slice, which V8 represents as a view over
// the parent string rather than a copy.
// ============================================================================

import { Buffer } from 'node:buffer';
import { VocabularyError } from './errors.js';
import type { Rank } from './types.js';

/** Convert raw bytes to a byte string. */
export function toByteString(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
}

/** Convert a byte string back to raw bytes. */
export function fromByteString(byteString: string): Uint8Array {
  return Uint8Array.from(Buffer.from(byteString, 'latin1'));
}

/**
 * UTF-8 encode text as a byte string.
 * ASCII text is already its own byte string and is returned as is.
 */
export function utf8ByteString(text: string): string {
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) > 0x7f) {
      return Buffer.from(text, 'utf8').toString('latin1');
    }
  }
  return text;
}

/** Number of UTF-8 bytes needed to encode `text`. */
export function utf8Length(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

function isByteString(value: string): boolean {
  for (let i = 0; i < value.length; i++) {
    if (value.charCodeAt(i) > 0xff) return false;
  }
  return true;
}

/**
 * Bijective `bytes ↔ rank` table of one vocabulary.
 *
 * Construction validates the table: ranks are non-negative integers, no two
 * byte sequences share a rank, and all 256 single bytes are present so that
 * the merge engine always has a base case. A table that fails is rejected
 * with `VocabularyError` before any encode call can see it.
 */
export class RankTable {
  private readonly encoder: ReadonlyMap<string, Rank>;
  private readonly decoder: ReadonlyMap<Rank, Uint8Array>;

  /** Largest ordinary rank. */
  readonly maxRank: Rank;

  private constructor(encoder: Map<string, Rank>, decoder: Map<Rank, Uint8Array>, maxRank: Rank) {
    this.encoder = encoder;
    this.decoder = decoder;
    this.maxRank = maxRank;
    Object.freeze(this);
  }

  /**
   * Build a table from `[byteString, rank]` pairs.
   *
   * @param source - Label used in validation errors (file path, scheme name)
   */
  static fromByteStrings(entries: Iterable<readonly [string, Rank]>, source?: string): RankTable {
    const encoder = new Map<string, Rank>();
    const decoder = new Map<Rank, Uint8Array>();
    let maxRank = -1;

    for (const [bytes, rank] of entries) {
      if (bytes.length === 0) {
        throw new VocabularyError('Rank table contains an empty byte sequence', source);
      }
      if (!isByteString(bytes)) {
        throw new VocabularyError('Rank table key is not a byte string', source);
      }
      if (!Number.isSafeInteger(rank) || rank < 0) {
        throw new VocabularyError(`Invalid rank ${rank}`, source);
      }
      if (encoder.has(bytes)) {
        throw new VocabularyError(`Duplicate byte sequence for rank ${rank}`, source);
      }
      if (decoder.has(rank)) {
        throw new VocabularyError(`Duplicate rank ${rank}`, source);
      }
      encoder.set(bytes, rank);
      decoder.set(rank, fromByteString(bytes));
      if (rank > maxRank) maxRank = rank;
    }

    for (let byte = 0; byte < 256; byte++) {
      if (!encoder.has(String.fromCharCode(byte))) {
        throw new VocabularyError(`Rank table is missing the single byte 0x${byte.toString(16).padStart(2, '0')}`, source);
      }
    }

    return new RankTable(encoder, decoder, maxRank);
  }

  /** Build a table from `[bytes, rank]` pairs. */
  static fromEntries(entries: Iterable<readonly [Uint8Array, Rank]>, source?: string): RankTable {
    const converted: Array<readonly [string, Rank]> = [];
    for (const [bytes, rank] of entries) {
      converted.push([toByteString(bytes), rank]);
    }
    return RankTable.fromByteStrings(converted, source);
  }

  /** Number of ordinary tokens. */
  get size(): number {
    return this.encoder.size;
  }

  /** Rank of a byte string, or undefined when it is not a token. */
  get(bytes: string): Rank | undefined {
    return this.encoder.get(bytes);
  }

  has(bytes: string): boolean {
    return this.encoder.has(bytes);
  }

  /** Rank of raw bytes, or undefined when they are not a token. */
  rankOf(bytes: Uint8Array): Rank | undefined {
    return this.encoder.get(toByteString(bytes));
  }

  /**
   * Bytes of an ordinary rank. The returned array is shared with the table;
   * callers that hand it out must copy it.
   */
  bytesOf(rank: Rank): Uint8Array | undefined {
    return this.decoder.get(rank);
  }

  hasRank(rank: Rank): boolean {
    return this.decoder.has(rank);
  }

  /** Iterate `[bytes, rank]` pairs (bytes are copies). */
  *entries(): IterableIterator<[Uint8Array, Rank]> {
    for (const [rank, bytes] of this.decoder) {
      yield [bytes.slice(), rank];
    }
  }
}
