// ============================================================================
// @ranktok/core — Encoding
// ============================================================================
//
// One vocabulary scheme bound to its tables: the public encode / decode /
// count surface. The rank and special-token tables are frozen at
// construction and shared by every call; the chunk cache is the only state
// that changes between calls.
//
// encode:  special scan → pattern split → chunk cache → merge engine
// decode:  rank → bytes (ordinary or special) → concatenate
// ============================================================================

import { Buffer } from 'node:buffer';
import { ChunkCache, type ChunkCacheOptions } from './chunk_cache.js';
import { DecodeError, SingleTokenError, UnknownTokenError, VocabularyError } from './errors.js';
import { logCacheCleared } from './logger.js';
import { bytePairEncode } from './merge.js';
import { type RankTable, utf8ByteString } from './rank_table.js';
import { ENDOFTEXT } from './schemes.js';
import type { SpecialTokenTable } from './special_tokens.js';
import { type SpecialScanner, buildSpecialScanner, findSpecialSpans, splitOrdinary } from './splitter.js';
import type {
  CacheStats,
  EncodeOptions,
  Rank,
  SpecialTokenSelection,
  Token,
  TokenStream,
} from './types.js';

/** Distinct special-token policies remembered per encoding. */
const MAX_SCANNERS = 32;

export interface EncodingOptions {
  name: string;
  /** Pre-tokenization pattern source; compiled with the `gu` flags. */
  patStr: string;
  ranks: RankTable;
  specialTokens: SpecialTokenTable;
  /** Expected `maxTokenValue + 1`, checked against the tables when given. */
  explicitNVocab?: number;
  /** Chunk cache settings, or `false` to encode without a cache. */
  cache?: ChunkCacheOptions | false;
}

/**
 * @example
 * ```ts
 * const enc = await getEncoding('cl100k_base');
 * enc.encode('hello world');                      // [15339, 1917]
 * enc.encode('<|endoftext|>', { allowedSpecial: 'all' }); // [100257]
 * enc.decode([15339, 1917]);                      // 'hello world'
 * ```
 */
export class Encoding {
  readonly name: string;
  readonly patStr: string;
  private readonly pattern: RegExp;
  private readonly ranks: RankTable;
  private readonly specials: SpecialTokenTable;
  private readonly cache: ChunkCache | null;
  private readonly scanners = new Map<string, SpecialScanner>();
  private readonly strictDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  private readonly lossyDecoder = new TextDecoder('utf-8', { ignoreBOM: true });

  constructor(options: EncodingOptions) {
    this.name = options.name;
    this.patStr = options.patStr;
    this.pattern = new RegExp(options.patStr, 'gu');
    this.ranks = options.ranks;
    this.specials = options.specialTokens;
    this.cache = options.cache === false ? null : new ChunkCache(options.cache);

    if (options.explicitNVocab !== undefined) {
      const size = this.ranks.size + this.specials.size;
      if (size !== options.explicitNVocab || this.maxTokenValue !== options.explicitNVocab - 1) {
        throw new VocabularyError(
          `Expected ${options.explicitNVocab} tokens ending at ${options.explicitNVocab - 1}, got ${size} ending at ${this.maxTokenValue}`,
          options.name,
        );
      }
    }
  }

  // ── Encoding ────────────────────────────────────────────────────────────

  /**
   * Encode text, intercepting special tokens according to `options`.
   *
   * @throws DisallowedSpecialTokenError when a disallowed special string appears in `text`
   */
  encode(text: string, options?: EncodeOptions): TokenStream {
    const out: TokenStream = [];
    this.visitTokens(text, this.scannerFor(options), (tokens) => {
      for (let i = 0; i < tokens.length; i++) out.push(tokens[i]);
    });
    return out;
  }

  /** Encode text treating special-token strings as plain text. */
  encodeOrdinary(text: string): TokenStream {
    const out: TokenStream = [];
    for (const chunk of splitOrdinary(text, this.pattern)) {
      const tokens = this.encodeChunk(chunk);
      for (let i = 0; i < tokens.length; i++) out.push(tokens[i]);
    }
    return out;
  }

  /**
   * Number of tokens `encode(text, options)` would return.
   * Runs the same pipeline without materialising the token array.
   */
  count(text: string, options?: EncodeOptions): number {
    let total = 0;
    this.visitTokens(text, this.scannerFor(options), (tokens) => {
      total += tokens.length;
    });
    return total;
  }

  encodeBatch(texts: readonly string[], options?: EncodeOptions): TokenStream[] {
    return texts.map((text) => this.encode(text, options));
  }

  encodeOrdinaryBatch(texts: readonly string[]): TokenStream[] {
    return texts.map((text) => this.encodeOrdinary(text));
  }

  /**
   * Token id of text that is exactly one token (special strings included).
   *
   * @throws SingleTokenError otherwise
   */
  encodeSingleToken(text: string): Token {
    const special = this.specials.get(text);
    if (special !== undefined) return special;
    const rank = this.ranks.get(utf8ByteString(text));
    if (rank !== undefined) return rank;
    throw new SingleTokenError(text);
  }

  // ── Decoding ────────────────────────────────────────────────────────────

  /**
   * Concatenated bytes of the tokens, exactly.
   *
   * @throws UnknownTokenError for an id outside both token ranges
   */
  decodeBytes(tokens: Iterable<Token>): Uint8Array {
    const parts: Uint8Array[] = [];
    let length = 0;
    for (const token of tokens) {
      const bytes = this.lookupBytes(token);
      parts.push(bytes);
      length += bytes.length;
    }

    const out = new Uint8Array(length);
    let offset = 0;
    for (const bytes of parts) {
      out.set(bytes, offset);
      offset += bytes.length;
    }
    return out;
  }

  /**
   * Decode to text, failing on byte sequences that are not valid UTF-8.
   *
   * @throws UnknownTokenError for an unknown id
   * @throws DecodeError when the bytes are not valid UTF-8
   */
  decode(tokens: Iterable<Token>): string {
    const bytes = this.decodeBytes(tokens);
    try {
      return this.strictDecoder.decode(bytes);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new DecodeError(`Token bytes are not valid UTF-8: ${reason}`);
    }
  }

  /**
   * Decode to text, replacing invalid UTF-8 runs with U+FFFD.
   *
   * @throws UnknownTokenError for an unknown id
   */
  decodeLossy(tokens: Iterable<Token>): string {
    return this.lossyDecoder.decode(this.decodeBytes(tokens));
  }

  decodeBatch(batch: readonly (readonly Token[])[]): string[] {
    return batch.map((tokens) => this.decode(tokens));
  }

  decodeBytesBatch(batch: readonly (readonly Token[])[]): Uint8Array[] {
    return batch.map((tokens) => this.decodeBytes(tokens));
  }

  /** Bytes of one token (a copy). */
  decodeSingleTokenBytes(token: Token): Uint8Array {
    return this.lookupBytes(token).slice();
  }

  // ── Vocabulary ──────────────────────────────────────────────────────────

  isSpecialToken(token: Token): boolean {
    return this.specials.hasRank(token);
  }

  get maxTokenValue(): Token {
    return Math.max(this.ranks.maxRank, this.specials.maxRank);
  }

  /** `maxTokenValue + 1`: the size of an id-indexed embedding table. */
  get nVocab(): number {
    return this.maxTokenValue + 1;
  }

  /** Number of distinct tokens, ordinary plus special. */
  get vocabSize(): number {
    return this.ranks.size + this.specials.size;
  }

  get eotToken(): Token | undefined {
    return this.specials.get(ENDOFTEXT);
  }

  get specialTokensSet(): Set<string> {
    return new Set(this.specials.names());
  }

  /** Bytes of every ordinary token, sorted bytewise. */
  tokenByteValues(): Uint8Array[] {
    const values = [...this.ranks.entries()].map(([bytes]) => bytes);
    return values.sort((a, b) => Buffer.compare(a, b));
  }

  // ── Cache ───────────────────────────────────────────────────────────────

  cacheStats(): CacheStats | null {
    return this.cache?.getStats() ?? null;
  }

  clearCache(): void {
    if (!this.cache) return;
    const entries = this.cache.size;
    this.cache.clear();
    logCacheCleared(this.name, entries);
  }

  // ── Internals ───────────────────────────────────────────────────────────

  private lookupBytes(token: Token): Uint8Array {
    const bytes = this.ranks.bytesOf(token) ?? this.specials.bytesOf(token);
    if (bytes === undefined) {
      throw new UnknownTokenError(token);
    }
    return bytes;
  }

  private visitTokens(
    text: string,
    scanner: SpecialScanner,
    visit: (tokens: readonly Rank[]) => void,
  ): void {
    for (const span of findSpecialSpans(text, scanner)) {
      if (span.kind === 'special') {
        visit([span.rank]);
        continue;
      }
      for (const chunk of splitOrdinary(span.text, this.pattern)) {
        visit(this.encodeChunk(chunk));
      }
    }
  }

  private encodeChunk(chunk: string): readonly Rank[] {
    const bytes = utf8ByteString(chunk);
    const direct = this.ranks.get(bytes);
    if (direct !== undefined) return [direct];
    if (this.cache === null) return bytePairEncode(bytes, this.ranks);
    return this.cache.getOrCompute(bytes, (key) => bytePairEncode(key, this.ranks));
  }

  private scannerFor(options: EncodeOptions | undefined): SpecialScanner {
    const allowedNames = this.select(options?.allowedSpecial ?? [], new Set());
    const disallowedNames = this.select(options?.disallowedSpecial ?? 'all', allowedNames);

    const key = `${[...allowedNames].sort().join('\u0000')}\u0001${[...disallowedNames].sort().join('\u0000')}`;
    const cached = this.scanners.get(key);
    if (cached) return cached;

    const allowed = new Map<string, Rank>();
    for (const name of allowedNames) {
      const rank = this.specials.get(name);
      if (rank !== undefined) allowed.set(name, rank);
    }

    const scanner = buildSpecialScanner(allowed, disallowedNames);
    if (this.scanners.size >= MAX_SCANNERS) this.scanners.clear();
    this.scanners.set(key, scanner);
    return scanner;
  }

  /** Resolve a selection to known special names, minus `exclude`. */
  private select(selection: SpecialTokenSelection, exclude: ReadonlySet<string>): Set<string> {
    const names = selection === 'all' ? this.specials.names() : selection;
    const out = new Set<string>();
    for (const name of names) {
      if (this.specials.has(name) && !exclude.has(name)) out.add(name);
    }
    return out;
  }
}
