// ============================================================================
// @ranktok/core — Type Definitions
// ============================================================================
//
// Shared types for the encoding pipeline. Token ids and ranks are the same
// integers: an ordinary token's id is its merge rank, a special token's id
// is the reserved rank assigned by its scheme.
// ============================================================================

/** A single token id produced by an encoding. */
export type Token = number;

/** Merge priority of a byte sequence. Lower ranks merge first. */
export type Rank = number;

/** An array of token ids representing an encoded text. */
export type TokenStream = Token[];

/**
 * Supported vocabulary schemes:
 * - `r50k_base` / `gpt2` — GPT-2, GPT-3 (earliest)
 * - `p50k_base`          — GPT-3, Codex
 * - `p50k_edit`          — edit models (p50k ranks + fill-in-the-middle specials)
 * - `cl100k_base`        — GPT-4, GPT-3.5-Turbo, text-embedding-3
 * - `o200k_base`         — GPT-4o, o-series, GPT-5
 */
export const ENCODING_NAMES = [
  'gpt2',
  'r50k_base',
  'p50k_base',
  'p50k_edit',
  'cl100k_base',
  'o200k_base',
] as const;

export type EncodingName = (typeof ENCODING_NAMES)[number];

export function isEncodingName(value: string): value is EncodingName {
  return ENCODING_NAMES.some((name) => name === value);
}

/**
 * A set of special-token strings, or every special token of the encoding.
 * A bare string is not accepted: it would be read character by character.
 */
export type SpecialTokenSelection = 'all' | readonly string[] | ReadonlySet<string>;

/**
 * Special-token policy for a single encode call.
 *
 * Defaults: nothing is allowed and everything not allowed is disallowed,
 * so a special-token string in plain input is an error unless the caller
 * opts in.
 */
export interface EncodeOptions {
  allowedSpecial?: SpecialTokenSelection;
  disallowedSpecial?: SpecialTokenSelection;
}

/** Hit/miss counters of a chunk cache. */
export interface CacheStats {
  size: number;
  maxEntries: number | null;
  hits: number;
  misses: number;
  /** Percentage with one decimal, 0 when nothing was looked up yet. */
  hitRatio: number;
}
