// ============================================================================
// @ranktok/core — Vocabulary Schemes
// ============================================================================
//
// Each scheme pins its pre-tokenization pattern, its special tokens with
// their reserved ranks, and the published rank file it is built from.
// Patterns are written for JS regular expressions with the `u` flag; the
// case-insensitive contraction groups of the published patterns are spelled
// out as character classes.
// ============================================================================

import type { EncodingName, Rank } from './types.js';

export const ENDOFTEXT = '<|endoftext|>';
export const FIM_PREFIX = '<|fim_prefix|>';
export const FIM_MIDDLE = '<|fim_middle|>';
export const FIM_SUFFIX = '<|fim_suffix|>';
export const ENDOFPROMPT = '<|endofprompt|>';

/** Published rank files; several schemes share one. */
export type RankSource = 'r50k_base' | 'p50k_base' | 'cl100k_base' | 'o200k_base';

export interface SchemeDefinition {
  name: EncodingName;
  patStr: string;
  specialTokens: Readonly<Record<string, Rank>>;
  rankSource: RankSource;
  explicitNVocab?: number;
}

const CONTRACTIONS = String.raw`'(?:[sS]|[tT]|[rR][eE]|[vV][eE]|[mM]|[lL][lL]|[dD])`;

// Whitespace is `\p{White_Space}`: JavaScript's `\s` also takes U+FEFF and misses U+0085.
export const R50K_PAT_STR = String.raw`'(?:[sdmt]|ll|ve|re)| ?\p{L}+| ?\p{N}+| ?[^\p{White_Space}\p{L}\p{N}]+|\p{White_Space}+(?!\P{White_Space})|\p{White_Space}+`;

export const CL100K_PAT_STR = [
  CONTRACTIONS,
  String.raw`[^\r\n\p{L}\p{N}]?\p{L}+`,
  String.raw`\p{N}{1,3}`,
  String.raw` ?[^\p{White_Space}\p{L}\p{N}]+[\r\n]*`,
  String.raw`\p{White_Space}*[\r\n]+`,
  String.raw`\p{White_Space}+(?!\P{White_Space})`,
  String.raw`\p{White_Space}+`,
].join('|');

export const O200K_PAT_STR = [
  String.raw`[^\r\n\p{L}\p{N}]?[\p{Lu}\p{Lt}\p{Lm}\p{Lo}\p{M}]*[\p{Ll}\p{Lm}\p{Lo}\p{M}]+(?:${CONTRACTIONS})?`,
  String.raw`[^\r\n\p{L}\p{N}]?[\p{Lu}\p{Lt}\p{Lm}\p{Lo}\p{M}]+[\p{Ll}\p{Lm}\p{Lo}\p{M}]*(?:${CONTRACTIONS})?`,
  String.raw`\p{N}{1,3}`,
  String.raw` ?[^\p{White_Space}\p{L}\p{N}]+[\r\n/]*`,
  String.raw`\p{White_Space}*[\r\n]+`,
  String.raw`\p{White_Space}+(?!\P{White_Space})`,
  String.raw`\p{White_Space}+`,
].join('|');

/**
 * SHA-256 of the published `.tiktoken` file behind each rank source.
 * Checked when ranks are read from a local vocabulary directory.
 */
export const RANK_FILE_SHA256: Readonly<Record<RankSource, string>> = {
  r50k_base: '306cd27f03c1a714eca7108e03d66b7dc042abe8c258b44c199a7ed9838dd930',
  p50k_base: '94b5ca7dff4d00767bc256fdd1b27e5b17361d7b8a5f968547f9f23eb70d2069',
  cl100k_base: '223921b76ee99bde995b7ff738513eef100fb51d18c93597a113bcffe865b2a7',
  o200k_base: '446a9538cb6c348e3516120d7c08b09f57c36495e2acfffe59a5bf8b0cfb1a2d',
};

export const SCHEMES: Readonly<Record<EncodingName, SchemeDefinition>> = {
  gpt2: {
    name: 'gpt2',
    patStr: R50K_PAT_STR,
    specialTokens: { [ENDOFTEXT]: 50256 },
    rankSource: 'r50k_base',
    explicitNVocab: 50257,
  },
  r50k_base: {
    name: 'r50k_base',
    patStr: R50K_PAT_STR,
    specialTokens: { [ENDOFTEXT]: 50256 },
    rankSource: 'r50k_base',
    explicitNVocab: 50257,
  },
  p50k_base: {
    name: 'p50k_base',
    patStr: R50K_PAT_STR,
    specialTokens: { [ENDOFTEXT]: 50256 },
    rankSource: 'p50k_base',
    explicitNVocab: 50281,
  },
  p50k_edit: {
    name: 'p50k_edit',
    patStr: R50K_PAT_STR,
    specialTokens: {
      [ENDOFTEXT]: 50256,
      [FIM_PREFIX]: 50281,
      [FIM_MIDDLE]: 50282,
      [FIM_SUFFIX]: 50283,
    },
    rankSource: 'p50k_base',
  },
  cl100k_base: {
    name: 'cl100k_base',
    patStr: CL100K_PAT_STR,
    specialTokens: {
      [ENDOFTEXT]: 100257,
      [FIM_PREFIX]: 100258,
      [FIM_MIDDLE]: 100259,
      [FIM_SUFFIX]: 100260,
      [ENDOFPROMPT]: 100276,
    },
    rankSource: 'cl100k_base',
  },
  o200k_base: {
    name: 'o200k_base',
    patStr: O200K_PAT_STR,
    specialTokens: {
      [ENDOFTEXT]: 199999,
      [ENDOFPROMPT]: 200018,
    },
    rankSource: 'o200k_base',
  },
};
