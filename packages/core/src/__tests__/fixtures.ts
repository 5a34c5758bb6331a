// ============================================================================
// Toy vocabulary shared by the engine tests
// ============================================================================
//
// Ranks 0–255 are the single bytes (byte b has rank b); the extra tokens
// follow from 256 in the order given.

import { Encoding } from '../encoding.js';
import { RankTable } from '../rank_table.js';
import { ENDOFTEXT, R50K_PAT_STR } from '../schemes.js';
import { SpecialTokenTable } from '../special_tokens.js';

export const PAD = '<|pad|>';

/** he=256 lo=257 llo=258 " w"=259 or=260 ld=261 */
export const TOY_MERGES = ['he', 'lo', 'llo', ' w', 'or', 'ld'];

export function byteEntries(): Array<[string, number]> {
  return Array.from({ length: 256 }, (_, b) => [String.fromCharCode(b), b]);
}

export function toyRanks(merges: readonly string[] = TOY_MERGES): RankTable {
  const entries = byteEntries();
  merges.forEach((bytes, i) => entries.push([bytes, 256 + i]));
  return RankTable.fromByteStrings(entries, 'toy');
}

/** Toy encoding: TOY_MERGES, endoftext=262, pad=263, r50k pattern. */
export function toyEncoding(options: { cache?: false; explicitNVocab?: number } = {}): Encoding {
  const ranks = toyRanks();
  return new Encoding({
    name: 'toy',
    patStr: R50K_PAT_STR,
    ranks,
    specialTokens: SpecialTokenTable.from(
      [
        [ENDOFTEXT, 262],
        [PAD, 263],
      ],
      ranks,
    ),
    explicitNVocab: options.explicitNVocab,
    cache: options.cache,
  });
}
