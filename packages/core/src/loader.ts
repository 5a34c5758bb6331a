// ============================================================================
// @ranktok/core — Vocabulary Loading
// ============================================================================
//
// Delivers validated rank tables to the engine. Two sources:
//   - bundled: the compressed rank modules shipped in the `js-tiktoken`
//     package (no network, no files to manage)
//   - file:    a published `.tiktoken` file in a local directory, verified
//     against its SHA-256 before it is parsed
// ============================================================================

import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { Buffer } from 'node:buffer';
import { z } from 'zod';
import { VocabularyError } from './errors.js';
import { logHashVerified } from './logger.js';
import { RankTable } from './rank_table.js';
import { RANK_FILE_SHA256, type RankSource } from './schemes.js';
import type { Rank } from './types.js';

const bundledRanksSchema = z.object({
  default: z.object({
    pat_str: z.string(),
    special_tokens: z.record(z.number()),
    bpe_ranks: z.string().min(1),
  }),
});

function base64ToByteString(value: string): string {
  return Buffer.from(value, 'base64').toString('latin1');
}

/**
 * Parse the `.tiktoken` format: one `<base64 bytes> <rank>` pair per line.
 */
export function parseTiktokenBpe(contents: string, source?: string): RankTable {
  const entries: Array<[string, Rank]> = [];
  const lines = contents.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line.length === 0) continue;

    const fields = line.split(/\s+/);
    if (fields.length !== 2) {
      throw new VocabularyError(`Malformed rank line ${i + 1}: "${line}"`, source);
    }
    const [token, rankStr] = fields;
    const rank = Number(rankStr);
    if (!/^\d+$/.test(rankStr)) {
      throw new VocabularyError(`Invalid rank "${rankStr}" on line ${i + 1}`, source);
    }
    entries.push([base64ToByteString(token), rank]);
  }

  return RankTable.fromByteStrings(entries, source);
}

/**
 * Parse the compressed rank format bundled with `js-tiktoken`: each line is
 * `<tag> <first rank> <base64> <base64> …`, the tokens taking consecutive
 * ranks from the first one.
 */
export function parseCompressedRanks(contents: string, source?: string): RankTable {
  const entries: Array<[string, Rank]> = [];
  const lines = contents.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line.length === 0) continue;

    const [, offsetStr = '', ...tokens] = line.split(' ');
    if (!/^\d+$/.test(offsetStr)) {
      throw new VocabularyError(`Invalid rank offset "${offsetStr}" on line ${i + 1}`, source);
    }
    const offset = Number(offsetStr);
    tokens.forEach((token, j) => {
      entries.push([base64ToByteString(token), offset + j]);
    });
  }

  return RankTable.fromByteStrings(entries, source);
}

/** Hex SHA-256 of raw file contents. */
export function sha256Hex(data: Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Read and parse a `.tiktoken` file.
 *
 * @param expectedSha256 - When given, the file is rejected unless its hash matches
 * @throws VocabularyError on a hash mismatch or malformed contents
 */
export async function loadTiktokenFile(filePath: string, expectedSha256?: string): Promise<RankTable> {
  const raw = await readFile(filePath);

  if (expectedSha256 !== undefined) {
    const actual = sha256Hex(raw);
    if (actual !== expectedSha256.toLowerCase()) {
      throw new VocabularyError(`Hash mismatch: expected ${expectedSha256}, got ${actual}`, filePath);
    }
    logHashVerified(filePath, actual);
  }

  return parseTiktokenBpe(raw.toString('utf8'), filePath);
}

function importBundledRanks(source: RankSource): Promise<unknown> {
  switch (source) {
    case 'r50k_base':
      return import('js-tiktoken/ranks/r50k_base');
    case 'p50k_base':
      return import('js-tiktoken/ranks/p50k_base');
    case 'cl100k_base':
      return import('js-tiktoken/ranks/cl100k_base');
    case 'o200k_base':
      return import('js-tiktoken/ranks/o200k_base');
  }
}

/**
 * Load the ranks bundled with the `js-tiktoken` package.
 *
 * @throws VocabularyError when the bundled module has an unexpected shape
 */
export async function loadBundledRanks(source: RankSource): Promise<RankTable> {
  const parsed = bundledRanksSchema.safeParse(await importBundledRanks(source));
  if (!parsed.success) {
    throw new VocabularyError(
      `Unexpected bundled rank module: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
      `js-tiktoken/ranks/${source}`,
    );
  }
  return parseCompressedRanks(parsed.data.default.bpe_ranks, `js-tiktoken/ranks/${source}`);
}

/**
 * Load ranks for a source, from `vocabDir` when set (hash-verified),
 * otherwise from the bundled data.
 */
export async function loadRanks(
  source: RankSource,
  vocabDir?: string,
): Promise<{ ranks: RankTable; origin: 'bundled' | 'file' }> {
  if (vocabDir) {
    const filePath = path.join(vocabDir, `${source}.tiktoken`);
    return { ranks: await loadTiktokenFile(filePath, RANK_FILE_SHA256[source]), origin: 'file' };
  }
  return { ranks: await loadBundledRanks(source), origin: 'bundled' };
}
