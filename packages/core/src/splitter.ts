// ============================================================================
// @ranktok/core — Splitter
// ============================================================================
//
// Two passes over the input, both left to right:
//   1. Literal special-token scan. Allowed matches become special spans,
//      disallowed matches abort the encode, the text between matches is
//      ordinary text.
//   2. The scheme's pre-tokenization pattern cuts each ordinary span into
//      chunks. Chunks never cross a special span, and each chunk is merged
//      independently.
// ============================================================================

import { DisallowedSpecialTokenError } from './errors.js';
import { utf8Length } from './rank_table.js';
import type { Rank } from './types.js';

export type Span =
  | { kind: 'ordinary'; text: string; index: number }
  | { kind: 'special'; text: string; rank: Rank; index: number };

/**
 * Literal matcher for one special-token policy.
 *
 * `pattern` matches every allowed or disallowed string (null when there are
 * none); `allowed` holds the strings to encode as special tokens.
 */
export interface SpecialScanner {
  readonly pattern: RegExp | null;
  readonly allowed: ReadonlyMap<string, Rank>;
}

const REGEXP_SYNTAX = /[.*+?^${}()|[\]\\/-]/g;

export function escapeRegExp(literal: string): string {
  return literal.replace(REGEXP_SYNTAX, '\\$&');
}

/**
 * Build a scanner for an allowed/disallowed split of the special tokens.
 *
 * Alternatives are ordered longest first, so where an allowed special is a
 * prefix of a longer one the longer string wins at that position.
 */
export function buildSpecialScanner(
  allowed: ReadonlyMap<string, Rank>,
  disallowed: Iterable<string>,
): SpecialScanner {
  const names = new Set<string>(allowed.keys());
  for (const name of disallowed) names.add(name);

  if (names.size === 0) {
    return { pattern: null, allowed };
  }

  const ordered = [...names].sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0));
  return {
    pattern: new RegExp(ordered.map(escapeRegExp).join('|'), 'g'),
    allowed,
  };
}

/**
 * Split text into ordinary and special spans.
 *
 * @throws DisallowedSpecialTokenError on the first match that is not allowed
 */
export function findSpecialSpans(text: string, scanner: SpecialScanner): Span[] {
  if (text.length === 0) return [];
  if (scanner.pattern === null) {
    return [{ kind: 'ordinary', text, index: 0 }];
  }

  const spans: Span[] = [];
  let cursor = 0;

  for (const match of text.matchAll(scanner.pattern)) {
    const token = match[0];
    const index = match.index ?? 0;
    const rank = scanner.allowed.get(token);

    if (rank === undefined) {
      throw new DisallowedSpecialTokenError(token, utf8Length(text.slice(0, index)), index);
    }
    if (index > cursor) {
      spans.push({ kind: 'ordinary', text: text.slice(cursor, index), index: cursor });
    }
    spans.push({ kind: 'special', text: token, rank, index });
    cursor = index + token.length;
  }

  if (cursor < text.length) {
    spans.push({ kind: 'ordinary', text: text.slice(cursor), index: cursor });
  }
  return spans;
}

/**
 * Cut ordinary text into chunks with a scheme pattern (must carry the `g` flag).
 */
export function splitOrdinary(text: string, pattern: RegExp): string[] {
  const chunks: string[] = [];
  for (const match of text.matchAll(pattern)) {
    chunks.push(match[0]);
  }
  return chunks;
}
