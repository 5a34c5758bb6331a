// ============================================================================
// @ranktok/core — Byte-Pair Merge Engine
// ============================================================================
//
// Given one chunk as a byte string, find the token sequence the reference
// tokenizer produces for it:
//
//   parts := one part per byte, each caching the rank of (part, right neighbour)
//   loop:
//     pick the pair with the lowest rank; on ties, the leftmost pair
//     merge it, then refresh the cached pair ranks of the merged part and
//     of its left neighbour
//   until no adjacent pair is a token
//
// Two interchangeable strategies implement the loop. `scan` rescans the parts
// list after every merge (O(n²), fastest for ordinary words). `heap` keeps a
// linked parts list and a min-heap ordered by (rank, start offset), which
// gives the same leftmost tie-break in O(n log n) for very long chunks.
// ============================================================================

import { InvariantViolationError } from './errors.js';
import { type RankTable, fromByteString } from './rank_table.js';
import type { Rank } from './types.js';

/** Chunks at least this many bytes long use the heap strategy. */
export const LARGE_PIECE_THRESHOLD = 256;

export type MergeStrategy = 'scan' | 'heap';

const NO_RANK = Number.POSITIVE_INFINITY;

/**
 * Merge a chunk and return the part boundaries: `[0, b1, b2, …, piece.length]`.
 */
export function bytePairMerge(piece: string, ranks: RankTable, strategy?: MergeStrategy): number[] {
  if (piece.length === 0) return [0];
  const chosen = strategy ?? (piece.length < LARGE_PIECE_THRESHOLD ? 'scan' : 'heap');
  return chosen === 'scan' ? mergeByScan(piece, ranks) : mergeByHeap(piece, ranks);
}

/**
 * Encode one chunk (a byte string) into ranks.
 *
 * Total over all byte strings given a validated rank table.
 *
 * @throws InvariantViolationError if a final part is not in the table
 */
export function bytePairEncode(piece: string, ranks: RankTable, strategy?: MergeStrategy): Rank[] {
  if (piece.length === 0) return [];

  const whole = ranks.get(piece);
  if (whole !== undefined) return [whole];

  const bounds = bytePairMerge(piece, ranks, strategy);
  const out = new Array<Rank>(bounds.length - 1);
  for (let i = 0; i < bounds.length - 1; i++) {
    const span = piece.slice(bounds[i], bounds[i + 1]);
    const rank = ranks.get(span);
    if (rank === undefined) {
      throw new InvariantViolationError(fromByteString(span));
    }
    out[i] = rank;
  }
  return out;
}

// ---------------------------------------------------------------------------
// Scan strategy
// ---------------------------------------------------------------------------

function mergeByScan(piece: string, ranks: RankTable): number[] {
  // starts[i] is where part i begins; pairRanks[i] is the rank of
  // piece[starts[i], starts[i + 2]), i.e. part i joined with part i + 1.
  // The final entry is the end sentinel `piece.length`.
  const starts: number[] = [];
  const pairRanks: number[] = [];
  let minRank = NO_RANK;
  let minIndex = -1;

  for (let i = 0; i < piece.length - 1; i++) {
    const rank = ranks.get(piece.slice(i, i + 2)) ?? NO_RANK;
    if (rank < minRank) {
      minRank = rank;
      minIndex = i;
    }
    starts.push(i);
    pairRanks.push(rank);
  }
  starts.push(piece.length - 1);
  pairRanks.push(NO_RANK);
  starts.push(piece.length);
  pairRanks.push(NO_RANK);

  // Rank of part i joined with the two parts after it; this is the pair
  // rank part i will have once parts i + 1 and i + 2 have been merged.
  const joinedRank = (i: number): number =>
    i + 3 < starts.length ? (ranks.get(piece.slice(starts[i], starts[i + 3])) ?? NO_RANK) : NO_RANK;

  while (minRank !== NO_RANK) {
    const i = minIndex;
    if (i > 0) {
      pairRanks[i - 1] = joinedRank(i - 1);
    }
    pairRanks[i] = joinedRank(i);
    starts.splice(i + 1, 1);
    pairRanks.splice(i + 1, 1);

    // Strict `<` keeps the first (leftmost) minimum.
    minRank = NO_RANK;
    minIndex = -1;
    for (let j = 0; j < pairRanks.length - 1; j++) {
      if (pairRanks[j] < minRank) {
        minRank = pairRanks[j];
        minIndex = j;
      }
    }
  }

  return starts;
}

// ---------------------------------------------------------------------------
// Heap strategy
// ---------------------------------------------------------------------------

interface Candidate {
  rank: Rank;
  start: number;
  version: number;
}

/** Binary min-heap of merge candidates ordered by (rank, start). */
class CandidateHeap {
  private items: Candidate[] = [];

  get size(): number {
    return this.items.length;
  }

  push(candidate: Candidate): void {
    const items = this.items;
    items.push(candidate);
    let i = items.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!precedes(items[i], items[parent])) break;
      [items[i], items[parent]] = [items[parent], items[i]];
      i = parent;
    }
  }

  pop(): Candidate | undefined {
    const items = this.items;
    const top = items[0];
    const last = items.pop();
    if (top === undefined || last === undefined || items.length === 0) return top;

    items[0] = last;
    let i = 0;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < items.length && precedes(items[left], items[smallest])) smallest = left;
      if (right < items.length && precedes(items[right], items[smallest])) smallest = right;
      if (smallest === i) break;
      [items[i], items[smallest]] = [items[smallest], items[i]];
      i = smallest;
    }
    return top;
  }
}

function precedes(a: Candidate, b: Candidate): boolean {
  return a.rank < b.rank || (a.rank === b.rank && a.start < b.start);
}

function mergeByHeap(piece: string, ranks: RankTable): number[] {
  const length = piece.length;
  // Parts are identified by their start offset, which never changes for the
  // surviving (left) part of a merge. next[s] is the start of the following
  // part, or `length` for the last one.
  const next = new Int32Array(length);
  const prev = new Int32Array(length);
  const version = new Uint32Array(length);
  const removed = new Uint8Array(length);
  const heap = new CandidateHeap();

  for (let i = 0; i < length; i++) {
    next[i] = i + 1;
    prev[i] = i - 1;
  }

  const pairRank = (start: number): number => {
    const right = next[start];
    if (right >= length) return NO_RANK;
    return ranks.get(piece.slice(start, next[right])) ?? NO_RANK;
  };

  const refresh = (start: number): void => {
    version[start]++;
    const rank = pairRank(start);
    if (rank !== NO_RANK) {
      heap.push({ rank, start, version: version[start] });
    }
  };

  for (let i = 0; i < length - 1; i++) {
    const rank = ranks.get(piece.slice(i, i + 2)) ?? NO_RANK;
    if (rank !== NO_RANK) heap.push({ rank, start: i, version: 0 });
  }

  while (heap.size > 0) {
    const candidate = heap.pop();
    if (candidate === undefined) break;
    const { start } = candidate;
    if (removed[start] === 1 || candidate.version !== version[start]) continue;

    const right = next[start];
    const after = next[right];
    removed[right] = 1;
    next[start] = after;
    if (after < length) prev[after] = start;

    refresh(start);
    if (prev[start] >= 0) refresh(prev[start]);
  }

  const bounds: number[] = [];
  for (let start = 0; start < length; start = next[start]) {
    bounds.push(start);
  }
  bounds.push(length);
  return bounds;
}
