import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { LARGE_PIECE_THRESHOLD, type MergeStrategy, bytePairEncode, bytePairMerge } from '../merge.js';
import { toyRanks } from './fixtures.js';

const STRATEGIES: MergeStrategy[] = ['scan', 'heap'];

describe.each(STRATEGIES)('bytePairEncode (%s)', (strategy) => {
  it('returns nothing for an empty piece', () => {
    expect(bytePairEncode('', toyRanks(), strategy)).toEqual([]);
  });

  it('encodes every single byte as its own rank', () => {
    const ranks = toyRanks();
    for (let b = 0; b < 256; b++) {
      expect(bytePairEncode(String.fromCharCode(b), ranks, strategy)).toEqual([b]);
    }
  });

  it('falls back to single bytes when nothing merges', () => {
    expect(bytePairEncode('\u0000ÿ', toyRanks(), strategy)).toEqual([0, 255]);
    expect(bytePairEncode('xyz', toyRanks(), strategy)).toEqual([120, 121, 122]);
  });

  it('only reaches tokens through mergeable pairs', () => {
    // "llo" is a token but "ll" is not, so it cannot be formed from l + l + o.
    const ranks = toyRanks(['he', 'llo']);
    expect(bytePairEncode('hello', ranks, strategy)).toEqual([256, 108, 108, 111]);
  });

  it('builds a longer token through an intermediate merge', () => {
    const ranks = toyRanks(['he', 'llo', 'lo']);
    expect(bytePairEncode('hello', ranks, strategy)).toEqual([256, 257]);
  });

  it('merges the lowest rank first', () => {
    expect(bytePairEncode('abc', toyRanks(['ab', 'bc']), strategy)).toEqual([256, 99]);
    expect(bytePairEncode('abc', toyRanks(['bc', 'ab']), strategy)).toEqual([97, 256]);
  });

  it('breaks rank ties toward the leftmost pair', () => {
    expect(bytePairEncode('aaa', toyRanks(['aa']), strategy)).toEqual([256, 97]);
  });

  it('returns the rank of a piece that is itself a token', () => {
    expect(bytePairEncode('llo', toyRanks(['he', 'llo']), strategy)).toEqual([257]);
  });

  it('handles long runs of one byte', () => {
    const ranks = toyRanks(['aa', 'aaaa']);
    expect(bytePairEncode('a'.repeat(600), ranks, strategy)).toEqual(new Array(150).fill(257));
  });
});

describe('bytePairMerge', () => {
  it('returns part boundaries including both ends', () => {
    expect(bytePairMerge('aaa', toyRanks(['aa']))).toEqual([0, 2, 3]);
    expect(bytePairMerge('', toyRanks())).toEqual([0]);
  });

  it('picks the heap strategy for long pieces', () => {
    const ranks = toyRanks(['ab']);
    const piece = 'ab'.repeat(LARGE_PIECE_THRESHOLD);
    expect(bytePairMerge(piece, ranks)).toEqual(bytePairMerge(piece, ranks, 'heap'));
  });

  it('gives identical boundaries under both strategies', () => {
    const ranks = toyRanks(['ab', 'ba', 'aa', 'abc', 'cab', 'bb', 'abab', 'ca', 'aab']);
    const piece = fc
      .array(fc.constantFrom('a', 'b', 'c'), { minLength: 0, maxLength: 400 })
      .map((chars) => chars.join(''));

    fc.assert(
      fc.property(piece, (p) => {
        const scan = bytePairMerge(p, ranks, 'scan');
        const heap = bytePairMerge(p, ranks, 'heap');
        expect(heap).toEqual(scan);

        const tokens = bytePairEncode(p, ranks, 'scan');
        const rebuilt = tokens.map((rank) => String.fromCharCode(...(ranks.bytesOf(rank) ?? []))).join('');
        expect(rebuilt).toBe(p);
      }),
      { numRuns: 300 },
    );
  });
});
