import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { VocabularyError } from '../errors.js';
import { loadRanks, loadTiktokenFile, parseCompressedRanks, parseTiktokenBpe, sha256Hex } from '../loader.js';

const b64 = (bytes: number[] | string) =>
  (typeof bytes === 'string' ? Buffer.from(bytes, 'latin1') : Buffer.from(bytes)).toString('base64');

function tiktokenContents(extra: Array<[string, number]> = [['he', 256]]): string {
  const lines: string[] = [];
  for (let b = 0; b < 256; b++) lines.push(`${b64([b])} ${b}`);
  for (const [bytes, rank] of extra) lines.push(`${b64(bytes)} ${rank}`);
  return `${lines.join('\n')}\n`;
}

describe('parseTiktokenBpe', () => {
  it('reads base64 tokens with their ranks', () => {
    const table = parseTiktokenBpe(tiktokenContents());
    expect(table.size).toBe(257);
    expect(table.get('he')).toBe(256);
    expect(table.get('\u0000')).toBe(0);
  });

  it('rejects malformed lines', () => {
    expect(() => parseTiktokenBpe(`${tiktokenContents()}aGk=\n`, 'bad.tiktoken')).toThrow(
      'Malformed rank line 258: "aGk=" (bad.tiktoken)',
    );
    expect(() => parseTiktokenBpe(`${tiktokenContents()}aGk= x\n`)).toThrow(VocabularyError);
  });
});

describe('parseCompressedRanks', () => {
  it('assigns consecutive ranks from each line offset', () => {
    const bytes = Array.from({ length: 256 }, (_, b) => b64([b])).join(' ');
    const table = parseCompressedRanks(`! 0 ${bytes}\n! 256 ${b64('he')} ${b64('llo')}\n! 300 ${b64('lo')}`);
    expect(table.size).toBe(259);
    expect(table.get('he')).toBe(256);
    expect(table.get('llo')).toBe(257);
    expect(table.get('lo')).toBe(300);
  });

  it('rejects a non-numeric offset', () => {
    expect(() => parseCompressedRanks('! x aGk=')).toThrow(/Invalid rank offset "x"/);
  });
});

describe('loadTiktokenFile', () => {
  let dir: string;
  let file: string;
  const contents = tiktokenContents();

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'ranktok-'));
    file = path.join(dir, 'r50k_base.tiktoken');
    await writeFile(file, contents);
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads a file whose hash matches', async () => {
    const hash = sha256Hex(Buffer.from(contents));
    const table = await loadTiktokenFile(file, hash.toUpperCase());
    expect(table.get('he')).toBe(256);
  });

  it('rejects a file whose hash differs', async () => {
    await expect(loadTiktokenFile(file, '0'.repeat(64))).rejects.toThrow(/Hash mismatch/);
  });

  it('checks vocabulary directories against the published hashes', async () => {
    await expect(loadRanks('r50k_base', dir)).rejects.toBeInstanceOf(VocabularyError);
  });
});

describe('loadRanks (bundled)', () => {
  it('loads the bundled r50k ranks', async () => {
    const { ranks, origin } = await loadRanks('r50k_base');
    expect(origin).toBe('bundled');
    expect(ranks.size).toBe(50256);
    expect(ranks.get('hello')).toBe(31373);
  });
});
