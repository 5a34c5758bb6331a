// ============================================================================
// Conformance against js-tiktoken on the bundled vocabularies
// ============================================================================

import { Tiktoken } from 'js-tiktoken/lite';
import cl100k from 'js-tiktoken/ranks/cl100k_base';
import o200k from 'js-tiktoken/ranks/o200k_base';
import p50k from 'js-tiktoken/ranks/p50k_base';
import r50k from 'js-tiktoken/ranks/r50k_base';
import { describe, expect, it } from 'vitest';
import { EncodingRegistry } from '../registry.js';
import { ENDOFTEXT } from '../schemes.js';

const registry = new EncodingRegistry();

const SAMPLES = [
  'hello world',
  'The quick brown fox jumps over the lazy dog.',
  "it's 2024-06-01, and we'll see what they've done",
  'function add(a, b) {\n  return a + b;\n}\n',
  '    indented\n\n\n\ttabs and   spaces   ',
  'naïve café, señor, Straße',
  'こんにちは世界 🌍🚀',
  'Привет, мир! 1234567890',
  'helloWorld camelCase HTTPServer',
  'https://example.com/path/to/file?query=1&x=y',
  '',
];

const ORACLES = [
  { name: 'r50k_base', oracle: new Tiktoken(r50k) },
  { name: 'gpt2', oracle: new Tiktoken(r50k) },
  { name: 'p50k_base', oracle: new Tiktoken(p50k) },
  { name: 'cl100k_base', oracle: new Tiktoken(cl100k) },
  { name: 'o200k_base', oracle: new Tiktoken(o200k) },
] as const;

describe.each(ORACLES)('$name', ({ name, oracle }) => {
  it.each(SAMPLES)('encodes %j like js-tiktoken', async (text) => {
    const enc = await registry.get(name);
    const tokens = enc.encode(text);
    expect(tokens).toEqual(oracle.encode(text));
    expect(enc.decode(tokens)).toBe(text);
    expect(enc.count(text)).toBe(tokens.length);
  });

  it('encodes allowed specials like js-tiktoken', async () => {
    const enc = await registry.get(name);
    const text = `first${ENDOFTEXT}second`;
    expect(enc.encode(text, { allowedSpecial: 'all' })).toEqual(oracle.encode(text, 'all'));
  });

  it('encodes a long run through the heap strategy', async () => {
    const enc = await registry.get(name);
    const text = `${'x'.repeat(700)} ${'ab'.repeat(300)}`;
    expect(enc.encode(text)).toEqual(oracle.encode(text));
  });
});

describe('known token ids', () => {
  it('matches published ids', async () => {
    const cl = await registry.get('cl100k_base');
    const gpt2 = await registry.get('gpt2');
    expect(cl.encode('hello world')).toEqual([15339, 1917]);
    expect(gpt2.encode('hello world')).toEqual([31373, 995]);
    expect(cl.encode(ENDOFTEXT, { allowedSpecial: 'all' })).toEqual([100257]);
    expect(gpt2.eotToken).toBe(50256);
  });

  it('reports vocabulary sizes', async () => {
    expect((await registry.get('r50k_base')).nVocab).toBe(50257);
    expect((await registry.get('p50k_base')).nVocab).toBe(50281);
    expect((await registry.get('p50k_edit')).nVocab).toBe(50284);
    expect((await registry.get('cl100k_base')).nVocab).toBe(100277);
    expect((await registry.get('o200k_base')).nVocab).toBe(200019);
  });
});
