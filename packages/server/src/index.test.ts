import { EncodingRegistry } from '@ranktok/core';
import { describe, expect, it } from 'vitest';
import { createApp } from './index.js';

const registry = new EncodingRegistry({ defaultEncoding: 'gpt2' });
const app = createApp({ registry });

function post(path: string, body: unknown) {
  return app.request(path, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('GET routes', () => {
  it('GET /health returns service metadata', async () => {
    const response = await app.request('/health');
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'ok', service: 'ranktok-api', version: '0.1.0' });
  });

  it('GET /v1/encodings lists encodings and the default', async () => {
    const response = await app.request('/v1/encodings');
    expect(await response.json()).toEqual({
      encodings: ['gpt2', 'r50k_base', 'p50k_base', 'p50k_edit', 'cl100k_base', 'o200k_base'],
      default: 'gpt2',
    });
  });

  it('GET /v1/models/:model maps a model', async () => {
    const response = await app.request('/v1/models/gpt-4o-mini');
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ model: 'gpt-4o-mini', encoding: 'o200k_base' });
  });

  it('GET /v1/models/:model answers 404 for unknown models', async () => {
    const response = await app.request('/v1/models/llama-3');
    expect(response.status).toBe(404);
    expect(await response.json()).toMatchObject({ error: { code: 'UnknownModelError' } });
  });
});

describe('POST /v1/encode', () => {
  it('encodes with the default encoding', async () => {
    const response = await post('/v1/encode', { text: 'hello world' });
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ encoding: 'gpt2', tokens: [31373, 995], count: 2 });
  });

  it('encodes with a model and allowed specials', async () => {
    const response = await post('/v1/encode', {
      text: 'hello world<|endoftext|>',
      model: 'gpt-4',
      allowedSpecial: 'all',
    });
    expect(await response.json()).toEqual({ encoding: 'cl100k_base', tokens: [15339, 1917, 100257], count: 3 });
  });

  it('answers 422 for a disallowed special token', async () => {
    const response = await post('/v1/encode', { text: '<|endoftext|>' });
    expect(response.status).toBe(422);
    expect(await response.json()).toMatchObject({ error: { code: 'DisallowedSpecialTokenError' } });
  });

  it('answers 422 for an unknown encoding', async () => {
    const response = await post('/v1/encode', { text: 'x', encoding: 'r51k' });
    expect(response.status).toBe(422);
    expect(await response.json()).toMatchObject({ error: { code: 'UnknownEncodingError' } });
  });

  it('answers 400 for an invalid body', async () => {
    const response = await post('/v1/encode', { text: 42 });
    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({
      error: { code: 'VALIDATION_ERROR', message: expect.stringMatching(/^text: /) },
    });
  });
});

describe('POST /v1/count and /v1/decode', () => {
  it('counts tokens', async () => {
    const response = await post('/v1/count', { text: 'hello world', encoding: 'cl100k_base' });
    expect(await response.json()).toEqual({ encoding: 'cl100k_base', count: 2 });
  });

  it('decodes tokens', async () => {
    const response = await post('/v1/decode', { tokens: [31373, 995] });
    expect(await response.json()).toEqual({ encoding: 'gpt2', text: 'hello world' });
  });

  it('answers 422 for unknown token ids', async () => {
    const response = await post('/v1/decode', { tokens: [999999], strict: true });
    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      error: { code: 'UnknownTokenError', message: 'Invalid token for decoding: 999999' },
    });
  });

  it('rejects negative ids', async () => {
    const response = await post('/v1/decode', { tokens: [-1] });
    expect(response.status).toBe(400);
  });
});
