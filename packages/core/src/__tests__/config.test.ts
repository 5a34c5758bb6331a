import { describe, expect, it } from 'vitest';
import { loadConfig } from '../config.js';
import { ConfigError } from '../errors.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      logLevel: 'info',
      cacheSize: null,
      defaultEncoding: 'cl100k_base',
      vocabDir: undefined,
      port: 3000,
    });
  });

  it('reads every variable', () => {
    expect(
      loadConfig({
        RANKTOK_DEBUG: '1',
        RANKTOK_CACHE_SIZE: '5000',
        RANKTOK_DEFAULT_ENCODING: 'o200k_base',
        RANKTOK_VOCAB_DIR: '/srv/vocab',
        PORT: '8080',
      }),
    ).toEqual({
      logLevel: 'debug',
      cacheSize: 5000,
      defaultEncoding: 'o200k_base',
      vocabDir: '/srv/vocab',
      port: 8080,
    });
  });

  it('treats empty variables as unset', () => {
    expect(loadConfig({ PORT: '', RANKTOK_CACHE_SIZE: '  ' }).port).toBe(3000);
  });

  it('names the invalid variable', () => {
    expect(() => loadConfig({ RANKTOK_CACHE_SIZE: 'lots' })).toThrow(ConfigError);
    expect(() => loadConfig({ RANKTOK_CACHE_SIZE: '-5' })).toThrow(/RANKTOK_CACHE_SIZE/);
    expect(() => loadConfig({ RANKTOK_DEFAULT_ENCODING: 'bogus' })).toThrow(/RANKTOK_DEFAULT_ENCODING/);
    expect(() => loadConfig({ PORT: '70000' })).toThrow(/PORT/);
  });
});
