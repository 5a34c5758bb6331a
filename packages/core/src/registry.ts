// ============================================================================
// @ranktok/core — Encoding Registry
// ============================================================================
//
// Lazily builds one Encoding per scheme and hands the same instance to every
// caller. Schemes that share a rank file (gpt2 / r50k_base, p50k_base /
// p50k_edit) share one loaded RankTable. A failed load is forgotten, so the
// next request retries it.
// ============================================================================

import { type RanktokConfig, loadConfig } from './config.js';
import { Encoding } from './encoding.js';
import { UnknownEncodingError } from './errors.js';
import { logVocabularyLoaded, setLogLevel, timer } from './logger.js';
import { loadRanks } from './loader.js';
import { encodingNameForModel } from './models.js';
import type { RankTable } from './rank_table.js';
import { type RankSource, SCHEMES, type SchemeDefinition } from './schemes.js';
import { SpecialTokenTable } from './special_tokens.js';
import { type CacheStats, ENCODING_NAMES, type EncodingName, isEncodingName } from './types.js';

export interface CreateEncodingOptions {
  /** Chunk cache limit; null or 0 means unbounded. */
  cacheSize?: number | null;
}

/**
 * Bind a scheme definition to a loaded rank table.
 *
 * @throws VocabularyError when the special tokens or the vocabulary size
 *   do not fit the ranks
 */
export function createEncoding(
  scheme: SchemeDefinition,
  ranks: RankTable,
  options: CreateEncodingOptions = {},
): Encoding {
  return new Encoding({
    name: scheme.name,
    patStr: scheme.patStr,
    ranks,
    specialTokens: SpecialTokenTable.from(Object.entries(scheme.specialTokens), ranks, scheme.name),
    explicitNVocab: scheme.explicitNVocab,
    cache: { maxEntries: options.cacheSize ?? null },
  });
}

/**
 * @example
 * ```ts
 * const registry = new EncodingRegistry({ cacheSize: 50_000 });
 * const enc = await registry.get('o200k_base');
 * const gpt4 = await registry.forModel('gpt-4');   // cl100k_base
 * registry.dispose();
 * ```
 */
export class EncodingRegistry {
  private readonly pending = new Map<EncodingName, Promise<Encoding>>();
  private readonly ready = new Map<EncodingName, Encoding>();
  private readonly rankLoads = new Map<RankSource, Promise<{ ranks: RankTable; origin: 'bundled' | 'file' }>>();
  private readonly config: Pick<RanktokConfig, 'cacheSize' | 'defaultEncoding' | 'vocabDir'>;

  constructor(config: Partial<Pick<RanktokConfig, 'cacheSize' | 'defaultEncoding' | 'vocabDir'>> = {}) {
    this.config = {
      cacheSize: config.cacheSize ?? null,
      defaultEncoding: config.defaultEncoding ?? 'cl100k_base',
      vocabDir: config.vocabDir,
    };
  }

  get defaultEncoding(): EncodingName {
    return this.config.defaultEncoding;
  }

  /**
   * The encoding named `name`, loading it on first use.
   *
   * @throws UnknownEncodingError for a name outside the supported schemes
   */
  get(name: string = this.config.defaultEncoding): Promise<Encoding> {
    if (!isEncodingName(name)) {
      return Promise.reject(new UnknownEncodingError(name, [...ENCODING_NAMES]));
    }
    let encoding = this.pending.get(name);
    if (!encoding) {
      encoding = this.load(name);
      this.pending.set(name, encoding);
    }
    return encoding;
  }

  /**
   * The encoding used by a model.
   *
   * @throws UnknownModelError when the model cannot be mapped
   */
  async forModel(model: string): Promise<Encoding> {
    return this.get(encodingNameForModel(model));
  }

  /** Names of the encodings built so far. */
  loaded(): EncodingName[] {
    return [...this.ready.keys()];
  }

  /** Chunk cache statistics for every built encoding. */
  stats(): Record<string, CacheStats | null> {
    const result: Record<string, CacheStats | null> = {};
    for (const [name, encoding] of this.ready) {
      result[name] = encoding.cacheStats();
    }
    return result;
  }

  /** Clear every cache and forget all built encodings. */
  dispose(): void {
    for (const encoding of this.ready.values()) {
      encoding.clearCache();
    }
    this.ready.clear();
    this.pending.clear();
    this.rankLoads.clear();
  }

  private async load(name: EncodingName): Promise<Encoding> {
    const scheme = SCHEMES[name];
    const t = timer(`load ${name}`);
    try {
      const { ranks, origin } = await this.ranksFor(scheme.rankSource);
      const encoding = createEncoding(scheme, ranks, { cacheSize: this.config.cacheSize });
      logVocabularyLoaded(name, origin, ranks.size, t.end({ encoding: name }));
      this.ready.set(name, encoding);
      return encoding;
    } catch (err: unknown) {
      this.pending.delete(name);
      throw err;
    }
  }

  private ranksFor(source: RankSource): Promise<{ ranks: RankTable; origin: 'bundled' | 'file' }> {
    let ranks = this.rankLoads.get(source);
    if (!ranks) {
      ranks = loadRanks(source, this.config.vocabDir).catch((err: unknown) => {
        this.rankLoads.delete(source);
        throw err;
      });
      this.rankLoads.set(source, ranks);
    }
    return ranks;
  }
}

// ---------------------------------------------------------------------------
// Process-wide registry
// ---------------------------------------------------------------------------

let defaultRegistry: EncodingRegistry | undefined;

/**
 * The registry behind `getEncoding` and `encodingForModel`, configured from
 * the environment on first use. Also applies the configured log level.
 *
 * @throws ConfigError when an environment variable is invalid
 */
export function getDefaultRegistry(): EncodingRegistry {
  if (!defaultRegistry) {
    const config = loadConfig();
    setLogLevel(config.logLevel);
    defaultRegistry = new EncodingRegistry(config);
  }
  return defaultRegistry;
}

/** Replace the process-wide registry (tests, custom vocabulary directories). */
export function setDefaultRegistry(registry: EncodingRegistry | undefined): void {
  defaultRegistry?.dispose();
  defaultRegistry = registry;
}

/**
 * @example
 * ```ts
 * const enc = await getEncoding('cl100k_base');
 * enc.encode('hello world'); // [15339, 1917]
 * ```
 */
export async function getEncoding(name: string): Promise<Encoding> {
  return getDefaultRegistry().get(name);
}

export async function encodingForModel(model: string): Promise<Encoding> {
  return getDefaultRegistry().forModel(model);
}

export function listEncodingNames(): EncodingName[] {
  return [...ENCODING_NAMES];
}
