// ============================================================================
// @ranktok/core — Model → Encoding Map
// ============================================================================
//
// Model names resolve to encodings by exact name first, then by the longest
// matching prefix (dated and fine-tuned variants such as `gpt-4o-2024-08-06`
// or `ft:gpt-4o:acme::abc123`). The tables live in `data/models.json`.
// ============================================================================

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { UnknownModelError } from './errors.js';
import { ENCODING_NAMES, type EncodingName } from './types.js';

const modelTableSchema = z.object({
  exact: z.record(z.enum(ENCODING_NAMES)),
  prefixes: z.record(z.enum(ENCODING_NAMES)),
});

function readModelTable(): { exact: Map<string, EncodingName>; prefixes: Map<string, EncodingName> } {
  const raw: unknown = JSON.parse(readFileSync(new URL('../data/models.json', import.meta.url), 'utf8'));
  const table = modelTableSchema.parse(raw);
  return {
    exact: new Map(Object.entries(table.exact)),
    prefixes: new Map(Object.entries(table.prefixes)),
  };
}

const { exact: MODEL_TO_ENCODING, prefixes: MODEL_PREFIX_TO_ENCODING } = readModelTable();

function longestPrefixMatch(model: string): EncodingName | undefined {
  let best: string | undefined;
  for (const prefix of MODEL_PREFIX_TO_ENCODING.keys()) {
    if (model.startsWith(prefix) && (best === undefined || prefix.length > best.length)) {
      best = prefix;
    }
  }
  return best === undefined ? undefined : MODEL_PREFIX_TO_ENCODING.get(best);
}

/**
 * Encoding name used by a model.
 *
 * @example
 * ```ts
 * encodingNameForModel('gpt-4o');             // 'o200k_base'
 * encodingNameForModel('gpt-4-0613');         // 'cl100k_base'
 * encodingNameForModel('text-davinci-003');   // 'p50k_base'
 * ```
 * @throws UnknownModelError when neither an exact name nor a prefix matches
 */
export function encodingNameForModel(model: string): EncodingName {
  const encoding = MODEL_TO_ENCODING.get(model) ?? longestPrefixMatch(model);
  if (encoding === undefined) {
    throw new UnknownModelError(model);
  }
  return encoding;
}

export function isModelSupported(model: string): boolean {
  return MODEL_TO_ENCODING.has(model) || longestPrefixMatch(model) !== undefined;
}

/** Every exact model name with its encoding, sorted by model name. */
export function listModels(): Array<{ model: string; encoding: EncodingName }> {
  return [...MODEL_TO_ENCODING]
    .map(([model, encoding]) => ({ model, encoding }))
    .sort((a, b) => a.model.localeCompare(b.model));
}

/**
 * Register (or override) a model name. With `prefix`, every model starting
 * with `model` maps to the encoding unless a longer prefix or an exact name
 * says otherwise.
 */
export function registerModelEncoding(model: string, encoding: EncodingName, options?: { prefix?: boolean }): void {
  if (options?.prefix) {
    MODEL_PREFIX_TO_ENCODING.set(model, encoding);
  } else {
    MODEL_TO_ENCODING.set(model, encoding);
  }
}
