// ============================================================================
// @ranktok/core — Configuration
// ============================================================================
//
// Process-level settings, read from the environment once per registry:
//
//   RANKTOK_DEBUG             1 | true | debug | warn | error  (default info)
//   RANKTOK_CACHE_SIZE        chunk cache entries per encoding, 0 = unbounded
//   RANKTOK_DEFAULT_ENCODING  encoding used when none is named (cl100k_base)
//   RANKTOK_VOCAB_DIR         directory of `.tiktoken` files to load instead
//                             of the bundled ranks
//   PORT                      HTTP port of the server (3000)
// ============================================================================

import process from 'node:process';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { type LogLevel, parseLogLevel } from './logger.js';
import { ENCODING_NAMES, type EncodingName } from './types.js';

export interface RanktokConfig {
  logLevel: LogLevel;
  /** Chunk cache limit per encoding; null means unbounded. */
  cacheSize: number | null;
  defaultEncoding: EncodingName;
  vocabDir?: string;
  port: number;
}

const envSchema = z.object({
  RANKTOK_DEBUG: z.string().optional(),
  RANKTOK_CACHE_SIZE: z.coerce.number().int().min(0).default(0),
  RANKTOK_DEFAULT_ENCODING: z.enum(ENCODING_NAMES).default('cl100k_base'),
  RANKTOK_VOCAB_DIR: z.string().min(1).optional(),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
});

/**
 * Read the configuration from an environment map.
 *
 * Empty variables count as unset.
 *
 * @throws ConfigError naming the first invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RanktokConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') present[key] = value.trim();
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(String(issue?.path[0] ?? 'environment'), issue?.message ?? 'invalid value');
  }

  const data = parsed.data;
  return {
    logLevel: parseLogLevel(data.RANKTOK_DEBUG),
    cacheSize: data.RANKTOK_CACHE_SIZE === 0 ? null : data.RANKTOK_CACHE_SIZE,
    defaultEncoding: data.RANKTOK_DEFAULT_ENCODING,
    vocabDir: data.RANKTOK_VOCAB_DIR,
    port: data.PORT,
  };
}
