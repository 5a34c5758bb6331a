// ============================================================================
// @ranktok/core — Public API
// ============================================================================

// Façade
export { Encoding } from './encoding.js';
export type { EncodingOptions } from './encoding.js';

// Registry
export {
  EncodingRegistry,
  createEncoding,
  getEncoding,
  encodingForModel,
  listEncodingNames,
  getDefaultRegistry,
  setDefaultRegistry,
} from './registry.js';
export type { CreateEncodingOptions } from './registry.js';

// Model map
export { encodingNameForModel, isModelSupported, listModels, registerModelEncoding } from './models.js';

// Schemes
export {
  SCHEMES,
  RANK_FILE_SHA256,
  R50K_PAT_STR,
  CL100K_PAT_STR,
  O200K_PAT_STR,
  ENDOFTEXT,
  FIM_PREFIX,
  FIM_MIDDLE,
  FIM_SUFFIX,
  ENDOFPROMPT,
} from './schemes.js';
export type { SchemeDefinition, RankSource } from './schemes.js';

// Tables
export { RankTable, toByteString, fromByteString, utf8ByteString, utf8Length } from './rank_table.js';
export { SpecialTokenTable } from './special_tokens.js';

// Engine
export { bytePairEncode, bytePairMerge, LARGE_PIECE_THRESHOLD } from './merge.js';
export type { MergeStrategy } from './merge.js';
export { buildSpecialScanner, findSpecialSpans, splitOrdinary, escapeRegExp } from './splitter.js';
export type { Span, SpecialScanner } from './splitter.js';
export { ChunkCache } from './chunk_cache.js';
export type { ChunkCacheOptions } from './chunk_cache.js';

// Vocabulary loading
export { loadRanks, loadBundledRanks, loadTiktokenFile, parseTiktokenBpe, parseCompressedRanks, sha256Hex } from './loader.js';

// Configuration
export { loadConfig } from './config.js';
export type { RanktokConfig } from './config.js';

// Errors
export {
  RanktokError,
  DisallowedSpecialTokenError,
  SingleTokenError,
  UnknownTokenError,
  DecodeError,
  VocabularyError,
  InvariantViolationError,
  UnknownEncodingError,
  UnknownModelError,
  ConfigError,
} from './errors.js';

// Logging
export { onLog, setLogLevel, getLogLevel, isDebugEnabled, parseLogLevel } from './logger.js';
export type { LogLevel, LogEntry, LogCallback } from './logger.js';

// Types
export { ENCODING_NAMES, isEncodingName } from './types.js';
export type {
  Token,
  Rank,
  TokenStream,
  EncodingName,
  SpecialTokenSelection,
  EncodeOptions,
  CacheStats,
} from './types.js';
