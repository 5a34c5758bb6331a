// ============================================================================
// @ranktok/core — Logging
// ============================================================================

import process from 'node:process';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

/**
 * Callback for log events (the server and tests hook in here).
 */
export type LogCallback = (entry: LogEntry) => void;

const callbacks: Set<LogCallback> = new Set();

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Map a `RANKTOK_DEBUG` value to a log level.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (value === '1' || value === 'true' || value === 'debug') return 'debug';
  if (value === 'warn') return 'warn';
  if (value === 'error') return 'error';
  return 'info';
}

let currentLevel: LogLevel = parseLogLevel(process.env.RANKTOK_DEBUG);

function shouldLog(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[currentLevel];
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };

  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  const msg = `[ranktok] ${message}${dataStr}`;

  switch (level) {
    case 'debug':
      console.debug(msg);
      break;
    case 'info':
      console.info(msg);
      break;
    case 'warn':
      console.warn(msg);
      break;
    case 'error':
      console.error(msg);
      break;
  }

  for (const cb of callbacks) {
    try {
      cb(entry);
    } catch (e) {
      console.error('[ranktok] Log callback error:', e);
    }
  }
}

/** Only logs when RANKTOK_DEBUG=1 is set. */
export function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data);
}

export function info(message: string, data?: Record<string, unknown>): void {
  log('info', message, data);
}

export function warn(message: string, data?: Record<string, unknown>): void {
  log('warn', message, data);
}

export function error(message: string, data?: Record<string, unknown>): void {
  log('error', message, data);
}

// ---------------------------------------------------------------------------
// Performance Timing
// ---------------------------------------------------------------------------

export class Timer {
  private startTime: number;
  private label: string;

  constructor(label: string) {
    this.label = label;
    this.startTime = performance.now();
  }

  /**
   * End the timer, log the duration at debug level and return it.
   */
  end(data?: Record<string, unknown>): number {
    const duration = performance.now() - this.startTime;
    debug(`${this.label}: ${duration.toFixed(2)}ms`, { ...data, durationMs: duration });
    return duration;
  }
}

export function timer(label: string): Timer {
  return new Timer(label);
}

// ---------------------------------------------------------------------------
// Event Callbacks
// ---------------------------------------------------------------------------

/**
 * Register a callback for log events. Returns the unsubscribe function.
 */
export function onLog(callback: LogCallback): () => void {
  callbacks.add(callback);
  return () => callbacks.delete(callback);
}

// ---------------------------------------------------------------------------
// Specific Log Events
// ---------------------------------------------------------------------------

export function logVocabularyLoaded(
  encoding: string,
  source: 'bundled' | 'file',
  size: number,
  durationMs: number,
): void {
  debug(`loaded ${encoding} from ${source} ranks (${size} entries) in ${durationMs.toFixed(1)}ms`, {
    encoding,
    source,
    size,
    durationMs,
  });
}

export function logHashVerified(path: string, sha256: string): void {
  debug(`vocabulary hash verified for ${path}`, { path, sha256: sha256.slice(0, 12) });
}

export function logCacheCleared(encoding: string, entries: number): void {
  debug(`cleared ${entries} cached chunks for ${encoding}`, { encoding, entries });
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isDebugEnabled(): boolean {
  return currentLevel === 'debug';
}
