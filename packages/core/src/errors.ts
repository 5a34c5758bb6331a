// ============================================================================
// @ranktok/core — Error Types
// ============================================================================

/**
 * Base error class for all ranktok errors.
 */
export class RanktokError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RanktokError';
  }
}

// ---------------------------------------------------------------------------
// Encoding Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a disallowed special-token string appears literally in the
 * text passed to `encode`.
 */
export class DisallowedSpecialTokenError extends RanktokError {
  public readonly token: string;
  /** UTF-8 byte offset of the match in the input text. */
  public readonly offset: number;
  /** UTF-16 code unit index of the match in the input text. */
  public readonly index: number;

  constructor(token: string, offset: number, index: number) {
    super(
      `Encountered text corresponding to disallowed special token "${token}" at byte offset ${offset}. ` +
        'Pass it in allowedSpecial to encode it as a special token, or remove it from disallowedSpecial to encode it as normal text.',
    );
    this.name = 'DisallowedSpecialTokenError';
    this.token = token;
    this.offset = offset;
    this.index = index;
  }
}

/**
 * Thrown by `encodeSingleToken` when the text is not exactly one token.
 */
export class SingleTokenError extends RanktokError {
  public readonly text: string;

  constructor(text: string) {
    super(`Text "${text}" does not correspond to a single token`);
    this.name = 'SingleTokenError';
    this.text = text;
  }
}

// ---------------------------------------------------------------------------
// Decoding Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a token id belongs to neither the ordinary nor the special range.
 */
export class UnknownTokenError extends RanktokError {
  public readonly token: number;

  constructor(token: number) {
    super(`Invalid token for decoding: ${token}`);
    this.name = 'UnknownTokenError';
    this.token = token;
  }
}

/**
 * Thrown by strict `decode` when the token bytes are not valid UTF-8.
 * Use `decodeLossy` or `decodeBytes` for artificial token sequences.
 */
export class DecodeError extends RanktokError {
  constructor(message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

// ---------------------------------------------------------------------------
// Vocabulary Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a vocabulary fails validation at load time: missing single
 * bytes, duplicate ranks, special tokens overlapping ordinary ranks, a
 * malformed rank file or a hash mismatch.
 */
export class VocabularyError extends RanktokError {
  public readonly source?: string;

  constructor(message: string, source?: string) {
    super(source ? `${message} (${source})` : message);
    this.name = 'VocabularyError';
    this.source = source;
  }
}

/**
 * Thrown when the merge engine produces a span missing from the rank table.
 * Indicates a defect in the engine or an unvalidated vocabulary, never bad input.
 */
export class InvariantViolationError extends RanktokError {
  public readonly span: Uint8Array;

  constructor(span: Uint8Array) {
    super(`Merge produced a byte span absent from the rank table: [${Array.from(span).join(', ')}]`);
    this.name = 'InvariantViolationError';
    this.span = span;
  }
}

// ---------------------------------------------------------------------------
// Registry Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a requested encoding name is not registered.
 */
export class UnknownEncodingError extends RanktokError {
  public readonly encoding: string;
  public readonly available: string[];

  constructor(encoding: string, available: string[] = []) {
    super(`Unknown encoding "${encoding}". Available: ${available.join(', ')}`);
    this.name = 'UnknownEncodingError';
    this.encoding = encoding;
    this.available = available;
  }
}

/**
 * Thrown when a model name cannot be mapped to an encoding.
 */
export class UnknownModelError extends RanktokError {
  public readonly model: string;

  constructor(model: string) {
    super(
      `Could not automatically map "${model}" to an encoding. Use getEncoding(name) to pick one explicitly.`,
    );
    this.name = 'UnknownModelError';
    this.model = model;
  }
}

// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when an environment variable holds an invalid value.
 */
export class ConfigError extends RanktokError {
  public readonly field: string;

  constructor(field: string, reason: string) {
    super(`Invalid ${field}: ${reason}`);
    this.name = 'ConfigError';
    this.field = field;
  }
}
