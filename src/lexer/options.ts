/**
 * Tokenize Options
 * Public configuration and observability hooks for tokenize()
 */

import type { Token } from '../types.js';
import type { LexerError } from './errors.js';

/** Event emitted after a token is finalized */
export interface TokenEvent {
  /** Position of the token in the output sequence (0-based) */
  index: number;
  token: Token;
}

/** Event emitted after a successful tokenize() call */
export interface TokenizeCompleteEvent {
  tokenCount: number;
  durationMs: number;
}

/** Event emitted before a lexer error propagates to the caller */
export interface TokenizeErrorEvent {
  error: LexerError;
  durationMs: number;
}

/** Observability callbacks for monitoring tokenization */
export interface LexerCallbacks {
  /** Called each time a token is appended to the output */
  onToken?: (event: TokenEvent) => void;
  /** Called once the whole input has been tokenized */
  onComplete?: (event: TokenizeCompleteEvent) => void;
  /** Called when tokenization fails */
  onError?: (event: TokenizeErrorEvent) => void;
}

export interface TokenizeOptions {
  /** Attach the start {line, col} to every token (default false) */
  location?: boolean | undefined;
  callbacks?: LexerCallbacks | undefined;
}

export interface ResolvedTokenizeOptions {
  readonly location: boolean;
  readonly callbacks: LexerCallbacks;
}

export const DEFAULT_TOKENIZE_OPTIONS: ResolvedTokenizeOptions = {
  location: false,
  callbacks: {},
};

/**
 * Merge caller options with defaults.
 *
 * @throws {TypeError} location is present but not a boolean
 */
export function resolveOptions(
  options: TokenizeOptions = {}
): ResolvedTokenizeOptions {
  const location = options.location ?? DEFAULT_TOKENIZE_OPTIONS.location;
  if (typeof location !== 'boolean') {
    throw new TypeError(
      `Option location must be a boolean, got: ${typeof location}`
    );
  }

  return {
    location,
    callbacks: options.callbacks ?? DEFAULT_TOKENIZE_OPTIONS.callbacks,
  };
}
