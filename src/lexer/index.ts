/**
 * Lexer Module
 * Converts EDN source text into tokens
 */

export {
  LexerError,
  UnexpectedInputError,
  UnfinishedTokenError,
  type UnfinishedToken,
} from './errors.js';
export {
  DEFAULT_TOKENIZE_OPTIONS,
  resolveOptions,
  type LexerCallbacks,
  type ResolvedTokenizeOptions,
  type TokenEvent,
  type TokenizeCompleteEvent,
  type TokenizeErrorEvent,
  type TokenizeOptions,
} from './options.js';
export { renderToken, renderTokens } from './render.js';
export { tokenize } from './tokenizer.js';
