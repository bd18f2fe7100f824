/**
 * EDN Lexer
 * Exports the tokenizer, token types and error taxonomy
 */

export {
  DEFAULT_TOKENIZE_OPTIONS,
  LexerError,
  renderToken,
  renderTokens,
  resolveOptions,
  tokenize,
  UnexpectedInputError,
  UnfinishedTokenError,
  type LexerCallbacks,
  type ResolvedTokenizeOptions,
  type TokenEvent,
  type TokenizeCompleteEvent,
  type TokenizeErrorEvent,
  type TokenizeOptions,
  type UnfinishedToken,
} from './lexer/index.js';

// ============================================================
// TOKENS
// ============================================================
export {
  TOKEN_TYPES,
  type LiteralTokenType,
  type SourceLocation,
  type Token,
  type TokenType,
} from './types.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  createError,
  EdnError,
  ERROR_IDS,
  ERROR_REGISTRY,
  renderMessage,
  type EdnErrorData,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorId,
  type ErrorRegistry,
} from './types.js';
