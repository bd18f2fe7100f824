/**
 * EDN Lexer Types
 * Shared types, token constants and error taxonomy
 */

export type { SourceLocation } from './source-location.js';
export {
  TOKEN_TYPES,
  type LiteralTokenType,
  type Token,
  type TokenType,
} from './token-types.js';
export {
  ERROR_IDS,
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorId,
  type ErrorRegistry,
} from './error-registry.js';
export { createError, EdnError, type EdnErrorData } from './error-classes.js';
