import type { SourceLocation } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  NIL: 'nil',
  TRUE: 'true',
  FALSE: 'false',
  STRING: 'string',
  CHARACTER: 'character',
  INTEGER: 'integer',
  FLOAT: 'float',

  // Identifiers
  SYMBOL: 'symbol',
  KEYWORD: 'keyword',

  // Reader markers
  DISCARD: 'discard', // #_
  TAG: 'tag', // #name
  NS_MAP: 'ns_map', // #:ns
  SET_OPEN: 'set_open', // #{

  // Delimiters
  CURLY_OPEN: 'curly_open', // {
  CURLY_CLOSE: 'curly_close', // }
  BRACKET_OPEN: 'bracket_open', // [
  BRACKET_CLOSE: 'bracket_close', // ]
  PAREN_OPEN: 'paren_open', // (
  PAREN_CLOSE: 'paren_close', // )

  // Special
  COMMENT: 'comment',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/** Token types produced by the nil/true/false prefixes */
export type LiteralTokenType =
  | typeof TOKEN_TYPES.NIL
  | typeof TOKEN_TYPES.TRUE
  | typeof TOKEN_TYPES.FALSE;

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  /** Present only when tokenizing with `location: true` */
  readonly location?: SourceLocation;
}
