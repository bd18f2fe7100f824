/**
 * Lexer Helper Functions
 * Character classification and lookup tables
 */

import { TOKEN_TYPES, type TokenType } from '../types.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

const SYMBOL_PUNCTUATION = new Set([
  '_',
  '?',
  '.',
  '*',
  '+',
  '!',
  '-',
  '$',
  '%',
  '&',
  '=',
  '<',
  '>',
  '#',
  ':',
  '|',
]);

/** Characters allowed after the first character of a symbol, keyword or tag */
export function isSymbolChar(ch: string): boolean {
  return isLetter(ch) || isDigit(ch) || SYMBOL_PUNCTUATION.has(ch);
}

/** Whitespace, with the comma counted as whitespace */
export function isWhitespace(ch: string): boolean {
  return (
    ch === ' ' ||
    ch === '\t' ||
    ch === '\n' ||
    ch === '\r' ||
    ch === '\f' ||
    ch === '\v' ||
    ch === ','
  );
}

export const DELIMITERS: Readonly<Partial<Record<string, TokenType>>> = {
  '{': TOKEN_TYPES.CURLY_OPEN,
  '}': TOKEN_TYPES.CURLY_CLOSE,
  '[': TOKEN_TYPES.BRACKET_OPEN,
  ']': TOKEN_TYPES.BRACKET_CLOSE,
  '(': TOKEN_TYPES.PAREN_OPEN,
  ')': TOKEN_TYPES.PAREN_CLOSE,
};

export function isDelimiter(ch: string): boolean {
  return Object.hasOwn(DELIMITERS, ch);
}

/** Ends a literal, number or symbol */
export function isSeparator(ch: string): boolean {
  return isWhitespace(ch) || isDelimiter(ch);
}

/** Decoded form of the character following a backslash inside a string */
export const STRING_ESCAPES: Readonly<Partial<Record<string, string>>> = {
  '"': '"',
  t: '\t',
  r: '\r',
  n: '\n',
  '\\': '\\',
};
