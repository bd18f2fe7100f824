/**
 * Token Rendering
 * Turns tokens back into EDN source text
 */

import { TOKEN_TYPES, type Token } from '../types.js';

const STRING_UNESCAPES: Readonly<Partial<Record<string, string>>> = {
  '"': '\\"',
  '\\': '\\\\',
  '\t': '\\t',
  '\r': '\\r',
  '\n': '\\n',
};

function quoteString(value: string): string {
  let result = '"';
  for (const ch of value) {
    result += STRING_UNESCAPES[ch] ?? ch;
  }
  return result + '"';
}

/**
 * Source lexeme of a token. Tokenizing the result yields a token with the
 * same type and value, except for a symbol spelled nil, true or false: those
 * come only from a prefix cut short (`nil"x"`) and render as the literal.
 *
 * @example
 * renderToken({ type: 'keyword', value: 'a/b' }) // ':a/b'
 */
export function renderToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.KEYWORD:
      return `:${token.value}`;
    case TOKEN_TYPES.TAG:
      return `#${token.value}`;
    case TOKEN_TYPES.NS_MAP:
      return `#:${token.value}`;
    case TOKEN_TYPES.CHARACTER:
      return `\\${token.value}`;
    case TOKEN_TYPES.COMMENT:
      return `;${token.value}`;
    case TOKEN_TYPES.STRING:
      return quoteString(token.value);
    default:
      return token.value;
  }
}

/** Render tokens separated by a space; a comment is followed by a newline */
export function renderTokens(tokens: readonly Token[]): string {
  let result = '';
  tokens.forEach((token, index) => {
    if (index > 0) {
      result += tokens[index - 1]?.type === TOKEN_TYPES.COMMENT ? '\n' : ' ';
    }
    result += renderToken(token);
  });
  return result;
}
