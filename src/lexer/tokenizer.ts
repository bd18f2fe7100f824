/**
 * Tokenizer
 * Single-pass scanner driving the mode machine
 */

import { TOKEN_TYPES, type LiteralTokenType, type Token } from '../types.js';
import {
  appendToken,
  beginLiteral,
  beginToken,
  continueAs,
  emitToken,
  finalizeToken,
  retypeToken,
} from './builder.js';
import {
  LexerError,
  UnexpectedInputError,
  UnfinishedTokenError,
} from './errors.js';
import {
  DELIMITERS,
  isDigit,
  isLetter,
  isSeparator,
  isSymbolChar,
  isWhitespace,
  STRING_ESCAPES,
} from './helpers.js';
import { resolveOptions, type TokenizeOptions } from './options.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  peek,
  peekNext,
  startsWith,
  type BuildingMode,
  type CheckLiteralMode,
  type LexerState,
} from './state.js';

const LITERALS: readonly LiteralTokenType[] = [
  TOKEN_TYPES.NIL,
  TOKEN_TYPES.TRUE,
  TOKEN_TYPES.FALSE,
];

function unexpected(state: LexerState, ch: string): UnexpectedInputError {
  return new UnexpectedInputError(ch, currentLocation(state));
}

function unfinished(mode: BuildingMode): UnfinishedTokenError {
  return new UnfinishedTokenError(mode.token, mode.token.start);
}

function scanNew(state: LexerState, ch: string): void {
  if (ch === ';') {
    beginToken(state, 'comment', TOKEN_TYPES.COMMENT, '');
    advance(state, ch);
    return;
  }

  const literal = LITERALS.find((text) => startsWith(state, text));
  if (literal !== undefined) {
    beginLiteral(state, literal);
    advance(state, literal);
    return;
  }

  if (ch === '"') {
    beginToken(state, 'string', TOKEN_TYPES.STRING, '');
    advance(state, ch);
    return;
  }

  // Character literal: backslash plus exactly one character
  if (ch === '\\') {
    const next = peekNext(state);
    if (next === '') {
      throw new UnfinishedTokenError(
        { type: TOKEN_TYPES.CHARACTER, value: '' },
        currentLocation(state)
      );
    }
    emitToken(state, TOKEN_TYPES.CHARACTER, next);
    advance(state, ch + next);
    return;
  }

  if (ch === ':') {
    beginToken(state, 'symbol', TOKEN_TYPES.KEYWORD, '');
    advance(state, ch);
    return;
  }

  const delimiterType = DELIMITERS[ch];
  if (delimiterType !== undefined) {
    emitToken(state, delimiterType, ch);
    advance(state, ch);
    return;
  }

  if (ch === '#') {
    scanDispatch(state);
    return;
  }

  if (isWhitespace(ch)) {
    advance(state, ch);
    return;
  }

  if (ch === '-' || ch === '+' || isDigit(ch)) {
    beginToken(state, 'number', TOKEN_TYPES.INTEGER, ch);
    advance(state, ch);
    return;
  }

  if (isLetter(ch)) {
    beginToken(state, 'symbol', TOKEN_TYPES.SYMBOL, ch);
    advance(state, ch);
    return;
  }

  throw unexpected(state, ch);
}

/** '#' prefixed markers: #{ #_ #: and tags */
function scanDispatch(state: LexerState): void {
  if (startsWith(state, '#{')) {
    emitToken(state, TOKEN_TYPES.SET_OPEN, '#{');
    advance(state, '#{');
  } else if (startsWith(state, '#_')) {
    emitToken(state, TOKEN_TYPES.DISCARD, '#_');
    advance(state, '#_');
  } else if (startsWith(state, '#:')) {
    beginToken(state, 'symbol', TOKEN_TYPES.NS_MAP, '');
    advance(state, '#:');
  } else {
    beginToken(state, 'symbol', TOKEN_TYPES.TAG, '');
    advance(state, '#');
  }
}

function scanComment(
  state: LexerState,
  mode: BuildingMode,
  ch: string
): void {
  advance(state, ch);
  if (ch === '\n' || ch === '\r') {
    finalizeToken(state);
  } else if (ch !== ';') {
    appendToken(mode.token, ch);
  }
}

/** A literal stands only when a separator follows; else it seeds a symbol */
function scanCheckLiteral(
  state: LexerState,
  mode: CheckLiteralMode,
  ch: string
): void {
  if (isSeparator(ch)) {
    finalizeToken(state);
    return;
  }

  retypeToken(mode.token, TOKEN_TYPES.SYMBOL);
  continueAs(state, 'symbol', mode.token);
}

function scanString(
  state: LexerState,
  mode: BuildingMode,
  ch: string
): void {
  if (ch === '"') {
    advance(state, ch);
    finalizeToken(state);
    return;
  }

  if (ch !== '\\') {
    appendToken(mode.token, ch);
    advance(state, ch);
    return;
  }

  const escaped = peekNext(state);
  if (escaped === '') {
    throw unfinished(mode);
  }

  const decoded = STRING_ESCAPES[escaped];
  if (decoded === undefined) {
    advance(state, ch);
    throw unexpected(state, escaped);
  }

  appendToken(mode.token, decoded);
  advance(state, ch + escaped);
}

function scanSymbol(
  state: LexerState,
  mode: BuildingMode,
  ch: string
): void {
  if (ch === '/') {
    if (mode.token.value.includes('/')) {
      throw unexpected(state, ch);
    }
    appendToken(mode.token, ch);
    advance(state, ch);
    return;
  }

  if (isSymbolChar(ch)) {
    appendToken(mode.token, ch);
    advance(state, ch);
    return;
  }

  // Not consumed: the character is read again in mode 'new'
  finalizeToken(state);
}

function scanNumber(
  state: LexerState,
  mode: BuildingMode,
  ch: string
): void {
  const { token } = mode;

  if (mode.kind === 'number') {
    switch (ch) {
      case 'N':
        appendToken(token, ch);
        advance(state, ch);
        finalizeToken(state);
        return;
      case 'M':
        appendToken(token, ch);
        retypeToken(token, TOKEN_TYPES.FLOAT);
        advance(state, ch);
        finalizeToken(state);
        return;
      case '.':
        appendToken(token, ch);
        retypeToken(token, TOKEN_TYPES.FLOAT);
        continueAs(state, 'fraction', token);
        advance(state, ch);
        return;
      case 'e':
      case 'E':
        appendToken(token, ch);
        retypeToken(token, TOKEN_TYPES.FLOAT);
        continueAs(state, 'exponent', token);
        advance(state, ch);
        return;
    }
  }

  if (mode.kind === 'exponent' && (ch === '-' || ch === '+')) {
    appendToken(token, ch);
    advance(state, ch);
    return;
  }

  if (isDigit(ch)) {
    appendToken(token, ch);
    continueAs(state, 'number', token);
    advance(state, ch);
    return;
  }

  if (isSeparator(ch)) {
    if (mode.kind !== 'number') {
      throw unfinished(mode);
    }
    finalizeToken(state);
    return;
  }

  throw unexpected(state, ch);
}

/** Dispatch one character according to the current mode */
function step(state: LexerState): void {
  const ch = peek(state);
  const mode = state.mode;

  switch (mode.kind) {
    case 'new':
      scanNew(state, ch);
      break;
    case 'comment':
      scanComment(state, mode, ch);
      break;
    case 'check_literal':
      scanCheckLiteral(state, mode, ch);
      break;
    case 'string':
      scanString(state, mode, ch);
      break;
    case 'symbol':
      scanSymbol(state, mode, ch);
      break;
    case 'number':
    case 'fraction':
    case 'exponent':
      scanNumber(state, mode, ch);
      break;
  }
}

function finish(state: LexerState): Token[] {
  const mode = state.mode;
  switch (mode.kind) {
    case 'string':
    case 'fraction':
    case 'exponent':
      throw unfinished(mode);
    default:
      finalizeToken(state);
      return state.tokens;
  }
}

/**
 * Convert EDN source text into tokens, in source order.
 * Whitespace and commas produce no tokens; comments do.
 *
 * @throws {UnexpectedInputError} no transition matches a character
 * @throws {UnfinishedTokenError} input or grammar ends inside a token
 */
export function tokenize(source: string, options?: TokenizeOptions): Token[] {
  const resolved = resolveOptions(options);
  const { callbacks } = resolved;
  const startTime = Date.now();
  const state = createLexerState(source, resolved);

  try {
    while (!isAtEnd(state)) {
      step(state);
    }
    const tokens = finish(state);
    callbacks.onComplete?.({
      tokenCount: tokens.length,
      durationMs: Date.now() - startTime,
    });
    return tokens;
  } catch (error) {
    if (error instanceof LexerError) {
      callbacks.onError?.({ error, durationMs: Date.now() - startTime });
    }
    throw error;
  }
}
