/**
 * Token Builder
 * Owns the in-progress token and its single finalization path
 */

import {
  TOKEN_TYPES,
  type LiteralTokenType,
  type Token,
  type TokenType,
} from '../types.js';
import { UnfinishedTokenError } from './errors.js';
import {
  currentLocation,
  IDLE,
  type BuildingModeKind,
  type LexerState,
  type PendingToken,
} from './state.js';

function pendingToken(
  state: LexerState,
  type: TokenType,
  value: string
): PendingToken {
  return { type, value, start: currentLocation(state) };
}

/** Start a token at the cursor; call before its first character is consumed */
export function beginToken(
  state: LexerState,
  kind: BuildingModeKind,
  type: TokenType,
  value: string
): void {
  state.mode = { kind, token: pendingToken(state, type, value) };
}

export function beginLiteral(
  state: LexerState,
  literal: LiteralTokenType
): void {
  state.mode = {
    kind: 'check_literal',
    token: pendingToken(state, literal, literal),
  };
}

/** Switch scanning mode, keeping the pending token and its start */
export function continueAs(
  state: LexerState,
  kind: BuildingModeKind,
  token: PendingToken
): void {
  state.mode = { kind, token };
}

export function appendToken(token: PendingToken, text: string): void {
  token.value += text;
}

/** Upgrade the type in place; value and start are kept */
export function retypeToken(token: PendingToken, type: TokenType): void {
  token.type = type;
}

function toToken(state: LexerState, pending: PendingToken): Token {
  if (state.options.location) {
    return {
      type: pending.type,
      value: pending.value,
      location: pending.start,
    };
  }
  return { type: pending.type, value: pending.value };
}

function commitToken(state: LexerState, pending: PendingToken): void {
  if (pending.type === TOKEN_TYPES.KEYWORD && pending.value === '') {
    throw new UnfinishedTokenError(pending, pending.start);
  }

  const token = toToken(state, pending);
  state.tokens.push(token);
  state.mode = IDLE;
  state.options.callbacks.onToken?.({
    index: state.tokens.length - 1,
    token,
  });
}

/**
 * Move the pending token into the output and return to mode 'new'.
 *
 * @throws {UnfinishedTokenError} keyword with no name
 */
export function finalizeToken(state: LexerState): void {
  if (state.mode.kind !== 'new') {
    commitToken(state, state.mode.token);
  }
}

/** Emit a token whose whole lexeme is known at its first character */
export function emitToken(
  state: LexerState,
  type: TokenType,
  value: string
): void {
  commitToken(state, pendingToken(state, type, value));
}
