/**
 * Lexer State
 * Scan mode, input position and the line/column cursor
 */

import type { SourceLocation, Token, TokenType } from '../types.js';
import type { ResolvedTokenizeOptions } from './options.js';

/** Token being accumulated; type may be upgraded while scanning */
export interface PendingToken {
  type: TokenType;
  value: string;
  readonly start: SourceLocation;
}

/** Modes that accumulate a pending token */
export type BuildingModeKind =
  | 'comment'
  | 'string'
  | 'symbol'
  | 'number'
  | 'fraction'
  | 'exponent';

export interface IdleMode {
  readonly kind: 'new';
}

export interface BuildingMode {
  readonly kind: BuildingModeKind;
  readonly token: PendingToken;
}

/** A nil/true/false prefix was read; the next character decides its fate */
export interface CheckLiteralMode {
  readonly kind: 'check_literal';
  /** Provisional type is one of nil/true/false until reclassified */
  readonly token: PendingToken;
}

export type ScanMode = IdleMode | BuildingMode | CheckLiteralMode;

export interface LexerState {
  readonly source: string;
  readonly options: ResolvedTokenizeOptions;
  readonly tokens: Token[];
  mode: ScanMode;
  pos: number;
  line: number;
  col: number;
}

export const IDLE: IdleMode = { kind: 'new' };

export function createLexerState(
  source: string,
  options: ResolvedTokenizeOptions
): LexerState {
  return {
    source,
    options,
    tokens: [],
    mode: IDLE,
    pos: 0,
    line: 1,
    col: 0,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, col: state.col };
}

function charAtIndex(source: string, index: number): string {
  const code = source.codePointAt(index);
  return code === undefined ? '' : String.fromCodePoint(code);
}

/** Character (full code point) at the read position, '' at end of input */
export function peek(state: LexerState): string {
  return charAtIndex(state.source, state.pos);
}

/** Character following the one at the read position */
export function peekNext(state: LexerState): string {
  return charAtIndex(state.source, state.pos + peek(state).length);
}

export function startsWith(state: LexerState, text: string): boolean {
  return state.source.startsWith(text, state.pos);
}

/**
 * Consume raw source text and move the cursor over it.
 * '\n' starts a new line, '\r' is zero-width, anything else is one column.
 */
export function advance(state: LexerState, raw: string): void {
  state.pos += raw.length;
  for (const ch of raw) {
    if (ch === '\n') {
      state.line++;
      state.col = 0;
    } else if (ch !== '\r') {
      state.col++;
    }
  }
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}
