/**
 * Lexer Errors
 */

import {
  EdnError,
  ERROR_IDS,
  ERROR_REGISTRY,
  renderMessage,
} from '../types.js';
import type { SourceLocation, TokenType } from '../types.js';

export class LexerError extends EdnError {
  // Lexer errors always have a location
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }

    if (definition.category !== 'lexer') {
      throw new TypeError(`Expected lexer error ID, got: ${errorId}`);
    }

    super({ errorId, message, location, context });

    this.name = 'LexerError';
    this.location = location;
  }
}

function messageFor(errorId: string, context: Record<string, unknown>): string {
  const definition = ERROR_REGISTRY.get(errorId);
  return definition ? renderMessage(definition.messageTemplate, context) : '';
}

/** No transition matches the character in the current mode */
export class UnexpectedInputError extends LexerError {
  readonly char: string;

  constructor(char: string, location: SourceLocation) {
    const context = { char };
    super(
      ERROR_IDS.UNEXPECTED_INPUT,
      messageFor(ERROR_IDS.UNEXPECTED_INPUT, context),
      location,
      context
    );
    this.name = 'UnexpectedInputError';
    this.char = char;
  }
}

/** Snapshot of the token that was being built when scanning stopped */
export interface UnfinishedToken {
  readonly type: TokenType;
  readonly value: string;
}

/** Input or grammar ended before the token was complete */
export class UnfinishedTokenError extends LexerError {
  readonly token: UnfinishedToken;

  /** @param location - Start of the unfinished token */
  constructor(token: UnfinishedToken, location: SourceLocation) {
    const context = { type: token.type, value: token.value };
    super(
      ERROR_IDS.UNFINISHED_TOKEN,
      messageFor(ERROR_IDS.UNFINISHED_TOKEN, context),
      location,
      context
    );
    this.name = 'UnfinishedTokenError';
    this.token = { type: token.type, value: token.value };
  }
}
