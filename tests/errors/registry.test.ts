/**
 * Error Taxonomy Tests
 * Registry lookup, template rendering, error classes and factory
 */

import { describe, expect, it } from 'vitest';
import {
  createError,
  EdnError,
  ERROR_IDS,
  ERROR_REGISTRY,
  LexerError,
  renderMessage,
  type SourceLocation,
} from '../../src/index.js';

describe('Error Taxonomy', () => {
  describe('Registry', () => {
    it('holds the unexpected-input and unfinished-token definitions', () => {
      expect(
        ERROR_REGISTRY.definitions().map((definition) => definition.errorId)
      ).toEqual(['EDN-L001', 'EDN-L002']);
      expect(ERROR_REGISTRY.get(ERROR_IDS.UNEXPECTED_INPUT)?.description).toBe(
        'Unexpected input'
      );
      expect(ERROR_REGISTRY.get(ERROR_IDS.UNFINISHED_TOKEN)?.description).toBe(
        'Unfinished token'
      );
    });

    it('uses the EDN-L{3 digits} format for every lexer error', () => {
      for (const definition of ERROR_REGISTRY.definitions()) {
        expect(definition.errorId).toMatch(/^EDN-L\d{3}$/);
        expect(definition.category).toBe('lexer');
        expect(ERROR_REGISTRY.get(definition.errorId)).toBe(definition);
      }
    });

    it('returns undefined for an unknown id', () => {
      expect(ERROR_REGISTRY.get('EDN-X999')).toBeUndefined();
      expect(ERROR_REGISTRY.has('')).toBe(false);
    });
  });

  describe('renderMessage', () => {
    it('replaces placeholders with context values', () => {
      expect(
        renderMessage('Unfinished {type} token "{value}"', {
          type: 'string',
          value: 'ab',
        })
      ).toBe('Unfinished string token "ab"');
    });

    it('renders a missing value as an empty string', () => {
      expect(renderMessage('Hello {name}', {})).toBe('Hello ');
    });

    it('coerces non-string values', () => {
      expect(renderMessage('{count} tokens', { count: 3 })).toBe('3 tokens');
    });

    it('returns the template unchanged for an unclosed brace', () => {
      expect(renderMessage('Broken {name', { name: 'x' })).toBe('Broken {name');
    });
  });

  describe('EdnError', () => {
    const location: SourceLocation = { line: 2, col: 4 };

    it('suffixes the message with the location', () => {
      const error = new EdnError({
        errorId: 'EDN-L001',
        message: 'Unexpected input "@"',
        location,
      });
      expect(error.message).toBe('Unexpected input "@" at 2:4');
      expect(error.name).toBe('EdnError');
    });

    it('omits the suffix without a location', () => {
      const error = new EdnError({ errorId: 'EDN-L001', message: 'plain' });
      expect(error.message).toBe('plain');
    });

    it('strips the location suffix in toData', () => {
      const error = new EdnError({
        errorId: 'EDN-L002',
        message: 'Unfinished string token "a"',
        location,
        context: { type: 'string', value: 'a' },
      });
      expect(error.toData()).toEqual({
        errorId: 'EDN-L002',
        message: 'Unfinished string token "a"',
        location,
        context: { type: 'string', value: 'a' },
      });
    });

    it('formats through a host formatter', () => {
      const error = new EdnError({
        errorId: 'EDN-L001',
        message: 'Unexpected input "@"',
        location,
      });
      expect(error.format()).toBe('Unexpected input "@" at 2:4');
      expect(
        error.format(
          (data) => `${data.errorId} ${data.location?.line}: ${data.message}`
        )
      ).toBe('EDN-L001 2: Unexpected input "@"');
    });

    it('throws TypeError for an unknown id', () => {
      expect(() => new EdnError({ errorId: 'EDN-X999', message: 'x' })).toThrow(
        'Unknown error ID: EDN-X999'
      );
      expect(() => new EdnError({ errorId: '', message: 'x' })).toThrow(
        'errorId is required'
      );
    });
  });

  describe('LexerError', () => {
    it('keeps id, location and context', () => {
      const location: SourceLocation = { line: 1, col: 5 };
      const error = new LexerError('EDN-L001', 'Test lexer error', location, {
        char: '@',
      });

      expect(error).toBeInstanceOf(EdnError);
      expect(error.name).toBe('LexerError');
      expect(error.message).toBe('Test lexer error at 1:5');
      expect(error.location).toEqual(location);
      expect(error.context).toEqual({ char: '@' });
    });

    it('throws TypeError for an unknown id', () => {
      expect(
        () => new LexerError('EDN-X999', 'x', { line: 1, col: 0 })
      ).toThrow('Unknown error ID: EDN-X999');
    });
  });

  describe('createError', () => {
    it('renders the registry template', () => {
      const error = createError('EDN-L001', { char: '@' }, { line: 1, col: 0 });
      expect(error).toBeInstanceOf(EdnError);
      expect(error.message).toBe('Unexpected input "@" at 1:0');
      expect(error.context).toEqual({ char: '@' });
    });

    it('throws TypeError for an unknown id', () => {
      expect(() => createError('EDN-X999', {})).toThrow(TypeError);
    });
  });
});
