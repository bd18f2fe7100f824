/**
 * Lexer Tests: Token Rendering
 * renderToken / renderTokens produce source that tokenizes back
 */

import { describe, expect, it } from 'vitest';
import { renderToken, renderTokens, tokenize } from '../../src/index.js';

const SAMPLE =
  '(defn f [x] {:a 1.5M, :b #{\\c "s\\t"}} #inst "t" #_ nil true false ' +
  '42N -3 1e5 #:ns{} ; note\n)';

describe('Lexer: Token Rendering', () => {
  describe('renderToken', () => {
    it('restores prefixes stripped from the value', () => {
      expect(renderToken({ type: 'keyword', value: 'a/b' })).toBe(':a/b');
      expect(renderToken({ type: 'tag', value: 'inst' })).toBe('#inst');
      expect(renderToken({ type: 'ns_map', value: 'ns' })).toBe('#:ns');
      expect(renderToken({ type: 'character', value: 'c' })).toBe('\\c');
      expect(renderToken({ type: 'comment', value: ' note' })).toBe('; note');
    });

    it('quotes and escapes strings', () => {
      expect(renderToken({ type: 'string', value: 'say "hi"\n\t\r\\' })).toBe(
        '"say \\"hi\\"\\n\\t\\r\\\\"'
      );
    });

    it('returns markers, numbers and symbols verbatim', () => {
      expect(renderToken({ type: 'set_open', value: '#{' })).toBe('#{');
      expect(renderToken({ type: 'float', value: '3.14M' })).toBe('3.14M');
      expect(renderToken({ type: 'symbol', value: 'my.ns/fn' })).toBe(
        'my.ns/fn'
      );
    });

    it('renders each token of a sample to source yielding the same token', () => {
      const tokens = tokenize(SAMPLE);
      expect(tokens).toHaveLength(29);
      for (const token of tokens) {
        expect(tokenize(renderToken(token))).toEqual([token]);
      }
    });
  });

  describe('renderTokens', () => {
    it('returns an empty string for no tokens', () => {
      expect(renderTokens([])).toBe('');
    });

    it('separates tokens with spaces', () => {
      expect(renderTokens(tokenize('[1,2]'))).toBe('[ 1 2 ]');
    });

    it('ends a comment with a newline', () => {
      expect(renderTokens(tokenize(';c\nx'))).toBe(';c\nx');
    });

    it('produces source that tokenizes to the same tokens', () => {
      const tokens = tokenize(SAMPLE);
      expect(tokenize(renderTokens(tokens))).toEqual(tokens);
    });

    it('renders a symbol cut short from a literal prefix as the literal', () => {
      const tokens = tokenize('nil"x"');
      expect(tokens).toEqual([
        { type: 'symbol', value: 'nil' },
        { type: 'string', value: 'x' },
      ]);
      expect(renderTokens(tokens)).toBe('nil "x"');
      expect(tokenize(renderTokens(tokens))).toEqual([
        { type: 'nil', value: 'nil' },
        { type: 'string', value: 'x' },
      ]);
    });

    it('renders true and false symbols cut short by a comment as literals', () => {
      const tokens = tokenize('true;c\nfalse;d');
      expect(tokens.map((token) => token.type)).toEqual([
        'symbol',
        'comment',
        'symbol',
        'comment',
      ]);
      expect(tokenize(renderTokens(tokens))).toEqual([
        { type: 'true', value: 'true' },
        { type: 'comment', value: 'c' },
        { type: 'false', value: 'false' },
        { type: 'comment', value: 'd' },
      ]);
    });
  });
});
