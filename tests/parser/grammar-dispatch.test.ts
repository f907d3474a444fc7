/**
 * Unit tests for grammar rule dispatch
 * Calls Parser rule methods directly, bypassing parse()
 */

import { describe, expect, it } from 'vitest';
import {
  GrammarDispatchError,
  ParseError,
  Parser,
  TOKEN_TYPES,
} from '../../src/index.js';
import { check, pull } from '../../src/parser/state.js';
import {
  toAdditiveOperator,
  toMultiplicativeOperator,
} from '../../src/parser/helpers.js';
import type { Token } from '../../src/types.js';

/** Parser primed with its first lookahead */
function primed(source: string): Parser {
  const parser = new Parser(source);
  pull(parser.state);
  return parser;
}

const at = { line: 1, column: 1, offset: 0 };

describe('Grammar dispatch', () => {
  describe('parseLiteral', () => {
    it('builds a numeric literal from a NUMBER lookahead', () => {
      const parser = primed('7');
      expect(parser.parseLiteral()).toEqual({
        type: 'NumericLiteral',
        value: '7',
        span: { start: at, end: { line: 1, column: 2, offset: 1 } },
      });
      expect(parser.state.lookahead).toBeNull();
    });

    it('builds a string literal from a STRING lookahead', () => {
      const parser = primed('"x" ;');
      expect(parser.parseLiteral()).toMatchObject({
        type: 'StringLiteral',
        value: '"x"',
      });
      expect(parser.state.lookahead?.type).toBe(TOKEN_TYPES.SEMICOLON);
    });

    it('throws GrammarDispatchError for a non-literal lookahead', () => {
      const parser = primed(';');
      expect(() => parser.parseLiteral()).toThrow(GrammarDispatchError);
      expect(() => parser.parseLiteral()).toThrow(
        'Literal: unexpected literal production ; at 1:1'
      );
    });

    it('keeps GrammarDispatchError distinct from ParseError', () => {
      const parser = primed('(');
      try {
        parser.parseLiteral();
        expect.unreachable('parseLiteral should throw');
      } catch (err) {
        expect(err).toBeInstanceOf(GrammarDispatchError);
        expect(err).not.toBeInstanceOf(ParseError);
        if (err instanceof GrammarDispatchError) {
          expect(err.errorId).toBe('SPRIG-I001');
          expect(err.name).toBe('GrammarDispatchError');
        }
      }
    });

    it('reports end of input when there is no lookahead', () => {
      const parser = new Parser('');
      expect(() => parser.parseLiteral()).toThrow(
        'Literal: unexpected literal production end of input at 1:1'
      );
    });
  });

  describe('parsePrimary', () => {
    it('reports a non-literal token as a syntax error, not a dispatch error', () => {
      const parser = primed('+');
      expect(() => parser.parsePrimary()).toThrow(ParseError);
    });
  });

  describe('check', () => {
    it('tests the lookahead kind without consuming it', () => {
      const parser = primed('{');
      expect(check(parser.state, TOKEN_TYPES.LBRACE)).toBe(true);
      expect(check(parser.state, TOKEN_TYPES.RBRACE)).toBe(false);
      expect(parser.state.lookahead?.value).toBe('{');
    });

    it('is false once input is exhausted', () => {
      const parser = primed('');
      expect(check(parser.state, TOKEN_TYPES.SEMICOLON)).toBe(false);
    });
  });

  describe('parseStatementList', () => {
    it('stops at the closing delimiter kind', () => {
      const parser = primed('1; 2; } 3;');
      const statements = parser.parseStatementList(TOKEN_TYPES.RBRACE);
      expect(statements).toHaveLength(2);
      expect(parser.state.lookahead?.type).toBe(TOKEN_TYPES.RBRACE);
    });

    it('runs to end of input without a closing kind', () => {
      const parser = primed('1; 2; 3;');
      expect(parser.parseStatementList(null)).toHaveLength(3);
      expect(parser.state.lookahead).toBeNull();
    });
  });

  describe('Operator narrowing', () => {
    const token = (value: string): Token => ({
      type: TOKEN_TYPES.ADDITIVE_OPERATOR,
      value,
      span: { start: at, end: at },
    });

    it('maps operator text to operators', () => {
      expect(toAdditiveOperator(token('+'))).toBe('+');
      expect(toAdditiveOperator(token('-'))).toBe('-');
      expect(toMultiplicativeOperator(token('*'))).toBe('*');
      expect(toMultiplicativeOperator(token('/'))).toBe('/');
    });

    it('rejects text outside the operator class', () => {
      expect(() => toAdditiveOperator(token('*'))).toThrow(
        'Unknown operator *, expected additive operator at 1:1'
      );
      expect(() => toMultiplicativeOperator(token('+'))).toThrow(
        GrammarDispatchError
      );
    });
  });

  describe('Parser reuse', () => {
    it('restarts from the beginning on each parse()', () => {
      const parser = new Parser('1; 2;');
      const first = parser.parse();
      const second = parser.parse();
      expect(second).toEqual(first);
      expect(second.body).toHaveLength(2);
    });
  });
});
