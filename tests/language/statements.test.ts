/**
 * Sprig Language Tests: Statements
 * Programs, expression statements, blocks and skipped text
 */

import { describe, expect, it } from 'vitest';
import { parse } from '../../src/index.js';
import { stripSpans } from '../helpers/parse.js';

describe('Sprig Language: Statements', () => {
  describe('Program', () => {
    it('parses a numeric literal statement', () => {
      expect(parse('42;')).toMatchObject({
        type: 'Program',
        body: [
          {
            type: 'ExpressionStatement',
            expression: { type: 'NumericLiteral', value: '42' },
          },
        ],
      });
    });

    it('parses a string literal statement keeping quotes', () => {
      expect(parse('"hello";')).toMatchObject({
        type: 'Program',
        body: [
          {
            type: 'ExpressionStatement',
            expression: { type: 'StringLiteral', value: '"hello"' },
          },
        ],
      });
    });

    it('keeps statements in source order', () => {
      const ast = parse('"hello"; 42; "world";');
      expect(ast.body).toHaveLength(3);
      expect(stripSpans(ast.body)).toEqual([
        {
          type: 'ExpressionStatement',
          expression: { type: 'StringLiteral', value: '"hello"' },
        },
        {
          type: 'ExpressionStatement',
          expression: { type: 'NumericLiteral', value: '42' },
        },
        {
          type: 'ExpressionStatement',
          expression: { type: 'StringLiteral', value: '"world"' },
        },
      ]);
    });

    it('parses empty source to an empty program', () => {
      expect(stripSpans(parse(''))).toEqual({ type: 'Program', body: [] });
    });

    it('parses comment-only source to an empty program', () => {
      expect(stripSpans(parse('// nothing\n/* here */'))).toEqual({
        type: 'Program',
        body: [],
      });
    });
  });

  describe('Whitespace and comments', () => {
    it('ignores leading line and block comments', () => {
      const withComments = `
        // Program
        /*
            Multiline comments...
        */
        "hello";
        42;
      `;
      expect(stripSpans(parse(withComments))).toEqual(
        stripSpans(parse('"hello"; 42;'))
      );
    });

    it('ignores comments between tokens of an expression', () => {
      expect(stripSpans(parse('1 /* a */ + // b\n 2;'))).toEqual(
        stripSpans(parse('1 + 2;'))
      );
    });

    it('keeps the digit string as written', () => {
      expect(parse('0042;')).toMatchObject({
        body: [{ expression: { type: 'NumericLiteral', value: '0042' } }],
      });
    });
  });

  describe('Blocks', () => {
    it('parses nested blocks', () => {
      expect(stripSpans(parse('{ 42; { "hello"; } }'))).toEqual({
        type: 'Program',
        body: [
          {
            type: 'BlockStatement',
            body: [
              {
                type: 'ExpressionStatement',
                expression: { type: 'NumericLiteral', value: '42' },
              },
              {
                type: 'BlockStatement',
                body: [
                  {
                    type: 'ExpressionStatement',
                    expression: { type: 'StringLiteral', value: '"hello"' },
                  },
                ],
              },
            ],
          },
        ],
      });
    });

    it('parses an empty block', () => {
      expect(stripSpans(parse('{ }'))).toEqual({
        type: 'Program',
        body: [{ type: 'BlockStatement', body: [] }],
      });
    });

    it('parses a block holding only a comment as empty', () => {
      expect(stripSpans(parse('{ /* nothing */ }'))).toEqual({
        type: 'Program',
        body: [{ type: 'BlockStatement', body: [] }],
      });
    });

    it('parses sibling blocks', () => {
      const ast = parse('{}{ 1; }');
      expect(ast.body.map((s) => s.type)).toEqual([
        'BlockStatement',
        'BlockStatement',
      ]);
    });

    it('does not end a block on a string whose text is a brace', () => {
      expect(stripSpans(parse('{ "}"; 1; }'))).toEqual({
        type: 'Program',
        body: [
          {
            type: 'BlockStatement',
            body: [
              {
                type: 'ExpressionStatement',
                expression: { type: 'StringLiteral', value: '"}"' },
              },
              {
                type: 'ExpressionStatement',
                expression: { type: 'NumericLiteral', value: '1' },
              },
            ],
          },
        ],
      });
    });

    it('mixes blocks and expression statements at top level', () => {
      const ast = parse('1; { 2; } 3;');
      expect(ast.body.map((s) => s.type)).toEqual([
        'ExpressionStatement',
        'BlockStatement',
        'ExpressionStatement',
      ]);
    });
  });
});
