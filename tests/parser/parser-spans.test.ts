/**
 * Parser Span Tests
 * Verify that AST node spans correctly represent source code ranges
 */

import { describe, expect, it } from 'vitest';
import { parse } from '../../src/index.js';
import type { ASTNode } from '../../src/types.js';

/** Source text covered by a node */
function textOf(source: string, node: ASTNode | undefined): string {
  if (!node) return '';
  return source.substring(node.span.start.offset, node.span.end.offset);
}

describe('Parser Spans', () => {
  it('covers a statement through its terminator', () => {
    const source = '2 + 2 * 2;';
    const statement = parse(source).body[0];
    expect(textOf(source, statement)).toBe('2 + 2 * 2;');
  });

  it('covers binary expressions from first to last operand', () => {
    const source = '2 + 2 * 2;';
    const statement = parse(source).body[0];
    if (statement?.type !== 'ExpressionStatement') {
      throw new Error('expected expression statement');
    }
    const sum = statement.expression;
    expect(textOf(source, sum)).toBe('2 + 2 * 2');
    if (sum.type !== 'BinaryExpression') {
      throw new Error('expected binary expression');
    }
    expect(textOf(source, sum.right)).toBe('2 * 2');
    expect(sum.right.span.start).toEqual({ line: 1, column: 5, offset: 4 });
  });

  it('includes parentheses in the enclosing expression only', () => {
    const source = '(2 + 2) * 2;';
    const statement = parse(source).body[0];
    if (statement?.type !== 'ExpressionStatement') {
      throw new Error('expected expression statement');
    }
    const product = statement.expression;
    expect(textOf(source, product)).toBe('(2 + 2) * 2');
    if (product.type !== 'BinaryExpression') {
      throw new Error('expected binary expression');
    }
    expect(textOf(source, product.left)).toBe('2 + 2');
  });

  it('covers a block from brace to brace', () => {
    const source = '  { 1; }  ';
    expect(textOf(source, parse(source).body[0])).toBe('{ 1; }');
  });

  it('covers the whole source for the program', () => {
    const source = '// c\n1;';
    const ast = parse(source);
    expect(ast.span).toEqual({
      start: { line: 1, column: 1, offset: 0 },
      end: { line: 2, column: 3, offset: 7 },
    });
    expect(ast.body[0]?.span.start).toEqual({ line: 2, column: 1, offset: 5 });
  });
});
