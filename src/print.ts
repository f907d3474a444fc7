/**
 * AST Printer
 * Indented outline of a tree, one node per line
 */

import type { ASTNode } from './types.js';

const INDENT = '  ';

function label(node: ASTNode): string {
  switch (node.type) {
    case 'Program':
    case 'BlockStatement':
    case 'ExpressionStatement':
      return node.type;
    case 'BinaryExpression':
      return `BinaryExpression ${node.operator}`;
    case 'NumericLiteral':
    case 'StringLiteral':
      return `${node.type} ${node.value}`;
  }
}

function children(node: ASTNode): ASTNode[] {
  switch (node.type) {
    case 'Program':
    case 'BlockStatement':
      return node.body;
    case 'ExpressionStatement':
      return [node.expression];
    case 'BinaryExpression':
      return [node.left, node.right];
    case 'NumericLiteral':
    case 'StringLiteral':
      return [];
  }
}

/**
 * Render a tree as an outline.
 *
 * @example
 * printAst(parse('1 + 2;'))
 * // Program
 * //   ExpressionStatement
 * //     BinaryExpression +
 * //       NumericLiteral 1
 * //       NumericLiteral 2
 */
export function printAst(node: ASTNode): string {
  const lines: string[] = [];

  const visit = (current: ASTNode, depth: number): void => {
    lines.push(`${INDENT.repeat(depth)}${label(current)}`);
    for (const child of children(current)) {
      visit(child, depth + 1);
    }
  };

  visit(node, 0);
  return lines.join('\n');
}
