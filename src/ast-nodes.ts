import type { SourceSpan } from './source-location.js';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// PROGRAM STRUCTURE
// ============================================================

export interface ProgramNode extends BaseNode {
  readonly type: 'Program';
  readonly body: StatementNode[];
}

// ============================================================
// STATEMENTS
// ============================================================

export type StatementNode = BlockStatementNode | ExpressionStatementNode;

/**
 * Block: { statement* }
 * An empty block (or one holding only comments) has an empty body.
 */
export interface BlockStatementNode extends BaseNode {
  readonly type: 'BlockStatement';
  readonly body: StatementNode[];
}

/** Expression terminated by `;` */
export interface ExpressionStatementNode extends BaseNode {
  readonly type: 'ExpressionStatement';
  readonly expression: ExpressionNode;
}

// ============================================================
// EXPRESSIONS
// ============================================================

export type ExpressionNode = BinaryExpressionNode | LiteralNode;

export type AdditiveOperator = '+' | '-';
export type MultiplicativeOperator = '*' | '/';
export type BinaryOperator = AdditiveOperator | MultiplicativeOperator;

/**
 * Binary expression: left operator right
 * Examples: (2 + 3), (2 * 3), ("a" - 1)
 *
 * Chains of equal precedence nest on the left: 2 - 2 - 2 is ((2 - 2) - 2).
 */
export interface BinaryExpressionNode extends BaseNode {
  readonly type: 'BinaryExpression';
  readonly operator: BinaryOperator;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

// ============================================================
// LITERALS
// ============================================================

export type LiteralNode = NumericLiteralNode | StringLiteralNode;

/** Digit run kept as source text, e.g. "42" */
export interface NumericLiteralNode extends BaseNode {
  readonly type: 'NumericLiteral';
  readonly value: string;
}

/** Raw string text including both quotes, e.g. "\"hello\"" */
export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
}

// ============================================================
// UNION
// ============================================================

export type ASTNode = ProgramNode | StatementNode | ExpressionNode;

export type NodeType = ASTNode['type'];
