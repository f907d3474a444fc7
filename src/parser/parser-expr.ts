/**
 * Parser Extension: Expression Parsing
 * Precedence chain and parenthesised expressions
 */

import { Parser } from './parser.js';
import type { BinaryExpressionNode, ExpressionNode } from '../types.js';
import { ParseError, spanBetween, TOKEN_TYPES } from '../types.js';
import { currentLocation } from '../lexer/state.js';
import { check, currentStart, eat, END_OF_INPUT } from './state.js';
import { toAdditiveOperator, toMultiplicativeOperator } from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseAdditive(): ExpressionNode;
    parseMultiplicative(): ExpressionNode;
    parsePrimary(): ExpressionNode;
    parseParenthesized(): ExpressionNode;
  }
}

/** Reported as the expected kind where any expression may start */
const EXPRESSION = 'expression';

// ============================================================
// EXPRESSION PRECEDENCE CHAIN
// ============================================================

/**
 * Expression
 *   : AdditiveExpression
 *   ;
 */
Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return this.parseAdditive();
};

/**
 * AdditiveExpression
 *   : MultiplicativeExpression
 *   | AdditiveExpression ADDITIVE_OPERATOR MultiplicativeExpression
 *   ;
 */
Parser.prototype.parseAdditive = function (this: Parser): ExpressionNode {
  const start = currentStart(this.state);
  let left = this.parseMultiplicative();

  while (check(this.state, TOKEN_TYPES.ADDITIVE_OPERATOR)) {
    const operator = toAdditiveOperator(
      eat(this.state, TOKEN_TYPES.ADDITIVE_OPERATOR)
    );
    const right = this.parseMultiplicative();
    left = this.finish<BinaryExpressionNode>({
      type: 'BinaryExpression',
      operator,
      left,
      right,
      span: spanBetween(start, this.state.lastEnd),
    });
  }

  return left;
};

/**
 * MultiplicativeExpression
 *   : PrimaryExpression
 *   | MultiplicativeExpression MULTIPLICATIVE_OPERATOR PrimaryExpression
 *   ;
 */
Parser.prototype.parseMultiplicative = function (
  this: Parser
): ExpressionNode {
  const start = currentStart(this.state);
  let left = this.parsePrimary();

  while (check(this.state, TOKEN_TYPES.MULTIPLICATIVE_OPERATOR)) {
    const operator = toMultiplicativeOperator(
      eat(this.state, TOKEN_TYPES.MULTIPLICATIVE_OPERATOR)
    );
    const right = this.parsePrimary();
    left = this.finish<BinaryExpressionNode>({
      type: 'BinaryExpression',
      operator,
      left,
      right,
      span: spanBetween(start, this.state.lastEnd),
    });
  }

  return left;
};

// ============================================================
// PRIMARY EXPRESSIONS
// ============================================================

/**
 * PrimaryExpression
 *   : ParenthesizedExpression
 *   | Literal
 *   ;
 */
Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const token = this.state.lookahead;
  if (token === null) {
    throw new ParseError(
      'SPRIG-P002',
      { found: END_OF_INPUT, expected: EXPRESSION },
      currentLocation(this.state.lexer)
    );
  }

  switch (token.type) {
    case TOKEN_TYPES.LPAREN:
      return this.parseParenthesized();
    case TOKEN_TYPES.NUMBER:
    case TOKEN_TYPES.STRING:
      return this.parseLiteral();
    case TOKEN_TYPES.SEMICOLON:
    case TOKEN_TYPES.LBRACE:
    case TOKEN_TYPES.RBRACE:
    case TOKEN_TYPES.RPAREN:
    case TOKEN_TYPES.ADDITIVE_OPERATOR:
    case TOKEN_TYPES.MULTIPLICATIVE_OPERATOR:
      throw new ParseError(
        'SPRIG-P003',
        { found: token.value, expected: EXPRESSION },
        token.span.start
      );
  }
};

/**
 * ParenthesizedExpression
 *   : '(' Expression ')'
 *   ;
 *
 * Yields the inner expression; parentheses leave no node behind.
 */
Parser.prototype.parseParenthesized = function (
  this: Parser
): ExpressionNode {
  return this.nested(() => {
    eat(this.state, TOKEN_TYPES.LPAREN);
    const expression = this.parseExpression();
    eat(this.state, TOKEN_TYPES.RPAREN);
    return expression;
  });
};
