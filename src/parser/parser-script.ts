/**
 * Parser Extension: Program and Statement Parsing
 */

import { Parser } from './parser.js';
import type {
  BlockStatementNode,
  ExpressionStatementNode,
  ProgramNode,
  StatementNode,
  TokenType,
} from '../types.js';
import { SOURCE_START, spanBetween, TOKEN_TYPES } from '../types.js';
import { currentLocation } from '../lexer/state.js';
import { check, currentStart, eat } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): ProgramNode;
    parseStatementList(end: TokenType | null): StatementNode[];
    parseStatement(): StatementNode;
    parseBlockStatement(): BlockStatementNode;
    parseExpressionStatement(): ExpressionStatementNode;
  }
}

// ============================================================
// PROGRAM
// ============================================================

/**
 * Program
 *   : StatementList
 *   ;
 */
Parser.prototype.parseProgram = function (this: Parser): ProgramNode {
  const body =
    this.state.lookahead === null ? [] : this.parseStatementList(null);

  return this.finish<ProgramNode>({
    type: 'Program',
    body,
    span: spanBetween(SOURCE_START, currentLocation(this.state.lexer)),
  });
};

// ============================================================
// STATEMENTS
// ============================================================

/**
 * StatementList
 *   : Statement
 *   | StatementList Statement
 *   ;
 *
 * Stops at end of input, or at a token of the `end` type.
 */
Parser.prototype.parseStatementList = function (
  this: Parser,
  end: TokenType | null
): StatementNode[] {
  const statements = [this.parseStatement()];

  while (this.state.lookahead !== null && this.state.lookahead.type !== end) {
    statements.push(this.parseStatement());
  }

  return statements;
};

/**
 * Statement
 *   : BlockStatement
 *   | ExpressionStatement
 *   ;
 */
Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  if (check(this.state, TOKEN_TYPES.LBRACE)) {
    return this.parseBlockStatement();
  }
  return this.parseExpressionStatement();
};

/**
 * BlockStatement
 *   : '{' OptStatementList '}'
 *   ;
 */
Parser.prototype.parseBlockStatement = function (
  this: Parser
): BlockStatementNode {
  const block = this.nested<BlockStatementNode>(() => {
    const start = currentStart(this.state);
    eat(this.state, TOKEN_TYPES.LBRACE);

    const body =
      this.state.lookahead === null || check(this.state, TOKEN_TYPES.RBRACE)
        ? []
        : this.parseStatementList(TOKEN_TYPES.RBRACE);

    const rbrace = eat(this.state, TOKEN_TYPES.RBRACE);
    return {
      type: 'BlockStatement',
      body,
      span: spanBetween(start, rbrace.span.end),
    };
  });

  return this.finish(block);
};

/**
 * ExpressionStatement
 *   : Expression ';'
 *   ;
 */
Parser.prototype.parseExpressionStatement = function (
  this: Parser
): ExpressionStatementNode {
  const start = currentStart(this.state);
  const expression = this.parseExpression();
  const semicolon = eat(this.state, TOKEN_TYPES.SEMICOLON);

  return this.finish<ExpressionStatementNode>({
    type: 'ExpressionStatement',
    expression,
    span: spanBetween(start, semicolon.span.end),
  });
};
