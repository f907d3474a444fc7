/**
 * Parser Extension: Literal Parsing
 */

import { Parser } from './parser.js';
import type {
  LiteralNode,
  NumericLiteralNode,
  StringLiteralNode,
} from '../types.js';
import { GrammarDispatchError, TOKEN_TYPES } from '../types.js';
import { currentLocation } from '../lexer/state.js';
import { eat, END_OF_INPUT } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseLiteral(): LiteralNode;
    parseNumericLiteral(): NumericLiteralNode;
    parseStringLiteral(): StringLiteralNode;
  }
}

/**
 * Literal
 *   : NumericLiteral
 *   | StringLiteral
 *   ;
 *
 * Callers dispatch through parsePrimary first; any other lookahead here is
 * a grammar invariant violation, not a syntax error.
 */
Parser.prototype.parseLiteral = function (this: Parser): LiteralNode {
  const token = this.state.lookahead;

  switch (token?.type) {
    case TOKEN_TYPES.NUMBER:
      return this.parseNumericLiteral();
    case TOKEN_TYPES.STRING:
      return this.parseStringLiteral();
    default:
      throw new GrammarDispatchError(
        'SPRIG-I001',
        { found: token?.value ?? END_OF_INPUT },
        token?.span.start ?? currentLocation(this.state.lexer)
      );
  }
};

/**
 * NumericLiteral
 *   : NUMBER
 *   ;
 */
Parser.prototype.parseNumericLiteral = function (
  this: Parser
): NumericLiteralNode {
  const token = eat(this.state, TOKEN_TYPES.NUMBER);
  return this.finish<NumericLiteralNode>({
    type: 'NumericLiteral',
    value: token.value,
    span: token.span,
  });
};

/**
 * StringLiteral
 *   : STRING
 *   ;
 */
Parser.prototype.parseStringLiteral = function (
  this: Parser
): StringLiteralNode {
  const token = eat(this.state, TOKEN_TYPES.STRING);
  return this.finish<StringLiteralNode>({
    type: 'StringLiteral',
    value: token.value,
    span: token.span,
  });
};
