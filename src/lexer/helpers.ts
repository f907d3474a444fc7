/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation, Token, TokenType } from '../types.js';
import { spanBetween } from '../types.js';
import { advance, currentLocation, type LexerState } from './state.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

const WHITESPACE = /\s/;

export function isWhitespace(ch: string): boolean {
  return ch !== '' && WHITESPACE.test(ch);
}

export function makeToken(
  type: TokenType,
  value: string,
  start: SourceLocation,
  end: SourceLocation
): Token {
  return { type, value, span: spanBetween(start, end) };
}

/** Consume the character at the cursor as a token of its own */
export function readCharToken(state: LexerState, type: TokenType): Token {
  const start = currentLocation(state);
  const value = advance(state);
  return makeToken(type, value, start, currentLocation(state));
}
