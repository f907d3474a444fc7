/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/**
 * Single-character token lookup table.
 * Insertion order mirrors scan priority: terminator, block delimiters,
 * parentheses, additive, multiplicative.
 */
export const SINGLE_CHAR_TOKENS: Readonly<Record<string, TokenType>> = {
  ';': TOKEN_TYPES.SEMICOLON,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '+': TOKEN_TYPES.ADDITIVE_OPERATOR,
  '-': TOKEN_TYPES.ADDITIVE_OPERATOR,
  '*': TOKEN_TYPES.MULTIPLICATIVE_OPERATOR,
  '/': TOKEN_TYPES.MULTIPLICATIVE_OPERATOR,
};
