import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  NUMBER: 'NUMBER',
  STRING: 'STRING',

  // Delimiters
  SEMICOLON: ';',
  LBRACE: '{',
  RBRACE: '}',
  LPAREN: '(',
  RPAREN: ')',

  // Operators
  ADDITIVE_OPERATOR: 'ADDITIVE_OPERATOR', // + -
  MULTIPLICATIVE_OPERATOR: 'MULTIPLICATIVE_OPERATOR', // * /
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  /** Exact source text of the token, quotes included for strings */
  readonly value: string;
  readonly span: SourceSpan;
}
