/**
 * Parser Helpers
 * Operator narrowing
 * @internal This module contains internal parser utilities
 */

import type {
  AdditiveOperator,
  MultiplicativeOperator,
  Token,
} from '../types.js';
import { GrammarDispatchError } from '../types.js';

const ADDITIVE_OPERATORS: Readonly<Record<string, AdditiveOperator>> = {
  '+': '+',
  '-': '-',
};

const MULTIPLICATIVE_OPERATORS: Readonly<
  Record<string, MultiplicativeOperator>
> = {
  '*': '*',
  '/': '/',
};

/** @internal */
export function toAdditiveOperator(token: Token): AdditiveOperator {
  const op = ADDITIVE_OPERATORS[token.value];
  if (!op) {
    throw new GrammarDispatchError(
      'SPRIG-I002',
      { found: token.value, expected: 'additive operator' },
      token.span.start
    );
  }
  return op;
}

/** @internal */
export function toMultiplicativeOperator(
  token: Token
): MultiplicativeOperator {
  const op = MULTIPLICATIVE_OPERATORS[token.value];
  if (!op) {
    throw new GrammarDispatchError(
      'SPRIG-I002',
      { found: token.value, expected: 'multiplicative operator' },
      token.span.start
    );
  }
  return op;
}

