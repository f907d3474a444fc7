/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { LexerError } from './errors.js';
import { isDigit, readCharToken } from './helpers.js';
import { SINGLE_CHAR_TOKENS } from './operators.js';
import {
  readNumber,
  readString,
  skipBlockComment,
  skipLineComment,
  skipWhitespace,
} from './readers.js';
import {
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekCodePoint,
} from './state.js';

/** Skip whitespace and comments until significant text or end of input */
function skipTrivia(state: LexerState): void {
  while (
    skipWhitespace(state) ||
    skipLineComment(state) ||
    skipBlockComment(state)
  ) {
    // keep skipping
  }
}

/**
 * Read the next significant token, or null at end of input.
 * Throws LexerError when no rule matches at the cursor.
 */
export function nextToken(state: LexerState): Token | null {
  skipTrivia(state);

  if (isAtEnd(state)) {
    return null;
  }

  const ch = peek(state);

  const singleCharType = SINGLE_CHAR_TOKENS[ch];
  if (singleCharType) {
    return readCharToken(state, singleCharType);
  }

  if (isDigit(ch)) {
    return readNumber(state);
  }

  if (ch === '"') {
    return readString(state);
  }

  throw new LexerError('SPRIG-L001', currentLocation(state), {
    char: peekCodePoint(state),
  });
}

export function tokenize(source: string): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];

  for (let token = nextToken(state); token; token = nextToken(state)) {
    tokens.push(token);
  }

  return tokens;
}
