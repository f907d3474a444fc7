/**
 * Token Readers
 * Functions to read or skip specific lexemes from source
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import { isDigit, isWhitespace, makeToken } from './helpers.js';
import {
  advance,
  advanceTo,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  startsWith,
} from './state.js';

// ============================================================
// DISCARDED TEXT
// ============================================================

/** Skip a whitespace run. Returns true when anything was consumed. */
export function skipWhitespace(state: LexerState): boolean {
  const startPos = state.pos;
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
  }
  return state.pos > startPos;
}

/** Skip `//` up to (not including) the next newline */
export function skipLineComment(state: LexerState): boolean {
  if (!startsWith(state, '//')) {
    return false;
  }

  while (!isAtEnd(state) && peek(state) !== '\n') {
    advance(state);
  }
  return true;
}

/**
 * Skip `/* ... *\/` up to the first closer.
 * Without a closer nothing is consumed, and `/` then `*` scan as operators.
 */
export function skipBlockComment(state: LexerState): boolean {
  if (!startsWith(state, '/*')) {
    return false;
  }

  const close = state.source.indexOf('*/', state.pos + 2);
  if (close === -1) {
    return false;
  }

  advanceTo(state, close + 2);
  return true;
}

// ============================================================
// LITERALS
// ============================================================

export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isDigit(peek(state))) {
    value += advance(state);
  }

  return makeToken(TOKEN_TYPES.NUMBER, value, start, currentLocation(state));
}

/**
 * Read `"..."` keeping both quotes in the token value.
 * No escapes; newlines are allowed. Without a closing quote the opening
 * quote is an unexpected character.
 */
export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  const close = state.source.indexOf('"', state.pos + 1);
  if (close === -1) {
    throw new LexerError('SPRIG-L001', start, { char: '"' });
  }

  const value = advanceTo(state, close + 1);
  return makeToken(TOKEN_TYPES.STRING, value, start, currentLocation(state));
}
