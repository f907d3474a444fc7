/**
 * Lexer State
 * Cursor over the source, with a line/column mirror of the offset
 */

import { SOURCE_START, type SourceLocation } from '../types.js';

export interface LexerState {
  readonly source: string;
  /** Only the cursor moves; `source` is never modified */
  pos: number;
  line: number;
  column: number;
}

export function createLexerState(source: string): LexerState {
  return {
    source,
    pos: SOURCE_START.offset,
    line: SOURCE_START.line,
    column: SOURCE_START.column,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

/** UTF-16 unit at the cursor, or '' at end of input */
export function peek(state: LexerState): string {
  return state.source[state.pos] ?? '';
}

/** Whole code point at the cursor, for diagnostics */
export function peekCodePoint(state: LexerState): string {
  const code = state.source.codePointAt(state.pos);
  return code === undefined ? '' : String.fromCodePoint(code);
}

export function startsWith(state: LexerState, text: string): boolean {
  return state.source.startsWith(text, state.pos);
}

export function advance(state: LexerState): string {
  const ch = peek(state);
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

/**
 * Move the cursor to `end`, keeping line and column in step.
 * Returns the text passed over.
 */
export function advanceTo(state: LexerState, end: number): string {
  const from = state.pos;
  while (state.pos < end) {
    advance(state);
  }
  return state.source.slice(from, state.pos);
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}
