/**
 * Parser State
 * Lookahead management and token consumption
 */

import type { SourceLocation, Token, TokenType } from '../types.js';
import { ParseError } from '../types.js';
import {
  createLexerState,
  currentLocation,
  type LexerState,
} from '../lexer/state.js';
import { nextToken } from '../lexer/tokenizer.js';
import {
  resolveParseOptions,
  type ParseOptions,
  type ResolvedParseOptions,
} from './options.js';

/** Reported as the found text when input runs out */
export const END_OF_INPUT = 'end of input';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly lexer: LexerState;
  /** Next unconsumed token; null once input is exhausted */
  lookahead: Token | null;
  /** End of the most recently consumed token */
  lastEnd: SourceLocation;
  /** Current block/parenthesis nesting */
  depth: number;
  readonly options: ResolvedParseOptions;
}

/**
 * Create unprimed state for a source string.
 * Call {@link pull} once before parsing to load the first lookahead.
 */
export function createParserState(
  source: string,
  options?: ParseOptions
): ParserState {
  const lexer = createLexerState(source);
  return {
    lexer,
    lookahead: null,
    lastEnd: currentLocation(lexer),
    depth: 0,
    options: resolveParseOptions(options),
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** Replace the lookahead with the next token from the tokenizer */
export function pull(state: ParserState): Token | null {
  const token = nextToken(state.lexer);
  state.lookahead = token;
  if (token) {
    state.options.observability.onToken?.({ token });
  }
  return token;
}

/** @internal */
export function check(state: ParserState, type: TokenType): boolean {
  return state.lookahead?.type === type;
}

/**
 * Where the lookahead starts, or where input ended.
 * @internal
 */
export function currentStart(state: ParserState): SourceLocation {
  return state.lookahead?.span.start ?? currentLocation(state.lexer);
}

/**
 * Consume a token of the expected type and refill the lookahead.
 * @internal
 */
export function eat(state: ParserState, type: TokenType): Token {
  const token = state.lookahead;
  if (token === null) {
    throw new ParseError(
      'SPRIG-P002',
      { found: END_OF_INPUT, expected: type },
      currentLocation(state.lexer)
    );
  }
  if (token.type !== type) {
    throw new ParseError(
      'SPRIG-P001',
      { found: token.value, expected: type },
      token.span.start
    );
  }

  state.lastEnd = token.span.end;
  pull(state);
  return token;
}
