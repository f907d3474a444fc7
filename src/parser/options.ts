/**
 * Parser Options
 * Configuration and observability callbacks for a single parse
 */

import type { ASTNode, SprigError, Token } from '../types.js';

// ============================================================
// OBSERVABILITY
// ============================================================

/** Event emitted when a token becomes the lookahead */
export interface TokenEvent {
  token: Token;
}

/** Event emitted when a grammar production completes */
export interface NodeEvent {
  node: ASTNode;
  /** Block/parenthesis nesting depth at which the node was built */
  depth: number;
}

/** Event emitted once before an error aborts the parse */
export interface ErrorEvent {
  error: SprigError;
}

/**
 * Host callbacks, invoked synchronously while parsing.
 * The library never prints; hosts route these to their own logging.
 */
export interface ObservabilityCallbacks {
  /** Called for every token pulled from the tokenizer */
  onToken?: (event: TokenEvent) => void;
  /** Called after each AST node is built */
  onNode?: (event: NodeEvent) => void;
  /** Called when a lexer or parser error aborts the parse */
  onError?: (event: ErrorEvent) => void;
}

// ============================================================
// OPTIONS
// ============================================================

export interface ParseOptions {
  /** Maximum nesting of blocks and parentheses (default: 256) */
  maxDepth?: number | undefined;
  observability?: ObservabilityCallbacks | undefined;
}

export interface ResolvedParseOptions {
  readonly maxDepth: number;
  readonly observability: ObservabilityCallbacks;
}

export const DEFAULT_PARSE_OPTIONS: ResolvedParseOptions = {
  maxDepth: 256,
  observability: {},
};

/**
 * Merge options over defaults.
 * @throws TypeError when maxDepth is not a positive integer
 */
export function resolveParseOptions(
  options: ParseOptions = {}
): ResolvedParseOptions {
  const maxDepth = options.maxDepth ?? DEFAULT_PARSE_OPTIONS.maxDepth;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new TypeError(
      `maxDepth must be a positive integer, got: ${String(maxDepth)}`
    );
  }

  return {
    maxDepth,
    observability: options.observability ?? DEFAULT_PARSE_OPTIONS.observability,
  };
}
