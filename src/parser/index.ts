/**
 * Sprig Parser
 * Main entry point and re-exports
 */

import type { ProgramNode } from '../types.js';
import type { ParseOptions } from './options.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-expr.js';
import './parser-literals.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Parse Sprig source code into an AST.
 *
 * Throws the first LexerError, ParseError or GrammarDispatchError; no
 * partial tree is returned.
 *
 * @example
 * ```typescript
 * const ast = parse('2 + 2 * 2;');
 * ast.body[0]; // ExpressionStatement wrapping a '+' BinaryExpression
 * ```
 */
export function parse(source: string, options?: ParseOptions): ProgramNode {
  return new Parser(source, options).parse();
}

// ============================================================
// RE-EXPORTS
// ============================================================

export {
  DEFAULT_PARSE_OPTIONS,
  resolveParseOptions,
  type ErrorEvent,
  type NodeEvent,
  type ObservabilityCallbacks,
  type ParseOptions,
  type ResolvedParseOptions,
  type TokenEvent,
} from './options.js';

// State (for advanced usage)
export { createParserState, END_OF_INPUT, type ParserState } from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';
