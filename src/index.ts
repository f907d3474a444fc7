/**
 * Sprig Module
 * Exports lexer, parser, printer and AST types
 */

export {
  createLexerState,
  LexerError,
  nextToken,
  tokenize,
  type LexerState,
} from './lexer/index.js';
export {
  createParserState,
  DEFAULT_PARSE_OPTIONS,
  END_OF_INPUT,
  parse,
  Parser,
  resolveParseOptions,
  type ErrorEvent,
  type NodeEvent,
  type ObservabilityCallbacks,
  type ParseOptions,
  type ParserState,
  type ResolvedParseOptions,
  type TokenEvent,
} from './parser/index.js';
export { printAst } from './print.js';

export * from './types.js';
