/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Grammar rules are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ASTNode, ProgramNode } from '../types.js';
import { ParseError, SprigError } from '../types.js';
import type { ParseOptions } from './options.js';
import {
  type ParserState,
  createParserState,
  currentStart,
  pull,
} from './state.js';

/**
 * LL(1) parser pulling one token of lookahead at a time.
 *
 * Grammar rules are organized across files:
 * - parser-script.ts: program, statement lists, blocks, expression statements
 * - parser-expr.ts: additive/multiplicative chains, parenthesised expressions
 * - parser-literals.ts: numeric and string literals
 *
 * A Parser is single-use per source; `parse()` restarts from the beginning.
 *
 * @example
 * ```typescript
 * const parser = new Parser('2 + 2 * 2;');
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  /** Lookahead, tokenizer state and options */
  state: ParserState;

  private readonly source: string;
  private readonly options: ParseOptions | undefined;

  constructor(source: string, options?: ParseOptions) {
    this.source = source;
    this.options = options;
    this.state = createParserState(source, options);
  }

  /**
   * Parse the whole source into a Program.
   * Throws the first LexerError, ParseError or GrammarDispatchError.
   */
  parse(): ProgramNode {
    this.state = createParserState(this.source, this.options);
    try {
      pull(this.state);
      return this.parseProgram();
    } catch (err) {
      if (err instanceof SprigError) {
        this.state.options.observability.onError?.({ error: err });
      }
      throw err;
    }
  }

  /** Report a completed node to observers and return it */
  finish<T extends ASTNode>(node: T): T {
    this.state.options.observability.onNode?.({
      node,
      depth: this.state.depth,
    });
    return node;
  }

  /** Run a block or parenthesised rule one level deeper, under maxDepth */
  nested<T>(rule: () => T): T {
    const { maxDepth } = this.state.options;
    if (this.state.depth >= maxDepth) {
      throw new ParseError(
        'SPRIG-P004',
        { maxDepth },
        currentStart(this.state)
      );
    }

    this.state.depth++;
    try {
      return rule();
    } finally {
      this.state.depth--;
    }
  }
}
