/**
 * Lexer Errors
 */

import { SprigError, renderFor } from '../types.js';
import type { SourceLocation } from '../types.js';

export class LexerError extends SprigError {
  // Lexer errors always have a location
  override readonly location: SourceLocation;
  /** 0-based offset of the offending input */
  readonly position: number;

  constructor(
    errorId: string,
    location: SourceLocation,
    context: Record<string, unknown> = {}
  ) {
    super({
      errorId,
      message: renderFor(errorId, 'lexer', {
        position: location.offset,
        ...context,
      }),
      location,
      context,
    });

    this.name = 'LexerError';
    this.location = location;
    this.position = location.offset;
  }
}
