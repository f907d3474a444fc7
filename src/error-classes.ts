/**
 * Sprig Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface SprigErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating errors from registry.
 *
 * Looks up the error definition, renders its message template with context,
 * and creates a SprigError with structured metadata.
 *
 * @param errorId - Error identifier (format: SPRIG-{category}{3-digit})
 * @param context - Key-value pairs for template placeholder replacement
 * @param location - Source location where error occurred (optional)
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("SPRIG-P002", { expected: ";" }, location)
 * // SprigError: "Unexpected end of input, expected ; at 1:3"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): SprigError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  return new SprigError({
    errorId,
    message: renderMessage(definition.messageTemplate, context),
    location,
    context,
  });
}

/**
 * Render the registry template for an ID, checking its category.
 * @internal
 */
export function renderFor(
  errorId: string,
  category: ErrorCategory,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Sprig errors.
 * Provides structured data for host applications to format as needed.
 */
export class SprigError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: SprigErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'SprigError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): SprigErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: SprigErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/**
 * Syntax errors raised by the parser.
 * `found` is the offending token text, or "end of input".
 */
export class ParseError extends SprigError {
  override readonly location: SourceLocation;
  readonly found: string | undefined;
  readonly expected: string | undefined;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation
  ) {
    super({
      errorId,
      message: renderFor(errorId, 'parse', context),
      location,
      context,
    });
    this.name = 'ParseError';
    this.location = location;
    this.found =
      typeof context['found'] === 'string' ? context['found'] : undefined;
    this.expected =
      typeof context['expected'] === 'string' ? context['expected'] : undefined;
  }
}

/**
 * Grammar invariant violation: a rule was entered with a lookahead its
 * caller should have ruled out. Never a user input error.
 */
export class GrammarDispatchError extends SprigError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation
  ) {
    super({
      errorId,
      message: renderFor(errorId, 'internal', context),
      location,
      context,
    });
    this.name = 'GrammarDispatchError';
    this.location = location;
  }
}
