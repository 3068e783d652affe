/**
 * Error types for the evaluation facade
 *
 * All errors include the expression string and optional position information.
 */

import type { SourcePosition } from './lexer/token';

/**
 * Base class for expression errors
 */
export abstract class ExpressionError extends Error {
  /** The expression that caused the error */
  readonly expression: string;
  /** Position where the error occurred (if available) */
  readonly position: SourcePosition | null;

  constructor(
    message: string,
    expression: string,
    position: SourcePosition | null = null,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.expression = expression;
    this.position = position;
  }
}

/**
 * Thrown when expression syntax is invalid.
 *
 * `cause` holds the underlying LexerError or ParserError.
 */
export class ExpressionSyntaxError extends ExpressionError {
  constructor(message: string, expression: string, position: SourcePosition | null, cause: Error) {
    super(message, expression, position, { cause });
  }
}

/**
 * Thrown when limits are exceeded (expression length, integer range)
 * or when evaluation options are invalid
 */
export class ExpressionRangeError extends ExpressionError {
  constructor(message: string, expression: string, position: SourcePosition | null = null) {
    super(message, expression, position);
  }
}
