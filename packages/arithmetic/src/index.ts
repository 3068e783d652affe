/**
 * @tally/arithmetic
 *
 * Integer addition and subtraction, evaluated strictly left to right.
 */

import { ExpressionRangeError, ExpressionSyntaxError } from './errors';
import { splitCharacters } from './lexer/characters';
import { lex } from './lexer/lexer';
import { LexerError } from './lexer/lexer-error';
import type { Token } from './lexer/token';
import { resolveOptions, type EvaluateOptions, type ResolvedOptions } from './options';
import { parse } from './parser/parser';
import { ParserError } from './parser/parser-error';

// Re-export pipeline stages
export { Lexer, lex } from './lexer/lexer';
export { Parser, parse } from './parser/parser';
export { LexerError } from './lexer/lexer-error';
export { ParserError } from './parser/parser-error';
export { TokenType } from './lexer/token-types';
export { formatToken, minusToken, numberToken, plusToken, renderTokens } from './lexer/token';

// Re-export error types
export { ExpressionError, ExpressionRangeError, ExpressionSyntaxError } from './errors';

// Re-export types
export type { LexerErrorKind } from './lexer/lexer-error';
export type { ParserErrorKind } from './parser/parser-error';
export type {
  MinusToken,
  NumberToken,
  PlusToken,
  SourceLocation,
  SourcePosition,
  Token,
} from './lexer/token';
export { DEFAULT_LIMITS } from './options';
export type { EvaluateOptions, Limits } from './options';

/**
 * Compiled expression that can be evaluated multiple times
 */
export interface CompiledExpression {
  /** Fold the stored tokens into a result */
  evaluate(): number;
  /** The original expression string */
  readonly expression: string;
  /** Tokens produced when the expression was compiled */
  readonly tokens: readonly Token[];
}

function tokenize(expression: string, { limits, logger }: ResolvedOptions): Token[] {
  // Check expression length limit, counted like lexer offsets; code units bound characters from above
  if (
    expression.length > limits.maxExpressionLength &&
    splitCharacters(expression).length > limits.maxExpressionLength
  ) {
    throw new ExpressionRangeError(
      `Expression exceeds maximum length of ${limits.maxExpressionLength} characters`,
      expression
    );
  }

  let tokens: Token[];
  try {
    tokens = lex(expression);
  } catch (error) {
    if (error instanceof LexerError) {
      throw new ExpressionSyntaxError(error.message, expression, error.position, error);
    }
    throw error;
  }

  logger.debug('expression_lexed', { token_count: tokens.length });
  return tokens;
}

function fold(expression: string, tokens: readonly Token[], { logger }: ResolvedOptions): number {
  let result: number;
  try {
    result = parse(tokens);
  } catch (error) {
    if (error instanceof ParserError) {
      throw new ExpressionSyntaxError(error.message, expression, error.position, error);
    }
    if (error instanceof ExpressionRangeError) {
      throw new ExpressionRangeError(error.message, expression, error.position);
    }
    throw error;
  }

  logger.debug('expression_evaluated', { result });
  return result;
}

/**
 * Evaluate an expression string
 *
 * @param expression - Non-negative integers joined by `+` and `-`, spaces allowed
 * @param options - Optional limits and logger
 * @returns The left-to-right fold of the expression
 * @throws {ExpressionSyntaxError} If lexing or parsing fails; `cause` holds the LexerError or ParserError
 * @throws {ExpressionRangeError} If a limit is exceeded or a value leaves the safe integer range
 *
 * @example
 * ```ts
 * evaluate('10 + 5 - 3 - 1')
 * // => 11
 * ```
 */
export function evaluate(expression: string, options: EvaluateOptions = {}): number {
  const resolved = resolveOptions(expression, options);
  const tokens = tokenize(expression, resolved);
  return fold(expression, tokens, resolved);
}

/**
 * Lex an expression once for repeated evaluation
 *
 * Lexer errors surface here; parser errors surface on each evaluate() call.
 *
 * @example
 * ```ts
 * const expr = compile('1 + 2');
 * expr.evaluate() // => 3
 * ```
 */
export function compile(expression: string, options: EvaluateOptions = {}): CompiledExpression {
  const resolved = resolveOptions(expression, options);
  const tokens = Object.freeze(tokenize(expression, resolved));

  return {
    expression,
    tokens,
    evaluate(): number {
      return fold(expression, tokens, resolved);
    },
  };
}
