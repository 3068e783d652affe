import { ExpressionRangeError } from '../errors';
import { renderTokens, type Token } from '../lexer/token';
import { TokenType } from '../lexer/token-types';
import { ParserError } from './parser-error';

/**
 * Left-to-right fold over a token sequence
 *
 * Grammar: NUMBER ((PLUS | MINUS) NUMBER)*
 *
 * There is no precedence and no tree: the running value is updated as each
 * operator/operand pair is consumed, so `10 + 5 - 3 - 1` is `((10 + 5) - 3) - 1`.
 * A parser is bound to one token sequence and is meant to be driven once.
 */
export class Parser {
  private readonly tokens: readonly Token[];
  private current: number = 0;

  constructor(tokens: readonly Token[]) {
    this.tokens = tokens;
  }

  /**
   * Fold the token sequence into a single integer
   *
   * @throws {ParserError} UnexpectedEndOfInput when a number is required but the tokens ran out,
   *   InvalidToken when an operator appears where a number belongs or two numbers are adjacent
   * @throws {ExpressionRangeError} If an operand or the running value is not a safe integer
   */
  parse(): number {
    let value = this.parseNumber();

    for (let token = this.nextToken(); token !== null; token = this.nextToken()) {
      switch (token.type) {
        case TokenType.PLUS:
          value = this.checked(value + this.parseNumber(), token);
          break;
        case TokenType.MINUS:
          value = this.checked(value - this.parseNumber(), token);
          break;
        case TokenType.NUMBER:
          // Two numbers in a row
          throw ParserError.invalidToken(token);
      }
    }

    return value;
  }

  /**
   * Consume and return the next token, or null once the sequence is exhausted
   */
  nextToken(): Token | null {
    if (this.current >= this.tokens.length) {
      return null;
    }
    return this.tokens[this.current++];
  }

  /**
   * Consume one token that must be a number
   *
   * @throws {ExpressionRangeError} If the token's value is not a non-negative safe integer
   */
  parseNumber(): number {
    const token = this.nextToken();
    if (token === null) {
      throw ParserError.unexpectedEndOfInput();
    }
    if (token.type !== TokenType.NUMBER) {
      throw ParserError.invalidToken(token);
    }
    // Hand-built tokens can bypass numberToken
    if (!Number.isSafeInteger(token.value) || token.value < 0) {
      throw new ExpressionRangeError(
        `Number ${token.value} is not a non-negative safe integer`,
        renderTokens(this.tokens),
        token.loc?.start ?? null
      );
    }
    return token.value;
  }

  private checked(value: number, operator: Token): number {
    if (!Number.isSafeInteger(value)) {
      throw new ExpressionRangeError(
        `Running total ${value} is outside the safe integer range`,
        renderTokens(this.tokens),
        operator.loc?.start ?? null
      );
    }
    return value;
  }
}

/**
 * Evaluate a token sequence with a fresh parser
 *
 * @example
 * ```ts
 * parse([numberToken(10), plusToken(), numberToken(3)]);
 * // => 13
 * ```
 */
export function parse(tokens: readonly Token[]): number {
  return new Parser(tokens).parse();
}
