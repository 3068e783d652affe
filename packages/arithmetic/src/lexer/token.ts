import assert from 'node:assert';
import { TokenType } from './token-types';

/**
 * Source position for error reporting
 */
export interface SourcePosition {
  /** 0-based character offset from start of input, counted in user-perceived characters */
  offset: number;
}

/**
 * Source location spanning start to end positions
 */
export interface SourceLocation {
  start: SourcePosition;
  end: SourcePosition;
}

export interface NumberToken {
  readonly type: typeof TokenType.NUMBER;
  /** The scanned integer value */
  readonly value: number;
  readonly loc?: SourceLocation;
}

export interface PlusToken {
  readonly type: typeof TokenType.PLUS;
  readonly loc?: SourceLocation;
}

export interface MinusToken {
  readonly type: typeof TokenType.MINUS;
  readonly loc?: SourceLocation;
}

/**
 * A token produced by the lexer.
 *
 * `loc` is always set on lexer output and may be left out when a token
 * sequence is built by hand.
 */
export type Token = NumberToken | PlusToken | MinusToken;

/**
 * @throws {AssertionError} If value is not a non-negative safe integer
 */
export function numberToken(value: number, loc?: SourceLocation): NumberToken {
  assert.ok(Number.isSafeInteger(value) && value >= 0, `Invalid number token value ${value}`);
  const token: NumberToken = loc ? { type: TokenType.NUMBER, value, loc } : { type: TokenType.NUMBER, value };
  return Object.freeze(token);
}

export function plusToken(loc?: SourceLocation): PlusToken {
  const token: PlusToken = loc ? { type: TokenType.PLUS, loc } : { type: TokenType.PLUS };
  return Object.freeze(token);
}

export function minusToken(loc?: SourceLocation): MinusToken {
  const token: MinusToken = loc ? { type: TokenType.MINUS, loc } : { type: TokenType.MINUS };
  return Object.freeze(token);
}

/**
 * Render a token for messages, e.g. `Number(10)` or `Plus`
 */
export function formatToken(token: Token): string {
  switch (token.type) {
    case TokenType.NUMBER:
      return `Number(${token.value})`;
    case TokenType.PLUS:
      return 'Plus';
    case TokenType.MINUS:
      return 'Minus';
  }
}

/**
 * Render a token sequence back to source text, one space between tokens
 */
export function renderTokens(tokens: readonly Token[]): string {
  return tokens
    .map((token) => {
      switch (token.type) {
        case TokenType.NUMBER:
          return String(token.value);
        case TokenType.PLUS:
          return '+';
        case TokenType.MINUS:
          return '-';
      }
    })
    .join(' ');
}
