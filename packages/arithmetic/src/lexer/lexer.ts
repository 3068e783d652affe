import assert from 'node:assert';
import { ExpressionRangeError } from '../errors';
import { splitCharacters } from './characters';
import { LexerError } from './lexer-error';
import { minusToken, numberToken, plusToken, type SourcePosition, type Token } from './token';

/**
 * Lexer for additive integer expressions
 *
 * The input is split into user-perceived characters up front, so `position`
 * and every reported offset count characters rather than UTF-16 code units.
 * A lexer is bound to one input and is meant to be driven once.
 */
export class Lexer {
  private readonly input: string;
  private readonly chars: string[];
  private position: number = 0;

  constructor(input: string) {
    this.input = input;
    this.chars = splitCharacters(input);
  }

  /**
   * Tokenize the whole input
   *
   * Spaces are skipped. Any character other than a digit, `+`, `-` or a
   * space stops lexing with a {@link LexerError}.
   */
  lex(): Token[] {
    const tokens: Token[] = [];

    for (let char = this.peek(); char !== null; char = this.peek()) {
      const start = this.currentPosition();

      if (isDigit(char)) {
        const value = this.scanNumber();
        tokens.push(numberToken(value, { start, end: this.currentPosition() }));
        continue;
      }

      switch (char) {
        case '+':
          this.advance();
          tokens.push(plusToken({ start, end: this.currentPosition() }));
          break;
        case '-':
          this.advance();
          tokens.push(minusToken({ start, end: this.currentPosition() }));
          break;
        case ' ':
          this.advance();
          break;
        default:
          throw new LexerError(char, this.input, start);
      }
    }

    return tokens;
  }

  /**
   * The character at the cursor, or null at end of input
   */
  peek(): string | null {
    return this.position < this.chars.length ? this.chars[this.position] : null;
  }

  /**
   * Move the cursor forward by one character.
   *
   * Must not be called at end of input; callers peek first.
   */
  advance(): void {
    assert.ok(this.position < this.chars.length, 'Cannot advance past end of input');
    this.position++;
  }

  /**
   * Accumulate a run of ASCII digits starting at the cursor.
   *
   * Returns 0 if the cursor is not on a digit.
   *
   * @throws {ExpressionRangeError} If the literal exceeds Number.MAX_SAFE_INTEGER
   */
  scanNumber(): number {
    const start = this.currentPosition();
    let value = 0;

    for (let char = this.peek(); char !== null && isDigit(char); char = this.peek()) {
      const digit = char.charCodeAt(0) - 48;
      if (value > (Number.MAX_SAFE_INTEGER - digit) / 10) {
        throw new ExpressionRangeError(
          `Number literal at offset ${start.offset} exceeds ${Number.MAX_SAFE_INTEGER}`,
          this.input,
          start
        );
      }
      value = value * 10 + digit;
      this.advance();
    }

    return value;
  }

  private currentPosition(): SourcePosition {
    return { offset: this.position };
  }
}

function isDigit(char: string): boolean {
  return char.length === 1 && char >= '0' && char <= '9';
}

/**
 * Tokenize an expression string with a fresh lexer
 *
 * @throws {LexerError} On the first character that is not a digit, `+`, `-` or space
 *
 * @example
 * ```ts
 * lex('10 + 3');
 * // => [Number(10), Plus, Number(3)] with source locations
 * ```
 */
export function lex(input: string): Token[] {
  return new Lexer(input).lex();
}
