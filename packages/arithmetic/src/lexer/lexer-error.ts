import type { SourcePosition } from './token';

export type LexerErrorKind = 'InvalidCharacter';

/**
 * Error thrown during lexical analysis
 */
export class LexerError extends Error {
  readonly kind: LexerErrorKind = 'InvalidCharacter';
  /** The expression that failed to tokenize */
  readonly expression: string;
  /** The offending character */
  readonly character: string;
  /** Position where the error occurred */
  readonly position: SourcePosition;

  constructor(character: string, expression: string, position: SourcePosition) {
    super(`Unexpected character '${character}' at offset ${position.offset}`);
    this.name = 'LexerError';
    this.expression = expression;
    this.character = character;
    this.position = position;
  }
}
