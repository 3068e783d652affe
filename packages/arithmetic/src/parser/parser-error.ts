import type { SourcePosition, Token } from '../lexer/token';
import { formatToken } from '../lexer/token';

export type ParserErrorKind = 'UnexpectedEndOfInput' | 'InvalidToken';

/**
 * Error thrown during parsing
 *
 * `token` is null for UnexpectedEndOfInput and holds the offending token
 * for InvalidToken.
 */
export class ParserError extends Error {
  readonly kind: ParserErrorKind;
  readonly token: Token | null;
  /** Position of the offending token, when it carries a location */
  readonly position: SourcePosition | null;

  constructor(kind: ParserErrorKind, token: Token | null, message: string) {
    super(message);
    this.name = 'ParserError';
    this.kind = kind;
    this.token = token;
    this.position = token?.loc?.start ?? null;
  }

  static unexpectedEndOfInput(): ParserError {
    return new ParserError('UnexpectedEndOfInput', null, 'Unexpected end of input');
  }

  static invalidToken(token: Token): ParserError {
    const at = token.loc ? ` at offset ${token.loc.start.offset}` : '';
    return new ParserError('InvalidToken', token, `Unexpected token ${formatToken(token)}${at}`);
  }
}
