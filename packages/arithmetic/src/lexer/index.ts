export { Lexer, lex } from './lexer';
export { LexerError } from './lexer-error';
export type { LexerErrorKind } from './lexer-error';
export { TokenType } from './token-types';
export { formatToken, minusToken, numberToken, plusToken, renderTokens } from './token';
export type { MinusToken, NumberToken, PlusToken, SourceLocation, SourcePosition, Token } from './token';
