/**
 * Token types for the arithmetic lexer
 *
 * Only non-negative integer literals and the two additive operators exist.
 */

export const TokenType = {
  // Literals
  NUMBER: 'NUMBER', // 0, 42, 1000

  // Operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];
