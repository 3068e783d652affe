import { createMockLogger } from '@tally/logger/mock';
import { describe, expect, it } from 'vitest';
import {
  DEFAULT_LIMITS,
  ExpressionError,
  ExpressionRangeError,
  ExpressionSyntaxError,
  LexerError,
  ParserError,
  compile,
  evaluate,
  numberToken,
} from '../src/index';

function syntaxError(expression: string): ExpressionSyntaxError {
  try {
    evaluate(expression);
  } catch (error) {
    if (error instanceof ExpressionSyntaxError) return error;
    throw error;
  }
  throw new Error(`Expected '${expression}' to fail`);
}

describe('evaluate', () => {
  it('adds and subtracts', () => {
    expect(evaluate('10 + 3 + 5')).toBe(18);
    expect(evaluate('10 + 5 - 3 - 1')).toBe(11);
    expect(evaluate('10+3+5')).toBe(18);
    expect(evaluate('  42  ')).toBe(42);
  });

  it('is repeatable', () => {
    expect(evaluate('7 - 2 + 1')).toBe(evaluate('7 - 2 + 1'));
  });

  describe('syntax errors', () => {
    it('wraps lexer errors', () => {
      const error = syntaxError('10! + 3');
      expect(error).toBeInstanceOf(ExpressionError);
      expect(error.name).toBe('ExpressionSyntaxError');
      expect(error.message).toBe("Unexpected character '!' at offset 2");
      expect(error.expression).toBe('10! + 3');
      expect(error.position).toEqual({ offset: 2 });
      expect(error.cause).toBeInstanceOf(LexerError);
    });

    it('wraps parser errors', () => {
      const error = syntaxError('10 3');
      expect(error.message).toBe('Unexpected token Number(3) at offset 3');
      expect(error.position).toEqual({ offset: 3 });
      expect(error.cause).toBeInstanceOf(ParserError);
      if (error.cause instanceof ParserError) {
        expect(error.cause.kind).toBe('InvalidToken');
        expect(error.cause.token).toMatchObject(numberToken(3));
      }
    });

    it('fails on empty input', () => {
      const error = syntaxError('');
      expect(error.message).toBe('Unexpected end of input');
      expect(error.position).toBeNull();
    });

    it('fails on a dangling operator', () => {
      expect(syntaxError('1 +').message).toBe('Unexpected end of input');
    });
  });

  describe('range errors', () => {
    it('rejects oversized literals', () => {
      expect(() => evaluate('99999999999999999')).toThrow(
        new ExpressionRangeError('Number literal at offset 0 exceeds 9007199254740991', '99999999999999999')
      );
    });

    it('reports overflow against the original expression', () => {
      try {
        evaluate('9007199254740991 + 1');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ExpressionRangeError);
        if (error instanceof ExpressionRangeError) {
          expect(error.expression).toBe('9007199254740991 + 1');
          expect(error.position).toEqual({ offset: 17 });
        }
      }
    });
  });

  describe('limits', () => {
    it('defaults the expression length limit', () => {
      expect(DEFAULT_LIMITS.maxExpressionLength).toBe(10_000);
      expect(() => evaluate('1' + ' '.repeat(10_000))).toThrow(ExpressionRangeError);
    });

    it('applies a custom expression length limit', () => {
      expect(() => evaluate('1 + 1', { limits: { maxExpressionLength: 3 } })).toThrow(
        'Expression exceeds maximum length of 3 characters'
      );
      expect(evaluate('1+1', { limits: { maxExpressionLength: 3 } })).toBe(2);
    });

    it('counts user-perceived characters against the limit', () => {
      // 6 UTF-16 code units, 5 characters
      expect(() => evaluate('1 + 👍', { limits: { maxExpressionLength: 5 } })).toThrow(ExpressionSyntaxError);
      expect(() => evaluate('1 + 👍', { limits: { maxExpressionLength: 4 } })).toThrow(
        'Expression exceeds maximum length of 4 characters'
      );
    });

    it('disables the limit with Infinity', () => {
      expect(evaluate('1' + ' '.repeat(20_000), { limits: { maxExpressionLength: Infinity } })).toBe(1);
    });

    it('rejects invalid limits', () => {
      expect(() => evaluate('1', { limits: { maxExpressionLength: -1 } })).toThrow(ExpressionRangeError);
      expect(() => evaluate('1', { limits: { maxExpressionLength: 2.5 } })).toThrow(
        /^Invalid limit 'maxExpressionLength': /
      );
    });
  });

  describe('logging', () => {
    it('logs each stage at debug level', () => {
      const logger = createMockLogger();

      evaluate('1 + 2', { logger });

      expect(logger.debug.mock.calls).toEqual([
        ['expression_lexed', { token_count: 3 }],
        ['expression_evaluated', { result: 3 }],
      ]);
    });

    it('does not log failures', () => {
      const logger = createMockLogger();

      expect(() => evaluate('1 +', { logger })).toThrow(ExpressionSyntaxError);

      expect(logger.debug.mock.calls).toEqual([['expression_lexed', { token_count: 2 }]]);
      expect(logger.error).not.toHaveBeenCalled();
    });
  });
});

describe('compile', () => {
  it('evaluates stored tokens repeatedly', () => {
    const expr = compile('4 - 1');
    expect(expr.expression).toBe('4 - 1');
    expect(expr.tokens).toHaveLength(3);
    expect(expr.evaluate()).toBe(3);
    expect(expr.evaluate()).toBe(3);
  });

  it('raises lexer errors at compile time', () => {
    expect(() => compile('1 ?')).toThrow(ExpressionSyntaxError);
  });

  it('raises parser errors on evaluate', () => {
    const expr = compile('1 +');
    expect(() => expr.evaluate()).toThrow(ExpressionSyntaxError);
  });

  it('freezes the token list', () => {
    expect(Object.isFrozen(compile('1').tokens)).toBe(true);
  });

  it('logs through the compile-time logger', () => {
    const logger = createMockLogger();
    const expr = compile('2 + 2', { logger });

    expr.evaluate();

    expect(logger.debug).toHaveBeenLastCalledWith('expression_evaluated', { result: 4 });
  });
});
