import { createNoopLogger, type Logger } from '@tally/logger';
import { z } from 'zod';
import { ExpressionRangeError } from './errors';

/**
 * Default limits for expression evaluation
 */
export const DEFAULT_LIMITS = {
  /** Maximum expression length in user-perceived characters */
  maxExpressionLength: 10_000,
} as const;

export type Limits = { -readonly [K in keyof typeof DEFAULT_LIMITS]: number };

/**
 * Options for expression evaluation
 */
export interface EvaluateOptions {
  /** Override default limits (set to Infinity to disable) */
  limits?: Partial<Limits>;
  /** Receives debug events for each stage; silent by default */
  logger?: Logger;
}

export interface ResolvedOptions {
  limits: Limits;
  logger: Logger;
}

const limitSchema = z.union([z.number().int().nonnegative(), z.literal(Infinity)]);

const limitsSchema = z
  .object({
    maxExpressionLength: limitSchema,
  })
  .partial()
  .strict();

/**
 * Merge options with defaults, rejecting malformed limits
 */
export function resolveOptions(expression: string, options: EvaluateOptions): ResolvedOptions {
  const parsed = limitsSchema.safeParse(options.limits ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue.path.length > 0 ? issue.path.join('.') : 'limits';
    throw new ExpressionRangeError(`Invalid limit '${key}': ${issue.message}`, expression);
  }

  return {
    limits: {
      maxExpressionLength: parsed.data.maxExpressionLength ?? DEFAULT_LIMITS.maxExpressionLength,
    },
    logger: options.logger ?? createNoopLogger(),
  };
}
