/**
 * Logger configuration from environment variables
 *
 * TALLY_ENV (falling back to NODE_ENV) selects the environment preset,
 * TALLY_LOG_LEVEL overrides its minimum level.
 */

import { z } from 'zod';
import type { LoggerConfig } from './types.js';

const environmentSchema = z.enum(['test', 'development', 'production']);
const levelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);

const envSchema = z.object({
  TALLY_ENV: environmentSchema.optional(),
  NODE_ENV: z.string().optional(),
  TALLY_LOG_LEVEL: levelSchema.optional(),
});

/**
 * Build a LoggerConfig from an environment map
 *
 * An unrecognised NODE_ENV falls back to development; an invalid
 * TALLY_ENV or TALLY_LOG_LEVEL throws.
 */
export function loadLoggerConfig(
  env: Record<string, string | undefined> = process.env,
): LoggerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid logger environment: ${issue.path.join('.')}: ${issue.message}`);
  }

  const { TALLY_ENV, NODE_ENV, TALLY_LOG_LEVEL } = parsed.data;
  const fallback = environmentSchema.safeParse(NODE_ENV);
  const config: LoggerConfig = {
    environment: TALLY_ENV ?? (fallback.success ? fallback.data : 'development'),
  };

  if (TALLY_LOG_LEVEL) {
    config.minLevel = TALLY_LOG_LEVEL;
  }

  return config;
}
