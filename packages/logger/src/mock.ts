/** Mock logger for testing */

import { vi, type Mock } from 'vitest';
import type { Logger } from './types.js';

type LogMethod = (event_type: string, metadata?: Record<string, unknown>) => void;

export interface MockLogger extends Logger {
  child: Mock<(metadata: Record<string, unknown>) => MockLogger>;
  debug: Mock<LogMethod>;
  info: Mock<LogMethod>;
  warn: Mock<LogMethod>;
  error: Mock<LogMethod>;
  fatal: Mock<LogMethod>;
}

/**
 * Creates a mock logger for testing with Vitest spy functions.
 * All methods are no-ops but can be asserted against in tests.
 *
 * @example
 * ```typescript
 * import { createMockLogger } from '@tally/logger/mock';
 *
 * const logger = createMockLogger();
 * evaluate('1 + 2', { logger });
 *
 * expect(logger.debug).toHaveBeenCalledWith('expression_evaluated', { result: 3 });
 * ```
 */
export function createMockLogger(): MockLogger {
  return {
    child: vi.fn((_metadata: Record<string, unknown>) => createMockLogger()),
    debug: vi.fn<LogMethod>(),
    info: vi.fn<LogMethod>(),
    warn: vi.fn<LogMethod>(),
    error: vi.fn<LogMethod>(),
    fatal: vi.fn<LogMethod>(),
  };
}
