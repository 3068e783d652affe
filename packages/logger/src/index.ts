export { loadLoggerConfig } from './config.js';
export { createLogger, createNoopLogger } from './logger.js';
export type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogSink,
} from './types.js';
