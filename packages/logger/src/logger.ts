/** Structured JSON logger, one line per entry */

import type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogSink,
} from './types.js';

/** Environment-specific configurations */
export const ENVIRONMENT_CONFIGS: Record<Environment, EnvironmentConfig> = {
  test: {
    minLevel: 'debug', // Log everything in tests
    includeStackTraces: true,
  },
  development: {
    minLevel: 'info', // Skip debug logs
    includeStackTraces: true,
  },
  production: {
    minLevel: 'warn', // Only warnings and errors
    includeStackTraces: false,
  },
};

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

class LoggerImpl implements Logger {
  protected metadata: Record<string, unknown>;
  private environment: Environment;
  private envConfig: EnvironmentConfig;
  private minLevel: LogLevel;
  private sink: LogSink;

  constructor(config: LoggerConfig, parentMetadata: Record<string, unknown> = {}) {
    this.metadata = parentMetadata;
    this.environment = config.environment ?? 'development';
    this.envConfig = ENVIRONMENT_CONFIGS[this.environment];
    this.minLevel = config.minLevel ?? this.envConfig.minLevel;
    this.sink = config.sink ?? ((line) => console.log(line));
  }

  child(metadata: Record<string, unknown>): Logger {
    return new LoggerImpl(
      {
        environment: this.environment,
        minLevel: this.minLevel,
        sink: this.sink,
      },
      { ...this.metadata, ...metadata },
    );
  }

  debug(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('debug', event_type, metadata);
  }

  info(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('info', event_type, metadata);
  }

  warn(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('warn', event_type, metadata);
  }

  error(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('error', event_type, metadata);
  }

  fatal(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('fatal', event_type, metadata);
  }

  private log(level: LogLevel, event_type: string, metadata?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      level,
      event_type,
      metadata: this.serializeMetadata({ ...this.metadata, ...metadata }),
      timestamp: new Date().toISOString(),
    };

    this.sink(JSON.stringify(entry));
  }

  /** Errors don't survive JSON.stringify, flatten them first */
  protected serializeMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
      if (value instanceof Error) {
        result[key] = {
          name: value.name,
          message: value.message,
          ...(this.envConfig.includeStackTraces && value.stack ? { stack: value.stack } : {}),
        };
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

export function createLogger(config: LoggerConfig = {}): Logger {
  return new LoggerImpl(config);
}

/** Logger that drops every entry */
export function createNoopLogger(): Logger {
  return createLogger({ sink: () => {} });
}
