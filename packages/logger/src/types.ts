export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type Environment = 'test' | 'development' | 'production';

export interface EnvironmentConfig {
  minLevel: LogLevel;
  includeStackTraces: boolean;
}

export interface LogEntry {
  level: LogLevel;
  event_type: string;
  metadata: Record<string, unknown>;
  timestamp: string;
}

/** Receives one serialized log line per entry */
export type LogSink = (line: string) => void;

export interface Logger {
  /**
   * Create a child logger with additional metadata merged in.
   * Child loggers inherit all parent metadata.
   */
  child(metadata: Record<string, unknown>): Logger;

  /**
   * Log at debug level
   */
  debug(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at info level
   */
  info(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at warn level
   */
  warn(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at error level
   */
  error(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at fatal level
   */
  fatal(event_type: string, metadata?: Record<string, unknown>): void;
}

export interface LoggerConfig {
  environment?: Environment;
  /** Overrides the environment's minimum level */
  minLevel?: LogLevel;
  /** Defaults to console.log */
  sink?: LogSink;
}
