export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type Environment = 'test' | 'development' | 'production';

export interface EnvironmentConfig {
  minLevel: LogLevel;
  includeStackTraces: boolean;
  bufferSize: number;
}

export interface LogEntry {
  id: string;
  level: LogLevel;
  event_type: string;
  metadata: Record<string, unknown>;
  timestamp: number;
}

/** Receives one serialized log line per entry */
export type LogWriter = (line: string) => void;

export interface Logger {
  /**
   * Create a child logger with additional metadata merged in.
   * Child loggers inherit all parent metadata and share the parent's entry buffer.
   */
  child(metadata: Record<string, unknown>): Logger;

  debug(event_type: string, metadata?: Record<string, unknown>): void;

  info(event_type: string, metadata?: Record<string, unknown>): void;

  warn(event_type: string, metadata?: Record<string, unknown>): void;

  error(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at fatal level (always emitted, whatever the environment)
   */
  fatal(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Most recent entries, oldest first. Bounded by the environment's buffer size.
   */
  entries(): LogEntry[];
}

export interface LoggerConfig {
  environment?: Environment;
  bufferSize?: number;
  write?: LogWriter;
  metadata?: Record<string, unknown>;
}
