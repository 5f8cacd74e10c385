/** Structured JSON logger with an in-memory ring of recent entries */

import { ulid } from 'ulid';
import type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogWriter,
} from './types.js';

/** Environment-specific configurations */
export const ENVIRONMENT_CONFIGS: Record<Environment, EnvironmentConfig> = {
  test: {
    minLevel: 'debug', // Log everything in tests
    includeStackTraces: true,
    bufferSize: 1000,
  },
  development: {
    minLevel: 'info', // Skip debug logs
    includeStackTraces: true,
    bufferSize: 200,
  },
  production: {
    minLevel: 'warn', // Only warnings and errors
    includeStackTraces: false,
    bufferSize: 50,
  },
};

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

/** Shared between a logger and all of its children */
interface EntryStore {
  entries: LogEntry[];
  capacity: number;
}

const defaultWriter: LogWriter = (line) => {
  console.log(line);
};

class LoggerImpl implements Logger {
  protected metadata: Record<string, unknown>;
  private store: EntryStore;
  private write: LogWriter;
  private environment: Environment;
  private envConfig: EnvironmentConfig;

  constructor(config: LoggerConfig, store?: EntryStore) {
    this.metadata = config.metadata ?? {};
    this.environment = config.environment ?? 'development';
    this.envConfig = ENVIRONMENT_CONFIGS[this.environment];
    this.write = config.write ?? defaultWriter;
    this.store = store ?? {
      entries: [],
      capacity: config.bufferSize ?? this.envConfig.bufferSize,
    };

    if (this.store.capacity < 1) {
      throw new Error('LoggerConfig.bufferSize must be at least 1');
    }
  }

  child(metadata: Record<string, unknown>): Logger {
    return new LoggerImpl(
      {
        environment: this.environment,
        write: this.write,
        metadata: { ...this.metadata, ...metadata },
      },
      this.store,
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

  entries(): LogEntry[] {
    return [...this.store.entries];
  }

  private log(level: LogLevel, event_type: string, metadata?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.envConfig.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      id: ulid(),
      level,
      event_type,
      metadata: this.serializeMetadata({ ...this.metadata, ...metadata }),
      timestamp: Date.now(),
    };

    this.store.entries.push(entry);
    if (this.store.entries.length > this.store.capacity) {
      this.store.entries.splice(0, this.store.entries.length - this.store.capacity);
    }

    this.write(JSON.stringify(entry));
  }

  /** Errors do not survive JSON.stringify, so flatten them first */
  private serializeMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
      result[key] = value instanceof Error ? this.serializeError(value) : value;
    }
    return result;
  }

  private serializeError(error: Error): Record<string, unknown> {
    const serialized: Record<string, unknown> = {
      name: error.name,
      message: error.message,
    };
    if (this.envConfig.includeStackTraces && error.stack) {
      serialized.stack = error.stack;
    }
    return serialized;
  }
}

export function createLogger(config: LoggerConfig = {}): Logger {
  return new LoggerImpl(config);
}
