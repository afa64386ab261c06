/**
 * Structured logging for sparse-npz
 *
 * The codec functions themselves never log; loggers are injected into the
 * outer layers (the codec facade, tools built on top of it).
 *
 * @example
 * ```typescript
 * import { createConsoleLogger, withContext } from '@sparse-npz/core';
 *
 * const logger = createConsoleLogger({ format: 'pretty', minLevel: 'debug' });
 * const codecLogger = withContext(logger, { service: 'sparse-codec' });
 *
 * codecLogger.debug('Decoded sparse matrix', { format: 'csr', nnz: 42, durationMs: 1.5 });
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

/**
 * Allowed value types in log context. Context is serialized to JSON,
 * so only JSON-compatible values are accepted.
 */
export type LogContextValue =
  | string
  | number
  | boolean
  | null
  | LogContextValue[]
  | { [key: string]: LogContextValue };

/**
 * Structured context data attached to log entries.
 */
export interface LogContext {
  /** Service or component name */
  service?: string;
  /** Operation being performed ('read', 'write') */
  operation?: string;
  /** Sparse format tag of the matrix involved */
  format?: string;
  /** Name of the array being processed */
  array?: string;
  /** Number of stored entries */
  nnz?: number;
  /** Duration in milliseconds */
  durationMs?: number;
  /** Error code for failure logs */
  errorCode?: string;
  /** Additional custom fields */
  [key: string]: LogContextValue | undefined;
}

/**
 * Type guard for JSON-compatible log context values.
 */
export function isLogContextValue(value: unknown): value is LogContextValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isLogContextValue);
      }
      return Object.values(value).every(isLogContextValue);
    default:
      return false;
  }
}

/**
 * A single log entry with all metadata
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  context?: LogContext;
  error?: Error;
}

/**
 * Logger interface - the core abstraction for logging
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  /**
   * @param message - Error description
   * @param error - Optional Error object
   * @param context - Optional structured context
   */
  error(message: string, error?: Error, context?: LogContext): void;
}

export interface LoggerConfig {
  /** Minimum log level to emit (default: 'debug') */
  minLevel?: LogLevel;
  /** Sink for log entries (default: discard) */
  output?: (entry: LogEntry) => void;
}

export interface ConsoleLoggerConfig extends Omit<LoggerConfig, 'output'> {
  /** Output format: 'json' for structured logs, 'pretty' for human-readable */
  format?: LogFormat;
}

/**
 * Test logger with additional methods for assertions
 */
export interface TestLogger extends Logger {
  getLogs(): LogEntry[];
  getLogsByLevel(level: LogLevel): LogEntry[];
  clear(): void;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Check if a level is at least as high as a minimum level
 */
export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
}

// =============================================================================
// Logger Factory Functions
// =============================================================================

/**
 * Create a logger with custom configuration
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   minLevel: 'info',
 *   output: (entry) => collected.push(entry),
 * });
 * ```
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const minLevel = config.minLevel ?? 'debug';
  const output = config.output ?? (() => {});

  const log = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (!isLevelEnabled(level, minLevel)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
    };
    if (context !== undefined) {
      entry.context = context;
    }
    if (error !== undefined) {
      entry.error = error;
    }

    output(entry);
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, error, context) => log('error', message, context, error),
  };
}

/**
 * Render a log entry as a single JSON line or a human-readable line.
 */
export function formatLogEntry(entry: LogEntry, format: LogFormat): string {
  if (format === 'json') {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp,
      ...(entry.context && { context: entry.context }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          stack: entry.error.stack,
        },
      }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  let line = `[${time}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  if (entry.context) {
    line += ` ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    line += `\n  Error: ${entry.error.message}`;
  }
  return line;
}

/**
 * Create a logger that writes to the console.
 *
 * Debug and info entries go to stdout, warnings and errors to stderr.
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'json';

  return createLogger({
    minLevel: config.minLevel,
    output: (entry) => {
      const line = formatLogEntry(entry, format);
      if (isLevelEnabled(entry.level, 'warn')) {
        console.error(line);
      } else {
        console.log(line);
      }
    },
  });
}

/**
 * Create a no-op logger that discards all log messages
 */
export function createNoopLogger(): Logger {
  return createLogger({ minLevel: 'error', output: () => {} });
}

/**
 * Create a test logger that captures log entries for assertions
 *
 * @example
 * ```typescript
 * const logger = createTestLogger();
 * codec.read(archive, Float64);
 * expect(logger.getLogsByLevel('debug')).toHaveLength(1);
 * ```
 */
export function createTestLogger(config: Omit<LoggerConfig, 'output'> = {}): TestLogger {
  const logs: LogEntry[] = [];
  const logger = createLogger({ ...config, output: (entry) => logs.push(entry) });

  return {
    ...logger,
    getLogs: () => [...logs],
    getLogsByLevel: (level) => logs.filter(entry => entry.level === level),
    clear: () => {
      logs.length = 0;
    },
  };
}

// =============================================================================
// Child Logger / Context
// =============================================================================

/**
 * Create a child logger that merges `context` into every entry.
 * Context given at log time wins over the bound context.
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  const merge = (local?: LogContext): LogContext =>
    local === undefined ? context : { ...context, ...local };

  return {
    debug: (message, local) => logger.debug(message, merge(local)),
    info: (message, local) => logger.info(message, merge(local)),
    warn: (message, local) => logger.warn(message, merge(local)),
    error: (message, error, local) => logger.error(message, error, merge(local)),
  };
}
