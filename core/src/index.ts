/**
 * @sparse-npz/core
 *
 * Errors, contract assertions, structured logging and small shared helpers
 * used by every sparse-npz package.
 *
 * @packageDocumentation
 */

export {
  ErrorCode,
  isErrorCode,
  SparseNpzError,
  ContractViolationError,
  assertContract,
} from './errors.js';

export {
  type LogLevel,
  type LogFormat,
  type LogContextValue,
  type LogContext,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type ConsoleLoggerConfig,
  type TestLogger,
  LOG_LEVELS,
  isLogLevel,
  isLevelEnabled,
  isLogContextValue,
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  withContext,
} from './logging.js';

export { assertNever, product } from './types.js';
