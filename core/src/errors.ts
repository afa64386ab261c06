/**
 * Typed exception classes for sparse-npz
 *
 * Error hierarchy:
 * - SparseNpzError: Base error class for recoverable sparse-npz errors
 *   - NpyError (@sparse-npz/npy): malformed or incompatible typed arrays
 *   - SparseFormatError (@sparse-npz/sparse): archives that do not hold a valid sparse matrix
 * - ContractViolationError: caller bugs (records built outside the codec's invariants)
 *
 * ContractViolationError does not extend SparseNpzError: an
 * `instanceof SparseNpzError` check matches bad input only.
 *
 * @example
 * ```typescript
 * import { SparseNpzError, ErrorCode } from '@sparse-npz/core';
 *
 * try {
 *   readSparse(archive, Float64);
 * } catch (error) {
 *   if (error instanceof SparseNpzError && error.code === ErrorCode.MISSING_ARRAY) {
 *     logger.warn(`Not a sparse archive: ${error.message}`, { errorCode: error.code });
 *   } else {
 *     throw error;
 *   }
 * }
 * ```
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  CONTRACT_VIOLATION = 'CONTRACT_VIOLATION',
  INVALID_CONFIG = 'INVALID_CONFIG',

  // Typed-array (NPY) errors
  INVALID_MAGIC = 'INVALID_MAGIC',
  UNSUPPORTED_VERSION = 'UNSUPPORTED_VERSION',
  INVALID_HEADER = 'INVALID_HEADER',
  UNSUPPORTED_DTYPE = 'UNSUPPORTED_DTYPE',
  DTYPE_MISMATCH = 'DTYPE_MISMATCH',
  TRUNCATED_DATA = 'TRUNCATED_DATA',
  ELEMENT_COUNT_MISMATCH = 'ELEMENT_COUNT_MISMATCH',

  // Container errors
  DUPLICATE_ENTRY = 'DUPLICATE_ENTRY',
  INCOMPLETE_ENTRY = 'INCOMPLETE_ENTRY',

  // Sparse matrix errors
  MISSING_ARRAY = 'MISSING_ARRAY',
  INVALID_RANK = 'INVALID_RANK',
  INVALID_DTYPE = 'INVALID_DTYPE',
  INVALID_SHAPE = 'INVALID_SHAPE',
  INVALID_FORMAT = 'INVALID_FORMAT',
  FORMAT_MISMATCH = 'FORMAT_MISMATCH',
  UNSUPPORTED_ORDER = 'UNSUPPORTED_ORDER',
}

const ERROR_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCode));

/**
 * Type guard to check if a string is a valid ErrorCode.
 */
export function isErrorCode(code: string): code is ErrorCode {
  return ERROR_CODES.has(code);
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for recoverable sparse-npz errors
 *
 * All errors caused by the contents of an archive extend this class, allowing for:
 * - Catching every malformed-input error with a single catch block
 * - Programmatic error identification via the `code` property
 * - Structured details (array name, expected vs. actual) for diagnostics
 */
export class SparseNpzError extends Error {
  /**
   * Error code for programmatic identification.
   */
  public readonly code: ErrorCode;

  /**
   * Structured details for debugging (array name, expected, actual, ...)
   */
  public readonly details?: Record<string, unknown>;

  /**
   * Helpful suggestion for resolving the error (when applicable)
   */
  public readonly suggestion?: string;

  /**
   * Timestamp when the error was created (milliseconds since epoch)
   */
  public readonly timestamp: number;

  /**
   * @param message - Human-readable error message
   * @param code - Error code for programmatic identification
   * @param details - Optional structured details for debugging
   * @param suggestion - Optional helpful suggestion for resolving the error
   */
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message);
    this.name = 'SparseNpzError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();

    Error.captureStackTrace(this, new.target);
  }

  /**
   * Format error for logging with all context.
   * Returns a structured object suitable for JSON logging.
   */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.suggestion && { suggestion: this.suggestion }),
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// Contract Violations
// =============================================================================

/**
 * Thrown when a caller hands the codec a value that breaks its documented
 * preconditions, e.g. a DIA record whose data does not fill
 * `offsets.length` diagonals of `length` elements.
 *
 * This is a programming error, not a property of some input file.
 */
export class ContractViolationError extends Error {
  public readonly code = ErrorCode.CONTRACT_VIOLATION;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ContractViolationError';
    this.details = details;
    Error.captureStackTrace(this, ContractViolationError);
  }
}

/**
 * Assert a precondition of the caller.
 *
 * @throws ContractViolationError if `condition` is false
 *
 * @example
 * ```typescript
 * assertContract(data.length === offsets.length * length, 'DIA data does not fill its diagonals', {
 *   dataLength: data.length,
 *   offsetsLength: offsets.length,
 * });
 * ```
 */
export function assertContract(
  condition: boolean,
  message: string,
  details?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    throw new ContractViolationError(message, details);
  }
}
