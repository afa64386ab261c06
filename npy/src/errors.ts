/**
 * Errors raised by the typed-array layer.
 */

import { ErrorCode, SparseNpzError } from '@sparse-npz/core';

/**
 * Error thrown when an NPY array is malformed, or cannot be read or written
 * with the requested element type.
 *
 * @example
 * ```typescript
 * throw NpyError.invalidMagic();
 * throw NpyError.dtypeMismatch('Float64', '<i4');
 * ```
 */
export class NpyError extends SparseNpzError {
  constructor(
    message: string,
    code: ErrorCode,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'NpyError';
  }

  static invalidMagic(): NpyError {
    return new NpyError(
      'invalid NPY file: bad magic number',
      ErrorCode.INVALID_MAGIC,
      undefined,
      'Ensure the entry was written as an NPY array'
    );
  }

  static unsupportedVersion(major: number, minor: number): NpyError {
    return new NpyError(
      `unsupported NPY version: ${major}.${minor}`,
      ErrorCode.UNSUPPORTED_VERSION,
      { major, minor }
    );
  }

  static invalidHeader(reason: string, header?: string): NpyError {
    return new NpyError(`invalid NPY header: ${reason}`, ErrorCode.INVALID_HEADER, {
      reason,
      ...(header !== undefined && { header }),
    });
  }

  static unsupportedDType(descr: string): NpyError {
    return new NpyError(`unsupported NPY dtype: ${descr}`, ErrorCode.UNSUPPORTED_DTYPE, { descr });
  }

  static dtypeMismatch(elementType: string, descr: string): NpyError {
    return new NpyError(
      `cannot read dtype ${descr} as ${elementType}`,
      ErrorCode.DTYPE_MISMATCH,
      { elementType, descr },
      `Read the array with an element type that accepts ${descr}`
    );
  }

  static truncatedData(expectedBytes: number, actualBytes: number): NpyError {
    return new NpyError(
      `NPY data truncated: expected ${expectedBytes} bytes, got ${actualBytes}`,
      ErrorCode.TRUNCATED_DATA,
      { expectedBytes, actualBytes }
    );
  }

  static elementCountMismatch(expected: number, actual: number): NpyError {
    return new NpyError(
      `NPY array expects ${expected} elements, got ${actual}`,
      ErrorCode.ELEMENT_COUNT_MISMATCH,
      { expected, actual }
    );
  }

  static duplicateEntry(name: string): NpyError {
    return new NpyError(`array '${name}' already exists in archive`, ErrorCode.DUPLICATE_ENTRY, { name });
  }

  static incompleteEntry(name: string): NpyError {
    return new NpyError(
      `array '${name}' is still being written`,
      ErrorCode.INCOMPLETE_ENTRY,
      { name },
      'Finish the previous array before starting or reading another'
    );
  }
}
