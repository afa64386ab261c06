/**
 * Errors for archives that do not hold a readable sparse matrix.
 */

import { ErrorCode, SparseNpzError } from '@sparse-npz/core';

/**
 * Render a raw discriminator for messages: printable ASCII as-is, every
 * other byte as `\xHH`, wrapped in single quotes.
 *
 * @example
 * ```typescript
 * showFormat(new Uint8Array([0x63, 0x73, 0x00])); // "'cs\x00'"
 * ```
 */
export function showFormat(bytes: Uint8Array): string {
  let out = '';
  for (const byte of bytes) {
    out += byte >= 0x20 && byte <= 0x7f
      ? String.fromCharCode(byte)
      : `\\x${byte.toString(16).toUpperCase().padStart(2, '0')}`;
  }
  return `'${out}'`;
}

/**
 * Thrown while decoding a sparse matrix from a named-array container.
 *
 * `details.array` names the offending array wherever one is involved.
 *
 * @example
 * ```typescript
 * throw SparseFormatError.missingArray('indptr');
 * throw SparseFormatError.invalidRank('row', 1, 2);
 * ```
 */
export class SparseFormatError extends SparseNpzError {
  constructor(
    message: string,
    code: ErrorCode,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'SparseFormatError';
  }

  static missingArray(name: string): SparseFormatError {
    return new SparseFormatError(
      `missing array '${name}' from sparse matrix`,
      ErrorCode.MISSING_ARRAY,
      { array: name },
      'Ensure the archive was written by scipy.sparse.save_npz or a compatible writer'
    );
  }

  static invalidRank(name: string, expected: number, actual: number): SparseFormatError {
    return new SparseFormatError(
      `invalid ndim for '${name}': ${actual} (expected ${expected})`,
      ErrorCode.INVALID_RANK,
      { array: name, expected, actual }
    );
  }

  static invalidDType(name: string, descr: string): SparseFormatError {
    return new SparseFormatError(
      `invalid dtype for '${name}' in sparse matrix: ${descr}`,
      ErrorCode.INVALID_DTYPE,
      { array: name, descr }
    );
  }

  static invalidShape(name: string, detail: string): SparseFormatError {
    return new SparseFormatError(
      `invalid shape for '${name}': ${detail}`,
      ErrorCode.INVALID_SHAPE,
      { array: name, detail }
    );
  }

  static invalidFormat(raw: Uint8Array): SparseFormatError {
    return new SparseFormatError(
      `invalid sparse format: ${showFormat(raw)}`,
      ErrorCode.INVALID_FORMAT,
      { array: 'format', raw: showFormat(raw), bytes: Array.from(raw) },
      "Expected one of 'coo', 'csr', 'csc', 'dia', 'bsr'"
    );
  }

  /**
   * The discriminator is not a scalar, so there is no single value to show.
   */
  static invalidFormatRank(ndim: number): SparseFormatError {
    return new SparseFormatError(
      `invalid sparse format: 'format' must be zero-dimensional, got ndim ${ndim}`,
      ErrorCode.INVALID_FORMAT,
      { array: 'format', ndim }
    );
  }

  static formatMismatch(expected: string, actual: Uint8Array): SparseFormatError {
    return new SparseFormatError(
      `wrong format: expected '${expected}', got ${showFormat(actual)}`,
      ErrorCode.FORMAT_MISMATCH,
      { array: 'format', expected, actual: showFormat(actual) },
      'Use readSparse to dispatch on the stored format'
    );
  }

  static unsupportedOrder(name: string): SparseFormatError {
    return new SparseFormatError(
      `fortran order is not supported for array '${name}' in a sparse matrix`,
      ErrorCode.UNSUPPORTED_ORDER,
      { array: name }
    );
  }
}
