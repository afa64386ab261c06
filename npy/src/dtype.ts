/**
 * NumPy dtype descriptors
 *
 * Descriptor format: [byte order char][type char][byte size]
 * - byte order: '<' (little), '>' (big), '=' (native), '|' (not applicable)
 * - type char: 'b' (bool), 'i' (int), 'u' (uint), 'f' (float), 'S' (fixed-width bytes)
 *
 * Native order ('=') is read as little-endian, like every platform Node runs on.
 */

import { NpyError } from './errors.js';

export type ByteOrder = 'little' | 'big';

export type DTypeKind = 'b' | 'i' | 'u' | 'f' | 'S';

export interface DType {
  /** 'none' for single-byte and byte-string types */
  readonly byteOrder: ByteOrder | 'none';
  readonly kind: DTypeKind;
  /** Item size in bytes */
  readonly size: number;
}

const NUMERIC_SIZES: Record<Exclude<DTypeKind, 'S'>, readonly number[]> = {
  b: [1],
  i: [1, 2, 4, 8],
  u: [1, 2, 4, 8],
  f: [4, 8],
};

const DESCR_PATTERN = /^([<>=|]?)([biufS])(\d+)$/;

function isDTypeKind(value: string): value is DTypeKind {
  return value === 'b' || value === 'i' || value === 'u' || value === 'f' || value === 'S';
}

/**
 * Parse a descriptor string such as `<i4`, `>f8` or `|S3`.
 *
 * @throws NpyError (UNSUPPORTED_DTYPE) for structured, object, unicode or oddly sized types
 */
export function parseDType(descr: string): DType {
  const match = DESCR_PATTERN.exec(descr);
  const kind = match?.[2];
  if (!match || kind === undefined || !isDTypeKind(kind)) {
    throw NpyError.unsupportedDType(descr);
  }
  const orderChar = match[1];
  const size = Number(match[3]);

  if (kind === 'S') {
    if (size < 1) {
      throw NpyError.unsupportedDType(descr);
    }
    return { byteOrder: 'none', kind, size };
  }

  if (!NUMERIC_SIZES[kind].includes(size)) {
    throw NpyError.unsupportedDType(descr);
  }
  if (size === 1) {
    return { byteOrder: 'none', kind, size };
  }
  if (orderChar === '|' || orderChar === '') {
    // Multi-byte numbers need an explicit byte order
    throw NpyError.unsupportedDType(descr);
  }
  return { byteOrder: orderChar === '>' ? 'big' : 'little', kind, size };
}

/**
 * Like parseDType, but returns null for descriptors this library does not
 * interpret (unicode, complex, datetime, object, ...).
 */
export function tryParseDType(descr: string): DType | null {
  try {
    return parseDType(descr);
  } catch (error) {
    if (error instanceof NpyError) {
      return null;
    }
    throw error;
  }
}

/**
 * Render a dtype back to its descriptor string.
 */
export function formatDType(dtype: DType): string {
  const orderChar = dtype.byteOrder === 'little' ? '<' : dtype.byteOrder === 'big' ? '>' : '|';
  return `${orderChar}${dtype.kind}${dtype.size}`;
}

/**
 * Build a numeric or byte-string dtype, normalizing the byte order of
 * single-byte types to 'none'.
 */
export function makeDType(kind: DTypeKind, size: number, byteOrder: ByteOrder = 'little'): DType {
  if (kind === 'S' || size === 1) {
    return { byteOrder: 'none', kind, size };
  }
  return { byteOrder, kind, size };
}

export function isLittleEndian(dtype: DType): boolean {
  return dtype.byteOrder !== 'big';
}
