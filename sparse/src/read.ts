/**
 * Decoding sparse matrices from a named-array container.
 *
 * Every reader checks, in order: the discriminator, `shape`, the format's
 * index arrays and finally `data`. The first problem found is thrown; no
 * partial record is ever returned.
 *
 * Not checked: `indptr` monotonicity and bounds, index sortedness, and
 * `shape` divisibility by `blocksize`. Archives scipy writes need not satisfy
 * them either.
 */

import { assertNever } from '@sparse-npz/core';
import { type ElementType, Int32, Int64, type NpyArray, type NpzReader } from '@sparse-npz/npy';
import { SparseFormatError } from './errors.js';
import { expectFormat, readFormat } from './format.js';
import { widenIndices, widenSignedIndices } from './indices.js';
import type { Bsr, Coo, Csc, Csr, Dia, MatrixShape, SparseMatrix } from './types.js';

// =============================================================================
// Array extraction
// =============================================================================

function fetchArray(npz: NpzReader, name: string, expectedNdim: number): NpyArray {
  const npy = npz.byName(name);
  if (npy === null) {
    throw SparseFormatError.missingArray(name);
  }
  if (npy.ndim !== expectedNdim) {
    throw SparseFormatError.invalidRank(name, expectedNdim, npy.ndim);
  }
  return npy;
}

/**
 * Read a rank-1 int32 or int64 array as u64.
 *
 * @throws SparseFormatError (INVALID_DTYPE) for any other dtype, including unsigned ones
 */
export function readIndices(npz: NpzReader, name: string): BigUint64Array {
  const npy = fetchArray(npz, name, 1);
  const values = npy.tryData(Int32) ?? npy.tryData(Int64);
  if (values === null) {
    throw SparseFormatError.invalidDType(name, npy.descr);
  }
  return widenIndices(values);
}

/**
 * Read a rank-1 int32 or int64 array as i64.
 */
export function readSignedIndices(npz: NpzReader, name: string): BigInt64Array {
  const npy = fetchArray(npz, name, 1);
  const values = npy.tryData(Int32) ?? npy.tryData(Int64);
  if (values === null) {
    throw SparseFormatError.invalidDType(name, npy.descr);
  }
  return widenSignedIndices(values);
}

function readShape(npz: NpzReader): MatrixShape {
  const shape = readIndices(npz, 'shape');
  if (shape.length !== 2) {
    throw SparseFormatError.invalidShape('shape', `expected 2 elements, got ${shape.length}`);
  }
  return [shape[0], shape[1]];
}

interface DataArray<T> {
  readonly data: T[];
  readonly shape: readonly number[];
}

/**
 * Read `data` with the caller's element type. A dtype the element type
 * cannot read surfaces as the array layer's NpyError.
 */
function readData<T>(npz: NpzReader, type: ElementType<T>, expectedNdim: number): DataArray<T> {
  const npy = fetchArray(npz, 'data', expectedNdim);
  if (expectedNdim > 1 && npy.order !== 'C') {
    throw SparseFormatError.unsupportedOrder('data');
  }
  return { data: npy.toArray(type), shape: npy.shape };
}

// =============================================================================
// Per-format readers
// =============================================================================

/**
 * Read a `coo_matrix` saved by `scipy.sparse.save_npz`.
 */
export function readCoo<T>(npz: NpzReader, type: ElementType<T>): Coo<T> {
  expectFormat(npz, 'coo');
  const shape = readShape(npz);
  const row = readIndices(npz, 'row');
  const col = readIndices(npz, 'col');
  const { data } = readData(npz, type, 1);
  return { format: 'coo', shape, row, col, data };
}

/**
 * Read a `csr_matrix` saved by `scipy.sparse.save_npz`.
 */
export function readCsr<T>(npz: NpzReader, type: ElementType<T>): Csr<T> {
  expectFormat(npz, 'csr');
  const shape = readShape(npz);
  const indices = readIndices(npz, 'indices');
  const indptr = readIndices(npz, 'indptr');
  const { data } = readData(npz, type, 1);
  return { format: 'csr', shape, indices, indptr, data };
}

/**
 * Read a `csc_matrix` saved by `scipy.sparse.save_npz`.
 */
export function readCsc<T>(npz: NpzReader, type: ElementType<T>): Csc<T> {
  expectFormat(npz, 'csc');
  const shape = readShape(npz);
  const indices = readIndices(npz, 'indices');
  const indptr = readIndices(npz, 'indptr');
  const { data } = readData(npz, type, 1);
  return { format: 'csc', shape, indices, indptr, data };
}

/**
 * Read a `dia_matrix` saved by `scipy.sparse.save_npz`.
 *
 * `length` is the trailing dimension of the C-order `data` array. Its
 * leading dimension is not compared with `offsets.length`.
 */
export function readDia<T>(npz: NpzReader, type: ElementType<T>): Dia<T> {
  expectFormat(npz, 'dia');
  const shape = readShape(npz);
  const offsets = readSignedIndices(npz, 'offsets');
  const { data, shape: dataShape } = readData(npz, type, 2);
  return { format: 'dia', shape, offsets, length: dataShape[1], data };
}

/**
 * Read a `bsr_matrix` saved by `scipy.sparse.save_npz`.
 *
 * `blocksize` is taken from the trailing dimensions of the C-order
 * `[nblocks, blockRows, blockCols]` data array.
 */
export function readBsr<T>(npz: NpzReader, type: ElementType<T>): Bsr<T> {
  expectFormat(npz, 'bsr');
  const shape = readShape(npz);
  const indices = readIndices(npz, 'indices');
  const indptr = readIndices(npz, 'indptr');
  const { data, shape: dataShape } = readData(npz, type, 3);
  return {
    format: 'bsr',
    shape,
    blocksize: [dataShape[1], dataShape[2]],
    indices,
    indptr,
    data,
  };
}

/**
 * Read a sparse matrix saved by `scipy.sparse.save_npz`, whatever its format.
 *
 * @example
 * ```typescript
 * const matrix = readSparse(npz, Float64);
 * if (matrix.format === 'csr') {
 *   console.log(matrix.indptr.length - 1, 'rows');
 * }
 * ```
 */
export function readSparse<T>(npz: NpzReader, type: ElementType<T>): SparseMatrix<T> {
  const format = readFormat(npz);
  switch (format) {
    case 'coo':
      return readCoo(npz, type);
    case 'csr':
      return readCsr(npz, type);
    case 'csc':
      return readCsc(npz, type);
    case 'dia':
      return readDia(npz, type);
    case 'bsr':
      return readBsr(npz, type);
    default:
      return assertNever(format, `Unhandled sparse format: ${String(format)}`);
  }
}
