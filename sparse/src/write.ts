/**
 * Encoding sparse matrices into a named-array container, like
 * `scipy.sparse.save_npz`.
 *
 * Arrays are written in this order: `format`, `shape`, the format's index
 * arrays, `data`. Independent readers may rely on the names; the order
 * follows scipy.
 *
 * Every array is encoded into a staging archive first and copied into the
 * target container only once all of them succeeded. A rejected element leaves
 * the target untouched; errors from the target itself propagate unchanged.
 */

import { assertContract, assertNever, product } from '@sparse-npz/core';
import {
  type ByteOrder,
  type ElementType,
  Int32,
  Int64,
  MemoryNpz,
  NpyBuilder,
  type NpzWriter,
} from '@sparse-npz/npy';
import { writeFormat } from './format.js';
import { type IndexWidthPolicy, narrowToInt32, selectIndexWidth, toSignedIndices } from './indices.js';
import type { Bsr, Coo, Csc, Csr, Dia, MatrixShape, SparseMatrix } from './types.js';

export interface WriteOptions {
  /** Byte order of every written array (default: 'little') */
  byteOrder?: ByteOrder;
  /** Integer width of index arrays (default: 'auto') */
  indexWidth?: IndexWidthPolicy;
}

interface ResolvedWriteOptions {
  readonly byteOrder: ByteOrder;
  readonly indexWidth: IndexWidthPolicy;
}

function resolveOptions(options: WriteOptions): ResolvedWriteOptions {
  return {
    byteOrder: options.byteOrder ?? 'little',
    indexWidth: options.indexWidth ?? 'auto',
  };
}

// =============================================================================
// Array writers
// =============================================================================

function writeShape(npz: NpzWriter, shape: MatrixShape, options: ResolvedWriteOptions): void {
  assertContract(shape.length === 2, `matrix shape must have 2 dimensions, got ${shape.length}`);
  const writer = new NpyBuilder(Int64)
    .defaultDType(options.byteOrder)
    .beginNd(npz.startArray('shape'), [2]);
  writer.extend(shape.map(dim => BigInt.asIntN(64, dim)));
  writer.finish();
}

/**
 * Write a rank-1 index array as int32 when every value fits, int64 otherwise.
 */
export function writeIndices(
  npz: NpzWriter,
  name: string,
  values: BigInt64Array,
  options: WriteOptions = {}
): void {
  const { byteOrder, indexWidth } = resolveOptions(options);
  const sink = npz.startArray(name);
  const width = indexWidth === 'int64' ? 'int64' : selectIndexWidth(values);

  if (width === 'int32') {
    const writer = new NpyBuilder(Int32).defaultDType(byteOrder).beginNd(sink, [values.length]);
    writer.extend(narrowToInt32(values));
    writer.finish();
  } else {
    const writer = new NpyBuilder(Int64).defaultDType(byteOrder).beginNd(sink, [values.length]);
    writer.extend(values);
    writer.finish();
  }
}

function writeData<T>(
  npz: NpzWriter,
  type: ElementType<T>,
  data: readonly T[],
  shape: readonly number[],
  options: ResolvedWriteOptions
): void {
  const writer = new NpyBuilder(type)
    .defaultDType(options.byteOrder)
    .beginNd(npz.startArray('data'), shape);
  writer.extend(data);
  writer.finish();
}

/**
 * Run `encode` against a staging archive, then copy the result into `npz`.
 */
function staged(npz: NpzWriter, encode: (staging: NpzWriter) => void): void {
  const staging = new MemoryNpz();
  encode(staging);
  staging.copyTo(npz);
}

// =============================================================================
// Per-format writers
// =============================================================================

/**
 * Write a `coo_matrix`.
 *
 * No structural validation is performed; lengths of `row`, `col` and `data`
 * are written as given.
 */
export function writeCoo<T>(matrix: Coo<T>, type: ElementType<T>, npz: NpzWriter, options: WriteOptions = {}): void {
  const resolved = resolveOptions(options);
  staged(npz, staging => {
    writeFormat(staging, 'coo');
    writeShape(staging, matrix.shape, resolved);
    writeIndices(staging, 'row', toSignedIndices(matrix.row), resolved);
    writeIndices(staging, 'col', toSignedIndices(matrix.col), resolved);
    writeData(staging, type, matrix.data, [matrix.data.length], resolved);
  });
}

/**
 * Write a `csr_matrix`. `indptr` is written as given.
 */
export function writeCsr<T>(matrix: Csr<T>, type: ElementType<T>, npz: NpzWriter, options: WriteOptions = {}): void {
  const resolved = resolveOptions(options);
  staged(npz, staging => {
    writeFormat(staging, 'csr');
    writeShape(staging, matrix.shape, resolved);
    writeIndices(staging, 'indices', toSignedIndices(matrix.indices), resolved);
    writeIndices(staging, 'indptr', toSignedIndices(matrix.indptr), resolved);
    writeData(staging, type, matrix.data, [matrix.data.length], resolved);
  });
}

/**
 * Write a `csc_matrix`. `indptr` is written as given.
 */
export function writeCsc<T>(matrix: Csc<T>, type: ElementType<T>, npz: NpzWriter, options: WriteOptions = {}): void {
  const resolved = resolveOptions(options);
  staged(npz, staging => {
    writeFormat(staging, 'csc');
    writeShape(staging, matrix.shape, resolved);
    writeIndices(staging, 'indices', toSignedIndices(matrix.indices), resolved);
    writeIndices(staging, 'indptr', toSignedIndices(matrix.indptr), resolved);
    writeData(staging, type, matrix.data, [matrix.data.length], resolved);
  });
}

/**
 * Write a `dia_matrix`; `data` is written as a C-order
 * `[offsets.length, length]` array, one row per diagonal, the layout scipy
 * keeps in `dia_matrix.data`. The transposed `[length, offsets.length]`
 * layout is not produced.
 *
 * @throws ContractViolationError if `length` is not a non-negative integer or
 *   `data.length !== offsets.length * length`. Nothing is written in that case.
 */
export function writeDia<T>(matrix: Dia<T>, type: ElementType<T>, npz: NpzWriter, options: WriteOptions = {}): void {
  const { data, offsets, length } = matrix;
  assertContract(Number.isSafeInteger(length) && length >= 0, `invalid DIA diagonal length ${length}`, {
    length,
  });
  assertContract(
    data.length === offsets.length * length,
    `DIA data length ${data.length} does not match ${offsets.length} diagonals of length ${length}`,
    { dataLength: data.length, offsetsLength: offsets.length, length }
  );

  const resolved = resolveOptions(options);
  staged(npz, staging => {
    writeFormat(staging, 'dia');
    writeShape(staging, matrix.shape, resolved);
    writeIndices(staging, 'offsets', offsets, resolved);
    writeData(staging, type, data, [offsets.length, length], resolved);
  });
}

/**
 * Write a `bsr_matrix`; `data` is written as a C-order
 * `[indices.length, blocksize[0], blocksize[1]]` array.
 *
 * @throws ContractViolationError if `data.length !== indices.length * blocksize[0] * blocksize[1]`.
 *   Nothing is written in that case.
 */
export function writeBsr<T>(matrix: Bsr<T>, type: ElementType<T>, npz: NpzWriter, options: WriteOptions = {}): void {
  const { data, indices, blocksize } = matrix;
  assertContract(
    blocksize.every(dim => Number.isSafeInteger(dim) && dim >= 0),
    `invalid BSR blocksize [${blocksize.join(', ')}]`,
    { blocksize: [...blocksize] }
  );
  const dataShape = [indices.length, blocksize[0], blocksize[1]];
  assertContract(
    data.length === product(dataShape),
    `BSR data length ${data.length} does not match ${indices.length} blocks of ${blocksize[0]}x${blocksize[1]}`,
    { dataLength: data.length, indicesLength: indices.length, blocksize: [...blocksize] }
  );

  const resolved = resolveOptions(options);
  staged(npz, staging => {
    writeFormat(staging, 'bsr');
    writeShape(staging, matrix.shape, resolved);
    writeIndices(staging, 'indices', toSignedIndices(indices), resolved);
    writeIndices(staging, 'indptr', toSignedIndices(matrix.indptr), resolved);
    writeData(staging, type, data, dataShape, resolved);
  });
}

/**
 * Write a sparse matrix of any format, like `scipy.sparse.save_npz`.
 *
 * @example
 * ```typescript
 * const npz = new MemoryNpz();
 * writeSparse(csr, Float64, npz);
 * npz.arrayNames(); // ['format', 'shape', 'indices', 'indptr', 'data']
 * ```
 */
export function writeSparse<T>(
  matrix: SparseMatrix<T>,
  type: ElementType<T>,
  npz: NpzWriter,
  options: WriteOptions = {}
): void {
  switch (matrix.format) {
    case 'coo':
      return writeCoo(matrix, type, npz, options);
    case 'csr':
      return writeCsr(matrix, type, npz, options);
    case 'csc':
      return writeCsc(matrix, type, npz, options);
    case 'dia':
      return writeDia(matrix, type, npz, options);
    case 'bsr':
      return writeBsr(matrix, type, npz, options);
    default:
      return assertNever(matrix, 'Unhandled sparse format');
  }
}
