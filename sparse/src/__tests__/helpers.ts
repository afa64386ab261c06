/**
 * Test helpers for assembling archives by hand, the way a foreign producer
 * (scipy, another writer) would lay them out.
 */

import {
  Bytes,
  type DType,
  type ElementType,
  encodeHeader,
  makeDType,
  type MemoryNpz,
  NpyBuilder,
  type NpzWriter,
} from '@sparse-npz/npy';
import type { SparseMatrix } from '../types.js';

const textEncoder = new TextEncoder();

export interface PutArrayOptions {
  dtype?: DType;
  shape?: number[];
}

export function putArray<T>(
  npz: NpzWriter,
  name: string,
  type: ElementType<T>,
  values: readonly T[],
  options: PutArrayOptions = {}
): void {
  const builder = new NpyBuilder(type);
  if (options.dtype) {
    builder.dtype(options.dtype);
  }
  const writer = builder.beginNd(npz.startArray(name), options.shape ?? [values.length]);
  writer.extend(values);
  writer.finish();
}

export function putFormat(npz: NpzWriter, tag: string | Uint8Array): void {
  const bytes = typeof tag === 'string' ? textEncoder.encode(tag) : tag;
  putArray(npz, 'format', Bytes, [bytes], { dtype: makeDType('S', Math.max(bytes.length, 1)), shape: [] });
}

/**
 * Store little-endian float64 values under a Fortran-order header.
 */
export function putFortranFloat64(npz: MemoryNpz, name: string, shape: number[], values: number[]): void {
  const header = encodeHeader(makeDType('f', 8), shape, 'F');
  const bytes = new Uint8Array(header.length + values.length * 8);
  bytes.set(header, 0);
  const view = new DataView(bytes.buffer);
  values.forEach((value, i) => view.setFloat64(header.length + i * 8, value, true));
  npz.putArrayBytes(name, bytes);
}

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

/**
 * Plain-array view of a record, for deep equality.
 */
export function plain<T>(matrix: SparseMatrix<T>): Record<string, unknown> {
  switch (matrix.format) {
    case 'coo':
      return { ...matrix, shape: [...matrix.shape], row: Array.from(matrix.row), col: Array.from(matrix.col) };
    case 'csr':
    case 'csc':
      return {
        ...matrix,
        shape: [...matrix.shape],
        indices: Array.from(matrix.indices),
        indptr: Array.from(matrix.indptr),
      };
    case 'dia':
      return { ...matrix, shape: [...matrix.shape], offsets: Array.from(matrix.offsets) };
    case 'bsr':
      return {
        ...matrix,
        shape: [...matrix.shape],
        blocksize: [...matrix.blocksize],
        indices: Array.from(matrix.indices),
        indptr: Array.from(matrix.indptr),
      };
  }
}
