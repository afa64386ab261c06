/**
 * Raw representations of the five sparse matrix formats stored by
 * `scipy.sparse.save_npz`.
 *
 * These are plain records: the codec reads and writes exactly what is stored
 * and performs no structural validation. In particular:
 *
 * - `indptr` is typically nondecreasing, starts at 0 and ends at nnz, but
 *   neither scipy nor this codec guarantees it. Round-tripping an archive
 *   preserves whatever `indptr` it holds.
 * - `indices` (and COO `row`/`col`) need not be sorted within a row, column
 *   or superrow.
 */

export const SPARSE_FORMATS = ['coo', 'csr', 'csc', 'dia', 'bsr'] as const;

/** Value of the `format` discriminator array */
export type SparseFormat = (typeof SPARSE_FORMATS)[number];

/** `[nrow, ncol]` */
export type MatrixShape = readonly [bigint, bigint];

interface SparseRecord<F extends SparseFormat, T> {
  readonly format: F;
  /** Dimensions of the matrix `[nrow, ncol]` */
  readonly shape: MatrixShape;
  readonly data: readonly T[];
}

/**
 * COOrdinate format: `data[k]` is stored at `(row[k], col[k])`.
 */
export interface Coo<T> extends SparseRecord<'coo', T> {
  readonly row: BigUint64Array;
  readonly col: BigUint64Array;
}

/**
 * Compressed Sparse Row format.
 */
export interface Csr<T> extends SparseRecord<'csr', T> {
  /** Column of each stored element. Not necessarily sorted within a row. */
  readonly indices: BigUint64Array;
  /** Length `nrow + 1`; partitions `data` and `indices` into rows. Not validated. */
  readonly indptr: BigUint64Array;
}

/**
 * Compressed Sparse Column format.
 */
export interface Csc<T> extends SparseRecord<'csc', T> {
  /** Row of each stored element. Not necessarily sorted within a column. */
  readonly indices: BigUint64Array;
  /** Length `ncol + 1`; partitions `data` and `indices` into columns. Not validated. */
  readonly indptr: BigUint64Array;
}

/**
 * DIAgonal format.
 *
 * `data` holds the C-order elements of a `[offsets.length, length]` block:
 * one row per stored diagonal. Scipy stores each value at the index of its
 * column, and `length` is usually one more than the rightmost column holding
 * a nonzero, but the codec does not constrain it.
 */
export interface Dia<T> extends SparseRecord<'dia', T> {
  /** Which diagonal each row of `data` holds; negative is below the main diagonal. Any order. */
  readonly offsets: BigInt64Array;
  /** Length of each stored diagonal: the trailing dimension of `data` */
  readonly length: number;
}

/**
 * Block Sparse Row format.
 *
 * `data` holds the C-order elements of a `[indices.length, blocksize[0], blocksize[1]]`
 * block array, sorted by superrow.
 */
export interface Bsr<T> extends SparseRecord<'bsr', T> {
  /** `[blockRows, blockCols]`; `shape` should be divisible by it (not checked on read) */
  readonly blocksize: readonly [number, number];
  /** Supercolumn of each block. Not necessarily sorted within a superrow. */
  readonly indices: BigUint64Array;
  /** Length `nrow / blocksize[0] + 1`; partitions the blocks into superrows. Not validated. */
  readonly indptr: BigUint64Array;
}

export type SparseMatrix<T> = Coo<T> | Csr<T> | Csc<T> | Dia<T> | Bsr<T>;

export function isSparseFormat(value: string): value is SparseFormat {
  return SPARSE_FORMATS.some(format => format === value);
}

/**
 * Number of explicitly stored entries. For BSR this counts stored blocks,
 * for DIA stored diagonal slots.
 */
export function storedCount(matrix: SparseMatrix<unknown>): number {
  return matrix.format === 'bsr' ? matrix.indices.length : matrix.data.length;
}
