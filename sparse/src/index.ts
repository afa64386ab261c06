/**
 * Reading and writing `scipy.sparse` matrices stored in NPZ archives.
 *
 * @example
 * ```typescript
 * import { MemoryNpz, Float64 } from '@sparse-npz/npy';
 * import { readSparse, writeSparse } from '@sparse-npz/sparse';
 *
 * const npz = new MemoryNpz();
 * writeSparse(matrix, Float64, npz);
 * const back = readSparse(npz, Float64);
 * ```
 *
 * @packageDocumentation
 */

export {
  SPARSE_FORMATS,
  type SparseFormat,
  type MatrixShape,
  type Coo,
  type Csr,
  type Csc,
  type Dia,
  type Bsr,
  type SparseMatrix,
  isSparseFormat,
  storedCount,
} from './types.js';

export { SparseFormatError, showFormat } from './errors.js';

export { FORMAT_ARRAY, readFormat, expectFormat, writeFormat } from './format.js';

export {
  type IndexWidth,
  type IndexWidthPolicy,
  INT32_MIN,
  INT32_MAX,
  fitsInt32,
  selectIndexWidth,
  toSignedIndices,
  widenIndices,
  widenSignedIndices,
  narrowToInt32,
} from './indices.js';

export {
  readIndices,
  readSignedIndices,
  readCoo,
  readCsr,
  readCsc,
  readDia,
  readBsr,
  readSparse,
} from './read.js';

export {
  type WriteOptions,
  writeIndices,
  writeCoo,
  writeCsr,
  writeCsc,
  writeDia,
  writeBsr,
  writeSparse,
} from './write.js';

export { SparseNpzCodec, type SparseNpzCodecOptions } from './codec.js';
