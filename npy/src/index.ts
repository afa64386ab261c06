/**
 * @sparse-npz/npy
 *
 * NumPy's NPY array format and the NPZ named-array container convention:
 * dtype descriptors, element (de)serialization, header parsing and writing,
 * and an in-memory archive.
 *
 * @packageDocumentation
 */

export { NpyError } from './errors.js';

export {
  type ByteOrder,
  type DType,
  type DTypeKind,
  parseDType,
  tryParseDType,
  formatDType,
  makeDType,
  isLittleEndian,
} from './dtype.js';

export {
  type ElementType,
  type ElementValue,
  Bool,
  Int8,
  Int16,
  Int32,
  Int64,
  UInt8,
  UInt16,
  UInt32,
  UInt64,
  Float32,
  Float64,
  Bytes,
} from './element.js';

export {
  type MemoryOrder,
  type NpyHeader,
  type ParsedHeader,
  NPY_MAGIC,
  NPY_ALIGNMENT,
  parseHeader,
  encodeHeader,
  formatShapeTuple,
} from './header.js';

export { NpyArray } from './array.js';
export { NpyBuilder, NpyWriter } from './builder.js';
export { type ByteSink, type NpzReader, type NpzWriter, MemoryNpz } from './archive.js';
