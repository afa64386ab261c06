/**
 * Read side of the typed-array layer.
 */

import { product } from '@sparse-npz/core';
import type { DType } from './dtype.js';
import type { ElementType } from './element.js';
import { NpyError } from './errors.js';
import { type MemoryOrder, type NpyHeader, parseHeader } from './header.js';

/**
 * A parsed NPY array.
 *
 * Holds the raw bytes; elements are materialized on demand for a given
 * element type, in the order they are stored.
 *
 * @example
 * ```typescript
 * const npy = NpyArray.fromBytes(bytes);
 * if (npy.ndim === 1) {
 *   const values = npy.toArray(Float64);
 * }
 * ```
 */
export class NpyArray {
  private constructor(
    readonly header: NpyHeader,
    readonly version: readonly [number, number],
    private readonly view: DataView
  ) {}

  /**
   * @throws NpyError when the header is malformed or the data is shorter than the header declares
   */
  static fromBytes(bytes: Uint8Array): NpyArray {
    const { header, version, dataOffset } = parseHeader(bytes);
    const data = bytes.subarray(dataOffset);

    if (header.dtype !== null) {
      const expectedBytes = product(header.shape) * header.dtype.size;
      if (data.length < expectedBytes) {
        throw NpyError.truncatedData(expectedBytes, data.length);
      }
    }

    return new NpyArray(header, version, new DataView(data.buffer, data.byteOffset, data.byteLength));
  }

  /** Parsed dtype, or null when the descriptor is not one this library reads */
  get dtype(): DType | null {
    return this.header.dtype;
  }

  /** The dtype descriptor as stored, e.g. `<i4` */
  get descr(): string {
    return this.header.descr;
  }

  get shape(): readonly number[] {
    return this.header.shape;
  }

  get order(): MemoryOrder {
    return this.header.order;
  }

  get ndim(): number {
    return this.header.shape.length;
  }

  /** Number of elements (1 for a zero-dimensional array) */
  get len(): number {
    return product(this.header.shape);
  }

  /**
   * Read all elements as `type`, or return null if `type` does not accept
   * this array's dtype.
   */
  tryData<T>(type: ElementType<T>): T[] | null {
    const dtype = this.header.dtype;
    if (dtype === null || !type.accepts(dtype)) {
      return null;
    }
    const count = this.len;
    const out = new Array<T>(count);
    for (let i = 0; i < count; i++) {
      out[i] = type.read(this.view, i * dtype.size, dtype);
    }
    return out;
  }

  /**
   * Read all elements as `type`.
   *
   * @throws NpyError (DTYPE_MISMATCH) if `type` does not accept this array's dtype
   */
  toArray<T>(type: ElementType<T>): T[] {
    const data = this.tryData(type);
    if (data === null) {
      throw NpyError.dtypeMismatch(type.name, this.descr);
    }
    return data;
  }
}
