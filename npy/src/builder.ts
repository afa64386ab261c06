/**
 * Write side of the typed-array layer.
 */

import { assertContract, product } from '@sparse-npz/core';
import type { ByteSink } from './archive.js';
import { type ByteOrder, type DType, formatDType } from './dtype.js';
import type { ElementType } from './element.js';
import { NpyError } from './errors.js';
import { encodeHeader } from './header.js';

/** Elements buffered before a chunk is handed to the sink */
const CHUNK_ELEMENTS = 4096;

/**
 * Configures the dtype of a new NPY array.
 *
 * @example
 * ```typescript
 * const writer = new NpyBuilder(Int32)
 *   .defaultDType('little')
 *   .beginNd(npz.startArray('indices'), [indices.length]);
 * writer.extend(indices);
 * writer.finish();
 * ```
 */
export class NpyBuilder<T> {
  private selected: DType;

  constructor(private readonly type: ElementType<T>) {
    this.selected = type.defaultDType();
  }

  /**
   * Write with an explicit dtype. The element type must accept it.
   */
  dtype(dtype: DType): this {
    assertContract(this.type.accepts(dtype), `${this.type.name} cannot be written as ${formatDType(dtype)}`, {
      elementType: this.type.name,
      descr: formatDType(dtype),
    });
    this.selected = dtype;
    return this;
  }

  /**
   * Write with the element type's own dtype in the given byte order.
   */
  defaultDType(byteOrder: ByteOrder = 'little'): this {
    this.selected = this.type.defaultDType(byteOrder);
    return this;
  }

  /**
   * Write the header to `sink` and return a writer expecting exactly
   * `product(shape)` elements in row-major order.
   */
  beginNd(sink: ByteSink, shape: readonly number[]): NpyWriter<T> {
    assertContract(
      shape.every(dim => Number.isSafeInteger(dim) && dim >= 0),
      `invalid array shape: [${shape.join(', ')}]`,
      { shape: [...shape] }
    );
    sink.write(encodeHeader(this.selected, shape, 'C'));
    return new NpyWriter(this.type, this.selected, sink, product(shape));
  }
}

/**
 * Streams elements of one array into a sink.
 */
export class NpyWriter<T> {
  private written = 0;
  private pending = 0;
  private readonly chunk: Uint8Array;
  private readonly view: DataView;

  constructor(
    private readonly type: ElementType<T>,
    private readonly dtype: DType,
    private readonly sink: ByteSink,
    private readonly expected: number
  ) {
    this.chunk = new Uint8Array(dtype.size * Math.min(CHUNK_ELEMENTS, Math.max(expected, 1)));
    this.view = new DataView(this.chunk.buffer);
  }

  /**
   * @throws NpyError (ELEMENT_COUNT_MISMATCH) when more elements are pushed than the shape allows
   */
  push(value: T): void {
    if (this.written >= this.expected) {
      throw NpyError.elementCountMismatch(this.expected, this.written + 1);
    }
    this.type.write(this.view, this.pending * this.dtype.size, value, this.dtype);
    this.pending++;
    this.written++;
    if (this.pending * this.dtype.size === this.chunk.length) {
      this.flush();
    }
  }

  extend(values: Iterable<T>): void {
    for (const value of values) {
      this.push(value);
    }
  }

  /**
   * Flush buffered elements and close the sink.
   *
   * @throws NpyError (ELEMENT_COUNT_MISMATCH) when fewer elements were pushed than the shape requires
   */
  finish(): void {
    if (this.written !== this.expected) {
      throw NpyError.elementCountMismatch(this.expected, this.written);
    }
    this.flush();
    this.sink.close();
  }

  private flush(): void {
    if (this.pending === 0) return;
    this.sink.write(this.chunk.slice(0, this.pending * this.dtype.size));
    this.pending = 0;
  }
}
