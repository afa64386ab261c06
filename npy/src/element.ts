/**
 * Element types: how a single scalar is read from and written to an NPY
 * data stream.
 *
 * An element type accepts exactly one dtype kind and size, in either byte
 * order. There is no implicit widening: reading `<i8` data as Int32 is a
 * dtype mismatch, not a conversion.
 */

import { assertContract } from '@sparse-npz/core';
import { type ByteOrder, type DType, isLittleEndian, makeDType } from './dtype.js';

export interface ElementType<T> {
  /** Display name used in error messages */
  readonly name: string;
  /** Dtype written when the caller does not pick one */
  defaultDType(byteOrder?: ByteOrder): DType;
  accepts(dtype: DType): boolean;
  read(view: DataView, offset: number, dtype: DType): T;
  write(view: DataView, offset: number, value: T, dtype: DType): void;
}

/** Value type produced by an element type */
export type ElementValue<E> = E extends ElementType<infer T> ? T : never;

interface NumberRange {
  readonly min: number;
  readonly max: number;
}

function integerElement(
  name: string,
  kind: 'i' | 'u',
  size: 1 | 2 | 4,
  range: NumberRange,
  get: (view: DataView, offset: number, littleEndian: boolean) => number,
  set: (view: DataView, offset: number, value: number, littleEndian: boolean) => void
): ElementType<number> {
  return {
    name,
    defaultDType: (byteOrder) => makeDType(kind, size, byteOrder),
    accepts: (dtype) => dtype.kind === kind && dtype.size === size,
    read: (view, offset, dtype) => get(view, offset, isLittleEndian(dtype)),
    write: (view, offset, value, dtype) => {
      assertContract(
        Number.isInteger(value) && value >= range.min && value <= range.max,
        `${name} value out of range: ${value}`,
        { elementType: name, value }
      );
      set(view, offset, value, isLittleEndian(dtype));
    },
  };
}

function floatElement(
  name: string,
  size: 4 | 8,
  get: (view: DataView, offset: number, littleEndian: boolean) => number,
  set: (view: DataView, offset: number, value: number, littleEndian: boolean) => void
): ElementType<number> {
  return {
    name,
    defaultDType: (byteOrder) => makeDType('f', size, byteOrder),
    accepts: (dtype) => dtype.kind === 'f' && dtype.size === size,
    read: (view, offset, dtype) => get(view, offset, isLittleEndian(dtype)),
    write: (view, offset, value, dtype) => set(view, offset, value, isLittleEndian(dtype)),
  };
}

function bigintElement(name: string, kind: 'i' | 'u', signed: boolean): ElementType<bigint> {
  return {
    name,
    defaultDType: (byteOrder) => makeDType(kind, 8, byteOrder),
    accepts: (dtype) => dtype.kind === kind && dtype.size === 8,
    read: (view, offset, dtype) =>
      signed
        ? view.getBigInt64(offset, isLittleEndian(dtype))
        : view.getBigUint64(offset, isLittleEndian(dtype)),
    write: (view, offset, value, dtype) => {
      const wrapped = signed ? BigInt.asIntN(64, value) : BigInt.asUintN(64, value);
      assertContract(wrapped === value, `${name} value out of range: ${value}`, {
        elementType: name,
        value: value.toString(),
      });
      if (signed) {
        view.setBigInt64(offset, value, isLittleEndian(dtype));
      } else {
        view.setBigUint64(offset, value, isLittleEndian(dtype));
      }
    },
  };
}

export const Bool: ElementType<boolean> = {
  name: 'Bool',
  defaultDType: () => makeDType('b', 1),
  accepts: (dtype) => dtype.kind === 'b' && dtype.size === 1,
  read: (view, offset) => view.getUint8(offset) !== 0,
  write: (view, offset, value) => view.setUint8(offset, value ? 1 : 0),
};

export const Int8 = integerElement('Int8', 'i', 1, { min: -0x80, max: 0x7f },
  (v, o) => v.getInt8(o), (v, o, x) => v.setInt8(o, x));
export const Int16 = integerElement('Int16', 'i', 2, { min: -0x8000, max: 0x7fff },
  (v, o, le) => v.getInt16(o, le), (v, o, x, le) => v.setInt16(o, x, le));
export const Int32 = integerElement('Int32', 'i', 4, { min: -0x8000_0000, max: 0x7fff_ffff },
  (v, o, le) => v.getInt32(o, le), (v, o, x, le) => v.setInt32(o, x, le));
export const UInt8 = integerElement('UInt8', 'u', 1, { min: 0, max: 0xff },
  (v, o) => v.getUint8(o), (v, o, x) => v.setUint8(o, x));
export const UInt16 = integerElement('UInt16', 'u', 2, { min: 0, max: 0xffff },
  (v, o, le) => v.getUint16(o, le), (v, o, x, le) => v.setUint16(o, x, le));
export const UInt32 = integerElement('UInt32', 'u', 4, { min: 0, max: 0xffff_ffff },
  (v, o, le) => v.getUint32(o, le), (v, o, x, le) => v.setUint32(o, x, le));

export const Int64 = bigintElement('Int64', 'i', true);
export const UInt64 = bigintElement('UInt64', 'u', false);

export const Float32 = floatElement('Float32', 4,
  (v, o, le) => v.getFloat32(o, le), (v, o, x, le) => v.setFloat32(o, x, le));
export const Float64 = floatElement('Float64', 8,
  (v, o, le) => v.getFloat64(o, le), (v, o, x, le) => v.setFloat64(o, x, le));

/**
 * Fixed-width byte strings (`|Sn`) of any width.
 *
 * Like NumPy, trailing NUL bytes are not part of the value: they are stripped
 * on read and used as padding on write.
 */
export const Bytes: ElementType<Uint8Array> = {
  name: 'Bytes',
  defaultDType: () => makeDType('S', 1),
  accepts: (dtype) => dtype.kind === 'S',
  read: (view, offset, dtype) => {
    let end = dtype.size;
    while (end > 0 && view.getUint8(offset + end - 1) === 0) {
      end--;
    }
    return new Uint8Array(view.buffer, view.byteOffset + offset, end).slice();
  },
  write: (view, offset, value, dtype) => {
    assertContract(value.length <= dtype.size, `byte string of length ${value.length} does not fit |S${dtype.size}`, {
      length: value.length,
      size: dtype.size,
    });
    for (let i = 0; i < dtype.size; i++) {
      view.setUint8(offset + i, i < value.length ? value[i] : 0);
    }
  },
};
