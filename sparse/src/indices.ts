/**
 * Integer width conversions for index and offset arrays.
 *
 * Scipy stores indices as int32 when they fit and int64 otherwise, and
 * either width may appear in any archive. Reading widens both to a canonical
 * 64-bit representation; writing picks the narrowest width that holds every
 * value of the array.
 */

import { assertContract } from '@sparse-npz/core';

export type IndexWidth = 'int32' | 'int64';

/** 'auto' picks per array; 'int64' always writes 8-byte integers */
export type IndexWidthPolicy = 'auto' | 'int64';

export const INT32_MIN = -(2n ** 31n);
export const INT32_MAX = 2n ** 31n - 1n;

export function fitsInt32(value: bigint): boolean {
  return value >= INT32_MIN && value <= INT32_MAX;
}

/**
 * Width needed to store every value of `values`. All-or-nothing: a single
 * value outside the int32 range makes the whole array int64.
 */
export function selectIndexWidth(values: Iterable<bigint>): IndexWidth {
  for (const value of values) {
    if (!fitsInt32(value)) {
      return 'int64';
    }
  }
  return 'int32';
}

/**
 * Reinterpret unsigned 64-bit indices as signed, bit for bit.
 */
export function toSignedIndices(values: BigUint64Array): BigInt64Array {
  return new BigInt64Array(values.buffer, values.byteOffset, values.length);
}

/**
 * Widen int32 or int64 values read from an archive to u64.
 * Negative values wrap, like a two's-complement cast.
 */
export function widenIndices(values: readonly number[] | readonly bigint[]): BigUint64Array {
  const out = new BigUint64Array(values.length);
  for (let i = 0; i < values.length; i++) {
    out[i] = BigInt.asUintN(64, BigInt(values[i]));
  }
  return out;
}

/**
 * Widen int32 or int64 values read from an archive to i64.
 */
export function widenSignedIndices(values: readonly number[] | readonly bigint[]): BigInt64Array {
  const out = new BigInt64Array(values.length);
  for (let i = 0; i < values.length; i++) {
    out[i] = BigInt(values[i]);
  }
  return out;
}

/**
 * Narrow i64 values to int32 numbers.
 *
 * Only valid after `selectIndexWidth` returned 'int32' for the same values.
 */
export function narrowToInt32(values: BigInt64Array): number[] {
  const out = new Array<number>(values.length);
  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    assertContract(fitsInt32(value), `index ${value} does not fit in int32`, { index: i, value: value.toString() });
    out[i] = Number(value);
  }
  return out;
}
