/**
 * Tests for encoding sparse matrices
 */

import { describe, it, expect } from 'vitest';
import { ContractViolationError, ErrorCode } from '@sparse-npz/core';
import { Float64, Int32, MemoryNpz } from '@sparse-npz/npy';
import { readSparse } from '../read.js';
import type { Bsr, Coo, Csr, Dia } from '../types.js';
import { writeIndices, writeSparse } from '../write.js';
import { catchError, plain } from './helpers.js';

const csr: Csr<number> = {
  format: 'csr',
  shape: [3n, 4n],
  indices: BigUint64Array.of(0n, 2n, 1n),
  indptr: BigUint64Array.of(0n, 2n, 2n, 3n),
  data: [1.5, 2.5, 3.5],
};

function descrs(npz: MemoryNpz): Record<string, [string, readonly number[]]> {
  const out: Record<string, [string, readonly number[]]> = {};
  for (const name of npz.arrayNames()) {
    const npy = npz.byName(name);
    if (npy !== null) {
      out[name] = [npy.descr, npy.shape];
    }
  }
  return out;
}

describe('writeSparse', () => {
  it('should write CSR arrays in scipy order with scipy dtypes', () => {
    const npz = new MemoryNpz();
    writeSparse(csr, Float64, npz);

    expect(npz.arrayNames()).toEqual(['format', 'shape', 'indices', 'indptr', 'data']);
    expect(descrs(npz)).toEqual({
      format: ['|S3', []],
      shape: ['<i8', [2]],
      indices: ['<i4', [3]],
      indptr: ['<i4', [4]],
      data: ['<f8', [3]],
    });
  });

  it('should write COO arrays as format, shape, row, col, data', () => {
    const coo: Coo<number> = {
      format: 'coo',
      shape: [2n, 2n],
      row: BigUint64Array.of(0n, 1n),
      col: BigUint64Array.of(1n, 0n),
      data: [5, 6],
    };
    const npz = new MemoryNpz();
    writeSparse(coo, Int32, npz);

    expect(npz.arrayNames()).toEqual(['format', 'shape', 'row', 'col', 'data']);
    expect(npz.byName('data')?.descr).toBe('<i4');
  });

  it('should widen only the arrays that need it', () => {
    const wide: Csr<number> = { ...csr, indices: BigUint64Array.of(0n, 2147483648n, 1n) };
    const npz = new MemoryNpz();
    writeSparse(wide, Float64, npz);

    expect(npz.byName('indices')?.descr).toBe('<i8');
    expect(npz.byName('indptr')?.descr).toBe('<i4');
  });

  it('should keep int32 at the int32 maximum', () => {
    const edge: Csr<number> = { ...csr, indices: BigUint64Array.of(0n, 2147483647n, 1n) };
    const npz = new MemoryNpz();
    writeSparse(edge, Float64, npz);

    expect(npz.byName('indices')?.descr).toBe('<i4');
  });

  it('should store u64 indices above the int64 range by their bit pattern', () => {
    const coo: Coo<number> = {
      format: 'coo',
      shape: [1n, 1n],
      row: BigUint64Array.of(2n ** 64n - 1n),
      col: BigUint64Array.of(2n ** 63n),
      data: [1],
    };
    const npz = new MemoryNpz();
    writeSparse(coo, Float64, npz);

    // -1 fits int32; -2^63 does not
    expect(npz.byName('row')?.toArray(Int32)).toEqual([-1]);
    expect(npz.byName('col')?.descr).toBe('<i8');
    expect(plain(readSparse(npz, Float64))).toEqual(plain(coo));
  });

  it('should honour the int64 index width policy', () => {
    const npz = new MemoryNpz();
    writeSparse(csr, Float64, npz, { indexWidth: 'int64' });

    expect(npz.byName('indices')?.descr).toBe('<i8');
    expect(npz.byName('indptr')?.descr).toBe('<i8');
  });

  it('should write big-endian arrays when asked', () => {
    const npz = new MemoryNpz();
    writeSparse(csr, Float64, npz, { byteOrder: 'big' });

    expect(descrs(npz)).toEqual({
      format: ['|S3', []],
      shape: ['>i8', [2]],
      indices: ['>i4', [3]],
      indptr: ['>i4', [4]],
      data: ['>f8', [3]],
    });
    expect(plain(readSparse(npz, Float64))).toEqual(plain(csr));
  });

  it('should propagate container errors', () => {
    const npz = new MemoryNpz();
    writeSparse(csr, Float64, npz);

    expect(catchError(() => writeSparse(csr, Float64, npz))).toMatchObject({
      code: ErrorCode.DUPLICATE_ENTRY,
      message: "array 'format' already exists in archive",
    });
  });
});

describe('writeDia', () => {
  it('should write data as [offsets, length]', () => {
    const dia: Dia<number> = {
      format: 'dia',
      shape: [7n, 7n],
      offsets: BigInt64Array.of(-1n, 0n, 1n),
      length: 7,
      data: Array.from({ length: 21 }, (_, i) => i),
    };
    const npz = new MemoryNpz();
    writeSparse(dia, Float64, npz);

    expect(npz.arrayNames()).toEqual(['format', 'shape', 'offsets', 'data']);
    expect(descrs(npz).offsets).toEqual(['<i4', [3]]);
    expect(descrs(npz).data).toEqual(['<f8', [3, 7]]);
  });

  it('should keep the diagonal length when there are no offsets', () => {
    const dia: Dia<number> = {
      format: 'dia',
      shape: [4n, 4n],
      offsets: new BigInt64Array(0),
      length: 4,
      data: [],
    };
    const npz = new MemoryNpz();
    writeSparse(dia, Float64, npz);

    expect(descrs(npz).data).toEqual(['<f8', [0, 4]]);
    expect(plain(readSparse(npz, Float64))).toEqual(plain(dia));
  });

  it('should write nothing when data does not fill the diagonals', () => {
    const dia: Dia<number> = {
      format: 'dia',
      shape: [3n, 3n],
      offsets: BigInt64Array.of(0n, 1n),
      length: 2,
      data: [1, 2, 3],
    };
    const npz = new MemoryNpz();
    const error = catchError(() => writeSparse(dia, Float64, npz));

    expect(error).toBeInstanceOf(ContractViolationError);
    expect(error).toMatchObject({ details: { dataLength: 3, offsetsLength: 2, length: 2 } });
    expect(npz.arrayNames()).toEqual([]);
  });

  it('should refuse data without offsets', () => {
    const dia: Dia<number> = {
      format: 'dia',
      shape: [1n, 1n],
      offsets: new BigInt64Array(0),
      length: 1,
      data: [1],
    };
    expect(() => writeSparse(dia, Float64, new MemoryNpz())).toThrow(ContractViolationError);
  });

  it('should refuse a negative diagonal length', () => {
    const dia: Dia<number> = {
      format: 'dia',
      shape: [1n, 1n],
      offsets: new BigInt64Array(0),
      length: -1,
      data: [],
    };
    expect(() => writeSparse(dia, Float64, new MemoryNpz())).toThrow(ContractViolationError);
  });
});

describe('writeBsr', () => {
  const bsr: Bsr<number> = {
    format: 'bsr',
    shape: [2n, 4n],
    blocksize: [2, 2],
    indices: BigUint64Array.of(0n, 1n),
    indptr: BigUint64Array.of(0n, 2n),
    data: [1, 2, 3, 4, 5, 6, 7, 8],
  };

  it('should write data as [blocks, blockRows, blockCols]', () => {
    const npz = new MemoryNpz();
    writeSparse(bsr, Float64, npz);

    expect(npz.arrayNames()).toEqual(['format', 'shape', 'indices', 'indptr', 'data']);
    expect(descrs(npz).data).toEqual(['<f8', [2, 2, 2]]);
    expect(plain(readSparse(npz, Float64))).toEqual(plain(bsr));
  });

  it('should write nothing when data does not match the blocks', () => {
    const npz = new MemoryNpz();
    const broken: Bsr<number> = { ...bsr, data: [1, 2, 3, 4, 5, 6, 7] };
    const error = catchError(() => writeSparse(broken, Float64, npz));

    expect(error).toBeInstanceOf(ContractViolationError);
    expect(error).toMatchObject({ details: { dataLength: 7, indicesLength: 2, blocksize: [2, 2] } });
    expect(npz.arrayNames()).toEqual([]);
  });
});

describe('failed writes', () => {
  const coo: Coo<number> = {
    format: 'coo',
    shape: [2n, 2n],
    row: BigUint64Array.of(0n),
    col: BigUint64Array.of(1n),
    data: [Number.NaN],
  };

  it('should leave the archive empty when a data element is rejected', () => {
    const npz = new MemoryNpz();

    expect(() => writeSparse(coo, Int32, npz)).toThrow(ContractViolationError);
    expect(npz.arrayNames()).toEqual([]);
    expect(npz.byName('data')).toBeNull();
  });

  it('should leave the archive usable for a later write', () => {
    const npz = new MemoryNpz();
    expect(() => writeSparse(coo, Int32, npz)).toThrow(ContractViolationError);

    writeSparse({ ...coo, data: [5] }, Int32, npz);

    expect(npz.arrayNames()).toEqual(['format', 'shape', 'row', 'col', 'data']);
    expect(npz.byName('data')?.toArray(Int32)).toEqual([5]);
  });
});

describe('writeIndices', () => {
  it('should write an empty array as int32', () => {
    const npz = new MemoryNpz();
    writeIndices(npz, 'row', new BigInt64Array(0));

    expect(descrs(npz).row).toEqual(['<i4', [0]]);
  });
});
