/**
 * Tests for the format discriminator
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode } from '@sparse-npz/core';
import { Int32, MemoryNpz } from '@sparse-npz/npy';
import { showFormat, SparseFormatError } from '../errors.js';
import { expectFormat, readFormat, writeFormat } from '../format.js';
import { SPARSE_FORMATS } from '../types.js';
import { catchError, putArray, putFormat } from './helpers.js';

describe('showFormat', () => {
  it('should quote printable bytes and escape the rest', () => {
    expect(showFormat(new Uint8Array([0x63, 0x73, 0x72]))).toBe("'csr'");
    expect(showFormat(new Uint8Array([0x61, 0x00, 0xff]))).toBe("'a\\x00\\xFF'");
    expect(showFormat(new Uint8Array([]))).toBe("''");
  });
});

describe('writeFormat', () => {
  it('should write a zero-dimensional |S3 array', () => {
    const npz = new MemoryNpz();
    writeFormat(npz, 'bsr');

    const npy = npz.byName('format');
    expect(npy?.descr).toBe('|S3');
    expect(npy?.ndim).toBe(0);
    expect(readFormat(npz)).toBe('bsr');
  });

  it.each(SPARSE_FORMATS)('should read back %s', (format) => {
    const npz = new MemoryNpz();
    writeFormat(npz, format);
    expect(readFormat(npz)).toBe(format);
  });
});

describe('readFormat', () => {
  it('should reject unknown tags and echo them', () => {
    const npz = new MemoryNpz();
    putFormat(npz, 'xyz');
    const error = catchError(() => readFormat(npz));

    expect(error).toBeInstanceOf(SparseFormatError);
    expect(error).toMatchObject({
      code: ErrorCode.INVALID_FORMAT,
      message: "invalid sparse format: 'xyz'",
      details: { array: 'format', raw: "'xyz'", bytes: [0x78, 0x79, 0x7a] },
    });
  });

  it('should be case-sensitive', () => {
    const npz = new MemoryNpz();
    putFormat(npz, 'CSR');
    expect(catchError(() => readFormat(npz))).toMatchObject({ code: ErrorCode.INVALID_FORMAT });
  });

  it('should escape non-printable bytes in the message', () => {
    const npz = new MemoryNpz();
    putFormat(npz, new Uint8Array([0x63, 0x73, 0x01]));
    expect(catchError(() => readFormat(npz))).toMatchObject({
      message: "invalid sparse format: 'cs\\x01'",
    });
  });

  it('should report a missing discriminator', () => {
    expect(catchError(() => readFormat(new MemoryNpz()))).toMatchObject({
      code: ErrorCode.MISSING_ARRAY,
      message: "missing array 'format' from sparse matrix",
    });
  });

  it('should reject a discriminator that is not a scalar', () => {
    const npz = new MemoryNpz();
    putArray(npz, 'format', Int32, [1, 2]);
    expect(catchError(() => readFormat(npz))).toMatchObject({
      code: ErrorCode.INVALID_FORMAT,
      details: { array: 'format', ndim: 1 },
    });
  });

  it('should reject a discriminator that is not a byte string', () => {
    const npz = new MemoryNpz();
    putArray(npz, 'format', Int32, [1], { shape: [] });
    expect(catchError(() => readFormat(npz))).toMatchObject({
      code: ErrorCode.INVALID_DTYPE,
      message: "invalid dtype for 'format' in sparse matrix: <i4",
    });
  });
});

describe('expectFormat', () => {
  it('should accept the expected tag', () => {
    const npz = new MemoryNpz();
    writeFormat(npz, 'dia');
    expect(() => expectFormat(npz, 'dia')).not.toThrow();
  });

  it('should reject any other tag', () => {
    const npz = new MemoryNpz();
    writeFormat(npz, 'csr');
    expect(catchError(() => expectFormat(npz, 'coo'))).toMatchObject({
      code: ErrorCode.FORMAT_MISMATCH,
      message: "wrong format: expected 'coo', got 'csr'",
    });
  });
});
