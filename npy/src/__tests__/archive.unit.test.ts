/**
 * Tests for the in-memory named-array container
 */

import { describe, it, expect } from 'vitest';
import { ContractViolationError, ErrorCode } from '@sparse-npz/core';
import { MemoryNpz } from '../archive.js';
import { NpyBuilder } from '../builder.js';
import { Int32 } from '../element.js';
import { catchError } from './helpers.js';

function putInt32(npz: MemoryNpz, name: string, values: number[]): void {
  const writer = new NpyBuilder(Int32).beginNd(npz.startArray(name), [values.length]);
  writer.extend(values);
  writer.finish();
}

describe('MemoryNpz', () => {
  it('should store arrays in write order', () => {
    const npz = new MemoryNpz();
    putInt32(npz, 'b', [1]);
    putInt32(npz, 'a', [2, 3]);

    expect(npz.arrayNames()).toEqual(['b', 'a']);
    expect(npz.byName('a')?.toArray(Int32)).toEqual([2, 3]);
  });

  it('should return null for a missing array', () => {
    expect(new MemoryNpz().byName('data')).toBeNull();
  });

  it('should reject a second array with the same name', () => {
    const npz = new MemoryNpz();
    putInt32(npz, 'row', [0]);

    expect(catchError(() => npz.startArray('row'))).toMatchObject({
      code: ErrorCode.DUPLICATE_ENTRY,
      message: "array 'row' already exists in archive",
    });
  });

  it('should allow one open entry at a time', () => {
    const npz = new MemoryNpz();
    const sink = npz.startArray('data');

    expect(catchError(() => npz.startArray('shape'))).toMatchObject({
      code: ErrorCode.INCOMPLETE_ENTRY,
      message: "array 'data' is still being written",
    });
    expect(catchError(() => npz.byName('data'))).toMatchObject({ code: ErrorCode.INCOMPLETE_ENTRY });

    sink.close();
    expect(() => npz.startArray('shape')).not.toThrow();
  });

  it('should reject writes after close and ignore a second close', () => {
    const npz = new MemoryNpz();
    const sink = npz.startArray('x');
    sink.write(new Uint8Array([1]));
    sink.close();
    sink.close();

    expect(() => sink.write(new Uint8Array([2]))).toThrow(ContractViolationError);
    expect(npz.getArrayBytes('x')).toEqual(new Uint8Array([1]));
  });

  it('should copy written chunks', () => {
    const npz = new MemoryNpz();
    const chunk = new Uint8Array([1, 2]);
    const sink = npz.startArray('x');
    sink.write(chunk);
    chunk[0] = 9;
    sink.close();

    expect(npz.getArrayBytes('x')).toEqual(new Uint8Array([1, 2]));
  });

  it('should load raw entries with putArrayBytes', () => {
    const source = new MemoryNpz();
    putInt32(source, 'indices', [4, 5]);
    const bytes = source.getArrayBytes('indices') ?? new Uint8Array(0);

    const npz = new MemoryNpz();
    npz.putArrayBytes('indices', bytes);
    expect(npz.byName('indices')?.toArray(Int32)).toEqual([4, 5]);

    npz.putArrayBytes('indices', bytes.subarray(0, 10));
    expect(catchError(() => npz.byName('indices'))).toMatchObject({ code: ErrorCode.TRUNCATED_DATA });
  });

  it('should copy its entries into another writer in order', () => {
    const source = new MemoryNpz();
    putInt32(source, 'b', [1]);
    putInt32(source, 'a', [2, 3]);
    const target = new MemoryNpz();

    source.copyTo(target);

    expect(target.arrayNames()).toEqual(['b', 'a']);
    expect(target.getArrayBytes('a')).toEqual(source.getArrayBytes('a'));
  });

  it('should not copy while an entry is open', () => {
    const source = new MemoryNpz();
    putInt32(source, 'b', [1]);
    source.startArray('a');
    const target = new MemoryNpz();

    expect(catchError(() => source.copyTo(target))).toMatchObject({ code: ErrorCode.INCOMPLETE_ENTRY });
    expect(target.arrayNames()).toEqual([]);
  });
});
