/**
 * The `format` discriminator array.
 */

import { Bytes, makeDType, NpyBuilder, type NpzReader, type NpzWriter } from '@sparse-npz/npy';
import { SparseFormatError } from './errors.js';
import { isSparseFormat, type SparseFormat } from './types.js';

export const FORMAT_ARRAY = 'format';

const textEncoder = new TextEncoder();

function readFormatBytes(npz: NpzReader): Uint8Array {
  const npy = npz.byName(FORMAT_ARRAY);
  if (npy === null) {
    throw SparseFormatError.missingArray(FORMAT_ARRAY);
  }
  if (npy.ndim !== 0) {
    throw SparseFormatError.invalidFormatRank(npy.ndim);
  }
  const values = npy.tryData(Bytes);
  if (values === null) {
    throw SparseFormatError.invalidDType(FORMAT_ARRAY, npy.descr);
  }
  return values[0];
}

function asciiString(bytes: Uint8Array): string {
  return String.fromCharCode(...bytes);
}

/**
 * Read and recognise the discriminator (case-sensitive).
 *
 * @throws SparseFormatError (INVALID_FORMAT) for a non-scalar or unknown value
 */
export function readFormat(npz: NpzReader): SparseFormat {
  const bytes = readFormatBytes(npz);
  const text = asciiString(bytes);
  if (!isSparseFormat(text)) {
    throw SparseFormatError.invalidFormat(bytes);
  }
  return text;
}

/**
 * Check that the discriminator is `expected`. Per-format readers call this
 * themselves, so calling one directly on the wrong kind of archive fails.
 *
 * @throws SparseFormatError (FORMAT_MISMATCH) when the stored value differs
 */
export function expectFormat(npz: NpzReader, expected: SparseFormat): void {
  const bytes = readFormatBytes(npz);
  if (asciiString(bytes) !== expected) {
    throw SparseFormatError.formatMismatch(expected, bytes);
  }
}

/**
 * Write the discriminator as a zero-dimensional `|S3` array.
 */
export function writeFormat(npz: NpzWriter, format: SparseFormat): void {
  const writer = new NpyBuilder(Bytes)
    .dtype(makeDType('S', 3))
    .beginNd(npz.startArray(FORMAT_ARRAY), []);
  writer.push(textEncoder.encode(format));
  writer.finish();
}
