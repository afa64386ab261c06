/**
 * NPY header parsing and writing
 *
 * NPY file layout:
 * - 6 bytes: magic "\x93NUMPY"
 * - 1 byte: major version, 1 byte: minor version
 * - 2 bytes (v1) or 4 bytes (v2, v3): little-endian header length
 * - header: Python dict literal, e.g. {'descr': '<f8', 'fortran_order': False, 'shape': (3, 4), }
 *   padded with spaces and terminated by '\n' so that data starts on a 64-byte boundary
 * - data: elements in C or Fortran order
 */

import { type DType, formatDType, tryParseDType } from './dtype.js';
import { NpyError } from './errors.js';

export const NPY_MAGIC: Uint8Array = Uint8Array.of(0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59);

/** Data offset alignment required by NumPy */
export const NPY_ALIGNMENT = 64;

export type MemoryOrder = 'C' | 'F';

export interface NpyHeader {
  /** Descriptor exactly as stored */
  readonly descr: string;
  /** Parsed descriptor, or null when the dtype is not one this library reads */
  readonly dtype: DType | null;
  readonly shape: readonly number[];
  readonly order: MemoryOrder;
}

export interface ParsedHeader {
  readonly header: NpyHeader;
  readonly version: readonly [number, number];
  /** Byte offset of the first element */
  readonly dataOffset: number;
}

const latin1Decoder = new TextDecoder('latin1');
const utf8Decoder = new TextDecoder('utf-8');

const DESCR_PATTERN = /['"]descr['"]\s*:\s*(['"])(.*?)\1/;
const FORTRAN_PATTERN = /['"]fortran_order['"]\s*:\s*(True|False)\b/;
const SHAPE_PATTERN = /['"]shape['"]\s*:\s*\(([^)]*)\)/;
const DIM_PATTERN = /^\d+L?$/;

/**
 * Parse the header at the start of `bytes`.
 *
 * @throws NpyError on bad magic, unknown version or malformed dict
 */
export function parseHeader(bytes: Uint8Array): ParsedHeader {
  if (bytes.length < 10 || NPY_MAGIC.some((b, i) => bytes[i] !== b)) {
    throw NpyError.invalidMagic();
  }

  const major = bytes[6];
  const minor = bytes[7];
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  let headerStart: number;
  let headerLen: number;
  if (major === 1) {
    headerStart = 10;
    headerLen = view.getUint16(8, true);
  } else if (major === 2 || major === 3) {
    if (bytes.length < 12) {
      throw NpyError.truncatedData(12, bytes.length);
    }
    headerStart = 12;
    headerLen = view.getUint32(8, true);
  } else {
    throw NpyError.unsupportedVersion(major, minor);
  }

  const dataOffset = headerStart + headerLen;
  if (bytes.length < dataOffset) {
    throw NpyError.truncatedData(dataOffset, bytes.length);
  }

  const decoder = major === 3 ? utf8Decoder : latin1Decoder;
  const text = decoder.decode(bytes.subarray(headerStart, dataOffset));

  return {
    header: parseHeaderDict(text),
    version: [major, minor],
    dataOffset,
  };
}

function parseHeaderDict(text: string): NpyHeader {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{') || !trimmed.endsWith('}')) {
    throw NpyError.invalidHeader('not a dict literal', trimmed);
  }

  const descrMatch = DESCR_PATTERN.exec(trimmed);
  if (!descrMatch) {
    if (/['"]descr['"]\s*:\s*\[/.test(trimmed)) {
      throw NpyError.unsupportedDType('structured');
    }
    throw NpyError.invalidHeader("missing 'descr' field", trimmed);
  }

  const fortranMatch = FORTRAN_PATTERN.exec(trimmed);
  if (!fortranMatch) {
    throw NpyError.invalidHeader("missing 'fortran_order' field", trimmed);
  }

  const shapeMatch = SHAPE_PATTERN.exec(trimmed);
  if (!shapeMatch) {
    throw NpyError.invalidHeader("missing 'shape' field", trimmed);
  }

  const descr = descrMatch[2];
  return {
    descr,
    dtype: tryParseDType(descr),
    order: fortranMatch[1] === 'True' ? 'F' : 'C',
    shape: parseShapeTuple(shapeMatch[1], trimmed),
  };
}

function parseShapeTuple(body: string, header: string): number[] {
  // (), (3,), (2, 3)
  const parts = body.split(',').map(part => part.trim());
  if (parts[parts.length - 1] === '') {
    parts.pop();
  }
  return parts.map(part => {
    if (!DIM_PATTERN.test(part)) {
      throw NpyError.invalidHeader(`bad shape dimension '${part}'`, header);
    }
    return Number.parseInt(part, 10);
  });
}

/**
 * Render a shape the way Python renders a tuple.
 */
export function formatShapeTuple(shape: readonly number[]): string {
  if (shape.length === 1) {
    return `(${shape[0]},)`;
  }
  return `(${shape.join(', ')})`;
}

/**
 * Encode magic, version, length and padded header dict.
 *
 * Version 1.0 is used unless the header does not fit a 16-bit length.
 */
export function encodeHeader(dtype: DType, shape: readonly number[], order: MemoryOrder = 'C'): Uint8Array {
  const dict =
    `{'descr': '${formatDType(dtype)}', ` +
    `'fortran_order': ${order === 'F' ? 'True' : 'False'}, ` +
    `'shape': ${formatShapeTuple(shape)}, }`;

  let prefixLen = NPY_MAGIC.length + 2 + 2;
  let headerLen = paddedLength(prefixLen, dict.length);
  const major = headerLen > 0xffff ? 2 : 1;
  if (major === 2) {
    prefixLen = NPY_MAGIC.length + 2 + 4;
    headerLen = paddedLength(prefixLen, dict.length);
  }

  const out = new Uint8Array(prefixLen + headerLen);
  const view = new DataView(out.buffer);
  out.set(NPY_MAGIC, 0);
  out[6] = major;
  out[7] = 0;
  if (major === 1) {
    view.setUint16(8, headerLen, true);
  } else {
    view.setUint32(8, headerLen, true);
  }

  const text = dict.padEnd(headerLen - 1, ' ') + '\n';
  for (let i = 0; i < text.length; i++) {
    out[prefixLen + i] = text.charCodeAt(i);
  }
  return out;
}

function paddedLength(prefixLen: number, dictLen: number): number {
  const unpadded = prefixLen + dictLen + 1;
  const padding = (NPY_ALIGNMENT - (unpadded % NPY_ALIGNMENT)) % NPY_ALIGNMENT;
  return dictLen + 1 + padding;
}
