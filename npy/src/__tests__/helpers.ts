/**
 * Test helpers: hand-assembled NPY entries, as a foreign producer would
 * write them.
 */

import type { ByteSink } from '../archive.js';
import { NPY_MAGIC } from '../header.js';

/**
 * Assemble an NPY file from a header dict literal and raw data bytes.
 * The header is not padded.
 */
export function rawNpy(dict: string, data: Uint8Array = new Uint8Array(0), major = 1): Uint8Array {
  const prefix = major === 1 ? 10 : 12;
  const text = `${dict}\n`;
  const out = new Uint8Array(prefix + text.length + data.length);
  const view = new DataView(out.buffer);

  out.set(NPY_MAGIC, 0);
  out[6] = major;
  out[7] = 0;
  if (major === 1) {
    view.setUint16(8, text.length, true);
  } else {
    view.setUint32(8, text.length, true);
  }
  for (let i = 0; i < text.length; i++) {
    out[prefix + i] = text.charCodeAt(i);
  }
  out.set(data, prefix + text.length);
  return out;
}

/**
 * Sink that records every chunk and close call.
 */
export function recordingSink(): ByteSink & { chunks: Uint8Array[]; closed: number; bytes(): Uint8Array } {
  const chunks: Uint8Array[] = [];
  return {
    chunks,
    closed: 0,
    write(chunk) {
      chunks.push(chunk.slice());
    },
    close() {
      this.closed++;
    },
    bytes() {
      const total = chunks.reduce((sum, c) => sum + c.length, 0);
      const out = new Uint8Array(total);
      let offset = 0;
      for (const c of chunks) {
        out.set(c, offset);
        offset += c.length;
      }
      return out;
    },
  };
}

/**
 * Run `fn` and return what it threw.
 */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}
