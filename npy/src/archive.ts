/**
 * Named-array containers (the NPZ convention)
 *
 * An NPZ archive maps array names to NPY files stored as `<name>.npy`.
 * Readers and writers only see the interfaces below; zip packaging and file
 * I/O belong to whatever implements them.
 */

import { assertContract } from '@sparse-npz/core';
import { NpyArray } from './array.js';
import { NpyError } from './errors.js';

/** Receives the bytes of one array entry, in order */
export interface ByteSink {
  write(chunk: Uint8Array): void;
  close(): void;
}

/** Read side of a named-array container */
export interface NpzReader {
  /**
   * Fetch an array by name (without the `.npy` suffix).
   *
   * @returns null when the archive has no such array
   * @throws NpyError when the entry exists but is not a readable NPY array
   */
  byName(name: string): NpyArray | null;
}

/** Write side of a named-array container */
export interface NpzWriter {
  /**
   * Start a new entry. Entries are written one at a time: the returned sink
   * must be closed before the next entry is started.
   */
  startArray(name: string): ByteSink;
}

const NPY_SUFFIX = '.npy';

function entryName(name: string): string {
  return `${name}${NPY_SUFFIX}`;
}

/**
 * In-memory NPZ archive, readable and writable.
 *
 * Keeps entries in write order.
 *
 * @example
 * ```typescript
 * const npz = new MemoryNpz();
 * writeSparse(matrix, Float64, npz);
 * npz.arrayNames(); // ['format', 'shape', 'indices', 'indptr', 'data']
 * const back = readSparse(npz, Float64);
 * ```
 */
export class MemoryNpz implements NpzReader, NpzWriter {
  private readonly entries = new Map<string, Uint8Array>();
  private open: string | null = null;

  startArray(name: string): ByteSink {
    if (this.open !== null) {
      throw NpyError.incompleteEntry(this.open);
    }
    const key = entryName(name);
    if (this.entries.has(key)) {
      throw NpyError.duplicateEntry(name);
    }

    this.open = name;
    const chunks: Uint8Array[] = [];
    let closed = false;

    return {
      write: (chunk) => {
        assertContract(!closed, `array '${name}' is already closed`, { name });
        chunks.push(chunk.slice());
      },
      close: () => {
        if (closed) return;
        closed = true;
        this.entries.set(key, concat(chunks));
        this.open = null;
      },
    };
  }

  byName(name: string): NpyArray | null {
    if (this.open === name) {
      throw NpyError.incompleteEntry(name);
    }
    const bytes = this.entries.get(entryName(name));
    return bytes === undefined ? null : NpyArray.fromBytes(bytes);
  }

  /**
   * Store raw bytes under `name`, replacing any existing entry.
   * Used to load archives produced elsewhere.
   */
  putArrayBytes(name: string, bytes: Uint8Array): void {
    this.entries.set(entryName(name), bytes.slice());
  }

  getArrayBytes(name: string): Uint8Array | undefined {
    return this.entries.get(entryName(name));
  }

  /** Array names in write order */
  arrayNames(): string[] {
    return [...this.entries.keys()].map(key => key.slice(0, -NPY_SUFFIX.length));
  }

  /**
   * Copy every entry into `writer`, in write order.
   */
  copyTo(writer: NpzWriter): void {
    if (this.open !== null) {
      throw NpyError.incompleteEntry(this.open);
    }
    for (const [key, bytes] of this.entries) {
      const sink = writer.startArray(key.slice(0, -NPY_SUFFIX.length));
      sink.write(bytes);
      sink.close();
    }
  }
}

function concat(chunks: readonly Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}
