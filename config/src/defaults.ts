/**
 * Default configuration values.
 *
 * @packageDocumentation
 */

import type { SparseNpzConfig } from './types.js';

/**
 * Defaults match what `scipy.sparse.save_npz` writes on a little-endian host.
 */
export const DEFAULT_CONFIG: SparseNpzConfig = Object.freeze({
  npy: Object.freeze({ byteOrder: 'little' }),
  sparse: Object.freeze({ indexWidth: 'auto' }),
  logging: Object.freeze({ level: 'info', format: 'json' }),
});
