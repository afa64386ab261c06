/**
 * Configured, logging entry point for the sparse codec.
 */

import {
  ConfigError,
  createConfig,
  createLoggerFromConfig,
  type DeepPartial,
  type SparseNpzConfig,
  validateConfig,
} from '@sparse-npz/config';
import {
  ContractViolationError,
  ErrorCode,
  isLogContextValue,
  type LogContext,
  type Logger,
  SparseNpzError,
  withContext,
} from '@sparse-npz/core';
import { type ElementType, MemoryNpz, type NpzReader, type NpzWriter } from '@sparse-npz/npy';
import { readSparse } from './read.js';
import { type SparseMatrix, storedCount } from './types.js';
import { type WriteOptions, writeSparse } from './write.js';

export interface SparseNpzCodecOptions {
  /** Overrides merged onto the default configuration */
  config?: DeepPartial<SparseNpzConfig>;
  /** Logger to use; built from the configuration when omitted */
  logger?: Logger;
}

function failureContext(error: unknown): LogContext {
  if (error instanceof SparseNpzError) {
    const context = error.toLogContext();
    return isLogContextValue(context)
      ? { errorCode: error.code, error: context }
      : { errorCode: error.code, error: { name: error.name, message: error.message } };
  }
  if (error instanceof ContractViolationError) {
    return { errorCode: error.code, error: { name: error.name, message: error.message } };
  }
  return { errorCode: ErrorCode.UNKNOWN };
}

/**
 * Reads and writes sparse matrices with a fixed configuration.
 *
 * Logs one `debug` entry per successful call and one `warn` entry per failed
 * call; errors are rethrown unchanged.
 *
 * @throws ConfigError from the constructor when the merged configuration
 *   fails `validateConfig`
 *
 * @example
 * ```typescript
 * const codec = new SparseNpzCodec({ config: { sparse: { indexWidth: 'int64' } } });
 * const npz = new MemoryNpz();
 * codec.write(matrix, Float64, npz);
 * const back = codec.read(npz, Float64);
 * ```
 */
export class SparseNpzCodec {
  readonly config: SparseNpzConfig;
  private readonly logger: Logger;

  constructor(options: SparseNpzCodecOptions = {}) {
    this.config = createConfig(options.config);
    const validation = validateConfig(this.config);
    if (!validation.valid) {
      throw ConfigError.invalid(validation.errors);
    }
    this.logger = withContext(options.logger ?? createLoggerFromConfig(this.config), {
      service: 'sparse-npz',
    });
    for (const warning of validation.warnings) {
      this.logger.info(warning.message, { path: warning.path });
    }
  }

  get writeOptions(): WriteOptions {
    return {
      byteOrder: this.config.npy.byteOrder,
      indexWidth: this.config.sparse.indexWidth,
    };
  }

  read<T>(npz: NpzReader, type: ElementType<T>): SparseMatrix<T> {
    const start = performance.now();
    try {
      const matrix = readSparse(npz, type);
      this.logger.debug('Decoded sparse matrix', {
        operation: 'read',
        format: matrix.format,
        nnz: storedCount(matrix),
        durationMs: performance.now() - start,
      });
      return matrix;
    } catch (error) {
      this.logger.warn('Failed to decode sparse matrix', {
        operation: 'read',
        ...failureContext(error),
        durationMs: performance.now() - start,
      });
      throw error;
    }
  }

  write<T>(matrix: SparseMatrix<T>, type: ElementType<T>, npz: NpzWriter): void {
    const start = performance.now();
    try {
      writeSparse(matrix, type, npz, this.writeOptions);
      this.logger.debug('Encoded sparse matrix', {
        operation: 'write',
        format: matrix.format,
        nnz: storedCount(matrix),
        durationMs: performance.now() - start,
      });
    } catch (error) {
      this.logger.warn('Failed to encode sparse matrix', {
        operation: 'write',
        format: matrix.format,
        ...failureContext(error),
        durationMs: performance.now() - start,
      });
      throw error;
    }
  }

  /**
   * Write into a fresh in-memory archive and read it back.
   */
  roundTrip<T>(matrix: SparseMatrix<T>, type: ElementType<T>): SparseMatrix<T> {
    const npz = new MemoryNpz();
    this.write(matrix, type, npz);
    return this.read(npz, type);
  }
}
