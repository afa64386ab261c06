/**
 * Configuration types for the sparse-matrix NPZ codec.
 *
 * @packageDocumentation
 */

import type { LogFormat, LogLevel } from '@sparse-npz/core';

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Deep partial type that makes all nested properties optional.
 */
export type DeepPartial<T> = T extends object
  ? { [P in keyof T]?: DeepPartial<T[P]> }
  : T;

// =============================================================================
// Sections
// =============================================================================

export type ByteOrderSetting = 'little' | 'big';

export type IndexWidthSetting = 'auto' | 'int64';

/**
 * Settings of the typed-array layer.
 */
export interface NpyConfig {
  /** Byte order of every array the codec writes */
  byteOrder: ByteOrderSetting;
}

/**
 * Settings of the sparse codec.
 */
export interface SparseConfig {
  /**
   * Integer width of written index arrays.
   * 'auto' picks int32 when every value fits, 'int64' always writes 8 bytes.
   * Decoding accepts both widths either way.
   */
  indexWidth: IndexWidthSetting;
}

export interface LoggingConfig {
  /** Minimum level emitted by the logger built from this config */
  level: LogLevel;
  format: LogFormat;
}

/**
 * Complete codec configuration.
 *
 * @example
 * ```typescript
 * const config = createConfig({ sparse: { indexWidth: 'int64' } });
 * ```
 */
export interface SparseNpzConfig {
  npy: NpyConfig;
  sparse: SparseConfig;
  logging: LoggingConfig;
}

// =============================================================================
// Validation Types
// =============================================================================

export interface ValidationError {
  /** Path to the invalid field (e.g., 'sparse.indexWidth') */
  path: string;

  /** Human-readable error message */
  message: string;

  /** The invalid value */
  value: unknown;

  /** Suggested fix (optional) */
  suggestion?: string;
}

export interface ValidationWarning {
  /** Path to the field with potential issue */
  path: string;

  message: string;

  value: unknown;

  /** Recommended action */
  recommendation?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}
