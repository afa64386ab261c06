/**
 * Configuration validation.
 *
 * @packageDocumentation
 */

import { isLogLevel, LOG_LEVELS } from '@sparse-npz/core';
import { isByteOrderSetting, isIndexWidthSetting, isLogFormatSetting } from './config.js';
import type {
  SparseNpzConfig,
  ValidationError,
  ValidationResult,
  ValidationWarning,
} from './types.js';

/**
 * Validate a complete SparseNpzConfig.
 *
 * Configurations assembled in plain JavaScript or parsed from JSON can carry
 * values outside the declared unions; those are reported as errors.
 *
 * @example
 * ```typescript
 * const result = validateConfig(myConfig);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * ```
 */
export function validateConfig(config: SparseNpzConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  validateNpyConfig(config.npy, errors);
  validateSparseConfig(config.sparse, errors, warnings);
  validateLoggingConfig(config.logging, errors);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

function validateNpyConfig(npy: SparseNpzConfig['npy'], errors: ValidationError[]): void {
  if (!isByteOrderSetting(npy.byteOrder)) {
    errors.push({
      path: 'npy.byteOrder',
      message: 'Byte order must be one of: little, big',
      value: npy.byteOrder,
    });
  }
}

function validateSparseConfig(
  sparse: SparseNpzConfig['sparse'],
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  if (!isIndexWidthSetting(sparse.indexWidth)) {
    errors.push({
      path: 'sparse.indexWidth',
      message: 'Index width must be one of: auto, int64',
      value: sparse.indexWidth,
    });
    return;
  }

  if (sparse.indexWidth === 'int64') {
    warnings.push({
      path: 'sparse.indexWidth',
      message: 'Index arrays are always written as int64, doubling their size when values fit in int32',
      value: sparse.indexWidth,
      recommendation: "Use 'auto' unless a consumer requires int64 indices",
    });
  }
}

function validateLoggingConfig(logging: SparseNpzConfig['logging'], errors: ValidationError[]): void {
  if (!isLogLevel(logging.level)) {
    errors.push({
      path: 'logging.level',
      message: `Log level must be one of: ${LOG_LEVELS.join(', ')}`,
      value: logging.level,
    });
  }

  if (!isLogFormatSetting(logging.format)) {
    errors.push({
      path: 'logging.format',
      message: 'Log format must be one of: json, pretty',
      value: logging.format,
      suggestion: "Use 'pretty' for local development and 'json' elsewhere",
    });
  }
}
