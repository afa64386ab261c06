/**
 * Errors raised for configurations that fail validation.
 *
 * @packageDocumentation
 */

import { ErrorCode, SparseNpzError } from '@sparse-npz/core';
import type { ValidationError } from './types.js';

export class ConfigError extends SparseNpzError {
  /** Every problem `validateConfig` found, in check order */
  public readonly errors: readonly ValidationError[];

  constructor(message: string, errors: readonly ValidationError[], suggestion?: string) {
    super(
      message,
      ErrorCode.INVALID_CONFIG,
      { paths: errors.map(error => error.path) },
      suggestion
    );
    this.name = 'ConfigError';
    this.errors = errors;
  }

  static invalid(errors: readonly ValidationError[]): ConfigError {
    const summary = errors.map(error => `${error.path}: ${error.message}`).join('; ');
    return new ConfigError(
      `Invalid configuration: ${summary}`,
      errors,
      errors.find(error => error.suggestion !== undefined)?.suggestion
    );
  }
}
