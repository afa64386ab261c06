/**
 * Configuration for the sparse-matrix NPZ codec.
 *
 * @example
 * ```typescript
 * import { createConfig, validateConfig } from '@sparse-npz/config';
 *
 * const config = createConfig({ sparse: { indexWidth: 'int64' } });
 * const result = validateConfig(config);
 * ```
 *
 * @packageDocumentation
 */

export type {
  DeepPartial,
  ByteOrderSetting,
  IndexWidthSetting,
  NpyConfig,
  SparseConfig,
  LoggingConfig,
  SparseNpzConfig,
  ValidationError,
  ValidationWarning,
  ValidationResult,
} from './types.js';

export { DEFAULT_CONFIG } from './defaults.js';

export {
  createConfig,
  mergeConfigs,
  createLoggerFromConfig,
  isByteOrderSetting,
  isIndexWidthSetting,
  isLogFormatSetting,
} from './config.js';

export { validateConfig } from './validation.js';

export { ConfigError } from './errors.js';
