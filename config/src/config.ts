/**
 * Configuration factory functions.
 *
 * @packageDocumentation
 */

import { createConsoleLogger, type Logger } from '@sparse-npz/core';
import { DEFAULT_CONFIG } from './defaults.js';
import type { ByteOrderSetting, DeepPartial, IndexWidthSetting, SparseNpzConfig } from './types.js';

export function isByteOrderSetting(value: string): value is ByteOrderSetting {
  return value === 'little' || value === 'big';
}

export function isIndexWidthSetting(value: string): value is IndexWidthSetting {
  return value === 'auto' || value === 'int64';
}

export function isLogFormatSetting(value: string): value is 'json' | 'pretty' {
  return value === 'json' || value === 'pretty';
}

/**
 * Deep freeze an object to prevent mutation.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  Object.freeze(obj);

  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return obj;
}

/**
 * Create a complete SparseNpzConfig with optional overrides.
 *
 * Undefined override values never replace a base value.
 *
 * @param overrides - Partial configuration to merge with defaults
 * @param base - Optional base configuration (defaults to DEFAULT_CONFIG)
 * @returns Frozen SparseNpzConfig with all values filled in
 *
 * @example
 * ```typescript
 * const config = createConfig({ npy: { byteOrder: 'big' } });
 * const stricter = createConfig({ logging: { level: 'warn' } }, config);
 * ```
 */
export function createConfig(
  overrides: DeepPartial<SparseNpzConfig> = {},
  base: SparseNpzConfig = DEFAULT_CONFIG
): SparseNpzConfig {
  return deepFreeze({
    npy: {
      byteOrder: overrides.npy?.byteOrder ?? base.npy.byteOrder,
    },
    sparse: {
      indexWidth: overrides.sparse?.indexWidth ?? base.sparse.indexWidth,
    },
    logging: {
      level: overrides.logging?.level ?? base.logging.level,
      format: overrides.logging?.format ?? base.logging.format,
    },
  });
}

/**
 * Merge multiple partial configurations.
 *
 * Later configurations take precedence over earlier ones; sections nobody
 * sets are left out of the result.
 *
 * @example
 * ```typescript
 * const merged = mergeConfigs(
 *   { logging: { level: 'debug' } },
 *   { logging: { format: 'pretty' } }
 * );
 * // merged.logging => { level: 'debug', format: 'pretty' }
 * ```
 */
export function mergeConfigs(
  ...configs: Array<DeepPartial<SparseNpzConfig> | null | undefined>
): DeepPartial<SparseNpzConfig> {
  const result: DeepPartial<SparseNpzConfig> = {};

  for (const config of configs) {
    if (!config) continue;
    if (config.npy) {
      result.npy = { ...result.npy, ...definedOnly(config.npy) };
    }
    if (config.sparse) {
      result.sparse = { ...result.sparse, ...definedOnly(config.sparse) };
    }
    if (config.logging) {
      result.logging = { ...result.logging, ...definedOnly(config.logging) };
    }
  }

  return result;
}

function definedOnly<T extends object>(section: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(section)) {
    if (!isKeyOf(section, key)) continue;
    const value = section[key];
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

function isKeyOf<T extends object>(obj: T, key: PropertyKey): key is keyof T {
  return key in obj;
}

/**
 * Build the console logger a configuration describes.
 */
export function createLoggerFromConfig(config: SparseNpzConfig = DEFAULT_CONFIG): Logger {
  return createConsoleLogger({
    minLevel: config.logging.level,
    format: config.logging.format,
  });
}
