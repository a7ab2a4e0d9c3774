/**
 * Runtime Config Registry
 *
 * Stores the active RuntimeConfigSchema for the current process.
 * Call setRuntimeConfig() before creating sessions to apply overrides.
 *
 * @module config/runtime
 */

import type { RuntimeConfigSchema, RuntimeConfigOverrides } from './schema/index.js';
import { createRuntimeConfig, KV_TENSOR_RANK } from './schema/index.js';
import { createKVCacheError, ERROR_CODES } from '../errors/kv-cache-error.js';
import { applyDebugConfig } from '../debug/config.js';

let runtimeConfig: RuntimeConfigSchema = createRuntimeConfig();

/**
 * Get the active runtime config (merged with defaults).
 */
export function getRuntimeConfig(): RuntimeConfigSchema {
  return runtimeConfig;
}

/**
 * Set the active runtime config.
 * Accepts partial overrides and merges with defaults. Log level and trace
 * overrides are applied to the debug module immediately.
 */
export function setRuntimeConfig(overrides?: RuntimeConfigOverrides): RuntimeConfigSchema {
  if (!overrides) {
    runtimeConfig = createRuntimeConfig();
    return runtimeConfig;
  }

  const merged = createRuntimeConfig(overrides);
  const { sequenceAxis, maxSessions } = merged.kvcache;

  if (!Number.isInteger(sequenceAxis) || sequenceAxis < 0 || sequenceAxis >= KV_TENSOR_RANK) {
    throw createKVCacheError(
      ERROR_CODES.INVALID_ARGUMENT,
      `kvcache.sequenceAxis must be an integer in [0, ${KV_TENSOR_RANK - 1}], got ${sequenceAxis}`
    );
  }
  if (!Number.isInteger(maxSessions) || maxSessions < 1) {
    throw createKVCacheError(
      ERROR_CODES.INVALID_ARGUMENT,
      `kvcache.maxSessions must be a positive integer, got ${maxSessions}`
    );
  }
  if (merged.debug.logHistory.maxLogHistoryEntries < 0) {
    throw createKVCacheError(
      ERROR_CODES.INVALID_ARGUMENT,
      'debug.logHistory.maxLogHistoryEntries must not be negative'
    );
  }

  runtimeConfig = merged;
  if (overrides.debug?.logLevel || overrides.debug?.trace) {
    applyDebugConfig(merged.debug);
  }
  return runtimeConfig;
}

/**
 * Reset runtime config to defaults.
 */
export function resetRuntimeConfig(): RuntimeConfigSchema {
  runtimeConfig = createRuntimeConfig();
  return runtimeConfig;
}
