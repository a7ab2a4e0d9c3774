/**
 * Schema Index
 *
 * Re-exports all schema definitions for easy importing.
 *
 * Naming Convention:
 * - *Schema: Type definitions (interface structure)
 * - DEFAULT_*: Default instances
 * - *Overrides: Partial input merged over defaults
 *
 * @module config/schema
 */

// =============================================================================
// KV Cache Schema
// =============================================================================
export {
  type KVDtype,
  type KVBackendKind,
  type KVCacheConfigSchema,
  DEFAULT_KVCACHE_CONFIG,
  KV_TENSOR_RANK,
} from './kvcache.schema.js';

// =============================================================================
// Debug Schema
// =============================================================================
export {
  type LogHistoryConfigSchema,
  type LogLevelConfigSchema,
  type TraceCategoryName,
  type TraceConfigSchema,
  type DebugConfigSchema,
  DEFAULT_LOG_HISTORY_CONFIG,
  DEFAULT_LOG_LEVEL_CONFIG,
  DEFAULT_TRACE_CONFIG,
  DEFAULT_DEBUG_CONFIG,
} from './debug.schema.js';

// =============================================================================
// Runtime Schema
// =============================================================================
export {
  type RuntimeConfigSchema,
  type RuntimeConfigOverrides,
  DEFAULT_RUNTIME_CONFIG,
  createRuntimeConfig,
} from './runtime.schema.js';
