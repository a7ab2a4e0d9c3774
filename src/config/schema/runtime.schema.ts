/**
 * Runtime Config Schema
 *
 * Master configuration that composes the per-domain configs. Individual
 * configs remain importable for subsystems that only need their own domain.
 *
 * @module config/schema/runtime
 */

import type { KVCacheConfigSchema } from './kvcache.schema.js';
import type {
  DebugConfigSchema,
  LogHistoryConfigSchema,
  LogLevelConfigSchema,
  TraceConfigSchema,
} from './debug.schema.js';

import { DEFAULT_KVCACHE_CONFIG } from './kvcache.schema.js';
import { DEFAULT_DEBUG_CONFIG } from './debug.schema.js';

// =============================================================================
// Runtime Config
// =============================================================================

export interface RuntimeConfigSchema {
  /** Session defaults and pool sizing */
  kvcache: KVCacheConfigSchema;

  /** Logging and tracing */
  debug: DebugConfigSchema;
}

export interface RuntimeConfigOverrides {
  kvcache?: Partial<KVCacheConfigSchema>;
  debug?: {
    logHistory?: Partial<LogHistoryConfigSchema>;
    logLevel?: Partial<LogLevelConfigSchema>;
    trace?: Partial<TraceConfigSchema>;
  };
}

/** Default runtime configuration */
export const DEFAULT_RUNTIME_CONFIG: RuntimeConfigSchema = {
  kvcache: DEFAULT_KVCACHE_CONFIG,
  debug: DEFAULT_DEBUG_CONFIG,
};

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Create a runtime configuration with optional overrides.
 *
 * Each section is merged with object spread; sections missing from the
 * overrides fall back to the defaults.
 *
 * @example
 * ```typescript
 * const config = createRuntimeConfig({
 *   kvcache: { freezeFirstPosition: true },
 *   debug: { logHistory: { maxLogHistoryEntries: 200 } },
 * });
 * ```
 */
export function createRuntimeConfig(overrides?: RuntimeConfigOverrides): RuntimeConfigSchema {
  const base = DEFAULT_RUNTIME_CONFIG;
  if (!overrides) {
    return {
      kvcache: { ...base.kvcache },
      debug: {
        logHistory: { ...base.debug.logHistory },
        logLevel: { ...base.debug.logLevel },
        trace: { ...base.debug.trace },
      },
    };
  }

  return {
    kvcache: { ...base.kvcache, ...overrides.kvcache },
    debug: {
      logHistory: { ...base.debug.logHistory, ...overrides.debug?.logHistory },
      logLevel: { ...base.debug.logLevel, ...overrides.debug?.logLevel },
      trace: { ...base.debug.trace, ...overrides.debug?.trace },
    },
  };
}
