/**
 * Debug Types and Constants
 *
 * @module debug/types
 */

/**
 * Log level values (higher = less verbose)
 */
export const LOG_LEVELS = {
  DEBUG: 0,
  VERBOSE: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  SILENT: 5,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;
export type LogLevelValue = (typeof LOG_LEVELS)[LogLevel];

/**
 * Trace categories
 */
export const TRACE_CATEGORIES = [
  'kv',       // Eviction plans and window bookkeeping
  'buffers',  // Tensor allocation sizes
  'pool',     // Session pool leases
] as const;

export type TraceCategory = (typeof TRACE_CATEGORIES)[number];

/**
 * Module tags for the cache subsystems
 */
export const LOG_MODULES = {
  cache: 'KVCache',
  tensor: 'KVTensor',
  pool: 'KVPool',
} as const;

export type LogModule = (typeof LOG_MODULES)[keyof typeof LOG_MODULES];

/** Module tag each trace category is recorded under */
export const TRACE_MODULES: Record<TraceCategory, LogModule> = {
  kv: LOG_MODULES.cache,
  buffers: LOG_MODULES.tensor,
  pool: LOG_MODULES.pool,
};

/**
 * Log entry for history
 */
export interface LogEntry {
  time: number;
  perfTime: number;
  level: string;
  module: string;
  message: string;
  data?: unknown;
}

/**
 * Log history filter
 */
export interface LogHistoryFilter {
  level?: string;
  module?: string;
  last?: number;
}

/**
 * Debug snapshot
 */
export interface DebugSnapshot {
  timestamp: string;
  logLevel: string | undefined;
  traceCategories: TraceCategory[];
  enabledModules: string[];
  disabledModules: string[];
  recentLogs: Array<{
    time: string;
    level: string;
    module: string;
    message: string;
  }>;
  errorCount: number;
  warnCount: number;
}
