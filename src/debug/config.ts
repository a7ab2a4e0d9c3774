/**
 * Debug Module - Configuration
 *
 * Manages log levels, trace categories, and module filters.
 *
 * @module debug/config
 */

import type { DebugConfigSchema } from '../config/schema/debug.schema.js';
import {
  LOG_LEVELS,
  TRACE_CATEGORIES,
  type LogLevelValue,
  type TraceCategory,
} from './types.js';
import {
  currentLogLevel,
  enabledTraceCategories,
  setCurrentLogLevel,
  setEnabledModules,
  setDisabledModules,
  setEnabledTraceCategories,
  disabledModules,
} from './state.js';

// ============================================================================
// Log Level
// ============================================================================

const LEVEL_MAP: Record<string, LogLevelValue> = {
  debug: LOG_LEVELS.DEBUG,
  verbose: LOG_LEVELS.VERBOSE,
  info: LOG_LEVELS.INFO,
  warn: LOG_LEVELS.WARN,
  error: LOG_LEVELS.ERROR,
  silent: LOG_LEVELS.SILENT,
};

/**
 * Set the global log level. Unknown names fall back to info.
 */
export function setLogLevel(level: string): void {
  setCurrentLogLevel(LEVEL_MAP[level.toLowerCase()] ?? LOG_LEVELS.INFO);
}

/**
 * Get current log level name.
 */
export function getLogLevel(): string {
  for (const [name, value] of Object.entries(LOG_LEVELS)) {
    if (value === currentLogLevel) return name.toLowerCase();
  }
  return 'info';
}

// ============================================================================
// Trace Categories
// ============================================================================

function isTraceCategory(value: string): value is TraceCategory {
  return (TRACE_CATEGORIES as readonly string[]).includes(value);
}

/**
 * Set trace categories.
 *
 * @param categories - Comma-separated categories, 'all', false to disable, or array
 *   Examples:
 *   - 'kv,pool' - enable kv and pool
 *   - 'all' - enable all categories
 *   - 'all,-buffers' - all except buffers
 *   - false - disable all tracing
 */
export function setTrace(categories: string | TraceCategory[] | false): void {
  const next = new Set<TraceCategory>();

  if (categories === false) {
    setEnabledTraceCategories(next);
    return;
  }

  const catArray = typeof categories === 'string'
    ? categories.split(',').map(s => s.trim()).filter(Boolean)
    : categories;

  if (catArray.includes('all')) {
    for (const cat of TRACE_CATEGORIES) {
      next.add(cat);
    }
  }

  // Inclusions, and exclusions prefixed with -
  for (const cat of catArray) {
    if (cat === 'all') continue;

    if (cat.startsWith('-')) {
      const exclude = cat.slice(1);
      if (isTraceCategory(exclude)) next.delete(exclude);
    } else if (isTraceCategory(cat)) {
      next.add(cat);
    }
  }

  setEnabledTraceCategories(next);
}

/**
 * Get enabled trace categories.
 */
export function getTrace(): TraceCategory[] {
  return [...enabledTraceCategories];
}

/**
 * Check if a trace category is enabled.
 */
export function isTraceEnabled(category: TraceCategory): boolean {
  return enabledTraceCategories.has(category);
}

// ============================================================================
// Module Filters
// ============================================================================

/**
 * Enable logging for specific modules only.
 */
export function enableModules(...modules: string[]): void {
  setEnabledModules(new Set(modules.map((m) => m.toLowerCase())));
}

/**
 * Disable logging for specific modules.
 */
export function disableModules(...modules: string[]): void {
  const next = new Set(disabledModules);
  for (const m of modules) {
    next.add(m.toLowerCase());
  }
  setDisabledModules(next);
}

/**
 * Reset module filters.
 */
export function resetModuleFilters(): void {
  setEnabledModules(new Set());
  setDisabledModules(new Set());
}

// ============================================================================
// Config / Environment
// ============================================================================

/**
 * Apply debug config defaults.
 */
export function applyDebugConfig(config: DebugConfigSchema): void {
  setLogLevel(config.logLevel.defaultLogLevel);

  if (config.trace.enabled) {
    const categories = config.trace.categories.length
      ? config.trace.categories.join(',')
      : 'all';
    setTrace(categories);
  } else {
    setTrace(false);
  }
}

/**
 * Initialize logging and tracing from environment variables.
 *
 * Supported variables:
 *   DECODER_KV_LOG=verbose       - Set log level
 *   DECODER_KV_TRACE=kv,pool     - Enable specific trace categories
 *   DECODER_KV_TRACE=all,-buffers
 */
export function initFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  const logLevel = env.DECODER_KV_LOG;
  if (logLevel) {
    setLogLevel(logLevel);
  }

  const traceParam = env.DECODER_KV_TRACE;
  if (traceParam) {
    setTrace(traceParam);
  }
}
