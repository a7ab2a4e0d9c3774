/**
 * Trace Logging Interface
 *
 * Category-based tracing for detailed subsystem debugging.
 *
 * @module debug/trace
 */

import { TRACE_MODULES, type TraceCategory } from './types.js';
import { enabledTraceCategories } from './state.js';
import { storeLog, writeConsole } from './logger.js';

/**
 * Format a trace message with category tag.
 */
function formatTraceMessage(category: TraceCategory, message: string): string {
  const timestamp = performance.now().toFixed(1);
  return `[${timestamp}ms][TRACE:${category}] ${message}`;
}

function emit(category: TraceCategory, message: string, data?: unknown): void {
  if (!enabledTraceCategories.has(category)) return;
  storeLog(`TRACE:${category}`, TRACE_MODULES[category], message, data);
  writeConsole('log', formatTraceMessage(category, message), data);
}

/**
 * Trace logging interface - only logs if category is enabled.
 */
export const trace = {
  /**
   * Trace eviction plans and window bookkeeping.
   */
  kv(message: string, data?: unknown): void {
    emit('kv', message, data);
  },

  /**
   * Trace tensor allocations.
   */
  buffers(message: string, data?: unknown): void {
    emit('buffers', message, data);
  },

  /**
   * Trace session pool leases.
   */
  pool(message: string, data?: unknown): void {
    emit('pool', message, data);
  },
};
