/**
 * Debug Module - Log History and Snapshots
 *
 * @module debug/history
 */

import {
  LOG_LEVELS,
  type LogEntry,
  type LogHistoryFilter,
  type DebugSnapshot,
} from './types.js';
import {
  currentLogLevel,
  enabledTraceCategories,
  enabledModules,
  disabledModules,
  logHistory,
  clearHistory,
} from './state.js';

/**
 * Get log history for debugging.
 */
export function getLogHistory(filter: LogHistoryFilter = {}): LogEntry[] {
  let history = [...logHistory];

  const level = filter.level?.toUpperCase();
  if (level) {
    history = history.filter((h) => h.level.toUpperCase() === level);
  }

  if (filter.module) {
    const m = filter.module.toLowerCase();
    history = history.filter((h) => h.module.toLowerCase().includes(m));
  }

  if (filter.last) {
    history = history.slice(-filter.last);
  }

  return history;
}

/**
 * Clear log history.
 */
export function clearLogHistory(): void {
  clearHistory();
}

/**
 * Export a debug snapshot for bug reports.
 */
export function getDebugSnapshot(): DebugSnapshot {
  return {
    timestamp: new Date().toISOString(),
    logLevel: Object.entries(LOG_LEVELS)
      .find(([, value]) => value === currentLogLevel)?.[0]
      .toLowerCase(),
    traceCategories: [...enabledTraceCategories],
    enabledModules: [...enabledModules],
    disabledModules: [...disabledModules],
    recentLogs: logHistory.slice(-50).map((e) => ({
      time: e.perfTime.toFixed(1),
      level: e.level,
      module: e.module,
      message: e.message,
    })),
    errorCount: logHistory.filter((e) => e.level === 'ERROR').length,
    warnCount: logHistory.filter((e) => e.level === 'WARN').length,
  };
}
