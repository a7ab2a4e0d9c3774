/**
 * Debug Module Global State
 *
 * @module debug/state
 */

import { LOG_LEVELS, type LogLevelValue, type TraceCategory, type LogEntry } from './types.js';

// Global state variables
export let currentLogLevel: LogLevelValue = LOG_LEVELS.INFO;
export let enabledModules = new Set<string>();
export let disabledModules = new Set<string>();
export let logHistory: LogEntry[] = [];

export let enabledTraceCategories = new Set<TraceCategory>();

// Helpers to update state (exported `let` bindings are read-only for importers)
export function setCurrentLogLevel(level: LogLevelValue): void {
  currentLogLevel = level;
}

export function setEnabledModules(modules: Set<string>): void {
  enabledModules = modules;
}

export function setDisabledModules(modules: Set<string>): void {
  disabledModules = modules;
}

export function setEnabledTraceCategories(categories: Set<TraceCategory>): void {
  enabledTraceCategories = categories;
}

export function clearHistory(): void {
  logHistory = [];
}

export function pushHistory(entry: LogEntry): void {
  logHistory.push(entry);
}

/**
 * Drop the oldest entries so at most `maxEntries` remain.
 */
export function trimHistory(maxEntries: number): void {
  const excess = logHistory.length - maxEntries;
  if (excess > 0) {
    logHistory.splice(0, excess);
  }
}
