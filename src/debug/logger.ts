/**
 * Core Logging Interface
 *
 * Leveled, module-tagged console logging. Every line that passes the
 * level and module filters is also kept in an in-memory history capped at
 * `debug.logHistory.maxLogHistoryEntries` of the runtime config.
 *
 * @module debug/logger
 */

import { LOG_LEVELS, type LogLevelValue } from './types.js';
import {
  currentLogLevel,
  enabledModules,
  disabledModules,
  pushHistory,
  trimHistory,
} from './state.js';
import { getRuntimeConfig } from '../config/runtime.js';

type ConsoleMethod = 'debug' | 'log' | 'warn' | 'error';

interface LevelRoute {
  /** Level recorded in history */
  label: string;
  /** null: bypasses level and module filters */
  threshold: LogLevelValue | null;
  method: ConsoleMethod;
}

const ROUTES = {
  debug: { label: 'DEBUG', threshold: LOG_LEVELS.DEBUG, method: 'debug' },
  verbose: { label: 'VERBOSE', threshold: LOG_LEVELS.VERBOSE, method: 'log' },
  info: { label: 'INFO', threshold: LOG_LEVELS.INFO, method: 'log' },
  warn: { label: 'WARN', threshold: LOG_LEVELS.WARN, method: 'warn' },
  error: { label: 'ERROR', threshold: LOG_LEVELS.ERROR, method: 'error' },
  always: { label: 'ALWAYS', threshold: null, method: 'log' },
} as const satisfies Record<string, LevelRoute>;

/**
 * Format a log message with timestamp and module tag.
 */
export function formatMessage(module: string, message: string): string {
  return `[${performance.now().toFixed(1)}ms][${module}] ${message}`;
}

/**
 * Record an entry and apply the configured history cap.
 */
export function storeLog(level: string, module: string, message: string, data?: unknown): void {
  pushHistory({
    time: Date.now(),
    perfTime: performance.now(),
    level,
    module,
    message,
    data,
  });
  trimHistory(getRuntimeConfig().debug.logHistory.maxLogHistoryEntries);
}

/**
 * Write one line to the console, with `data` as a second argument if given.
 */
export function writeConsole(method: ConsoleMethod, line: string, data?: unknown): void {
  if (data !== undefined) {
    console[method](line, data);
  } else {
    console[method](line);
  }
}

/**
 * Check if logging is enabled for a module at a level. Module names
 * compare case-insensitively.
 */
export function shouldLog(module: string, level: LogLevelValue): boolean {
  if (level < currentLogLevel) return false;

  const tag = module.toLowerCase();
  if (enabledModules.size > 0 && !enabledModules.has(tag)) return false;
  return !disabledModules.has(tag);
}

function emit(route: LevelRoute, module: string, message: string, data?: unknown): void {
  if (route.threshold !== null && !shouldLog(module, route.threshold)) return;
  storeLog(route.label, module, message, data);
  writeConsole(route.method, formatMessage(module, message), data);
}

type LogFn = (module: string, message: string, data?: unknown) => void;

/**
 * Main logging interface. `module` is normally one of LOG_MODULES.
 */
export const log: Record<keyof typeof ROUTES, LogFn> = {
  debug: (module, message, data) => emit(ROUTES.debug, module, message, data),
  verbose: (module, message, data) => emit(ROUTES.verbose, module, message, data),
  info: (module, message, data) => emit(ROUTES.info, module, message, data),
  warn: (module, message, data) => emit(ROUTES.warn, module, message, data),
  error: (module, message, data) => emit(ROUTES.error, module, message, data),
  always: (module, message, data) => emit(ROUTES.always, module, message, data),
};
