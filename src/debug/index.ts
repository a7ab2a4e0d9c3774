/**
 * Debug Module - Unified Logging and Tracing
 *
 * Single source of truth for all logging and debugging.
 *
 * ## Log Levels (verbosity - how much to show)
 *   silent  - nothing
 *   error   - errors only
 *   warn    - errors + warnings
 *   info    - normal operation (default)
 *   verbose - detailed info
 *   debug   - everything
 *
 * ## Trace Categories (what to show when tracing)
 *   kv      - eviction plans, window bookkeeping
 *   buffers - tensor allocation sizes
 *   pool    - session pool leases
 *   all     - everything
 *
 * ## Usage
 *   import { log, trace, LOG_MODULES, setLogLevel, setTrace } from '../debug/index.js';
 *
 *   log.info(LOG_MODULES.cache, 'Session ready');
 *   log.debug(LOG_MODULES.pool, `lease ${sessionId}`);
 *   trace.kv('plan', plan);
 *
 *   setLogLevel('verbose');
 *   setTrace('kv,pool');
 *   setTrace('all,-buffers');
 *   setTrace(false);
 *
 * ## Environment
 *   DECODER_KV_LOG=debug
 *   DECODER_KV_TRACE=all,-buffers
 *
 * @module debug
 */

export {
  LOG_LEVELS,
  TRACE_CATEGORIES,
  LOG_MODULES,
  TRACE_MODULES,
  type LogLevel,
  type LogLevelValue,
  type TraceCategory,
  type LogModule,
  type LogEntry,
  type LogHistoryFilter,
  type DebugSnapshot,
} from './types.js';

export { log, formatMessage } from './logger.js';
export { trace } from './trace.js';

export {
  setLogLevel,
  getLogLevel,
  setTrace,
  getTrace,
  isTraceEnabled,
  enableModules,
  disableModules,
  resetModuleFilters,
  applyDebugConfig,
  initFromEnv,
} from './config.js';

export {
  getLogHistory,
  clearLogHistory,
  getDebugSnapshot,
} from './history.js';
