import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  DEFAULT_DEBUG_CONFIG,
} from '../../src/config/schema/index.js';
import { resetRuntimeConfig, setRuntimeConfig } from '../../src/config/runtime.js';
import {
  applyDebugConfig,
  clearLogHistory,
  disableModules,
  enableModules,
  formatMessage,
  getDebugSnapshot,
  getLogHistory,
  getLogLevel,
  getTrace,
  initFromEnv,
  isTraceEnabled,
  LOG_MODULES,
  log,
  resetModuleFilters,
  setLogLevel,
  setTrace,
  trace,
} from '../../src/debug/index.js';

describe('debug', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    setLogLevel('info');
    setTrace(false);
    resetModuleFilters();
    clearLogHistory();
    resetRuntimeConfig();
    vi.restoreAllMocks();
  });

  describe('log', () => {
    it('tags messages with time and module', () => {
      expect(formatMessage('KVCache', 'ready')).toMatch(/^\[\d+\.\dms\]\[KVCache\] ready$/);
    });

    it('filters by level', () => {
      log.verbose('KVCache', 'hidden');
      log.info('KVCache', 'shown');

      expect(console.log).toHaveBeenCalledTimes(1);
      expect(getLogHistory().map((e) => e.message)).toEqual(['shown']);

      setLogLevel('verbose');
      log.verbose('KVCache', 'now shown');
      expect(getLogHistory({ level: 'verbose' }).map((e) => e.message)).toEqual(['now shown']);
    });

    it('routes levels to the matching console method', () => {
      setLogLevel('debug');
      log.debug('KVCache', 'd');
      log.warn('KVCache', 'w', { capacity: 4 });
      log.error('KVCache', 'e');

      expect(console.debug).toHaveBeenCalledTimes(1);
      expect(console.warn).toHaveBeenCalledWith(expect.stringMatching(/\[KVCache\] w$/), { capacity: 4 });
      expect(console.error).toHaveBeenCalledTimes(1);
    });

    it('logs always regardless of level', () => {
      setLogLevel('silent');
      log.error('KVCache', 'dropped');
      log.always('KVCache', 'kept');
      expect(getLogHistory().map((e) => e.level)).toEqual(['ALWAYS']);
    });

    it('falls back to info for unknown level names', () => {
      setLogLevel('debug');
      setLogLevel('chatty');
      expect(getLogLevel()).toBe('info');
    });
  });

  describe('module filters', () => {
    it('limits output to enabled modules', () => {
      enableModules('KVPool');
      log.info('KVCache', 'dropped');
      log.info('KVPool', 'kept');
      expect(getLogHistory().map((e) => e.module)).toEqual(['KVPool']);
    });

    it('drops disabled modules', () => {
      disableModules('kvcache');
      log.info('KVCache', 'dropped');
      log.info('KVPool', 'kept');
      expect(getLogHistory().map((e) => e.message)).toEqual(['kept']);
    });
  });

  describe('history', () => {
    it('keeps at most the configured number of entries', () => {
      setRuntimeConfig({ debug: { logHistory: { maxLogHistoryEntries: 2 } } });
      log.info('KVCache', 'a');
      log.info('KVCache', 'b');
      log.info('KVCache', 'c');
      expect(getLogHistory().map((e) => e.message)).toEqual(['b', 'c']);
    });

    it('drops older entries when the cap is lowered', () => {
      log.info(LOG_MODULES.cache, 'a');
      log.info(LOG_MODULES.cache, 'b');
      log.info(LOG_MODULES.cache, 'c');
      setRuntimeConfig({ debug: { logHistory: { maxLogHistoryEntries: 1 } } });
      log.info(LOG_MODULES.pool, 'd');
      expect(getLogHistory().map((e) => `${e.module} ${e.message}`)).toEqual(['KVPool d']);
    });

    it('keeps no history with a zero cap but still writes to the console', () => {
      setRuntimeConfig({ debug: { logHistory: { maxLogHistoryEntries: 0 } } });
      log.info(LOG_MODULES.cache, 'a');
      expect(getLogHistory()).toEqual([]);
      expect(console.log).toHaveBeenCalledTimes(1);
    });

    it('filters by module substring and count', () => {
      log.info('KVCache', 'one');
      log.info('KVPool', 'two');
      log.info('KVCache', 'three');
      expect(getLogHistory({ module: 'cache' }).map((e) => e.message)).toEqual(['one', 'three']);
      expect(getLogHistory({ last: 1 }).map((e) => e.message)).toEqual(['three']);
    });

    it('summarises state in a snapshot', () => {
      setLogLevel('warn');
      disableModules('KVPool');
      log.warn('KVCache', 'w');
      log.error('KVCache', 'e');
      log.error('KVCache', 'e2');

      const snapshot = getDebugSnapshot();
      expect(snapshot.logLevel).toBe('warn');
      expect(snapshot.disabledModules).toEqual(['kvpool']);
      expect(snapshot.errorCount).toBe(2);
      expect(snapshot.warnCount).toBe(1);
      expect(snapshot.recentLogs.map((e) => e.message)).toEqual(['w', 'e', 'e2']);
    });
  });

  describe('trace', () => {
    it('is off by default', () => {
      trace.kv('plan');
      expect(getLogHistory()).toEqual([]);
      expect(console.log).not.toHaveBeenCalled();
    });

    it('supports all with exclusions', () => {
      setTrace('all,-buffers');
      expect(getTrace()).toEqual(['kv', 'pool']);
      expect(isTraceEnabled('buffers')).toBe(false);

      trace.buffers('alloc');
      trace.pool('lease a');
      expect(getLogHistory().map((e) => `${e.level} ${e.module} ${e.message}`)).toEqual([
        'TRACE:pool KVPool lease a',
      ]);
    });

    it('records each category under its subsystem tag', () => {
      setTrace('all');
      trace.kv('plan');
      trace.buffers('alloc');
      trace.pool('lease');
      expect(getLogHistory().map((e) => `${e.level} ${e.module}`)).toEqual([
        'TRACE:kv KVCache',
        'TRACE:buffers KVTensor',
        'TRACE:pool KVPool',
      ]);
    });

    it('accepts arrays and ignores unknown names', () => {
      setTrace(['pool']);
      expect(getTrace()).toEqual(['pool']);
      setTrace('kv, gpu');
      expect(getTrace()).toEqual(['kv']);
      setTrace(false);
      expect(getTrace()).toEqual([]);
    });
  });

  describe('configuration', () => {
    it('reads level and trace from the environment', () => {
      initFromEnv({ DECODER_KV_LOG: 'debug', DECODER_KV_TRACE: 'kv' });
      expect(getLogLevel()).toBe('debug');
      expect(getTrace()).toEqual(['kv']);
    });

    it('leaves settings alone when the environment is empty', () => {
      setLogLevel('warn');
      initFromEnv({});
      expect(getLogLevel()).toBe('warn');
    });

    it('applies debug config', () => {
      applyDebugConfig({
        ...DEFAULT_DEBUG_CONFIG,
        logLevel: { defaultLogLevel: 'error' },
        trace: { enabled: true, categories: [] },
      });
      expect(getLogLevel()).toBe('error');
      expect(getTrace()).toEqual(['kv', 'buffers', 'pool']);

      applyDebugConfig(DEFAULT_DEBUG_CONFIG);
      expect(getLogLevel()).toBe('info');
      expect(getTrace()).toEqual([]);
    });
  });
});
