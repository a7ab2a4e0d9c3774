import { afterEach, describe, expect, it } from 'vitest';

import { getRuntimeConfig, resetRuntimeConfig, setRuntimeConfig } from '../../src/config/runtime.js';
import { DEFAULT_RUNTIME_CONFIG, createRuntimeConfig } from '../../src/config/schema/index.js';
import { DecoderKVCache } from '../../src/inference/kv-cache/session.js';
import { ERROR_CODES } from '../../src/errors/kv-cache-error.js';
import { getLogLevel, getTrace, setLogLevel, setTrace } from '../../src/debug/index.js';
import { catchError } from './kv-fixtures.js';

describe('config/runtime', () => {
  afterEach(() => {
    resetRuntimeConfig();
    setLogLevel('info');
    setTrace(false);
  });

  it('starts from the defaults', () => {
    const config = getRuntimeConfig();
    expect(config.kvcache).toEqual({
      sequenceAxis: 2,
      freezeFirstPosition: false,
      useNativeBuffer: false,
      maxSessions: 64,
    });
    expect(config.debug.logHistory.maxLogHistoryEntries).toBe(1000);
    expect(config.debug.logLevel.defaultLogLevel).toBe('info');
  });

  it('merges overrides section by section', () => {
    const config = setRuntimeConfig({
      kvcache: { freezeFirstPosition: true },
      debug: { trace: { enabled: true } },
    });
    expect(config.kvcache.freezeFirstPosition).toBe(true);
    expect(config.kvcache.sequenceAxis).toBe(2);
    expect(config.debug.trace).toEqual({ enabled: true, categories: ['all'] });
    expect(getRuntimeConfig()).toBe(config);
  });

  it('applies log level and trace overrides to the debug module', () => {
    setRuntimeConfig({
      debug: { logLevel: { defaultLogLevel: 'warn' }, trace: { enabled: true, categories: ['kv', 'pool'] } },
    });
    expect(getLogLevel()).toBe('warn');
    expect(getTrace()).toEqual(['kv', 'pool']);
  });

  it('leaves the defaults untouched', () => {
    createRuntimeConfig({ kvcache: { sequenceAxis: 1 } }).kvcache.maxSessions = 3;
    expect(DEFAULT_RUNTIME_CONFIG.kvcache.sequenceAxis).toBe(2);
    expect(DEFAULT_RUNTIME_CONFIG.kvcache.maxSessions).toBe(64);
  });

  it('rejects invalid values and keeps the active config', () => {
    const before = getRuntimeConfig();
    expect(catchError(() => setRuntimeConfig({ kvcache: { sequenceAxis: 4 } }))).toMatchObject({
      code: ERROR_CODES.INVALID_ARGUMENT,
    });
    expect(catchError(() => setRuntimeConfig({ kvcache: { maxSessions: 0 } }))).toMatchObject({
      code: ERROR_CODES.INVALID_ARGUMENT,
    });
    expect(catchError(() => setRuntimeConfig({ debug: { logHistory: { maxLogHistoryEntries: -1 } } }))).toMatchObject({
      code: ERROR_CODES.INVALID_ARGUMENT,
    });
    expect(getRuntimeConfig()).toBe(before);
  });

  it('resets when called without overrides', () => {
    setRuntimeConfig({ kvcache: { maxSessions: 2 } });
    expect(setRuntimeConfig().kvcache.maxSessions).toBe(64);
  });

  it('feeds session defaults', () => {
    setRuntimeConfig({ kvcache: { sequenceAxis: 1 } });
    expect(new DecoderKVCache().sequenceAxis).toBe(1);
    expect(new DecoderKVCache({ sequenceAxis: 3 }).sequenceAxis).toBe(3);
  });

  it('validates session options', () => {
    expect(catchError(() => new DecoderKVCache({ sequenceAxis: 4 }))).toMatchObject({
      code: ERROR_CODES.INVALID_ARGUMENT,
    });
    expect(catchError(() => new DecoderKVCache({ useNativeBuffer: true }))).toMatchObject({
      code: ERROR_CODES.INVALID_ARGUMENT,
    });
  });
});
