/**
 * Decoder KV cache - public entry point
 *
 * @module decoder-kv-cache
 */

export const DECODER_KV_CACHE_VERSION = '0.1.0';

// Sessions
export {
  DecoderKVCache,
  KVCacheSessionPool,
  type KVCacheSessionPoolOptions,
  type CreateSessionOptions,
  type KVCacheLease,
} from './inference/kv-cache/index.js';

// Tensors and eviction
export {
  type KVState,
  type KVTensor,
  type KVTypedArray,
  type KVDtype,
  type SequenceRange,
  type NativeKVBufferBackend,
  type DecoderKVCacheOptions,
  type EvictionPlan,
  type EvictionStrategy,
  type EvictionResult,
  type KVCacheStats,
  createKVTensor,
  zerosKVTensor,
  fromValues,
  toFloat32,
  cloneKVTensor,
  sequenceLength,
  gatherSequence,
  sliceSequence,
  padSequenceFront,
  readSequenceEntry,
  tensorBytes,
  planEviction,
  keptRanges,
  HostEvictionStrategy,
  NativeBufferStrategy,
  createEvictionStrategy,
} from './inference/kv-cache/index.js';

// Generation hand-off
export {
  canStartGeneration,
  createKVStepOutput,
  type KVStepOutput,
} from './inference/pipelines/text/kv-handoff.js';

// Errors
export {
  ERROR_CODES,
  createKVCacheError,
  isKVCacheError,
  type KVCacheError,
  type KVCacheErrorCode,
} from './errors/kv-cache-error.js';

// Config
export {
  getRuntimeConfig,
  setRuntimeConfig,
  resetRuntimeConfig,
  createRuntimeConfig,
  DEFAULT_KVCACHE_CONFIG,
  DEFAULT_DEBUG_CONFIG,
  DEFAULT_RUNTIME_CONFIG,
  type RuntimeConfigSchema,
  type RuntimeConfigOverrides,
  type KVCacheConfigSchema,
  type DebugConfigSchema,
} from './config/index.js';

// Debug
export {
  log,
  trace,
  setLogLevel,
  getLogLevel,
  setTrace,
  getTrace,
  enableModules,
  disableModules,
  resetModuleFilters,
  applyDebugConfig,
  initFromEnv,
  getLogHistory,
  clearLogHistory,
  getDebugSnapshot,
} from './debug/index.js';
