/**
 * KV Cache Module - Re-exports
 *
 * @module inference/kv-cache
 */

// Types
export {
  type KVState,
  type KVDtype,
  type NativeKVBufferBackend,
  type DecoderKVCacheOptions,
  type EvictionPlan,
  type KVCacheStats,
  f32ToF16Bits,
  f16ToF32Bits,
  f32ToF16Array,
  f16ToF32Array,
} from './types.js';

// Tensors
export {
  type KVTensor,
  type KVTypedArray,
  type SequenceRange,
  createKVTensor,
  zerosKVTensor,
  fromValues,
  toFloat32,
  cloneKVTensor,
  assertKVTensor,
  dtypeBytes,
  dtypeOf,
  tensorBytes,
  sequenceLength,
  gatherSequence,
  sliceSequence,
  padSequenceFront,
  readSequenceEntry,
} from './tensor.js';

// Eviction
export {
  type EvictionStrategy,
  type EvictionResult,
  planEviction,
  keptRanges,
  HostEvictionStrategy,
  NativeBufferStrategy,
  createEvictionStrategy,
} from './eviction.js';

// Classes
export { DecoderKVCache } from './session.js';
export {
  KVCacheSessionPool,
  type KVCacheSessionPoolOptions,
  type CreateSessionOptions,
  type KVCacheLease,
} from './pool.js';

export { DecoderKVCache as default } from './session.js';
