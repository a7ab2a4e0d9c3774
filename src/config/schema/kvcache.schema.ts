/**
 * KV Cache Config Schema
 *
 * Defaults for decoder KV cache sessions: sequence axis, eviction policy,
 * backend selection, and pool sizing.
 *
 * @module config/schema/kvcache
 */

// =============================================================================
// KV Dtype
// =============================================================================

/**
 * Element type of a host-side KV cache tensor.
 *
 * - 'f32': Float32Array
 * - 'f16': Uint16Array holding half-precision bit patterns
 * - 'i8':  Int8Array (quantized caches)
 * - 'u8':  Uint8Array (quantized caches)
 */
export type KVDtype = 'f32' | 'f16' | 'i8' | 'u8';

// =============================================================================
// KV Backend
// =============================================================================

/**
 * Where sequence-axis eviction happens.
 *
 * - 'host':   this package trims and pads the tensors itself
 * - 'native': an external native buffer owns the sequence axis
 */
export type KVBackendKind = 'host' | 'native';

// =============================================================================
// KV Cache Config Schema
// =============================================================================

/**
 * Configuration for decoder KV cache sessions.
 *
 * Cache tensors are laid out as [batch, heads, sequence, hidden]; the
 * sequence axis is the one the sliding window moves along.
 */
export interface KVCacheConfigSchema {
  /** Index of the sequence axis in every cache tensor */
  sequenceAxis: number;

  /** Keep the first (BOS) entry when evicting real entries */
  freezeFirstPosition: boolean;

  /** Delegate sequence-axis mutation to a native buffer */
  useNativeBuffer: boolean;

  /** Maximum number of live sessions in a session pool */
  maxSessions: number;
}

// =============================================================================
// Default Config
// =============================================================================

/** Default KV cache configuration */
export const DEFAULT_KVCACHE_CONFIG: KVCacheConfigSchema = {
  sequenceAxis: 2,
  freezeFirstPosition: false,
  useNativeBuffer: false,
  maxSessions: 64,
};

/** Rank of every cache tensor: [batch, heads, sequence, hidden] */
export const KV_TENSOR_RANK = 4;
