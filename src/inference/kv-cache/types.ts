/**
 * KV Cache Types - Shared interfaces and utilities
 *
 * @module inference/kv-cache/types
 */

import type { KVBackendKind, KVDtype } from '../../config/schema/kvcache.schema.js';
import type { KVTensor } from './tensor.js';

// ============================================================================
// State
// ============================================================================

/**
 * Cache tensors keyed by name (one per attention layer / head group).
 * Every tensor is [batch, heads, sequence, hidden] and all share the same
 * sequence extent.
 */
export type KVState = Record<string, KVTensor>;

// ============================================================================
// Native Buffer Capability
// ============================================================================

/**
 * Pluggable native buffer backend. When a session is configured with
 * `useNativeBuffer`, it acquires one handle per setup and releases it
 * exactly once; the buffer owns all sequence-axis mutation.
 */
export interface NativeKVBufferBackend<THandle = unknown> {
  /**
   * @param priorTokens - tokens already folded into the cache
   * @param frozenCount - leading entries that are never evicted (0 or 1)
   */
  acquire(priorTokens: number, frozenCount: number): THandle;
  release(handle: THandle): void;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Construction options for DecoderKVCache
 */
export interface DecoderKVCacheOptions {
  useNativeBuffer?: boolean;
  /** Required when useNativeBuffer is true */
  nativeBackend?: NativeKVBufferBackend;
  /** Sequence axis index; defaults to runtime config (2) */
  sequenceAxis?: number;
}

// ============================================================================
// Eviction
// ============================================================================

/**
 * Entries removed from the sequence axis during one update.
 */
export interface EvictionPlan {
  /** Blank entries dropped from the front */
  paddedToDelete: number;
  /** Oldest real entries evicted */
  nonPaddedToDelete: number;
  /** Blank entries present in the raw state before deletion */
  paddedEntries: number;
}

// ============================================================================
// Result Types
// ============================================================================

/**
 * Session statistics
 */
export interface KVCacheStats {
  sessionId: string;
  capacity: number;
  totalProcessedTokens: number;
  numNonBlankEntries: number;
  numPaddedEntries: number;
  tensorCount: number;
  bytes: number;
  freezeFirstPosition: boolean;
  backend: KVBackendKind;
}

export type { KVDtype };

// ============================================================================
// F16 Conversion Utilities
// ============================================================================

const f32View = new Float32Array(1);
const u32View = new Uint32Array(f32View.buffer);

/**
 * Convert a single F32 value to F16 bits
 */
export function f32ToF16Bits(value: number): number {
  f32View[0] = value;
  const x = u32View[0];
  const sign = (x >> 16) & 0x8000;
  let exp = ((x >> 23) & 0xff) - 127 + 15;
  let mant = x & 0x7fffff;

  if (exp <= 0) {
    if (exp < -10) return sign;
    mant = (mant | 0x800000) >> (1 - exp);
    return sign | ((mant + 0x1000) >> 13);
  }

  if (exp >= 31) {
    return sign | 0x7c00 | (mant ? 0x200 : 0);
  }

  return sign | (exp << 10) | ((mant + 0x1000) >> 13);
}

/**
 * Convert F16 bits to F32 value
 */
export function f16ToF32Bits(h: number): number {
  const sign = (h >> 15) & 0x1;
  const exp = (h >> 10) & 0x1f;
  const mant = h & 0x3ff;

  if (exp === 0) {
    if (mant === 0) return sign ? -0 : 0;
    const f = mant / 1024 * Math.pow(2, -14);
    return sign ? -f : f;
  }
  if (exp === 31) {
    return mant ? NaN : (sign ? -Infinity : Infinity);
  }

  const f = (1 + mant / 1024) * Math.pow(2, exp - 15);
  return sign ? -f : f;
}

/**
 * Convert F32 values to F16 (Uint16Array)
 */
export function f32ToF16Array(input: ArrayLike<number>): Uint16Array {
  const out = new Uint16Array(input.length);
  for (let i = 0; i < input.length; i++) {
    out[i] = f32ToF16Bits(input[i]);
  }
  return out;
}

/**
 * Convert F16 array to F32
 */
export function f16ToF32Array(input: Uint16Array): Float32Array {
  const out = new Float32Array(input.length);
  for (let i = 0; i < input.length; i++) {
    out[i] = f16ToF32Bits(input[i]);
  }
  return out;
}
