/**
 * KV Cache Eviction
 *
 * Turns the raw post-forward-pass cache back into a fixed-size window.
 * The forward pass appends `inputTokenCount` entries at the tail, so the
 * raw sequence extent is `capacity + inputTokenCount`; eviction removes
 * exactly `inputTokenCount` entries from the front, blank entries first.
 *
 * Two strategies, chosen once at setup:
 * - HostEvictionStrategy trims the typed arrays itself.
 * - NativeBufferStrategy leaves the sequence axis to a native buffer and
 *   only takes ownership of the tensors it is handed.
 *
 * @module inference/kv-cache/eviction
 */

import type { KVBackendKind } from '../../config/schema/kvcache.schema.js';
import { createKVCacheError, ERROR_CODES } from '../../errors/kv-cache-error.js';
import { log, trace, LOG_MODULES } from '../../debug/index.js';
import type { EvictionPlan, KVState, NativeKVBufferBackend } from './types.js';
import {
  type KVTensor,
  type SequenceRange,
  cloneKVTensor,
  gatherSequence,
  padSequenceFront,
  sequenceLength,
} from './tensor.js';

// ============================================================================
// Planning
// ============================================================================

/**
 * Compute how many blank and real entries one update removes.
 *
 * @param rawExtent - sequence extent of the raw state (capacity + input)
 * @param totalProcessedTokens - cumulative count, already including this input
 * @param inputTokenCount - tokens consumed by this forward pass
 */
export function planEviction(
  rawExtent: number,
  totalProcessedTokens: number,
  inputTokenCount: number
): EvictionPlan {
  const paddedEntries = Math.max(0, rawExtent - totalProcessedTokens);
  return {
    paddedEntries,
    paddedToDelete: Math.min(paddedEntries, inputTokenCount),
    nonPaddedToDelete: Math.max(0, inputTokenCount - paddedEntries),
  };
}

/**
 * Sequence ranges kept from one tensor under a plan.
 */
export function keptRanges(
  rawExtent: number,
  plan: EvictionPlan,
  freezeFirstPosition: boolean
): SequenceRange[] {
  const start = plan.paddedToDelete;
  const evict = plan.nonPaddedToDelete;

  if (evict === 0) {
    return [[start, rawExtent]];
  }

  // Index `start` is the earliest real entry once the blanks are gone.
  // A zero-capacity window has no room for it.
  if (freezeFirstPosition && rawExtent - start > evict) {
    return [[start, start + 1], [start + 1 + evict, rawExtent]];
  }

  return [[start + evict, rawExtent]];
}

// ============================================================================
// Strategy Interface
// ============================================================================

export interface EvictionResult {
  state: KVState;
  plan: EvictionPlan;
}

export interface EvictionStrategy {
  readonly kind: KVBackendKind;

  /** Bind backend resources for a freshly set-up session */
  open(priorTokens: number, frozenCount: number): void;

  /** Release backend resources; safe to call more than once */
  close(): void;

  /** Sequence extent `update` must receive for a window of `capacity` */
  rawExtentFor(capacity: number, inputTokenCount: number): number;

  /**
   * Build the next window. `rawState` is already validated; the result
   * must not alias any of its buffers.
   */
  evict(
    rawState: KVState,
    inputTokenCount: number,
    totalProcessedTokens: number,
    freezeFirstPosition: boolean
  ): EvictionResult;

  /** Prepend blank entries up to `targetCapacity` */
  grow(state: KVState, targetCapacity: number): KVState;
}

function mapState(state: KVState, fn: (tensor: KVTensor, name: string) => KVTensor): KVState {
  const next: KVState = {};
  for (const [name, tensor] of Object.entries(state)) {
    next[name] = fn(tensor, name);
  }
  return next;
}

function firstTensor(state: KVState): KVTensor {
  const [tensor] = Object.values(state);
  if (!tensor) {
    throw createKVCacheError(ERROR_CODES.INVALID_STATE, 'cache state has no tensors');
  }
  return tensor;
}

// ============================================================================
// Host Strategy
// ============================================================================

/**
 * Trims and pads host typed arrays along the sequence axis.
 */
export class HostEvictionStrategy implements EvictionStrategy {
  readonly kind = 'host' as const;
  readonly sequenceAxis: number;

  constructor(sequenceAxis: number) {
    this.sequenceAxis = sequenceAxis;
  }

  open(): void {}

  close(): void {}

  rawExtentFor(capacity: number, inputTokenCount: number): number {
    return capacity + inputTokenCount;
  }

  evict(
    rawState: KVState,
    inputTokenCount: number,
    totalProcessedTokens: number,
    freezeFirstPosition: boolean
  ): EvictionResult {
    const rawExtent = sequenceLength(firstTensor(rawState), this.sequenceAxis);
    const plan = planEviction(rawExtent, totalProcessedTokens, inputTokenCount);
    const ranges = keptRanges(rawExtent, plan, freezeFirstPosition);

    trace.kv(
      `evict padded=${plan.paddedToDelete} real=${plan.nonPaddedToDelete} ` +
      `keep=${ranges.map(([a, b]) => `[${a},${b})`).join('+')}`
    );

    const state = mapState(rawState, (tensor) => gatherSequence(tensor, this.sequenceAxis, ranges));
    return { state, plan };
  }

  grow(state: KVState, targetCapacity: number): KVState {
    const capacity = sequenceLength(firstTensor(state), this.sequenceAxis);
    const extra = targetCapacity - capacity;
    trace.buffers(`grow ${capacity} -> ${targetCapacity} (+${extra} blank entries)`);
    return mapState(state, (tensor) => padSequenceFront(tensor, this.sequenceAxis, extra));
  }
}

// ============================================================================
// Native Buffer Strategy
// ============================================================================

/**
 * Holds one native buffer handle per setup. The native buffer performs
 * sequence-axis eviction itself, so `update` receives window-sized state
 * and this strategy only copies it into session-owned buffers.
 */
export class NativeBufferStrategy<THandle = unknown> implements EvictionStrategy {
  readonly kind = 'native' as const;
  readonly sequenceAxis: number;
  private readonly backend: NativeKVBufferBackend<THandle>;
  private handle: { value: THandle } | null = null;

  constructor(backend: NativeKVBufferBackend<THandle>, sequenceAxis: number) {
    this.backend = backend;
    this.sequenceAxis = sequenceAxis;
  }

  get isOpen(): boolean {
    return this.handle !== null;
  }

  open(priorTokens: number, frozenCount: number): void {
    if (this.handle) {
      throw createKVCacheError(
        ERROR_CODES.UNSUPPORTED_OPERATION,
        'native buffer already acquired for this strategy'
      );
    }
    try {
      this.handle = { value: this.backend.acquire(priorTokens, frozenCount) };
    } catch (cause) {
      throw createKVCacheError(
        ERROR_CODES.NATIVE_ACQUIRE_FAILED,
        `failed to acquire native KV buffer (priorTokens=${priorTokens}, frozen=${frozenCount})`,
        { cause }
      );
    }
    log.debug(LOG_MODULES.cache, `Native buffer acquired (priorTokens=${priorTokens}, frozen=${frozenCount})`);
  }

  close(): void {
    const handle = this.handle;
    if (!handle) return;
    this.handle = null;
    this.backend.release(handle.value);
    log.debug(LOG_MODULES.cache, 'Native buffer released');
  }

  rawExtentFor(capacity: number): number {
    return capacity;
  }

  evict(rawState: KVState, _inputTokenCount: number, totalProcessedTokens: number): EvictionResult {
    const extent = sequenceLength(firstTensor(rawState), this.sequenceAxis);
    return {
      state: mapState(rawState, cloneKVTensor),
      plan: {
        paddedEntries: Math.max(0, extent - totalProcessedTokens),
        paddedToDelete: 0,
        nonPaddedToDelete: 0,
      },
    };
  }

  grow(): KVState {
    throw createKVCacheError(
      ERROR_CODES.UNSUPPORTED_OPERATION,
      'setCapacity is not supported with a native buffer; the native buffer owns the sequence axis'
    );
  }
}

/**
 * Select the strategy for a session at setup time.
 */
export function createEvictionStrategy(
  sequenceAxis: number,
  nativeBackend: NativeKVBufferBackend | null
): EvictionStrategy {
  return nativeBackend
    ? new NativeBufferStrategy(nativeBackend, sequenceAxis)
    : new HostEvictionStrategy(sequenceAxis);
}
