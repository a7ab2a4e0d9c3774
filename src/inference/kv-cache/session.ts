/**
 * Decoder KV Cache Session
 *
 * Owns one generation request's cache: named [batch, heads, sequence, hidden]
 * tensors sharing a sliding window of `capacity` sequence positions, plus
 * the cumulative processed-token count.
 *
 * Per forward pass the caller hands `update` the raw cache the model
 * produced (window + newly appended entries) and gets back the trimmed,
 * session-owned window for the next pass. Blank (padding) entries are
 * dropped before real ones; with `freezeFirstPosition` the first real
 * entry (BOS) is never evicted.
 *
 * `setCapacity` only grows the window. Shrinking is rejected with
 * KV_UNSUPPORTED_OPERATION and leaves the tensors untouched.
 *
 * Lifecycle: inert -> setup() -> update()/setCapacity()* -> destroy().
 * Every mutation validates first and commits state and counters together,
 * so a failed call leaves the session exactly as it was.
 *
 * @module inference/kv-cache/session
 */

import { getRuntimeConfig } from '../../config/runtime.js';
import { KV_TENSOR_RANK } from '../../config/schema/kvcache.schema.js';
import { createKVCacheError, ERROR_CODES } from '../../errors/kv-cache-error.js';
import { log, LOG_MODULES } from '../../debug/index.js';
import type {
  DecoderKVCacheOptions,
  EvictionPlan,
  KVCacheStats,
  KVState,
  NativeKVBufferBackend,
} from './types.js';
import {
  type KVTensor,
  assertKVTensor,
  cloneKVTensor,
  sameNonSequenceDims,
  sequenceLength,
  tensorBytes,
} from './tensor.js';
import { type EvictionStrategy, createEvictionStrategy } from './eviction.js';

interface ConfiguredSession {
  sessionId: string;
  state: KVState;
  totalProcessedTokens: number;
  freezeFirstPosition: boolean;
  strategy: EvictionStrategy;
}

function assertCount(value: number, name: string, min: number): void {
  if (!Number.isSafeInteger(value) || value < min) {
    throw createKVCacheError(
      ERROR_CODES.INVALID_ARGUMENT,
      `${name} must be a safe integer >= ${min}, got ${value}`
    );
  }
}

export class DecoderKVCache {
  readonly useNativeBuffer: boolean;
  readonly sequenceAxis: number;
  private readonly nativeBackend: NativeKVBufferBackend | null;
  private session: ConfiguredSession | null = null;
  private lastPlan: EvictionPlan | null = null;

  constructor(options: DecoderKVCacheOptions = {}) {
    const runtimeKV = getRuntimeConfig().kvcache;
    this.useNativeBuffer = options.useNativeBuffer ?? runtimeKV.useNativeBuffer;
    this.sequenceAxis = options.sequenceAxis ?? runtimeKV.sequenceAxis;

    if (!Number.isInteger(this.sequenceAxis) || this.sequenceAxis < 0 || this.sequenceAxis >= KV_TENSOR_RANK) {
      throw createKVCacheError(
        ERROR_CODES.INVALID_ARGUMENT,
        `sequenceAxis must be an integer in [0, ${KV_TENSOR_RANK - 1}], got ${this.sequenceAxis}`
      );
    }

    if (this.useNativeBuffer && !options.nativeBackend) {
      throw createKVCacheError(
        ERROR_CODES.INVALID_ARGUMENT,
        'useNativeBuffer requires a nativeBackend'
      );
    }
    this.nativeBackend = this.useNativeBuffer ? options.nativeBackend ?? null : null;
  }

  // ==========================================================================
  // Setup / Teardown
  // ==========================================================================

  /**
   * Bind identity and initial cache content. Re-setup discards all prior
   * state, releasing any native buffer held from the previous setup.
   *
   * @param initialState - tensors copied into session-owned buffers
   * @param numProcessedTokens - tokens already folded into `initialState`
   * @param freezeFirstPosition - keep the BOS entry once the window is full
   */
  setup(
    sessionId: string,
    initialState: KVState,
    numProcessedTokens = 0,
    freezeFirstPosition = getRuntimeConfig().kvcache.freezeFirstPosition
  ): void {
    if (typeof sessionId !== 'string' || sessionId.length === 0) {
      throw createKVCacheError(ERROR_CODES.INVALID_ARGUMENT, 'sessionId must be a non-empty string');
    }
    assertCount(numProcessedTokens, 'numProcessedTokens', 0);
    this.validateState(initialState, 'setup');

    const state = Object.freeze(Object.fromEntries(
      Object.entries(initialState).map(([name, tensor]) => [name, cloneKVTensor(tensor)])
    ));

    this.destroy();

    const strategy = createEvictionStrategy(this.sequenceAxis, this.nativeBackend);
    try {
      strategy.open(numProcessedTokens, freezeFirstPosition ? 1 : 0);
    } catch (err) {
      log.error(LOG_MODULES.cache, `Setup failed for session ${sessionId}`, err);
      throw err;
    }

    this.session = {
      sessionId,
      state,
      totalProcessedTokens: numProcessedTokens,
      freezeFirstPosition,
      strategy,
    };

    log.verbose(
      LOG_MODULES.cache,
      `Session ${sessionId} ready: ${Object.keys(state).length} tensors, ` +
      `capacity=${this.capacity}, processed=${numProcessedTokens}, ` +
      `freezeFirst=${freezeFirstPosition}, backend=${strategy.kind}`
    );
  }

  /**
   * Release backend resources and return to the inert phase.
   * Calling it on an inert session does nothing.
   */
  destroy(): void {
    const session = this.session;
    if (!session) return;
    this.session = null;
    this.lastPlan = null;
    session.strategy.close();
    log.debug(LOG_MODULES.cache, `Session ${session.sessionId} destroyed`);
  }

  // ==========================================================================
  // Update
  // ==========================================================================

  /**
   * Fold one forward pass into the cache.
   *
   * `newState` is the raw cache from the model: same tensor names as the
   * session, each with sequence extent `capacity + inputTokenCount` (host
   * backend) or `capacity` (native backend, which evicts on its own).
   *
   * @returns the session-owned window for the next forward pass
   */
  update(newState: KVState, inputTokenCount: number): Readonly<KVState> {
    const session = this.requireSession('update');
    assertCount(inputTokenCount, 'inputTokenCount', 1);

    const capacity = this.assertUniformCapacity(session.state, 'update');
    const expectedExtent = session.strategy.rawExtentFor(capacity, inputTokenCount);
    this.validateRawState(session.state, newState, expectedExtent);

    const totalProcessedTokens = session.totalProcessedTokens + inputTokenCount;
    assertCount(totalProcessedTokens, 'totalProcessedTokens', 0);
    const { state, plan } = session.strategy.evict(
      newState,
      inputTokenCount,
      totalProcessedTokens,
      session.freezeFirstPosition
    );

    session.state = Object.freeze(state);
    session.totalProcessedTokens = totalProcessedTokens;
    this.lastPlan = plan;

    log.debug(
      LOG_MODULES.cache,
      `update +${inputTokenCount}: processed=${totalProcessedTokens}, ` +
      `dropped padded=${plan.paddedToDelete} real=${plan.nonPaddedToDelete}`
    );

    return session.state;
  }

  // ==========================================================================
  // Capacity
  // ==========================================================================

  /**
   * Resize the window. Growing prepends zero entries at sequence index 0;
   * shrinking is unsupported. Token accounting is unchanged.
   *
   * With `freezeFirstPosition`, a grown window's frozen slot is whatever
   * sits at the front once padding runs out, which may be one of the new
   * blank entries.
   */
  setCapacity(targetCapacity: number): void {
    const session = this.requireSession('setCapacity');
    assertCount(targetCapacity, 'targetCapacity', 0);

    const capacity = this.assertUniformCapacity(session.state, 'setCapacity');

    if (targetCapacity < capacity) {
      throw createKVCacheError(
        ERROR_CODES.UNSUPPORTED_OPERATION,
        `shrinking the cache from ${capacity} to ${targetCapacity} entries is not supported`
      );
    }
    if (targetCapacity === capacity) return;

    session.state = Object.freeze(session.strategy.grow(session.state, targetCapacity));
    log.verbose(LOG_MODULES.cache, `Session ${session.sessionId} capacity ${capacity} -> ${targetCapacity}`);
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  get id(): string {
    if (!this.session) {
      throw createKVCacheError(
        ERROR_CODES.SESSION_NOT_CONFIGURED,
        'attempted to access session id before setting up session'
      );
    }
    return this.session.sessionId;
  }

  /**
   * Rebind the session id. In-flight state is kept as is.
   */
  set id(sessionId: string) {
    const session = this.requireSession('id');
    if (sessionId.length === 0) {
      throw createKVCacheError(ERROR_CODES.INVALID_ARGUMENT, 'sessionId must be a non-empty string');
    }
    log.debug(LOG_MODULES.cache, `Session ${session.sessionId} rebound to ${sessionId}`);
    session.sessionId = sessionId;
  }

  get isConfigured(): boolean {
    return this.session !== null;
  }

  /**
   * Maximum number of entries the window holds before old ones are evicted.
   */
  get capacity(): number {
    const session = this.requireSession('capacity');
    return sequenceLength(this.firstTensor(session.state), this.sequenceAxis);
  }

  get totalProcessedTokens(): number {
    return this.requireSession('totalProcessedTokens').totalProcessedTokens;
  }

  get numNonBlankEntries(): number {
    return Math.min(this.capacity, this.totalProcessedTokens);
  }

  get freezeFirstPosition(): boolean {
    return this.requireSession('freezeFirstPosition').freezeFirstPosition;
  }

  get cachedInputs(): Readonly<KVState> {
    return this.requireSession('cachedInputs').state;
  }

  /** Plan applied by the most recent update, or null */
  get lastEvictionPlan(): EvictionPlan | null {
    return this.lastPlan;
  }

  getStats(): KVCacheStats {
    const session = this.requireSession('getStats');
    const capacity = this.capacity;
    const numNonBlankEntries = this.numNonBlankEntries;
    let bytes = 0;
    for (const tensor of Object.values(session.state)) {
      bytes += tensorBytes(tensor);
    }
    return {
      sessionId: session.sessionId,
      capacity,
      totalProcessedTokens: session.totalProcessedTokens,
      numNonBlankEntries,
      numPaddedEntries: capacity - numNonBlankEntries,
      tensorCount: Object.keys(session.state).length,
      bytes,
      freezeFirstPosition: session.freezeFirstPosition,
      backend: session.strategy.kind,
    };
  }

  // ==========================================================================
  // Validation
  // ==========================================================================

  private requireSession(operation: string): ConfiguredSession {
    if (!this.session) {
      throw createKVCacheError(
        ERROR_CODES.SESSION_NOT_CONFIGURED,
        `${operation} called before setup`
      );
    }
    return this.session;
  }

  private firstTensor(state: KVState): KVTensor {
    const [tensor] = Object.values(state);
    if (!tensor) {
      throw createKVCacheError(ERROR_CODES.INVALID_STATE, 'cache state has no tensors');
    }
    return tensor;
  }

  /**
   * Well-formed, non-empty, uniform sequence extent. Returns the extent.
   */
  private validateState(state: KVState, operation: string): number {
    const entries = Object.entries(state);
    if (entries.length === 0) {
      throw createKVCacheError(ERROR_CODES.INVALID_STATE, `${operation}: cache state has no tensors`);
    }

    let extent: number | null = null;
    for (const [name, tensor] of entries) {
      assertKVTensor(tensor, operation, name);
      const length = sequenceLength(tensor, this.sequenceAxis);
      if (extent === null) {
        extent = length;
      } else if (length !== extent) {
        throw createKVCacheError(
          ERROR_CODES.INVALID_STATE,
          `${operation}: tensor ${name} has sequence extent ${length}, expected ${extent}`,
          { name, extent: length, expected: extent }
        );
      }
    }
    return extent ?? 0;
  }

  /**
   * Capacity of the cached tensors; they must all agree.
   */
  private assertUniformCapacity(state: KVState, operation: string): number {
    let capacity: number | null = null;
    for (const [name, tensor] of Object.entries(state)) {
      const length = sequenceLength(tensor, this.sequenceAxis);
      if (capacity === null) {
        capacity = length;
      } else if (length !== capacity) {
        throw createKVCacheError(
          ERROR_CODES.CAPACITY_MISMATCH,
          `${operation}: cached tensor ${name} has capacity ${length}, expected ${capacity}`
        );
      }
    }
    if (capacity === null) {
      throw createKVCacheError(ERROR_CODES.INVALID_STATE, `${operation}: cache state has no tensors`);
    }
    return capacity;
  }

  private validateRawState(cached: KVState, raw: KVState, expectedExtent: number): void {
    const extent = this.validateState(raw, 'update');

    const cachedNames = Object.keys(cached);
    const rawNames = Object.keys(raw);
    const missing = cachedNames.filter((name) => !(name in raw));
    const unknown = rawNames.filter((name) => !(name in cached));
    if (missing.length > 0 || unknown.length > 0) {
      throw createKVCacheError(
        ERROR_CODES.INVALID_STATE,
        `update: tensor names differ from the session (missing: [${missing.join(', ')}], ` +
        `unexpected: [${unknown.join(', ')}])`,
        { missing, unknown }
      );
    }

    for (const [name, tensor] of Object.entries(raw)) {
      const current = cached[name];
      if (tensor.dtype !== current.dtype) {
        throw createKVCacheError(
          ERROR_CODES.INVALID_STATE,
          `update: tensor ${name} has dtype ${tensor.dtype}, session holds ${current.dtype}`
        );
      }
      if (!sameNonSequenceDims(tensor, current, this.sequenceAxis)) {
        throw createKVCacheError(
          ERROR_CODES.INVALID_STATE,
          `update: tensor ${name} shape [${tensor.shape.join(', ')}] does not match ` +
          `session shape [${current.shape.join(', ')}] outside the sequence axis`
        );
      }
    }

    if (extent !== expectedExtent) {
      throw createKVCacheError(
        ERROR_CODES.INVALID_STATE,
        `update: raw sequence extent ${extent} does not match expected ${expectedExtent}`,
        { extent, expected: expectedExtent }
      );
    }
  }
}
