/**
 * KV Cache Session Pool
 *
 * Owns the sessions of concurrent generation requests, keyed by session
 * id. A session is mutated only through a lease, and at most one lease
 * per id is outstanding. Discarding a session destroys it, which releases
 * its native buffer exactly once.
 *
 * @module inference/kv-cache/pool
 */

import { getRuntimeConfig } from '../../config/runtime.js';
import { createKVCacheError, ERROR_CODES } from '../../errors/kv-cache-error.js';
import { log, trace, LOG_MODULES } from '../../debug/index.js';
import type { DecoderKVCacheOptions, KVState } from './types.js';
import { DecoderKVCache } from './session.js';

export interface KVCacheSessionPoolOptions extends DecoderKVCacheOptions {
  /** Defaults to runtime kvcache.maxSessions */
  maxSessions?: number;
}

export interface CreateSessionOptions {
  numProcessedTokens?: number;
  freezeFirstPosition?: boolean;
}

/**
 * Exclusive access to one pooled session.
 */
export interface KVCacheLease {
  readonly sessionId: string;
  readonly session: DecoderKVCache;
}

interface PoolEntry {
  session: DecoderKVCache;
  lease: KVCacheLease | null;
}

export class KVCacheSessionPool {
  readonly maxSessions: number;
  private readonly sessionOptions: DecoderKVCacheOptions;
  private readonly entries = new Map<string, PoolEntry>();

  constructor(options: KVCacheSessionPoolOptions = {}) {
    const { maxSessions, ...sessionOptions } = options;
    this.maxSessions = maxSessions ?? getRuntimeConfig().kvcache.maxSessions;
    this.sessionOptions = sessionOptions;
  }

  get size(): number {
    return this.entries.size;
  }

  has(sessionId: string): boolean {
    return this.entries.has(sessionId);
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Create and set up a session. Fails if the id is taken or the pool is full.
   */
  create(sessionId: string, initialState: KVState, options: CreateSessionOptions = {}): DecoderKVCache {
    if (this.entries.has(sessionId)) {
      throw createKVCacheError(ERROR_CODES.SESSION_EXISTS, `session ${sessionId} already exists`);
    }
    if (this.entries.size >= this.maxSessions) {
      throw createKVCacheError(
        ERROR_CODES.POOL_EXHAUSTED,
        `session pool is full (${this.maxSessions} sessions)`
      );
    }

    const session = new DecoderKVCache(this.sessionOptions);
    session.setup(sessionId, initialState, options.numProcessedTokens, options.freezeFirstPosition);
    this.entries.set(sessionId, { session, lease: null });
    log.verbose(LOG_MODULES.pool, `Created session ${sessionId} (${this.entries.size}/${this.maxSessions})`);
    return session;
  }

  /**
   * Read-only lookup; mutation goes through lease().
   */
  get(sessionId: string): DecoderKVCache {
    return this.requireEntry(sessionId).session;
  }

  isLeased(sessionId: string): boolean {
    return this.requireEntry(sessionId).lease !== null;
  }

  /**
   * Take exclusive access to a session.
   */
  lease(sessionId: string): KVCacheLease {
    const entry = this.requireEntry(sessionId);
    if (entry.lease) {
      throw createKVCacheError(ERROR_CODES.SESSION_BUSY, `session ${sessionId} is already leased`);
    }
    const lease: KVCacheLease = Object.freeze({ sessionId, session: entry.session });
    entry.lease = lease;
    trace.pool(`lease ${sessionId}`);
    return lease;
  }

  /**
   * Return a lease. Each lease can be returned once.
   */
  release(lease: KVCacheLease): void {
    const entry = this.entries.get(lease.sessionId);
    if (!entry || entry.lease !== lease) {
      throw createKVCacheError(
        ERROR_CODES.INVALID_ARGUMENT,
        `lease for session ${lease.sessionId} is not outstanding`
      );
    }
    entry.lease = null;
    trace.pool(`release ${lease.sessionId}`);
  }

  /**
   * Run `fn` with exclusive access, returning the lease afterwards even
   * when `fn` throws.
   */
  withLease<T>(sessionId: string, fn: (session: DecoderKVCache) => T): T {
    const lease = this.lease(sessionId);
    try {
      return fn(lease.session);
    } finally {
      this.release(lease);
    }
  }

  /**
   * Destroy a session and drop it from the pool.
   */
  discard(sessionId: string): void {
    const entry = this.requireEntry(sessionId);
    if (entry.lease) {
      throw createKVCacheError(
        ERROR_CODES.SESSION_BUSY,
        `session ${sessionId} cannot be discarded while leased`
      );
    }
    this.entries.delete(sessionId);
    entry.session.destroy();
    log.verbose(LOG_MODULES.pool, `Discarded session ${sessionId}`);
  }

  /**
   * Destroy every session, leased or not.
   */
  clear(): void {
    for (const entry of this.entries.values()) {
      entry.session.destroy();
    }
    this.entries.clear();
  }

  private requireEntry(sessionId: string): PoolEntry {
    const entry = this.entries.get(sessionId);
    if (!entry) {
      throw createKVCacheError(ERROR_CODES.SESSION_NOT_FOUND, `no session ${sessionId}`);
    }
    return entry;
  }
}
