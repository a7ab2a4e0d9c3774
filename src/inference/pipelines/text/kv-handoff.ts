/**
 * KV cache hand-off between prefill and generation.
 *
 * The generation loop lives outside this package; these helpers are the
 * contract it uses to decide when decoding can start and what it feeds
 * into the next forward pass.
 *
 * @module inference/pipelines/text/kv-handoff
 */

import type { DecoderKVCache } from '../../kv-cache/session.js';
import type { KVState } from '../../kv-cache/types.js';

export interface KVStepOutput {
  /** Window for the next forward pass; null for cache-less engines */
  kvCache: Readonly<KVState> | null;
  totalProcessedTokens: number;
  numNonBlankEntries: number;
  capacity: number;
  inGeneration: boolean;
}

/**
 * Prefill is complete once the cache has folded in every prompt token.
 * Engines without a cache can always start.
 */
export function canStartGeneration(
  promptTokens: ArrayLike<number>,
  kvCache: DecoderKVCache | null
): boolean {
  if (!kvCache) return true;
  return promptTokens.length === kvCache.totalProcessedTokens;
}

/**
 * Snapshot of the cache for the orchestration step.
 */
export function createKVStepOutput(kvCache: DecoderKVCache | null): KVStepOutput {
  if (!kvCache) {
    return {
      kvCache: null,
      totalProcessedTokens: 0,
      numNonBlankEntries: 0,
      capacity: 0,
      inGeneration: false,
    };
  }

  return {
    kvCache: kvCache.cachedInputs,
    totalProcessedTokens: kvCache.totalProcessedTokens,
    numNonBlankEntries: kvCache.numNonBlankEntries,
    capacity: kvCache.capacity,
    inGeneration: true,
  };
}
