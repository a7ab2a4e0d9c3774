/**
 * KV Cache Errors
 *
 * Coded errors for cache sessions. Every failure is a deterministic
 * function of caller-supplied state; nothing here is retried.
 *
 * @module errors/kv-cache-error
 */

export const ERROR_CODES = {
  /** `id` read, or mutation attempted, before setup */
  SESSION_NOT_CONFIGURED: 'KV_SESSION_NOT_CONFIGURED',
  /** Tensor mapping is malformed (names, rank, dtype, extents) */
  INVALID_STATE: 'KV_INVALID_STATE',
  /** Scalar argument out of range */
  INVALID_ARGUMENT: 'KV_INVALID_ARGUMENT',
  /** Cached tensors disagree on capacity */
  CAPACITY_MISMATCH: 'KV_CAPACITY_MISMATCH',
  /** Operation not supported in this direction or backend */
  UNSUPPORTED_OPERATION: 'KV_UNSUPPORTED_OPERATION',
  /** Native buffer could not be acquired during setup */
  NATIVE_ACQUIRE_FAILED: 'KV_NATIVE_ACQUIRE_FAILED',
  SESSION_EXISTS: 'KV_SESSION_EXISTS',
  SESSION_NOT_FOUND: 'KV_SESSION_NOT_FOUND',
  SESSION_BUSY: 'KV_SESSION_BUSY',
  POOL_EXHAUSTED: 'KV_POOL_EXHAUSTED',
} as const;

export type KVCacheErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export type KVCacheError = Error & {
  code: KVCacheErrorCode;
  details?: Record<string, unknown>;
};

/**
 * Create a coded error. `details` carries structured context for logs;
 * a `cause` entry is also set as the standard Error cause.
 */
export function createKVCacheError(
  code: KVCacheErrorCode,
  message: string,
  details?: Record<string, unknown>
): KVCacheError {
  const options = details && 'cause' in details ? { cause: details.cause } : undefined;
  const error = new Error(`[${code}] ${message}`, options);
  return Object.assign(error, { code, details });
}

/**
 * Type guard for coded errors, optionally narrowed to one code.
 */
export function isKVCacheError(error: unknown, code?: KVCacheErrorCode): error is KVCacheError {
  if (!(error instanceof Error) || !('code' in error)) return false;
  const { code: actual } = error;
  if (typeof actual !== 'string' || !actual.startsWith('KV_')) return false;
  return code === undefined || actual === code;
}
