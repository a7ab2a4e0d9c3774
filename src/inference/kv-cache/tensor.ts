/**
 * KV Tensor - host-side cache tensor
 *
 * Wraps a typed array with explicit dtype and shape metadata. Cache tensors
 * are row-major [batch, heads, sequence, hidden]; every helper here that
 * changes the sequence extent returns a fresh, contiguous tensor and never
 * aliases its input.
 *
 * @module inference/kv-cache/tensor
 */

import type { KVDtype } from '../../config/schema/kvcache.schema.js';
import { KV_TENSOR_RANK } from '../../config/schema/kvcache.schema.js';
import { createKVCacheError, ERROR_CODES } from '../../errors/kv-cache-error.js';
import { f32ToF16Array, f16ToF32Array } from './types.js';

export type KVTypedArray = Float32Array | Uint16Array | Int8Array | Uint8Array;

/**
 * A cache tensor with explicit dtype and shape.
 */
export interface KVTensor {
  readonly data: KVTypedArray;
  readonly dtype: KVDtype;
  readonly shape: readonly number[];
}

/** Half-open [start, end) range of sequence positions */
export type SequenceRange = readonly [start: number, end: number];

// ============================================================================
// Allocation
// ============================================================================

/**
 * Get bytes per element for dtype.
 */
export function dtypeBytes(dtype: KVDtype): number {
  switch (dtype) {
    case 'f32':
      return 4;
    case 'f16':
      return 2;
    case 'i8':
    case 'u8':
      return 1;
  }
}

/**
 * Allocate a zero-filled array for dtype. Zero is the all-zero bit
 * pattern for every supported dtype, f16 included.
 */
export function allocateKVData(dtype: KVDtype, length: number): KVTypedArray {
  switch (dtype) {
    case 'f32':
      return new Float32Array(length);
    case 'f16':
      return new Uint16Array(length);
    case 'i8':
      return new Int8Array(length);
    case 'u8':
      return new Uint8Array(length);
  }
}

/**
 * Infer dtype from the backing array type.
 */
export function dtypeOf(data: KVTypedArray): KVDtype {
  if (data instanceof Float32Array) return 'f32';
  if (data instanceof Uint16Array) return 'f16';
  if (data instanceof Int8Array) return 'i8';
  return 'u8';
}

export function elementCount(shape: readonly number[]): number {
  return shape.reduce((a, b) => a * b, 1);
}

/**
 * Total byte size of a tensor.
 */
export function tensorBytes(tensor: KVTensor): number {
  return elementCount(tensor.shape) * dtypeBytes(tensor.dtype);
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Create a tensor over existing data (no copy). Throws KV_INVALID_STATE
 * when the array type or length disagrees with dtype and shape.
 */
export function createKVTensor(
  data: KVTypedArray,
  shape: readonly number[],
  dtype: KVDtype = dtypeOf(data)
): KVTensor {
  const tensor: KVTensor = { data, dtype, shape: Object.freeze([...shape]) };
  assertKVTensor(tensor, 'createKVTensor');
  return tensor;
}

/**
 * Create a zero-filled tensor.
 */
export function zerosKVTensor(shape: readonly number[], dtype: KVDtype = 'f32'): KVTensor {
  return createKVTensor(allocateKVData(dtype, elementCount(shape)), shape, dtype);
}

/**
 * Create a tensor from plain numbers, converting to dtype storage
 * (f16 values are encoded to half-precision bits).
 */
export function fromValues(
  values: ArrayLike<number>,
  shape: readonly number[],
  dtype: KVDtype = 'f32'
): KVTensor {
  let data: KVTypedArray;
  switch (dtype) {
    case 'f16':
      data = f32ToF16Array(values);
      break;
    case 'f32':
      data = Float32Array.from(values);
      break;
    case 'i8':
      data = Int8Array.from(values);
      break;
    case 'u8':
      data = Uint8Array.from(values);
      break;
  }
  return createKVTensor(data, shape, dtype);
}

/**
 * Decode tensor contents to F32 (f16 bits are decoded).
 */
export function toFloat32(tensor: KVTensor): Float32Array {
  if (tensor.data instanceof Uint16Array && tensor.dtype === 'f16') {
    return f16ToF32Array(tensor.data);
  }
  return Float32Array.from(tensor.data);
}

/**
 * Deep copy into a fresh contiguous buffer. The shape is copied and
 * frozen too, so later edits to the caller's shape array do not reach it.
 */
export function cloneKVTensor(tensor: KVTensor): KVTensor {
  return { data: tensor.data.slice(), dtype: tensor.dtype, shape: Object.freeze([...tensor.shape]) };
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Assert a tensor is a well-formed rank-4 cache tensor.
 */
export function assertKVTensor(tensor: KVTensor, operation: string, label?: string): void {
  const tag = label ? ` (${label})` : '';

  if (tensor.shape.length !== KV_TENSOR_RANK) {
    throw createKVCacheError(
      ERROR_CODES.INVALID_STATE,
      `${operation}: expected ${KV_TENSOR_RANK}D tensor, got ${tensor.shape.length}D${tag}`
    );
  }
  for (let i = 0; i < tensor.shape.length; i++) {
    const dim = tensor.shape[i];
    if (!Number.isInteger(dim) || dim < 0) {
      throw createKVCacheError(
        ERROR_CODES.INVALID_STATE,
        `${operation}: invalid extent ${dim} at dim ${i}${tag}`
      );
    }
  }
  if (dtypeOf(tensor.data) !== tensor.dtype) {
    throw createKVCacheError(
      ERROR_CODES.INVALID_STATE,
      `${operation}: dtype ${tensor.dtype} does not match ${tensor.data.constructor.name}${tag}`
    );
  }
  const expected = elementCount(tensor.shape);
  if (tensor.data.length !== expected) {
    throw createKVCacheError(
      ERROR_CODES.INVALID_STATE,
      `${operation}: shape [${tensor.shape.join(', ')}] needs ${expected} elements, got ${tensor.data.length}${tag}`
    );
  }
}

/**
 * Check that two tensors agree on every dim except the sequence axis.
 */
export function sameNonSequenceDims(a: KVTensor, b: KVTensor, axis: number): boolean {
  if (a.shape.length !== b.shape.length) return false;
  for (let i = 0; i < a.shape.length; i++) {
    if (i !== axis && a.shape[i] !== b.shape[i]) return false;
  }
  return true;
}

// ============================================================================
// Sequence Axis Operations
// ============================================================================

/**
 * Extent of the sequence axis.
 */
export function sequenceLength(tensor: KVTensor, axis: number): number {
  return tensor.shape[axis];
}

function axisLayout(shape: readonly number[], axis: number): { outer: number; inner: number; seqLen: number } {
  return {
    outer: elementCount(shape.slice(0, axis)),
    inner: elementCount(shape.slice(axis + 1)),
    seqLen: shape[axis],
  };
}

/**
 * Copy the given sequence ranges, in order, into a new contiguous tensor.
 */
export function gatherSequence(
  tensor: KVTensor,
  axis: number,
  ranges: readonly SequenceRange[]
): KVTensor {
  const { outer, inner, seqLen } = axisLayout(tensor.shape, axis);

  let newSeqLen = 0;
  for (const [start, end] of ranges) {
    if (start < 0 || end > seqLen || start > end) {
      throw createKVCacheError(
        ERROR_CODES.INVALID_ARGUMENT,
        `gatherSequence: range [${start}, ${end}) outside sequence extent ${seqLen}`
      );
    }
    newSeqLen += end - start;
  }

  const shape = [...tensor.shape];
  shape[axis] = newSeqLen;
  const data = allocateKVData(tensor.dtype, outer * newSeqLen * inner);

  for (let o = 0; o < outer; o++) {
    let writeOffset = o * newSeqLen * inner;
    const rowBase = o * seqLen;
    for (const [start, end] of ranges) {
      if (end === start) continue;
      data.set(tensor.data.subarray((rowBase + start) * inner, (rowBase + end) * inner), writeOffset);
      writeOffset += (end - start) * inner;
    }
  }

  return { data, dtype: tensor.dtype, shape: Object.freeze(shape) };
}

/**
 * Slice [start, end) of the sequence axis into a new tensor.
 */
export function sliceSequence(tensor: KVTensor, axis: number, start: number, end?: number): KVTensor {
  return gatherSequence(tensor, axis, [[start, end ?? sequenceLength(tensor, axis)]]);
}

/**
 * Prepend `count` zero entries at sequence index 0.
 */
export function padSequenceFront(tensor: KVTensor, axis: number, count: number): KVTensor {
  const { outer, inner, seqLen } = axisLayout(tensor.shape, axis);
  const newSeqLen = seqLen + count;

  const shape = [...tensor.shape];
  shape[axis] = newSeqLen;
  const data = allocateKVData(tensor.dtype, outer * newSeqLen * inner);

  for (let o = 0; o < outer; o++) {
    const src = tensor.data.subarray(o * seqLen * inner, (o + 1) * seqLen * inner);
    data.set(src, (o * newSeqLen + count) * inner);
  }

  return { data, dtype: tensor.dtype, shape: Object.freeze(shape) };
}

/**
 * Read one sequence position as plain numbers, in [batch, heads, hidden]
 * order. Used for inspection and tests.
 */
export function readSequenceEntry(tensor: KVTensor, axis: number, position: number): number[] {
  const entry = sliceSequence(tensor, axis, position, position + 1);
  return Array.from(entry.data);
}
