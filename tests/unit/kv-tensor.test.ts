import { describe, expect, it } from 'vitest';

import {
  cloneKVTensor,
  createKVTensor,
  dtypeBytes,
  fromValues,
  gatherSequence,
  padSequenceFront,
  readSequenceEntry,
  sliceSequence,
  tensorBytes,
  toFloat32,
  zerosKVTensor,
} from '../../src/inference/kv-cache/tensor.js';
import { f16ToF32Bits, f32ToF16Bits } from '../../src/inference/kv-cache/types.js';
import { ERROR_CODES } from '../../src/errors/kv-cache-error.js';
import { catchError } from './kv-fixtures.js';

function counting(shape: number[]) {
  const length = shape.reduce((a, b) => a * b, 1);
  return createKVTensor(Float32Array.from({ length }, (_, i) => i), shape);
}

describe('inference/kv-cache/tensor', () => {
  describe('construction', () => {
    it('infers dtype from the backing array', () => {
      expect(createKVTensor(new Float32Array(4), [1, 1, 2, 2]).dtype).toBe('f32');
      expect(createKVTensor(new Uint16Array(4), [1, 1, 2, 2]).dtype).toBe('f16');
      expect(createKVTensor(new Int8Array(4), [1, 1, 2, 2]).dtype).toBe('i8');
      expect(createKVTensor(new Uint8Array(4), [1, 1, 2, 2]).dtype).toBe('u8');
    });

    it('allocates zeros for every dtype', () => {
      const t = zerosKVTensor([1, 2, 3, 4], 'f16');
      expect(t.data).toBeInstanceOf(Uint16Array);
      expect(t.data.length).toBe(24);
      expect(Array.from(t.data).every((v) => v === 0)).toBe(true);
      expect(zerosKVTensor([1, 1, 2, 2], 'i8').data).toBeInstanceOf(Int8Array);
    });

    it('reports byte sizes', () => {
      expect(dtypeBytes('f32')).toBe(4);
      expect(dtypeBytes('f16')).toBe(2);
      expect(dtypeBytes('u8')).toBe(1);
      expect(tensorBytes(zerosKVTensor([1, 2, 3, 4], 'f16'))).toBe(48);
    });

    it('encodes f16 values and decodes them back', () => {
      const t = fromValues([1.5, -2], [1, 1, 2, 1], 'f16');
      expect(Array.from(t.data)).toEqual([0x3e00, 0xc000]);
      expect(Array.from(toFloat32(t))).toEqual([1.5, -2]);
      expect(f16ToF32Bits(f32ToF16Bits(0.25))).toBe(0.25);
    });

    it('clones into a separate buffer', () => {
      const t = counting([1, 1, 2, 2]);
      const copy = cloneKVTensor(t);
      expect(copy.data).not.toBe(t.data);
      expect(Array.from(copy.data)).toEqual([0, 1, 2, 3]);
      expect(copy.shape).toEqual([1, 1, 2, 2]);
    });
  });

  describe('validation', () => {
    it('rejects a length that disagrees with the shape', () => {
      expect(catchError(() => createKVTensor(new Float32Array(3), [1, 1, 2, 2]))).toMatchObject({
        code: ERROR_CODES.INVALID_STATE,
      });
    });

    it('rejects tensors that are not rank 4', () => {
      expect(catchError(() => createKVTensor(new Float32Array(4), [1, 2, 2]))).toMatchObject({
        code: ERROR_CODES.INVALID_STATE,
      });
    });

    it('rejects negative or fractional extents', () => {
      expect(catchError(() => createKVTensor(new Float32Array(0), [1, 1, -1, 2]))).toMatchObject({
        code: ERROR_CODES.INVALID_STATE,
      });
      expect(catchError(() => createKVTensor(new Float32Array(0), [1, 1, 0.5, 2]))).toMatchObject({
        code: ERROR_CODES.INVALID_STATE,
      });
    });

    it('rejects a dtype the array cannot hold', () => {
      expect(catchError(() => createKVTensor(new Float32Array(4), [1, 1, 2, 2], 'f16'))).toMatchObject({
        code: ERROR_CODES.INVALID_STATE,
      });
    });

    it('accepts an empty sequence axis', () => {
      expect(createKVTensor(new Float32Array(0), [1, 2, 0, 4]).shape).toEqual([1, 2, 0, 4]);
    });
  });

  describe('sequence axis', () => {
    it('gathers ranges per outer row', () => {
      const t = counting([2, 1, 3, 2]);
      const out = gatherSequence(t, 2, [[0, 1], [2, 3]]);
      expect(out.shape).toEqual([2, 1, 2, 2]);
      expect(Array.from(out.data)).toEqual([0, 1, 4, 5, 6, 7, 10, 11]);
    });

    it('gathers along a non-default axis', () => {
      const t = counting([1, 3, 2, 1]);
      const out = gatherSequence(t, 1, [[1, 3]]);
      expect(out.shape).toEqual([1, 2, 2, 1]);
      expect(Array.from(out.data)).toEqual([2, 3, 4, 5]);
    });

    it('gathers nothing into an empty tensor', () => {
      const out = gatherSequence(counting([2, 1, 3, 2]), 2, []);
      expect(out.shape).toEqual([2, 1, 0, 2]);
      expect(out.data.length).toBe(0);
    });

    it('never aliases the source', () => {
      const t = counting([1, 1, 3, 2]);
      const out = gatherSequence(t, 2, [[0, 3]]);
      t.data.fill(-1);
      expect(Array.from(out.data)).toEqual([0, 1, 2, 3, 4, 5]);
    });

    it('rejects ranges outside the extent', () => {
      const t = counting([2, 1, 3, 2]);
      expect(catchError(() => gatherSequence(t, 2, [[0, 4]]))).toMatchObject({
        code: ERROR_CODES.INVALID_ARGUMENT,
      });
      expect(catchError(() => gatherSequence(t, 2, [[2, 1]]))).toMatchObject({
        code: ERROR_CODES.INVALID_ARGUMENT,
      });
    });

    it('slices to the end by default', () => {
      const out = sliceSequence(counting([2, 1, 3, 2]), 2, 1);
      expect(out.shape).toEqual([2, 1, 2, 2]);
      expect(Array.from(out.data)).toEqual([2, 3, 4, 5, 8, 9, 10, 11]);
    });

    it('pads zeros at the front of every row', () => {
      const out = padSequenceFront(counting([2, 1, 3, 2]), 2, 1);
      expect(out.shape).toEqual([2, 1, 4, 2]);
      expect(Array.from(out.data)).toEqual([0, 0, 0, 1, 2, 3, 4, 5, 0, 0, 6, 7, 8, 9, 10, 11]);
    });

    it('keeps f16 storage when padding', () => {
      const out = padSequenceFront(fromValues([0.5, 1.5], [1, 1, 2, 1], 'f16'), 2, 2);
      expect(out.dtype).toBe('f16');
      expect(Array.from(toFloat32(out))).toEqual([0, 0, 0.5, 1.5]);
    });

    it('reads one position across rows', () => {
      expect(readSequenceEntry(counting([2, 1, 3, 2]), 2, 1)).toEqual([2, 3, 8, 9]);
    });
  });
});
