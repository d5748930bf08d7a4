import { describe, expect, it } from 'vitest';
import { Tensor, broadcastIndex, dtypeFromCode, isDType } from '../src/registers/tensor.js';
import { attend, matmul, softmaxRows, transpose } from '../src/registers/linalg.js';
import { RegisterFile } from '../src/registers/file.js';
import { IdentityBaseline } from '../src/identity/baseline.js';
import { decodeTensor, encodeTensor } from '../src/codec/tensor.js';

describe('Tensor', () => {
  it('builds from rows and reports its shape', () => {
    const t = Tensor.matrix([
      [1, 2, 3],
      [4, 5, 6],
    ]);
    expect(t.shape).toEqual([2, 3]);
    expect(t.rank).toBe(2);
    expect(t.size).toBe(6);
    expect(t.at(4)).toBe(5);
    expect(t.toRows()).toEqual([
      [1, 2, 3],
      [4, 5, 6],
    ]);
  });

  it('rejects bad shapes and fills', () => {
    expect(() => Tensor.zeros([])).toThrowError('E_SHAPE_MISMATCH');
    expect(() => Tensor.zeros([2, -1])).toThrowError('E_SHAPE_MISMATCH');
    expect(() => Tensor.from([2, 2], [1, 2, 3])).toThrowError('3 values do not fill shape [2, 2]');
    expect(() => Tensor.matrix([[1, 2], [3]])).toThrowError('ragged matrix rows');
    expect(() => Tensor.zeros([2]).at(2)).toThrowError('E_SHAPE_MISMATCH');
  });

  it('truncates into integer storage', () => {
    expect(Tensor.from([3], [1.9, -2.5, 7], 'i32').toArray()).toEqual([1, -2, 7]);
  });

  it('broadcasts rows and columns in place', () => {
    const rows = Tensor.zeros([2, 3]).addInPlace(Tensor.from([3], [10, 20, 30]));
    expect(rows.toRows()).toEqual([
      [10, 20, 30],
      [10, 20, 30],
    ]);
    const cols = Tensor.zeros([2, 3]).addInPlace(Tensor.from([2, 1], [1, 2]));
    expect(cols.toRows()).toEqual([
      [1, 1, 1],
      [2, 2, 2],
    ]);
    const lead = Tensor.from([2, 2], [1, 2, 3, 4]).mulInPlace(Tensor.from([1, 2, 2], [2, 2, 2, 2]));
    expect(lead.toArray()).toEqual([2, 4, 6, 8]);
  });

  it('refuses incompatible broadcasts', () => {
    expect(() => broadcastIndex([2, 3], [2])).toThrowError('cannot broadcast [2] onto [2, 3]');
    expect(() => broadcastIndex([3], [2, 3])).toThrowError('E_SHAPE_MISMATCH');
  });

  it('reshapes only to the same element count', () => {
    const t = Tensor.from([2, 3], [1, 2, 3, 4, 5, 6]);
    expect(t.reshape([3, 2]).toRows()).toEqual([
      [1, 2],
      [3, 4],
      [5, 6],
    ]);
    expect(() => t.reshape([4])).toThrowError('cannot reshape 6 elements to [4]');
  });

  it('compares by dtype, shape and values', () => {
    const a = Tensor.from([2], [1, 2]);
    expect(a.equals(a.clone())).toBe(true);
    expect(a.equals(Tensor.from([2], [1, 2], 'f32'))).toBe(false);
    expect(a.equals(Tensor.from([2, 1], [1, 2]))).toBe(false);
  });

  it('knows its dtype codes', () => {
    expect(isDType('f32')).toBe(true);
    expect(isDType('u8')).toBe(false);
    expect(dtypeFromCode(2)).toBe('i32');
    expect(() => dtypeFromCode(3)).toThrowError('unknown tensor dtype code 3');
  });
});

describe('linear algebra', () => {
  it('multiplies and transposes matrices', () => {
    const a = Tensor.matrix([
      [1, 2],
      [3, 4],
    ]);
    const b = Tensor.matrix([
      [5, 6],
      [7, 8],
    ]);
    expect(matmul(a, b).toRows()).toEqual([
      [19, 22],
      [43, 50],
    ]);
    expect(transpose(Tensor.matrix([[1, 2, 3], [4, 5, 6]])).toRows()).toEqual([
      [1, 4],
      [2, 5],
      [3, 6],
    ]);
    expect(() => matmul(a, Tensor.zeros([3, 2]))).toThrowError('matmul inner dimensions differ: 2 vs 3');
  });

  it('normalises rows and leaves fully masked rows at zero', () => {
    const s = softmaxRows(Tensor.matrix([
      [0, 0],
      [-Infinity, -Infinity],
    ]));
    expect(s.toRows()).toEqual([
      [0.5, 0.5],
      [0, 0],
    ]);
    expect(softmaxRows(Tensor.from([2], [1, 1], 'i32')).dtype).toBe('f64');
  });

  it('averages values when every score ties', () => {
    const q = Tensor.zeros([2, 2]);
    const k = Tensor.zeros([2, 2]);
    const v = Tensor.matrix([
      [10, 20],
      [30, 40],
    ]);
    expect(attend(q, k, v).toRows()).toEqual([
      [20, 30],
      [20, 30],
    ]);
  });
});

describe('tensor codec', () => {
  it('carries dtype, shape and values', () => {
    const t = Tensor.from([2, 2], [1.5, -2, 0, 4], 'f32');
    const bytes = encodeTensor(t);
    expect(bytes).toHaveLength(2 + 8 + 16);
    expect(Array.from(bytes.subarray(0, 6))).toEqual([0, 2, 2, 0, 0, 0]);
    expect(decodeTensor(bytes).equals(t)).toBe(true);
  });

  it('rejects rank 0, short data and trailing bytes', () => {
    expect(() => decodeTensor(Uint8Array.of(1, 0))).toThrowError('tensor rank must be at least 1');
    expect(() => decodeTensor(Uint8Array.of(2, 1, 2, 0, 0, 0, 1, 0, 0, 0))).toThrowError('needs 8 bytes, have 4');
    const padded = new Uint8Array([...encodeTensor(Tensor.from([1], [7], 'i32')), 0]);
    expect(() => decodeTensor(padded)).toThrowError('1 trailing bytes after tensor');
  });
});

describe('RegisterFile', () => {
  const sizes = { general: 4, tensor: 2, context: 2 };

  it('bounds every bank', () => {
    const regs = new RegisterFile(sizes);
    expect(() => regs.get(4)).toThrowError('E_REGISTER_RANGE: R4 out of range (bank size 4)');
    expect(() => regs.getTensor(-1)).toThrowError('TR-1 out of range');
    expect(() => regs.setContext(2, null)).toThrowError('CR2 out of range');
  });

  it('separates empty slots from wrongly typed ones', () => {
    const regs = new RegisterFile(sizes);
    expect(() => regs.requireTensor(0)).toThrowError('TR0 is empty');
    regs.setContext(0, Uint8Array.of(1, 2));
    expect(() => regs.requireBaseline(0)).toThrowError('CR0 does not hold a baseline');
    expect(regs.requireBytes(0)).toEqual(Uint8Array.of(1, 2));
  });

  it('clones deeply and snapshots every bank', () => {
    const regs = new RegisterFile(sizes);
    regs.set(1, 2.5);
    regs.allocTensor(0, [2]).fill(3);
    regs.setContext(0, IdentityBaseline.derive(2, 1));
    regs.setContext(1, Uint8Array.of(9));

    const copy = regs.clone();
    copy.requireTensor(0).fill(0);
    copy.set(1, 0);
    expect(regs.requireTensor(0).toArray()).toEqual([3, 3]);
    expect(regs.get(1)).toBe(2.5);

    const snap = regs.snapshot();
    expect(snap.general).toEqual([0, 2.5, 0, 0]);
    expect(snap.tensor).toEqual([{ shape: [2], dtype: 'f64', data: [3, 3] }, null]);
    expect(snap.context[0]).toMatchObject({ kind: 'baseline', seed: 2, depth: 1 });
    expect(snap.context[1]).toEqual({ kind: 'bytes', bytes: [9] });

    regs.reset();
    expect(regs.snapshot()).toEqual({ general: [0, 0, 0, 0], tensor: [null, null], context: [null, null] });
  });
});
