import { ShapeMismatchError } from '../errors.js';
import { Tensor } from './tensor.js';

function dims2(t: Tensor, what: string): [number, number] {
  if (t.rank !== 2) throw new ShapeMismatchError(`${what} needs a 2-D tensor, got rank ${t.rank}`);
  return [t.shape[0], t.shape[1]];
}

/** Rows and row width, treating a 1-D tensor as a single row. */
export function rowView(t: Tensor): [number, number] {
  const cols = t.shape[t.rank - 1];
  return [cols === 0 ? 0 : t.size / cols, cols];
}

export function matmul(a: Tensor, b: Tensor): Tensor {
  const [n, k] = dims2(a, 'matmul');
  const [k2, m] = dims2(b, 'matmul');
  if (k !== k2) throw new ShapeMismatchError(`matmul inner dimensions differ: ${k} vs ${k2}`);
  const out = Tensor.zeros([n, m], a.dtype);
  const x = a.data;
  const y = b.data;
  const z = out.data;
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < m; j++) {
      let acc = 0;
      for (let p = 0; p < k; p++) acc += x[i * k + p] * y[p * m + j];
      z[i * m + j] = acc;
    }
  }
  return out;
}

export function transpose(t: Tensor): Tensor {
  const [rows, cols] = dims2(t, 'transpose');
  const out = Tensor.zeros([cols, rows], t.dtype);
  for (let i = 0; i < rows; i++) {
    for (let j = 0; j < cols; j++) out.data[j * rows + i] = t.data[i * cols + j];
  }
  return out;
}

export function softmaxRows(t: Tensor): Tensor {
  const out = Tensor.zeros(t.shape, t.dtype === 'i32' ? 'f64' : t.dtype);
  const [rows, cols] = rowView(t);
  for (let r = 0; r < rows; r++) {
    const base = r * cols;
    let max = -Infinity;
    for (let c = 0; c < cols; c++) max = Math.max(max, t.data[base + c]);
    // fully masked row
    if (max === -Infinity) continue;
    let sum = 0;
    for (let c = 0; c < cols; c++) {
      const e = Math.exp(t.data[base + c] - max);
      out.data[base + c] = e;
      sum += e;
    }
    for (let c = 0; c < cols; c++) out.data[base + c] /= sum;
  }
  return out;
}

/** Scaled dot-product scores `QKᵀ/√d`. */
export function scores(q: Tensor, k: Tensor): Tensor {
  const [, d] = dims2(q, 'attention query');
  const s = matmul(q, transpose(k));
  return s.scaleInPlace(d > 0 ? 1 / Math.sqrt(d) : 1);
}

export function attend(q: Tensor, k: Tensor, v: Tensor): Tensor {
  return matmul(softmaxRows(scores(q, k)), v);
}
