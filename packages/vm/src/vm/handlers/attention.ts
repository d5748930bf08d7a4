import { ShapeMismatchError } from '../../errors.js';
import type { AttentionOp } from '../../opcodes/domains.js';
import { attend, rowView, scores, softmaxRows } from '../../registers/linalg.js';
import { Tensor } from '../../registers/tensor.js';
import type { AttentionCapability, HandlerTable } from '../capabilities.js';
import { fractional } from './tensor.js';

function topK(src: Tensor, k: number): Tensor {
  const out = Tensor.zeros(src.shape, src.dtype);
  const [rows, cols] = rowView(src);
  for (let r = 0; r < rows; r++) {
    const base = r * cols;
    const order = Array.from({ length: cols }, (_, c) => c).sort(
      (a, b) => src.data[base + b] - src.data[base + a] || a - b,
    );
    for (const c of order.slice(0, Math.max(0, k))) out.data[base + c] = src.data[base + c];
  }
  return out;
}

function argmax(src: Tensor): number {
  if (src.size === 0) throw new ShapeMismatchError('argmax of an empty tensor');
  let best = 0;
  for (let i = 1; i < src.size; i++) if (src.data[i] > src.data[best]) best = i;
  return best;
}

function weigh(w: Tensor, v: Tensor): Tensor {
  const [rows, cols] = rowView(v);
  if (w.size !== rows) throw new ShapeMismatchError(`${w.size} weights for ${rows} value rows`);
  const out = Tensor.zeros([cols], fractional(v.dtype));
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) out.data[c] += w.data[r] * v.data[r * cols + c];
  }
  return out;
}

/** Entropy in nats of the values normalised to sum to 1; non-positive entries contribute nothing. */
function entropy(src: Tensor): number {
  let total = 0;
  for (let i = 0; i < src.size; i++) if (src.data[i] > 0) total += src.data[i];
  if (total === 0) return 0;
  let h = 0;
  for (let i = 0; i < src.size; i++) {
    const p = src.data[i] / total;
    if (p > 0) h -= p * Math.log(p);
  }
  return h;
}

export const ATTENTION_HANDLERS: HandlerTable<AttentionOp, AttentionCapability> = {
  A_ROUTE: ({ registers, stage }, [q, k, v, dst]) => {
    stage.setTensor(dst, attend(registers.requireTensor(q), registers.requireTensor(k), registers.requireTensor(v)));
  },
  A_SELF: ({ registers, stage }, [dst, src]) => {
    const x = registers.requireTensor(src);
    stage.setTensor(dst, attend(x, x, x));
  },
  A_SCORE: ({ registers, stage }, [dst, q, k]) => {
    stage.setTensor(dst, scores(registers.requireTensor(q), registers.requireTensor(k)));
  },
  A_SOFTMAX: ({ registers, stage }, [dst, src]) => {
    stage.setTensor(dst, softmaxRows(registers.requireTensor(src)));
  },
  A_MASK: ({ registers, stage }, [dst]) => {
    const t = registers.requireTensor(dst);
    if (t.rank !== 2) throw new ShapeMismatchError(`causal mask needs a 2-D tensor, got rank ${t.rank}`);
    if (t.dtype === 'i32') throw new ShapeMismatchError('causal mask needs a floating-point tensor');
    const [rows, cols] = [t.shape[0], t.shape[1]];
    stage.mutateTensor(dst, (m) => {
      for (let i = 0; i < rows; i++) {
        for (let j = i + 1; j < cols; j++) m.data[i * cols + j] = -Infinity;
      }
    });
  },
  A_TOPK: ({ registers, stage }, [dst, src, k]) => {
    stage.setTensor(dst, topK(registers.requireTensor(src), k));
  },
  A_ARGMAX: ({ registers, stage }, [dst, src]) => {
    stage.setScalar(dst, argmax(registers.requireTensor(src)));
  },
  A_WEIGHT: ({ registers, stage }, [dst, w, v]) => {
    stage.setTensor(dst, weigh(registers.requireTensor(w), registers.requireTensor(v)));
  },
  A_GATE: ({ registers, stage }, [dst, src, threshold]) => {
    const out = registers.requireTensor(src).clone();
    for (let i = 0; i < out.size; i++) if (out.data[i] < threshold) out.data[i] = 0;
    stage.setTensor(dst, out);
  },
  A_ENTROPY: ({ registers, stage }, [dst, src]) => {
    stage.setScalar(dst, entropy(registers.requireTensor(src)));
  },
  A_MERGE: ({ registers, stage }, [dst, a, b, alpha]) => {
    const lhs = registers.requireTensor(a);
    const out = Tensor.from(lhs.shape, lhs.data, fractional(lhs.dtype)).scaleInPlace(alpha);
    const rhs = registers.requireTensor(b);
    out.addInPlace(Tensor.from(rhs.shape, rhs.data, out.dtype).scaleInPlace(1 - alpha));
    stage.setTensor(dst, out);
  },
  A_SELECT: ({ registers, stage }, [dst, src, row]) => {
    const t = registers.requireTensor(src);
    const index = registers.get(row);
    const [rows, cols] = rowView(t);
    if (!Number.isInteger(index) || index < 0 || index >= rows) {
      throw new ShapeMismatchError(`row ${index} outside ${rows} rows`, { row: index, rows });
    }
    stage.setTensor(dst, Tensor.from([cols], t.data.subarray(index * cols, (index + 1) * cols), t.dtype));
  },
};
