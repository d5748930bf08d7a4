import { DecodeError, ShapeMismatchError } from '../../errors.js';
import type { TensorOp } from '../../opcodes/domains.js';
import { matmul, rowView, transpose } from '../../registers/linalg.js';
import { Tensor, broadcastIndex, shapeSize } from '../../registers/tensor.js';
import type { DType } from '../../registers/tensor.js';
import type { HandlerTable, TensorCapability } from '../capabilities.js';

export function badMode(mnemonic: string, mode: number): DecodeError {
  return new DecodeError(`${mnemonic} has no mode ${mode}`, { mnemonic, mode });
}

/** `[rows, cols]`, or `[rows]` when cols is 0. */
export function shapeOf(rows: number, cols: number): number[] {
  return cols === 0 ? [rows] : [rows, cols];
}

/** Integer tensors become f64 when an operation produces fractions. */
export function fractional(dtype: DType): DType {
  return dtype === 'i32' ? 'f64' : dtype;
}

function norm(values: ArrayLike<number>, mode: number): number {
  if (mode < 0 || mode > 2) throw badMode('T_NORM', mode);
  let acc = 0;
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (mode === 0) acc += Math.abs(v);
    else if (mode === 1) acc += v * v;
    else acc = Math.max(acc, Math.abs(v));
  }
  return mode === 1 ? Math.sqrt(acc) : acc;
}

function reduce(src: Tensor, mode: number): number {
  if (mode < 0 || mode > 3) throw badMode('T_REDUCE', mode);
  const data = src.data;
  let sum = 0;
  for (let i = 0; i < data.length; i++) sum += data[i];
  if (mode === 0) return sum;
  if (data.length === 0) throw new ShapeMismatchError('cannot reduce an empty tensor');
  if (mode === 1) return sum / data.length;
  let best = data[0];
  for (let i = 1; i < data.length; i++) best = mode === 2 ? Math.max(best, data[i]) : Math.min(best, data[i]);
  return best;
}

function concatRows(a: Tensor, b: Tensor): Tensor {
  const [ra, ca] = rowView(a);
  const [rb, cb] = rowView(b);
  if (ca !== cb) throw new ShapeMismatchError(`cannot stack rows of width ${ca} and ${cb}`);
  return Tensor.from([ra + rb, ca], [...a.data, ...b.data], a.dtype);
}

function compose(a: Tensor, b: Tensor, mode: number): Tensor {
  switch (mode) {
    case 0:
      return a.clone().addInPlace(b);
    case 1:
      return a.clone().mulInPlace(b);
    case 2: {
      if (a.size !== b.size) throw new ShapeMismatchError(`dot product of ${a.size} and ${b.size} elements`);
      let acc = 0;
      for (let i = 0; i < a.size; i++) acc += a.data[i] * b.data[i];
      return Tensor.from([1], [acc], a.dtype);
    }
    case 3:
      return concatRows(a, b);
    default:
      throw badMode('T_COMPOSE', mode);
  }
}

export const TENSOR_HANDLERS: HandlerTable<TensorOp, TensorCapability> = {
  T_ALLOC: ({ stage }, [dst, rows, cols]) => {
    stage.setTensor(dst, Tensor.zeros(shapeOf(rows, cols)));
  },
  T_FILL: ({ stage }, [dst, value]) => {
    stage.mutateTensor(dst, (t) => t.fill(value));
  },
  T_COPY: ({ registers, stage }, [dst, src]) => {
    stage.setTensor(dst, registers.requireTensor(src).clone());
  },
  T_ADD: ({ registers, stage }, [dst, src]) => {
    const rhs = registers.requireTensor(src);
    broadcastIndex(registers.requireTensor(dst).shape, rhs.shape);
    stage.mutateTensor(dst, (t) => t.addInPlace(rhs));
  },
  T_SUB: ({ registers, stage }, [dst, src]) => {
    const rhs = registers.requireTensor(src);
    broadcastIndex(registers.requireTensor(dst).shape, rhs.shape);
    stage.mutateTensor(dst, (t) => t.subInPlace(rhs));
  },
  T_MUL: ({ registers, stage }, [dst, src]) => {
    const rhs = registers.requireTensor(src);
    broadcastIndex(registers.requireTensor(dst).shape, rhs.shape);
    stage.mutateTensor(dst, (t) => t.mulInPlace(rhs));
  },
  T_SCALE: ({ stage }, [dst, factor]) => {
    stage.mutateTensor(dst, (t) => t.scaleInPlace(factor));
  },
  T_MATMUL: ({ registers, stage }, [dst, a, b]) => {
    stage.setTensor(dst, matmul(registers.requireTensor(a), registers.requireTensor(b)));
  },
  T_TRANSPOSE: ({ registers, stage }, [dst, src]) => {
    stage.setTensor(dst, transpose(registers.requireTensor(src)));
  },
  T_RESHAPE: ({ registers, stage }, [dst, rows, cols]) => {
    const shape = shapeOf(rows, cols);
    const size = registers.requireTensor(dst).size;
    if (shape.some((d) => d < 0) || shapeSize(shape) !== size) {
      throw new ShapeMismatchError(`cannot reshape ${size} elements to [${shape.join(', ')}]`);
    }
    stage.mutateTensor(dst, (t) => t.reshape(shape));
  },
  T_NORM: ({ registers, stage }, [dst, src, mode]) => {
    const input = registers.requireTensor(src);
    const n = norm(input.data, mode);
    const out = Tensor.from(input.shape, input.data, fractional(input.dtype));
    stage.setTensor(dst, n === 0 ? out : out.scaleInPlace(1 / n));
  },
  T_COMPOSE: ({ registers, stage }, [dst, a, b, mode]) => {
    stage.setTensor(dst, compose(registers.requireTensor(a), registers.requireTensor(b), mode));
  },
  T_REDUCE: ({ registers, stage }, [dst, src, mode]) => {
    stage.setScalar(dst, reduce(registers.requireTensor(src), mode));
  },
  T_FREE: ({ stage }, [dst]) => {
    stage.setTensor(dst, null);
  },
};
