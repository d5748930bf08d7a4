import { DecodeError, ShapeMismatchError } from '../errors.js';

export type DType = 'f32' | 'f64' | 'i32';
export type TensorData = Float32Array | Float64Array | Int32Array;

export const DTYPES: readonly DType[] = ['f32', 'f64', 'i32'];

/** Largest element count a single tensor may hold. */
export const MAX_TENSOR_ELEMENTS = 1 << 24;

function allocate(dtype: DType, size: number): TensorData {
  switch (dtype) {
    case 'f32':
      return new Float32Array(size);
    case 'f64':
      return new Float64Array(size);
    case 'i32':
      return new Int32Array(size);
  }
}

export function shapeSize(shape: readonly number[]): number {
  return shape.reduce((n, d) => n * d, 1);
}

function checkShape(shape: readonly number[]): void {
  if (shape.length === 0 || shape.some((d) => !Number.isInteger(d) || d < 0)) {
    throw new ShapeMismatchError(`invalid shape [${shape.join(', ')}]`);
  }
  const size = shapeSize(shape);
  if (size > MAX_TENSOR_ELEMENTS) {
    throw new ShapeMismatchError(`shape [${shape.join(', ')}] holds ${size} elements, limit is ${MAX_TENSOR_ELEMENTS}`, {
      size,
      limit: MAX_TENSOR_ELEMENTS,
    });
  }
}

function sameShape(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((d, i) => d === b[i]);
}

/**
 * Dense row-major tensor. The buffer is owned by whoever holds the tensor; in-place operations
 * write into it and never reallocate.
 */
export class Tensor {
  private dims: number[];

  private constructor(
    readonly dtype: DType,
    shape: readonly number[],
    private readonly buffer: TensorData,
  ) {
    this.dims = [...shape];
  }

  static zeros(shape: readonly number[], dtype: DType = 'f64'): Tensor {
    checkShape(shape);
    return new Tensor(dtype, shape, allocate(dtype, shapeSize(shape)));
  }

  static from(shape: readonly number[], values: ArrayLike<number>, dtype: DType = 'f64'): Tensor {
    checkShape(shape);
    const size = shapeSize(shape);
    if (values.length !== size) {
      throw new ShapeMismatchError(`${values.length} values do not fill shape [${shape.join(', ')}]`);
    }
    const buffer = allocate(dtype, size);
    buffer.set(Array.from(values));
    return new Tensor(dtype, shape, buffer);
  }

  /** 2-D tensor from nested rows. */
  static matrix(rows: readonly (readonly number[])[], dtype: DType = 'f64'): Tensor {
    const cols = rows.length ? rows[0].length : 0;
    if (rows.some((row) => row.length !== cols)) throw new ShapeMismatchError('ragged matrix rows');
    return Tensor.from([rows.length, cols], rows.flat(), dtype);
  }

  get shape(): readonly number[] {
    return this.dims;
  }

  get rank(): number {
    return this.dims.length;
  }

  get size(): number {
    return this.buffer.length;
  }

  get data(): TensorData {
    return this.buffer;
  }

  at(flat: number): number {
    if (!Number.isInteger(flat) || flat < 0 || flat >= this.buffer.length) {
      throw new ShapeMismatchError(`index ${flat} outside tensor of ${this.buffer.length} elements`);
    }
    return this.buffer[flat];
  }

  toArray(): number[] {
    return Array.from(this.buffer);
  }

  /** Nested rows for 2-D tensors; a 1-D tensor is one row. */
  toRows(): number[][] {
    const cols = this.dims[this.dims.length - 1];
    const out: number[][] = [];
    for (let offset = 0; offset < this.buffer.length; offset += cols) {
      out.push(Array.from(this.buffer.subarray(offset, offset + cols)));
    }
    return out;
  }

  clone(): Tensor {
    return new Tensor(this.dtype, this.dims, this.buffer.slice());
  }

  equals(other: Tensor): boolean {
    if (this.dtype !== other.dtype || !sameShape(this.dims, other.dims)) return false;
    for (let i = 0; i < this.buffer.length; i++) {
      if (!Object.is(this.buffer[i], other.buffer[i])) return false;
    }
    return true;
  }

  fill(value: number): this {
    this.buffer.fill(value);
    return this;
  }

  scaleInPlace(factor: number): this {
    for (let i = 0; i < this.buffer.length; i++) this.buffer[i] *= factor;
    return this;
  }

  addInPlace(src: Tensor): this {
    return this.zipInPlace(src, (a, b) => a + b);
  }

  subInPlace(src: Tensor): this {
    return this.zipInPlace(src, (a, b) => a - b);
  }

  mulInPlace(src: Tensor): this {
    return this.zipInPlace(src, (a, b) => a * b);
  }

  reshape(shape: readonly number[]): this {
    checkShape(shape);
    if (shapeSize(shape) !== this.buffer.length) {
      throw new ShapeMismatchError(`cannot reshape ${this.buffer.length} elements to [${shape.join(', ')}]`);
    }
    this.dims = [...shape];
    return this;
  }

  private zipInPlace(src: Tensor, op: (a: number, b: number) => number): this {
    const index = broadcastIndex(this.dims, src.dims);
    for (let i = 0; i < this.buffer.length; i++) {
      this.buffer[i] = op(this.buffer[i], src.buffer[index(i)]);
    }
    return this;
  }
}

/**
 * Maps a flat destination index to the flat source index under right-aligned broadcasting.
 * Source dimensions must equal the destination's or be 1; surplus leading source dimensions must
 * be 1.
 */
export function broadcastIndex(dst: readonly number[], src: readonly number[]): (flat: number) => number {
  if (sameShape(dst, src)) return (flat) => flat;
  const mismatch = (): ShapeMismatchError =>
    new ShapeMismatchError(`cannot broadcast [${src.join(', ')}] onto [${dst.join(', ')}]`, {
      dst: dst.join('x'),
      src: src.join('x'),
    });
  const lead = src.length - dst.length;
  for (let i = 0; i < lead; i++) {
    if (src[i] !== 1) throw mismatch();
  }
  const aligned = lead > 0 ? src.slice(lead) : src;
  const offset = dst.length - aligned.length;
  aligned.forEach((d, i) => {
    if (d !== 1 && d !== dst[offset + i]) throw mismatch();
  });

  const strides: number[] = new Array<number>(aligned.length).fill(0);
  let stride = 1;
  for (let i = aligned.length - 1; i >= 0; i--) {
    strides[i] = aligned[i] === 1 ? 0 : stride;
    stride *= aligned[i];
  }
  return (flat) => {
    let rest = flat;
    let out = 0;
    for (let axis = dst.length - 1; axis >= offset; axis--) {
      const coord = rest % dst[axis];
      rest = Math.floor(rest / dst[axis]);
      out += coord * strides[axis - offset];
    }
    return out;
  };
}

export function isDType(value: unknown): value is DType {
  return typeof value === 'string' && DTYPES.some((d) => d === value);
}

export function dtypeCode(dtype: DType): number {
  return DTYPES.indexOf(dtype);
}

export function dtypeFromCode(code: number): DType {
  const dtype = DTYPES[code];
  if (dtype === undefined) throw new DecodeError(`unknown tensor dtype code ${code}`, { code });
  return dtype;
}
