import type { RegisterSizes } from '../config.js';
import { DecodeError, RegisterOutOfRangeError } from '../errors.js';
import { IdentityBaseline } from '../identity/baseline.js';
import { Tensor } from './tensor.js';
import type { DType } from './tensor.js';

export type ContextValue = IdentityBaseline | Uint8Array;

export type TensorSnapshot = { shape: number[]; dtype: DType; data: number[] };
export type ContextSnapshot =
  | { kind: 'baseline'; seed: number; depth: number; fingerprint: string }
  | { kind: 'bytes'; bytes: number[] };

export interface RegisterSnapshot {
  general: number[];
  tensor: (TensorSnapshot | null)[];
  context: (ContextSnapshot | null)[];
}

/** Three fixed-size banks: scalars, tensors and context slots (baselines or raw bytes). */
export class RegisterFile {
  private general: Float64Array;
  private tensors: (Tensor | null)[];
  private contexts: (ContextValue | null)[];

  constructor(readonly sizes: Readonly<RegisterSizes>) {
    this.general = new Float64Array(sizes.general);
    this.tensors = new Array<Tensor | null>(sizes.tensor).fill(null);
    this.contexts = new Array<ContextValue | null>(sizes.context).fill(null);
  }

  checkGeneral(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.sizes.general) {
      throw new RegisterOutOfRangeError('R', index, this.sizes.general);
    }
  }

  checkTensor(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.sizes.tensor) {
      throw new RegisterOutOfRangeError('TR', index, this.sizes.tensor);
    }
  }

  checkContext(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.sizes.context) {
      throw new RegisterOutOfRangeError('CR', index, this.sizes.context);
    }
  }

  get(index: number): number {
    this.checkGeneral(index);
    return this.general[index];
  }

  set(index: number, value: number): void {
    this.checkGeneral(index);
    this.general[index] = value;
  }

  getTensor(index: number): Tensor | null {
    this.checkTensor(index);
    return this.tensors[index];
  }

  requireTensor(index: number): Tensor {
    const tensor = this.getTensor(index);
    if (!tensor) throw new DecodeError(`TR${index} is empty`, { register: index });
    return tensor;
  }

  setTensor(index: number, tensor: Tensor | null): void {
    this.checkTensor(index);
    this.tensors[index] = tensor;
  }

  allocTensor(index: number, shape: readonly number[], dtype: DType = 'f64'): Tensor {
    this.checkTensor(index);
    const tensor = Tensor.zeros(shape, dtype);
    this.tensors[index] = tensor;
    return tensor;
  }

  getContext(index: number): ContextValue | null {
    this.checkContext(index);
    return this.contexts[index];
  }

  setContext(index: number, value: ContextValue | null): void {
    this.checkContext(index);
    this.contexts[index] = value;
  }

  requireBaseline(index: number): IdentityBaseline {
    const value = this.getContext(index);
    if (!(value instanceof IdentityBaseline)) {
      throw new DecodeError(`CR${index} does not hold a baseline`, { register: index });
    }
    return value;
  }

  requireBytes(index: number): Uint8Array {
    const value = this.getContext(index);
    if (!(value instanceof Uint8Array)) {
      throw new DecodeError(`CR${index} does not hold bytes`, { register: index });
    }
    return value;
  }

  /** Independent copy: scalars and tensors are duplicated, baselines are shared (immutable). */
  clone(): RegisterFile {
    const copy = new RegisterFile(this.sizes);
    copy.general.set(this.general);
    copy.tensors = this.tensors.map((t) => (t ? t.clone() : null));
    copy.contexts = this.contexts.map((c) => (c instanceof Uint8Array ? c.slice() : c));
    return copy;
  }

  reset(): void {
    this.general.fill(0);
    this.tensors.fill(null);
    this.contexts.fill(null);
  }

  snapshot(): RegisterSnapshot {
    return {
      general: Array.from(this.general),
      tensor: this.tensors.map((t): TensorSnapshot | null => (t ? { shape: [...t.shape], dtype: t.dtype, data: t.toArray() } : null)),
      context: this.contexts.map((c): ContextSnapshot | null => {
        if (c === null) return null;
        if (c instanceof IdentityBaseline) {
          return { kind: 'baseline', seed: c.seed, depth: c.depth, fingerprint: c.fingerprintHex() };
        }
        return { kind: 'bytes', bytes: Array.from(c) };
      }),
    };
  }
}
