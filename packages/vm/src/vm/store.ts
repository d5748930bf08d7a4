import { ByteReader, ByteWriter } from '../codec/bytes.js';
import { readTensor, writeTensor } from '../codec/tensor.js';
import { DecodeError } from '../errors.js';
import { Tensor } from '../registers/tensor.js';

export type StoredValue = number | Tensor;

const SNAPSHOT_VERSION = 1;
const KIND_SCALAR = 0;
const KIND_TENSOR = 1;

/**
 * Session-owned key/value store behind S_STORE/S_LOAD. Tensors go in and out as copies.
 * Snapshot layout: version u8, count u32, then per key in ascending order: key i32, kind u8,
 * and either an f64 or a u32 length followed by the tensor encoding.
 */
export class StateStore {
  private entries = new Map<number, StoredValue>();

  get size(): number {
    return this.entries.size;
  }

  has(key: number): boolean {
    return this.entries.has(key);
  }

  get(key: number): StoredValue | undefined {
    const value = this.entries.get(key);
    return value instanceof Tensor ? value.clone() : value;
  }

  set(key: number, value: StoredValue): void {
    this.entries.set(key, value instanceof Tensor ? value.clone() : value);
  }

  delete(key: number): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  keys(): number[] {
    return [...this.entries.keys()].sort((a, b) => a - b);
  }

  /** Swaps in entries decoded elsewhere; pair with StateStore.decode so a bad snapshot changes nothing. */
  replace(entries: ReadonlyMap<number, StoredValue>): void {
    this.entries = new Map(entries);
  }

  snapshot(): Uint8Array {
    const out = new ByteWriter().u8(SNAPSHOT_VERSION).u32(this.entries.size);
    for (const key of this.keys()) {
      const value = this.entries.get(key);
      out.i32(key);
      if (value instanceof Tensor) {
        const body = new ByteWriter();
        writeTensor(body, value);
        const bytes = body.finish();
        out.u8(KIND_TENSOR).u32(bytes.length).bytes(bytes);
      } else {
        out.u8(KIND_SCALAR).f64(value ?? 0);
      }
    }
    return out.finish();
  }

  static decode(bytes: Uint8Array): Map<number, StoredValue> {
    const reader = new ByteReader(bytes);
    const version = reader.u8('snapshot version');
    if (version !== SNAPSHOT_VERSION) {
      throw new DecodeError(`unsupported store snapshot version ${version}`, { version });
    }
    const count = reader.u32('snapshot entry count');
    const entries = new Map<number, StoredValue>();
    for (let i = 0; i < count; i++) {
      const key = reader.i32('snapshot key');
      const kind = reader.u8('snapshot value kind');
      if (kind === KIND_SCALAR) {
        entries.set(key, reader.f64('snapshot scalar'));
      } else if (kind === KIND_TENSOR) {
        const length = reader.u32('snapshot tensor length');
        const body = new ByteReader(reader.bytesOf(length, 'snapshot tensor'));
        entries.set(key, readTensor(body));
        if (body.remaining !== 0) throw new DecodeError(`tensor under key ${key} has trailing bytes`, { key });
      } else {
        throw new DecodeError(`unknown snapshot value kind ${kind}`, { kind, key });
      }
    }
    if (reader.remaining !== 0) {
      throw new DecodeError(`${reader.remaining} trailing bytes after store snapshot`, { trailing: reader.remaining });
    }
    return entries;
  }
}
