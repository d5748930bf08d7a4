import { DecodeError } from '../errors.js';

/** Growable little-endian byte writer. */
export class ByteWriter {
  private buf = new Uint8Array(64);
  private view = new DataView(this.buf.buffer);
  private len = 0;

  get length(): number {
    return this.len;
  }

  /** Grows the buffer before returning the write offset; callers must not hold `buf` or `view` across it. */
  private reserve(n: number): number {
    const at = this.len;
    if (at + n > this.buf.length) {
      let cap = this.buf.length * 2;
      while (cap < at + n) cap *= 2;
      const next = new Uint8Array(cap);
      next.set(this.buf.subarray(0, at));
      this.buf = next;
      this.view = new DataView(next.buffer);
    }
    this.len += n;
    return at;
  }

  u8(value: number): this {
    const at = this.reserve(1);
    this.buf[at] = value;
    return this;
  }

  u32(value: number): this {
    const at = this.reserve(4);
    this.view.setUint32(at, value >>> 0, true);
    return this;
  }

  i32(value: number): this {
    const at = this.reserve(4);
    this.view.setInt32(at, value | 0, true);
    return this;
  }

  f32(value: number): this {
    const at = this.reserve(4);
    this.view.setFloat32(at, value, true);
    return this;
  }

  f64(value: number): this {
    const at = this.reserve(8);
    this.view.setFloat64(at, value, true);
    return this;
  }

  bytes(value: Uint8Array): this {
    const at = this.reserve(value.length);
    this.buf.set(value, at);
    return this;
  }

  finish(): Uint8Array {
    return this.buf.slice(0, this.len);
  }
}

export type TruncationError = (explain: string, offset: number) => Error;

const decodeTruncation: TruncationError = (explain, offset) => new DecodeError(explain, { offset });

/** Bounds-checked little-endian reader; running past the end raises the supplied error. */
export class ByteReader {
  private readonly view: DataView;
  private pos = 0;

  constructor(
    private readonly bytes: Uint8Array,
    private readonly truncated: TruncationError = decodeTruncation,
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get offset(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.bytes.length - this.pos;
  }

  private take(n: number, what: string): number {
    if (this.pos + n > this.bytes.length) {
      throw this.truncated(`truncated ${what}: need ${n} bytes at offset ${this.pos}, have ${this.remaining}`, this.pos);
    }
    const at = this.pos;
    this.pos += n;
    return at;
  }

  u8(what = 'u8'): number {
    return this.bytes[this.take(1, what)];
  }

  u32(what = 'u32'): number {
    return this.view.getUint32(this.take(4, what), true);
  }

  i32(what = 'i32'): number {
    return this.view.getInt32(this.take(4, what), true);
  }

  f32(what = 'f32'): number {
    return this.view.getFloat32(this.take(4, what), true);
  }

  f64(what = 'f64'): number {
    return this.view.getFloat64(this.take(8, what), true);
  }

  bytesOf(n: number, what = 'bytes'): Uint8Array {
    const at = this.take(n, what);
    return this.bytes.slice(at, at + n);
  }
}
