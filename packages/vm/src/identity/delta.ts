import { DecodeError } from '../errors.js';
import type { IdentityBaseline } from './baseline.js';
import { HEADER_BYTES, TAG_ZERO, rleDecode, rleEncode } from './rle.js';

export interface DeltaOptions {
  /** Byte position in the keystream where every payload starts. */
  offset?: number;
}

function xorInto(out: Uint8Array, bytes: Uint8Array, mask: Uint8Array): Uint8Array {
  for (let i = 0; i < bytes.length; i++) out[i] = bytes[i] ^ mask[i];
  return out;
}

/** Reference bytes resized to `length`: truncated, or zero-extended. */
function fit(reference: Uint8Array, length: number): Uint8Array {
  if (reference.length === length) return reference;
  const out = new Uint8Array(length);
  out.set(reference.subarray(0, Math.min(length, reference.length)));
  return out;
}

/** `compress(x) = RLE(x ⊕ keystream)`. Holds no state beyond the baseline and the offset. */
export class DeltaCompressor {
  readonly offset: number;

  constructor(
    readonly baseline: IdentityBaseline,
    options: DeltaOptions = {},
  ) {
    const offset = options.offset ?? 0;
    if (!Number.isInteger(offset) || offset < 0) {
      throw new DecodeError(`keystream offset must be a non-negative integer, got ${offset}`, { offset });
    }
    this.offset = offset;
  }

  compress(bytes: Uint8Array): Uint8Array {
    const mask = this.baseline.keystream(bytes.length, this.offset);
    return rleEncode(xorInto(new Uint8Array(bytes.length), bytes, mask));
  }

  decompress(stream: Uint8Array): Uint8Array {
    const delta = rleDecode(stream);
    const mask = this.baseline.keystream(delta.length, this.offset);
    return xorInto(delta, delta, mask);
  }
}

export function compress(bytes: Uint8Array, baseline: IdentityBaseline, options?: DeltaOptions): Uint8Array {
  return new DeltaCompressor(baseline, options).compress(bytes);
}

export function decompress(stream: Uint8Array, baseline: IdentityBaseline, options?: DeltaOptions): Uint8Array {
  return new DeltaCompressor(baseline, options).decompress(stream);
}

export function isZeroMarker(stream: Uint8Array): boolean {
  return stream.length === HEADER_BYTES && stream[0] === TAG_ZERO;
}

/**
 * One direction of a state-sync link. The first payload is masked with the keystream; every later
 * payload is diffed against the previous one, so resending unchanged state costs a 5-byte marker.
 * Sender and receiver must see the same sequence of payloads.
 */
export class DeltaChannel {
  private previous: Uint8Array | null = null;
  private readonly codec: DeltaCompressor;

  constructor(baseline: IdentityBaseline, options: DeltaOptions = {}) {
    this.codec = new DeltaCompressor(baseline, options);
  }

  send(payload: Uint8Array): Uint8Array {
    const previous = this.previous;
    this.previous = payload.slice();
    if (!previous) return this.codec.compress(payload);
    return rleEncode(xorInto(new Uint8Array(payload.length), payload, fit(previous, payload.length)));
  }

  receive(stream: Uint8Array): Uint8Array {
    let payload: Uint8Array;
    if (this.previous) {
      const delta = rleDecode(stream);
      payload = xorInto(delta, delta, fit(this.previous, delta.length));
    } else {
      payload = this.codec.decompress(stream);
    }
    this.previous = payload.slice();
    return payload;
  }

  reset(): void {
    this.previous = null;
  }
}
