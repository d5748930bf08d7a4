import { blake3 } from '@noble/hashes/blake3.js';
import { bytesToHex } from '@noble/hashes/utils.js';

import { DecodeError } from '../errors.js';
import { square32 } from './algebra.js';

export const MAX_DEPTH = 1 << 20;
export const FINGERPRINT_BYTES = 16;
export const MAX_KEYSTREAM_BYTES = 64 * 1024 * 1024;

function checkSeed(seed: number): void {
  if (!Number.isInteger(seed) || seed < 0 || seed > 0xffffffff) {
    throw new DecodeError(`baseline seed must be a u32, got ${seed}`, { seed });
  }
}

function checkDepth(depth: number): void {
  if (!Number.isInteger(depth) || depth < 1 || depth > MAX_DEPTH) {
    throw new DecodeError(`baseline depth must be in 1..${MAX_DEPTH}, got ${depth}`, { depth });
  }
}

function root(seed: number, i: number): number {
  return (seed + i) >>> 0;
}

/**
 * Shared integer chain `sᵢ = (seed + i)² mod 2³²`. Only `s₀` is squared; every later element is
 * reached by adding `rᵢ₋₁ + rᵢ`, so two peers holding the same (seed, depth) hold the same bits.
 */
export class IdentityBaseline {
  private fingerprintCache: Uint8Array | undefined;

  private constructor(
    readonly seed: number,
    private readonly chain: Uint32Array,
  ) {}

  static derive(seed: number, depth: number): IdentityBaseline {
    checkSeed(seed);
    checkDepth(depth);
    const chain = new Uint32Array(depth);
    chain[0] = square32(seed);
    for (let i = 1; i < depth; i++) {
      chain[i] = (chain[i - 1] + root(seed, i - 1) + root(seed, i)) >>> 0;
    }
    return new IdentityBaseline(seed, chain);
  }

  /** Wraps an explicit chain without recomputing it; probes report any element that is off. */
  static fromChain(seed: number, chain: ArrayLike<number>): IdentityBaseline {
    checkSeed(seed);
    checkDepth(chain.length);
    return new IdentityBaseline(seed, Uint32Array.from(chain));
  }

  get depth(): number {
    return this.chain.length;
  }

  element(index: number): number {
    this.checkIndex(index);
    return this.chain[index];
  }

  elements(): number[] {
    return Array.from(this.chain);
  }

  probe(index: number): boolean {
    this.checkIndex(index);
    if (index === 0) return this.chain[0] === square32(this.seed);
    const step = (this.chain[index - 1] + root(this.seed, index - 1) + root(this.seed, index)) >>> 0;
    return step === this.chain[index];
  }

  /** Index of the first element failing its probe, or -1. */
  firstCorruption(): number {
    for (let i = 0; i < this.chain.length; i++) {
      if (!this.probe(i)) return i;
    }
    return -1;
  }

  verify(): boolean {
    return this.firstCorruption() === -1;
  }

  /** Chain bytes as u32 little-endian, repeated cyclically from `offset`. */
  keystream(length: number, offset = 0): Uint8Array {
    if (!Number.isInteger(length) || length < 0) {
      throw new DecodeError(`keystream length must be a non-negative integer, got ${length}`, { length });
    }
    if (length > MAX_KEYSTREAM_BYTES) {
      throw new DecodeError(`keystream length ${length} exceeds ${MAX_KEYSTREAM_BYTES} bytes`, { length });
    }
    if (!Number.isInteger(offset) || offset < 0) {
      throw new DecodeError(`keystream offset must be a non-negative integer, got ${offset}`, { offset });
    }
    const period = this.chain.length * 4;
    const out = new Uint8Array(length);
    let pos = offset % period;
    for (let k = 0; k < length; k++) {
      out[k] = (this.chain[pos >> 2] >>> ((pos & 3) * 8)) & 0xff;
      pos = pos + 1 === period ? 0 : pos + 1;
    }
    return out;
  }

  chainBytes(): Uint8Array {
    return this.keystream(this.chain.length * 4);
  }

  fingerprint(): Uint8Array {
    if (!this.fingerprintCache) {
      this.fingerprintCache = blake3(this.chainBytes(), { dkLen: FINGERPRINT_BYTES });
    }
    return this.fingerprintCache.slice();
  }

  fingerprintHex(): string {
    return bytesToHex(this.fingerprint());
  }

  fingerprint32(): number {
    const fp = this.fingerprint();
    return (fp[0] | (fp[1] << 8) | (fp[2] << 16) | (fp[3] << 24)) >>> 0;
  }

  equals(other: IdentityBaseline): boolean {
    if (this.seed !== other.seed || this.chain.length !== other.chain.length) return false;
    return this.chain.every((v, i) => v === other.chain[i]);
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.chain.length) {
      throw new DecodeError(`chain index ${index} outside depth ${this.chain.length}`, { index, depth: this.chain.length });
    }
  }
}
