import { blake3 } from '@noble/hashes/blake3.js';
import { utf8ToBytes } from '@noble/hashes/utils.js';

import { bytesEqual, concatBytes } from '../canon/hash.js';
import { IdentityBaseline } from './baseline.js';

export const SHARED_KEY_BYTES = 32;
const SHARED_KEY_CONTEXT = 'scrawl/identity/shared-key/v1';

export interface Initiation {
  readonly baseline: IdentityBaseline;
  readonly fingerprint: Uint8Array;
}

export interface Response {
  readonly baseline: IdentityBaseline;
  readonly match: boolean;
}

function u32le(value: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, value >>> 0, true);
  return out;
}

// Both peers derive the baseline from the agreed (seed, depth); only fingerprints cross the wire.
export class IdentityHandshake {
  static initiate(seed: number, depth: number): Initiation {
    const baseline = IdentityBaseline.derive(seed, depth);
    return { baseline, fingerprint: baseline.fingerprint() };
  }

  static respond(seed: number, depth: number, fingerprint: Uint8Array): Response {
    const baseline = IdentityBaseline.derive(seed, depth);
    return { baseline, match: bytesEqual(baseline.fingerprint(), fingerprint) };
  }

  /** Symmetric in the two agent ids. */
  static deriveSharedKey(baseline: IdentityBaseline, agentA: number, agentB: number): Uint8Array {
    const [lo, hi] = agentA <= agentB ? [agentA, agentB] : [agentB, agentA];
    const material = concatBytes(baseline.fingerprint(), u32le(lo), u32le(hi));
    return blake3(material, { dkLen: SHARED_KEY_BYTES, context: utf8ToBytes(SHARED_KEY_CONTEXT) });
  }
}
