import { gnomonStep, identityHolds } from '../../identity/algebra.js';
import { IdentityBaseline } from '../../identity/baseline.js';
import { IdentityHandshake } from '../../identity/handshake.js';
import type { IdentityOp } from '../../opcodes/domains.js';
import type { HandlerTable, IdentityCapability } from '../capabilities.js';

export const IDENTITY_HANDLERS: HandlerTable<IdentityOp, IdentityCapability> = {
  I_DERIVE: ({ stage }, [dst, seed, depth]) => {
    const baseline = IdentityBaseline.derive(seed >>> 0, depth);
    stage.setContext(dst, baseline);
    stage.emit({
      type: 'identity.derive',
      severity: 'debug',
      message: `baseline derived (seed=0x${baseline.seed.toString(16)}, depth=${depth})`,
      data: { seed: baseline.seed, depth, fingerprint: baseline.fingerprint32() },
    });
  },
  I_VERIFY: ({ registers, stage }, [dst, src]) => {
    const corrupt = registers.requireBaseline(src).firstCorruption();
    stage.setScalar(dst, corrupt === -1 ? 1 : 0);
    if (corrupt !== -1) {
      stage.emit({
        type: 'identity.verify',
        severity: 'warn',
        message: `chain corrupted at element ${corrupt}`,
        data: { element: corrupt },
      });
    }
  },
  I_FINGERPRINT: ({ registers, stage }, [dst, src]) => {
    stage.setScalar(dst, registers.requireBaseline(src).fingerprint32());
  },
  I_PROBE: ({ registers, stage }, [dst, src, index]) => {
    stage.setScalar(dst, registers.requireBaseline(src).probe(index) ? 1 : 0);
  },
  I_CHAIN: ({ registers, stage }, [dst, src, index]) => {
    stage.setScalar(dst, registers.requireBaseline(src).element(index));
  },
  I_DEPTH: ({ registers, stage }, [dst, src]) => {
    stage.setScalar(dst, registers.requireBaseline(src).depth);
  },
  I_SEED: ({ registers, stage }, [dst, src]) => {
    stage.setScalar(dst, registers.requireBaseline(src).seed);
  },
  I_GNOMON: ({ registers, stage }, [dst, square, a]) => {
    stage.setScalar(dst, gnomonStep(registers.get(square) >>> 0, registers.get(a) >>> 0));
  },
  I_ALGEBRA: ({ registers, stage }, [dst, a, aSquared, b, bSquared]) => {
    const holds = identityHolds(registers.get(a), registers.get(aSquared), registers.get(b), registers.get(bSquared));
    stage.setScalar(dst, holds ? 1 : 0);
  },
  I_HANDSHAKE: ({ registers, stage }, [dst, src, fingerprint]) => {
    const ours = registers.requireBaseline(src).fingerprint32();
    const theirs = registers.get(fingerprint) >>> 0;
    const match = ours === theirs;
    stage.setScalar(dst, match ? 1 : 0);
    stage.emit({
      type: 'identity.handshake',
      severity: match ? 'info' : 'warn',
      message: match ? 'peer fingerprint matches' : `peer fingerprint 0x${theirs.toString(16)} does not match`,
      data: { match },
    });
  },
  I_SHARED_KEY: ({ registers, stage, agentId }, [dst, src, peer]) => {
    stage.setContext(dst, IdentityHandshake.deriveSharedKey(registers.requireBaseline(src), agentId, peer));
  },
  I_KEYSTREAM: ({ registers, stage }, [dst, src, length]) => {
    stage.setContext(dst, registers.requireBaseline(src).keystream(length));
  },
  I_COMPARE: ({ registers, stage }, [dst, a, b]) => {
    stage.setScalar(dst, registers.requireBaseline(a).equals(registers.requireBaseline(b)) ? 1 : 0);
  },
};
