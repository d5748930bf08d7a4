import { hash32 } from '../../canon/hash.js';
import { decodeTensor, encodeTensor } from '../../codec/tensor.js';
import { DecodeError } from '../../errors.js';
import { compress, decompress } from '../../identity/delta.js';
import type { StateOp } from '../../opcodes/domains.js';
import { Tensor } from '../../registers/tensor.js';
import type { HandlerTable, StateCapability } from '../capabilities.js';
import { StateStore } from '../store.js';
import type { Stage } from '../stage.js';

function missing(stage: Stage, key: number, what: string): void {
  stage.emit({
    type: 'state.miss',
    severity: 'warn',
    message: `no ${what} stored under key ${key}`,
    data: { key },
  });
}

function wrongKind(key: number, expected: string): DecodeError {
  return new DecodeError(`key ${key} does not hold a ${expected}`, { key });
}

export const STATE_HANDLERS: HandlerTable<StateOp, StateCapability> = {
  S_SET: ({ stage }, [dst, value]) => {
    stage.setScalar(dst, value);
  },
  S_MOVE: ({ registers, stage }, [dst, src]) => {
    stage.setScalar(dst, registers.get(src));
  },
  S_STORE: ({ registers, stage, store }, [key, src]) => {
    const value = registers.get(src);
    stage.effect(() => store.set(key, value));
  },
  S_LOAD: ({ stage, store }, [dst, key]) => {
    const value = store.get(key);
    if (value instanceof Tensor) throw wrongKind(key, 'scalar');
    if (value === undefined) missing(stage, key, 'scalar');
    stage.setScalar(dst, value ?? 0);
  },
  S_STORE_T: ({ registers, stage, store }, [key, src]) => {
    const value = registers.requireTensor(src).clone();
    stage.effect(() => store.set(key, value));
  },
  S_LOAD_T: ({ stage, store }, [dst, key]) => {
    const value = store.get(key);
    if (typeof value === 'number') throw wrongKind(key, 'tensor');
    if (value === undefined) missing(stage, key, 'tensor');
    stage.setTensor(dst, value ?? null);
  },
  S_DELETE: ({ stage, store }, [key]) => {
    stage.effect(() => {
      store.delete(key);
    });
  },
  S_HAS: ({ stage, store }, [dst, key]) => {
    stage.setScalar(dst, store.has(key) ? 1 : 0);
  },
  S_SNAPSHOT: ({ stage, store }, [dst]) => {
    stage.setContext(dst, store.snapshot());
  },
  S_RESTORE: ({ registers, stage, store }, [src]) => {
    const entries = StateStore.decode(registers.requireBytes(src));
    stage.effect(() => store.replace(entries));
  },
  S_COMPRESS: ({ registers, stage }, [dst, src, baseline]) => {
    stage.setContext(dst, compress(registers.requireBytes(src), registers.requireBaseline(baseline)));
  },
  S_DECOMPRESS: ({ registers, stage }, [dst, src, baseline]) => {
    stage.setContext(dst, decompress(registers.requireBytes(src), registers.requireBaseline(baseline)));
  },
  S_HASH: ({ registers, stage }, [dst, src]) => {
    stage.setScalar(dst, hash32(registers.requireBytes(src)));
  },
  S_SERIALIZE: ({ registers, stage }, [dst, src]) => {
    stage.setContext(dst, encodeTensor(registers.requireTensor(src)));
  },
  S_DESERIALIZE: ({ registers, stage }, [dst, src]) => {
    stage.setTensor(dst, decodeTensor(registers.requireBytes(src)));
  },
};
