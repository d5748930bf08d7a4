export type OperandKind = 'reg' | 'treg' | 'creg' | 'int' | 'float';

export type CoreDomain = 'tensor' | 'attention' | 'execution' | 'state' | 'consensus' | 'identity';
export type Domain = CoreDomain | 'extension';

export interface OpSpec {
  readonly opcode: number;
  readonly operands: readonly OperandKind[];
}

export const DOMAIN_BASE: Readonly<Record<CoreDomain, number>> = {
  tensor: 0x00,
  attention: 0x20,
  execution: 0x40,
  state: 0x60,
  consensus: 0x80,
  identity: 0xa0,
};

export const CORE_DOMAINS: readonly CoreDomain[] = ['tensor', 'attention', 'execution', 'state', 'consensus', 'identity'];

export const CORE_LIMIT = 0xc0;

export function domainOf(opcode: number): Domain {
  return opcode >= CORE_LIMIT ? 'extension' : CORE_DOMAINS[opcode >> 5];
}

export const TENSOR_OPS = {
  T_ALLOC: { opcode: 0x00, operands: ['treg', 'int', 'int'] },
  T_FILL: { opcode: 0x01, operands: ['treg', 'float'] },
  T_COPY: { opcode: 0x02, operands: ['treg', 'treg'] },
  T_ADD: { opcode: 0x03, operands: ['treg', 'treg'] },
  T_SUB: { opcode: 0x04, operands: ['treg', 'treg'] },
  T_MUL: { opcode: 0x05, operands: ['treg', 'treg'] },
  T_SCALE: { opcode: 0x06, operands: ['treg', 'float'] },
  T_MATMUL: { opcode: 0x07, operands: ['treg', 'treg', 'treg'] },
  T_TRANSPOSE: { opcode: 0x08, operands: ['treg', 'treg'] },
  T_RESHAPE: { opcode: 0x09, operands: ['treg', 'int', 'int'] },
  T_NORM: { opcode: 0x0a, operands: ['treg', 'treg', 'int'] },
  T_COMPOSE: { opcode: 0x0b, operands: ['treg', 'treg', 'treg', 'int'] },
  T_REDUCE: { opcode: 0x0c, operands: ['reg', 'treg', 'int'] },
  T_FREE: { opcode: 0x0d, operands: ['treg'] },
} as const satisfies Record<string, OpSpec>;

export const ATTENTION_OPS = {
  A_ROUTE: { opcode: 0x20, operands: ['treg', 'treg', 'treg', 'treg'] },
  A_SELF: { opcode: 0x21, operands: ['treg', 'treg'] },
  A_SCORE: { opcode: 0x22, operands: ['treg', 'treg', 'treg'] },
  A_SOFTMAX: { opcode: 0x23, operands: ['treg', 'treg'] },
  A_MASK: { opcode: 0x24, operands: ['treg'] },
  A_TOPK: { opcode: 0x25, operands: ['treg', 'treg', 'int'] },
  A_ARGMAX: { opcode: 0x26, operands: ['reg', 'treg'] },
  A_WEIGHT: { opcode: 0x27, operands: ['treg', 'treg', 'treg'] },
  A_GATE: { opcode: 0x28, operands: ['treg', 'treg', 'float'] },
  A_ENTROPY: { opcode: 0x29, operands: ['reg', 'treg'] },
  A_MERGE: { opcode: 0x2a, operands: ['treg', 'treg', 'treg', 'float'] },
  A_SELECT: { opcode: 0x2b, operands: ['treg', 'treg', 'reg'] },
} as const satisfies Record<string, OpSpec>;

export const EXECUTION_OPS = {
  X_NOP: { opcode: 0x40, operands: [] },
  X_HALT: { opcode: 0x41, operands: [] },
  X_JUMP: { opcode: 0x42, operands: ['int'] },
  X_BRANCH: { opcode: 0x43, operands: ['reg', 'int'] },
  X_LOOP: { opcode: 0x44, operands: ['reg', 'int'] },
  X_CALL: { opcode: 0x45, operands: ['int'] },
  X_RETURN: { opcode: 0x46, operands: [] },
  X_YIELD: { opcode: 0x47, operands: ['reg'] },
  X_FORK: { opcode: 0x48, operands: ['reg', 'int'] },
  X_SPAWN: { opcode: 0x49, operands: ['reg', 'int'] },
  X_JOIN: { opcode: 0x4a, operands: ['reg'] },
  X_KILL: { opcode: 0x4b, operands: ['reg'] },
  X_SLEEP: { opcode: 0x4c, operands: ['int'] },
  X_WAKE: { opcode: 0x4d, operands: ['reg'] },
  X_TRAP: { opcode: 0x4e, operands: ['int'] },
  X_RESUME: { opcode: 0x4f, operands: [] },
  X_ABORT: { opcode: 0x50, operands: [] },
} as const satisfies Record<string, OpSpec>;

export const STATE_OPS = {
  S_SET: { opcode: 0x60, operands: ['reg', 'int'] },
  S_MOVE: { opcode: 0x61, operands: ['reg', 'reg'] },
  S_STORE: { opcode: 0x62, operands: ['int', 'reg'] },
  S_LOAD: { opcode: 0x63, operands: ['reg', 'int'] },
  S_STORE_T: { opcode: 0x64, operands: ['int', 'treg'] },
  S_LOAD_T: { opcode: 0x65, operands: ['treg', 'int'] },
  S_DELETE: { opcode: 0x66, operands: ['int'] },
  S_HAS: { opcode: 0x67, operands: ['reg', 'int'] },
  S_SNAPSHOT: { opcode: 0x68, operands: ['creg'] },
  S_RESTORE: { opcode: 0x69, operands: ['creg'] },
  S_COMPRESS: { opcode: 0x6a, operands: ['creg', 'creg', 'creg'] },
  S_DECOMPRESS: { opcode: 0x6b, operands: ['creg', 'creg', 'creg'] },
  S_HASH: { opcode: 0x6c, operands: ['reg', 'creg'] },
  S_SERIALIZE: { opcode: 0x6d, operands: ['creg', 'treg'] },
  S_DESERIALIZE: { opcode: 0x6e, operands: ['treg', 'creg'] },
} as const satisfies Record<string, OpSpec>;

export const CONSENSUS_OPS = {
  C_PROPOSE: { opcode: 0x80, operands: ['int', 'reg', 'int'] },
  C_VOTE: { opcode: 0x81, operands: ['int', 'int', 'int'] },
  C_QUORUM: { opcode: 0x82, operands: ['int', 'int'] },
  C_COMMIT: { opcode: 0x83, operands: ['reg', 'int'] },
  C_REJECT: { opcode: 0x84, operands: ['int'] },
  C_VETO: { opcode: 0x85, operands: ['int', 'int'] },
  C_TIMEOUT: { opcode: 0x86, operands: ['int'] },
  C_ESCALATE: { opcode: 0x87, operands: ['int', 'int'] },
  C_DECIDE: { opcode: 0x88, operands: ['int', 'int'] },
  C_STATUS: { opcode: 0x89, operands: ['reg', 'int'] },
  C_TALLY: { opcode: 0x8a, operands: ['reg', 'int'] },
  C_SEAL: { opcode: 0x8b, operands: ['int', 'creg'] },
  C_VERIFY: { opcode: 0x8c, operands: ['reg', 'int', 'creg'] },
} as const satisfies Record<string, OpSpec>;

export const IDENTITY_OPS = {
  I_DERIVE: { opcode: 0xa0, operands: ['creg', 'int', 'int'] },
  I_VERIFY: { opcode: 0xa1, operands: ['reg', 'creg'] },
  I_FINGERPRINT: { opcode: 0xa2, operands: ['reg', 'creg'] },
  I_PROBE: { opcode: 0xa3, operands: ['reg', 'creg', 'int'] },
  I_CHAIN: { opcode: 0xa4, operands: ['reg', 'creg', 'int'] },
  I_DEPTH: { opcode: 0xa5, operands: ['reg', 'creg'] },
  I_SEED: { opcode: 0xa6, operands: ['reg', 'creg'] },
  I_GNOMON: { opcode: 0xa7, operands: ['reg', 'reg', 'reg'] },
  I_ALGEBRA: { opcode: 0xa8, operands: ['reg', 'reg', 'reg', 'reg', 'reg'] },
  I_HANDSHAKE: { opcode: 0xa9, operands: ['reg', 'creg', 'reg'] },
  I_SHARED_KEY: { opcode: 0xaa, operands: ['creg', 'creg', 'int'] },
  I_KEYSTREAM: { opcode: 0xab, operands: ['creg', 'creg', 'int'] },
  I_COMPARE: { opcode: 0xac, operands: ['reg', 'creg', 'creg'] },
} as const satisfies Record<string, OpSpec>;

export type TensorOp = keyof typeof TENSOR_OPS;
export type AttentionOp = keyof typeof ATTENTION_OPS;
export type ExecutionOp = keyof typeof EXECUTION_OPS;
export type StateOp = keyof typeof STATE_OPS;
export type ConsensusOp = keyof typeof CONSENSUS_OPS;
export type IdentityOp = keyof typeof IDENTITY_OPS;
export type CoreMnemonic = TensorOp | AttentionOp | ExecutionOp | StateOp | ConsensusOp | IdentityOp;

export const CORE_OPS: Readonly<Record<CoreDomain, Readonly<Record<string, OpSpec>>>> = {
  tensor: TENSOR_OPS,
  attention: ATTENTION_OPS,
  execution: EXECUTION_OPS,
  state: STATE_OPS,
  consensus: CONSENSUS_OPS,
  identity: IDENTITY_OPS,
};
