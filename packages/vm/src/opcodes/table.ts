import { UnknownOpcodeError, DecodeError } from '../errors.js';
import { CORE_DOMAINS, CORE_LIMIT, CORE_OPS, domainOf } from './domains.js';
import type { Domain, OperandKind } from './domains.js';

export interface OpcodeDescriptor {
  readonly opcode: number;
  readonly mnemonic: string;
  readonly domain: Domain;
  readonly operands: readonly OperandKind[];
}

export interface ExtensionSpec {
  readonly opcode: number;
  readonly mnemonic: string;
  readonly operands: readonly OperandKind[];
}

const MNEMONIC_RE = /^[A-Z][A-Z0-9_]*$/;

function buildCore(): Map<number, OpcodeDescriptor> {
  const out = new Map<number, OpcodeDescriptor>();
  for (const domain of CORE_DOMAINS) {
    for (const [mnemonic, spec] of Object.entries(CORE_OPS[domain])) {
      out.set(spec.opcode, Object.freeze({ opcode: spec.opcode, mnemonic, domain, operands: spec.operands }));
    }
  }
  return out;
}

const CORE = buildCore();

/**
 * Opcode registry. The core block (0x00-0xBF) is fixed; extensions are accepted only in
 * 0xC0-0xFF and only at construction, after which the table never changes.
 */
export class OpcodeTable {
  private readonly byCode: Map<number, OpcodeDescriptor>;
  private readonly byName: Map<string, OpcodeDescriptor>;

  constructor(extensions: readonly ExtensionSpec[] = []) {
    this.byCode = new Map(CORE);
    this.byName = new Map();
    for (const d of CORE.values()) this.byName.set(d.mnemonic, d);

    for (const ext of extensions) {
      if (!Number.isInteger(ext.opcode) || ext.opcode < CORE_LIMIT || ext.opcode > 0xff) {
        throw new DecodeError(`extension opcode 0x${ext.opcode.toString(16)} outside 0xc0-0xff`, { opcode: ext.opcode });
      }
      if (this.byCode.has(ext.opcode)) {
        throw new DecodeError(`extension opcode 0x${ext.opcode.toString(16)} already registered`, { opcode: ext.opcode });
      }
      if (!MNEMONIC_RE.test(ext.mnemonic) || this.byName.has(ext.mnemonic)) {
        throw new DecodeError(`extension mnemonic ${ext.mnemonic} is invalid or taken`, { mnemonic: ext.mnemonic });
      }
      const descriptor: OpcodeDescriptor = Object.freeze({
        opcode: ext.opcode,
        mnemonic: ext.mnemonic,
        domain: 'extension',
        operands: Object.freeze([...ext.operands]),
      });
      this.byCode.set(ext.opcode, descriptor);
      this.byName.set(ext.mnemonic, descriptor);
    }
  }

  lookup(opcode: number): OpcodeDescriptor {
    const found = this.byCode.get(opcode);
    if (!found) throw new UnknownOpcodeError(opcode);
    return found;
  }

  has(opcode: number): boolean {
    return this.byCode.has(opcode);
  }

  lookupMnemonic(mnemonic: string): OpcodeDescriptor {
    const found = this.byName.get(mnemonic);
    if (!found) throw new DecodeError(`unknown mnemonic ${mnemonic}`, { mnemonic });
    return found;
  }

  isExtension(opcode: number): boolean {
    return this.byCode.has(opcode) && domainOf(opcode) === 'extension';
  }

  descriptors(): OpcodeDescriptor[] {
    return [...this.byCode.values()].sort((a, b) => a.opcode - b.opcode);
  }
}

export const CORE_TABLE = new OpcodeTable();

export function lookup(opcode: number): OpcodeDescriptor {
  return CORE_TABLE.lookup(opcode);
}

export function lookupMnemonic(mnemonic: string): OpcodeDescriptor {
  return CORE_TABLE.lookupMnemonic(mnemonic);
}
