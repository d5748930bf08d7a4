import { DecodeError } from '../errors.js';
import { CORE_TABLE } from '../opcodes/table.js';
import type { OpcodeDescriptor, OpcodeTable } from '../opcodes/table.js';

export interface Instruction {
  readonly opcode: number;
  readonly operands: readonly number[];
}

const I32_MIN = -0x80000000;
const I32_MAX = 0x7fffffff;

/** Builds an instruction from a mnemonic, e.g. `ins('S_SET', 0, 42)`. */
export function ins(mnemonic: string, ...operands: number[]): Instruction {
  return { opcode: CORE_TABLE.lookupMnemonic(mnemonic).opcode, operands };
}

/** Checks operand count and per-kind ranges; throws DecodeError before anything runs. */
export function validateOperands(descriptor: OpcodeDescriptor, operands: readonly number[]): void {
  const { mnemonic } = descriptor;
  if (operands.length !== descriptor.operands.length) {
    throw new DecodeError(`${mnemonic} takes ${descriptor.operands.length} operands, got ${operands.length}`, {
      mnemonic,
      expected: descriptor.operands.length,
      actual: operands.length,
    });
  }
  descriptor.operands.forEach((kind, i) => {
    const value = operands[i];
    switch (kind) {
      case 'reg':
      case 'treg':
      case 'creg':
        if (!Number.isInteger(value) || value < 0 || value > 0xff) {
          throw new DecodeError(`${mnemonic} operand ${i} is not a register index: ${value}`, { mnemonic, operand: i });
        }
        break;
      case 'int':
        if (!Number.isInteger(value) || value < I32_MIN || value > I32_MAX) {
          throw new DecodeError(`${mnemonic} operand ${i} is not an i32: ${value}`, { mnemonic, operand: i });
        }
        break;
      case 'float':
        if (typeof value !== 'number' || Number.isNaN(value)) {
          throw new DecodeError(`${mnemonic} operand ${i} is not a number`, { mnemonic, operand: i });
        }
        break;
    }
  });
}

export function formatInstruction(instruction: Instruction, table: OpcodeTable = CORE_TABLE): string {
  const { mnemonic } = table.lookup(instruction.opcode);
  return instruction.operands.length ? `${mnemonic} ${instruction.operands.join(', ')}` : mnemonic;
}
