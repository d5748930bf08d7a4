import type { Instruction } from '../model/instruction.js';
import { validateOperands } from '../model/instruction.js';
import type { OperandKind } from '../opcodes/domains.js';
import { CORE_TABLE } from '../opcodes/table.js';
import type { OpcodeTable } from '../opcodes/table.js';
import { ByteReader, ByteWriter } from './bytes.js';

export const OPERAND_BYTES: Readonly<Record<OperandKind, number>> = {
  reg: 1,
  treg: 1,
  creg: 1,
  int: 4,
  float: 8,
};

export function instructionSize(instruction: Instruction, table: OpcodeTable = CORE_TABLE): number {
  const descriptor = table.lookup(instruction.opcode);
  return descriptor.operands.reduce((n, kind) => n + OPERAND_BYTES[kind], 1);
}

/** Opcode byte followed by each operand at its fixed width; no tags, no padding. */
export function encodePayload(instructions: readonly Instruction[], table: OpcodeTable = CORE_TABLE): Uint8Array {
  const out = new ByteWriter();
  for (const instruction of instructions) {
    const descriptor = table.lookup(instruction.opcode);
    validateOperands(descriptor, instruction.operands);
    out.u8(instruction.opcode);
    descriptor.operands.forEach((kind, i) => {
      const value = instruction.operands[i];
      switch (kind) {
        case 'reg':
        case 'treg':
        case 'creg':
          out.u8(value);
          break;
        case 'int':
          out.i32(value);
          break;
        case 'float':
          out.f64(value);
          break;
      }
    });
  }
  return out.finish();
}

/** Decodes and validates every instruction, so a bad operand rejects the whole payload. */
export function decodePayload(payload: Uint8Array, table: OpcodeTable = CORE_TABLE): Instruction[] {
  const reader = new ByteReader(payload);
  const out: Instruction[] = [];
  while (reader.remaining > 0) {
    const descriptor = table.lookup(reader.u8('opcode'));
    const operands = descriptor.operands.map((kind, i) => {
      const what = `${descriptor.mnemonic} operand ${i}`;
      switch (kind) {
        case 'reg':
        case 'treg':
        case 'creg':
          return reader.u8(what);
        case 'int':
          return reader.i32(what);
        case 'float':
          return reader.f64(what);
      }
    });
    validateOperands(descriptor, operands);
    out.push({ opcode: descriptor.opcode, operands });
  }
  return out;
}
