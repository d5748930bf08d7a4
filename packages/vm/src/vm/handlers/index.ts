import { UnknownOpcodeError } from '../../errors.js';
import type { OpcodeDescriptor } from '../../opcodes/table.js';
import type { EngineCapability, Handler, HandlerContext } from '../capabilities.js';
import { ATTENTION_HANDLERS } from './attention.js';
import { CONSENSUS_HANDLERS } from './consensus.js';
import { EXECUTION_HANDLERS } from './execution.js';
import { IDENTITY_HANDLERS } from './identity.js';
import { STATE_HANDLERS } from './state.js';
import { TENSOR_HANDLERS } from './tensor.js';

export { ATTENTION_HANDLERS, CONSENSUS_HANDLERS, EXECUTION_HANDLERS, IDENTITY_HANDLERS, STATE_HANDLERS, TENSOR_HANDLERS };

function hasKey<T extends object>(table: T, key: string): key is Extract<keyof T, string> {
  return Object.prototype.hasOwnProperty.call(table, key);
}

function pick<T extends object>(table: T, key: string): T[Extract<keyof T, string>] | undefined {
  return hasKey(table, key) ? table[key] : undefined;
}

/** Finds the handler for a descriptor: core domains by mnemonic, extensions by opcode. */
export function resolveHandler(
  descriptor: OpcodeDescriptor,
  extensions: ReadonlyMap<number, Handler<HandlerContext>>,
): Handler<EngineCapability> {
  let handler: Handler<EngineCapability> | undefined;
  switch (descriptor.domain) {
    case 'tensor':
      handler = pick(TENSOR_HANDLERS, descriptor.mnemonic);
      break;
    case 'attention':
      handler = pick(ATTENTION_HANDLERS, descriptor.mnemonic);
      break;
    case 'execution':
      handler = pick(EXECUTION_HANDLERS, descriptor.mnemonic);
      break;
    case 'state':
      handler = pick(STATE_HANDLERS, descriptor.mnemonic);
      break;
    case 'consensus':
      handler = pick(CONSENSUS_HANDLERS, descriptor.mnemonic);
      break;
    case 'identity':
      handler = pick(IDENTITY_HANDLERS, descriptor.mnemonic);
      break;
    case 'extension':
      handler = extensions.get(descriptor.opcode);
      break;
  }
  if (!handler) throw new UnknownOpcodeError(descriptor.opcode);
  return handler;
}
