import type { RegisterFile } from '../registers/file.js';
import type { ConsensusBook } from './consensus.js';
import type { ContextRecord, Scheduler } from './scheduler.js';
import type { Stage } from './stage.js';
import type { StateStore } from './store.js';

// Each domain's handlers see only what their interface names.

export interface HandlerContext {
  /** Register window of the running context. Read freely; write through `stage`. */
  readonly registers: RegisterFile;
  readonly stage: Stage;
  readonly pc: number;
  readonly contextId: number;
}

export type TensorCapability = HandlerContext;
export type AttentionCapability = HandlerContext;

export interface ExecutionCapability extends HandlerContext {
  readonly scheduler: Scheduler;
  readonly context: ContextRecord;
  readonly programLength: number;
  readonly maxCallDepth: number;
}

export interface StateCapability extends HandlerContext {
  readonly store: StateStore;
}

export interface ConsensusCapability extends HandlerContext {
  readonly book: ConsensusBook;
  readonly agentId: number;
}

export interface IdentityCapability extends HandlerContext {
  readonly agentId: number;
}

export type EngineCapability = ExecutionCapability & StateCapability & ConsensusCapability & IdentityCapability;

export type Handler<C extends HandlerContext> = (cx: C, operands: readonly number[]) => void;

export type HandlerTable<K extends string, C extends HandlerContext> = { readonly [M in K]: Handler<C> };
