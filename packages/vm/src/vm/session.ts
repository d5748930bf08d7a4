import { createMemorySink, stdoutSink } from '@scrawl/trace';
import type { MemorySink, TraceContext, TraceEvent, TraceSeverity, TraceSink } from '@scrawl/trace';

import { decodeFrame } from '../codec/frame.js';
import type { FrameCodecOptions } from '../codec/frame.js';
import { resolveConfig } from '../config.js';
import type { ConfigOverrides, SessionConfig } from '../config.js';
import { InstructionTimeoutError, InvalidTransitionError, isScrawlError } from '../errors.js';
import type { Instruction } from '../model/instruction.js';
import { formatInstruction, validateOperands } from '../model/instruction.js';
import { EXECUTION_OPS } from '../opcodes/domains.js';
import { OpcodeTable } from '../opcodes/table.js';
import type { ExtensionSpec, OpcodeDescriptor } from '../opcodes/table.js';
import { RegisterFile } from '../registers/file.js';
import type { ContextValue, RegisterSnapshot } from '../registers/file.js';
import type { Tensor } from '../registers/tensor.js';
import type { EngineCapability, Handler, HandlerContext } from './capabilities.js';
import { ConsensusBook } from './consensus.js';
import type { ConsensusRound } from './consensus.js';
import { resolveHandler } from './handlers/index.js';
import { ROOT_CONTEXT, Scheduler } from './scheduler.js';
import type { ContextRecord, ContextView } from './scheduler.js';
import { Stage } from './stage.js';
import type { PendingEvent } from './stage.js';
import { StateStore } from './store.js';
import type { StoredValue } from './store.js';

export type SessionState = 'Idle' | 'Running' | 'Halted' | 'Trapped' | 'Aborted';

export interface ExecutionResult {
  readonly state: SessionState;
  readonly instructionsExecuted: number;
  readonly elapsedMs: number;
  /** Values passed to X_YIELD during this call, in execution order. */
  readonly yielded: number[];
  /** Trace events emitted during this call. */
  readonly trace: TraceEvent[];
  /** Next pc of the root context. */
  readonly pc: number;
  readonly trapCode?: number;
}

export interface TrapInfo {
  readonly contextId: number;
  /** Where execution continues on resume. */
  readonly pc: number;
  /** X_TRAP operand; null when a fault caused the trap. */
  readonly code: number | null;
  readonly error: Error | null;
}

export interface ExtensionOp extends ExtensionSpec {
  readonly run: Handler<HandlerContext>;
}

export interface SessionOptions {
  config?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
  /** Millisecond clock used for instruction budgets and elapsed time. */
  clock?: () => number;
  extensions?: readonly ExtensionOp[];
}

export interface TraceSinkHandle {
  readonly id: number;
}

interface Batch {
  readonly started: number;
  readonly events: TraceEvent[];
  readonly yielded: number[];
  executed: number;
}

const X_RESUME = EXECUTION_OPS.X_RESUME.opcode;

function checkRegisters(descriptor: OpcodeDescriptor, operands: readonly number[], registers: RegisterFile): void {
  descriptor.operands.forEach((kind, i) => {
    if (kind === 'reg') registers.checkGeneral(operands[i]);
    else if (kind === 'treg') registers.checkTensor(operands[i]);
    else if (kind === 'creg') registers.checkContext(operands[i]);
  });
}

/**
 * One engine instance: register file, store, consensus book and a scheduler of cooperative
 * contexts, driven batch by batch through `execute`. State persists across batches until `reset`.
 */
export class Session {
  readonly config: SessionConfig;
  readonly table: OpcodeTable;

  private readonly extensions: Map<number, Handler<HandlerContext>>;
  private readonly clock: () => number;
  private readonly registers: RegisterFile;
  private readonly store = new StateStore();
  private readonly book = new ConsensusBook();
  private readonly log: MemorySink = createMemorySink();
  private readonly sinks = new Map<number, TraceSink>();
  private scheduler: Scheduler;
  private program: readonly Instruction[] = [];
  private current: SessionState = 'Idle';
  private trap: TrapInfo | null = null;
  private batch: Batch | null = null;
  private nextSinkId = 1;
  private eventIndex = 0;
  private sinkFailure: { error: unknown } | null = null;

  constructor(options: SessionOptions = {}) {
    this.config = resolveConfig(options.config, options.env);
    const extensions = options.extensions ?? [];
    this.table = new OpcodeTable(extensions);
    this.extensions = new Map(extensions.map((ext) => [ext.opcode, ext.run]));
    this.clock = options.clock ?? (() => performance.now());
    this.registers = new RegisterFile(this.config.registers);
    this.scheduler = new Scheduler(this.registers);
    if (this.config.traceStdout) this.addTraceSink(stdoutSink());
  }

  get state(): SessionState {
    return this.current;
  }

  get trapInfo(): TrapInfo | null {
    return this.trap;
  }

  execute(program: readonly Instruction[]): ExecutionResult {
    if (this.current === 'Trapped') {
      const [only] = program;
      if (program.length === 1 && only.opcode === X_RESUME && only.operands.length === 0) return this.resume();
      throw new InvalidTransitionError('session is Trapped; only X_RESUME may run', { state: this.current });
    }
    if (this.current !== 'Idle') {
      throw new InvalidTransitionError(`cannot execute while ${this.current}`, { state: this.current });
    }
    this.program = program;
    this.scheduler.begin();
    return this.run(false);
  }

  executeFrame(frame: Uint8Array, options: FrameCodecOptions = {}): ExecutionResult {
    return this.execute(decodeFrame(frame, { table: this.table, ...options }).instructions);
  }

  resume(): ExecutionResult {
    if (this.current !== 'Trapped') {
      throw new InvalidTransitionError(`cannot resume while ${this.current}`, { state: this.current });
    }
    this.trap = null;
    return this.run(true);
  }

  abort(): void {
    if (this.current === 'Halted' || this.current === 'Aborted') {
      throw new InvalidTransitionError(`cannot abort while ${this.current}`, { state: this.current });
    }
    this.current = 'Aborted';
    this.emitEngine('session.abort', 'warn', 'session aborted by host');
    this.raiseSinkFailure();
  }

  /** Back to a fresh Idle session; registered sinks stay attached. */
  reset(): void {
    this.registers.reset();
    this.scheduler = new Scheduler(this.registers);
    this.store.clear();
    this.book.clear();
    this.log.take();
    this.program = [];
    this.current = 'Idle';
    this.trap = null;
    this.batch = null;
    this.eventIndex = 0;
  }

  readRegister(index: number): number {
    return this.registers.get(index);
  }

  writeRegister(index: number, value: number): void {
    this.checkWritable();
    this.registers.set(index, value);
  }

  readTensor(index: number): Tensor | null {
    const tensor = this.registers.getTensor(index);
    return tensor ? tensor.clone() : null;
  }

  writeTensor(index: number, tensor: Tensor | null): void {
    this.checkWritable();
    this.registers.setTensor(index, tensor ? tensor.clone() : null);
  }

  readContext(index: number): ContextValue | null {
    const value = this.registers.getContext(index);
    return value instanceof Uint8Array ? value.slice() : value;
  }

  writeContext(index: number, value: ContextValue | null): void {
    this.checkWritable();
    this.registers.setContext(index, value instanceof Uint8Array ? value.slice() : value);
  }

  snapshotRegisters(): RegisterSnapshot {
    return this.registers.snapshot();
  }

  stored(key: number): StoredValue | undefined {
    return this.store.get(key);
  }

  proposal(id: number): ConsensusRound | undefined {
    return this.book.get(id);
  }

  proposals(): ConsensusRound[] {
    return this.book.list();
  }

  contexts(): ContextView[] {
    return this.scheduler.contexts();
  }

  addTraceSink(sink: TraceSink): TraceSinkHandle {
    const id = this.nextSinkId++;
    this.sinks.set(id, sink);
    return { id };
  }

  removeTraceSink(handle: TraceSinkHandle): boolean {
    return this.sinks.delete(handle.id);
  }

  traceEvents(min?: TraceSeverity): TraceEvent[] {
    return this.log.peek(min);
  }

  clearTrace(): void {
    this.log.take();
  }

  private checkWritable(): void {
    if (this.current === 'Running') {
      throw new InvalidTransitionError('registers cannot be written from outside while Running');
    }
  }

  private run(resumed: boolean): ExecutionResult {
    const batch: Batch = { started: this.clock(), events: [], yielded: [], executed: 0 };
    this.batch = batch;
    this.current = 'Running';
    let rotate = false;
    try {
      if (resumed) this.emitEngine('session.resume', 'info', 'session resumed');
      this.raiseSinkFailure();
      for (;;) {
        const ctx = this.scheduler.pick(rotate);
        if (!ctx) {
          this.current = 'Idle';
          break;
        }
        if (ctx.pc >= this.program.length) {
          ctx.status = 'done';
          rotate = true;
          continue;
        }
        if (batch.executed >= this.config.maxSteps) {
          throw new InstructionTimeoutError(`step budget of ${this.config.maxSteps} instructions exhausted`, {
            maxSteps: this.config.maxSteps,
          });
        }
        rotate = this.step(ctx, batch);
        this.raiseSinkFailure();
        if (this.current !== 'Running') break;
      }
    } catch (error) {
      this.fault(error);
      this.sinkFailure = null;
      throw error;
    } finally {
      this.batch = null;
    }
    return {
      state: this.current,
      instructionsExecuted: batch.executed,
      elapsedMs: this.clock() - batch.started,
      yielded: batch.yielded,
      trace: batch.events,
      pc: this.scheduler.root.pc,
      ...(this.trap && this.trap.code !== null ? { trapCode: this.trap.code } : {}),
    };
  }

  /** Runs one instruction of `ctx`. Returns true when the scheduler should move to another context. */
  private step(ctx: ContextRecord, batch: Batch): boolean {
    const pc = ctx.pc;
    const instruction = this.program[pc];
    const descriptor = this.table.lookup(instruction.opcode);
    validateOperands(descriptor, instruction.operands);
    checkRegisters(descriptor, instruction.operands, ctx.registers);
    const handler = resolveHandler(descriptor, this.extensions);

    const stage = new Stage(ctx.registers, this.program.length);
    const started = this.clock();
    handler(this.capability(ctx, stage, pc), instruction.operands);
    const elapsed = this.clock() - started;
    if (elapsed > this.config.instructionTimeoutMs) {
      throw new InstructionTimeoutError(
        `${descriptor.mnemonic} took ${elapsed}ms, budget is ${this.config.instructionTimeoutMs}ms`,
        { mnemonic: descriptor.mnemonic, elapsed, budget: this.config.instructionTimeoutMs },
      );
    }
    stage.commit();

    const where: TraceContext = {
      pc,
      contextId: ctx.id,
      tick: this.scheduler.tick,
      opcode: descriptor.opcode,
      mnemonic: descriptor.mnemonic,
    };
    batch.executed++;
    this.scheduler.tick++;
    batch.yielded.push(...stage.yielded);
    this.emit('engine', { type: 'exec.dispatch', severity: 'debug', message: formatInstruction(instruction, this.table) }, where);
    for (const event of stage.events) this.emit(descriptor.domain, event, where);

    switch (stage.transition) {
      case 'halt':
        ctx.pc = pc + 1;
        ctx.status = 'done';
        if (ctx.id !== ROOT_CONTEXT) return true;
        this.scheduler.killAllButRoot();
        this.current = 'Halted';
        this.emit('engine', { type: 'session.halt', severity: 'info', message: 'session halted' }, where);
        return false;
      case 'abort':
        this.current = 'Aborted';
        this.emit('engine', { type: 'session.abort', severity: 'warn', message: 'session aborted by X_ABORT' }, where);
        return false;
      case 'trap':
        ctx.pc = pc + 1;
        this.current = 'Trapped';
        this.trap = { contextId: ctx.id, pc: ctx.pc, code: stage.trapCode, error: null };
        this.emit(
          'engine',
          { type: 'session.trap', severity: 'warn', message: `trap ${stage.trapCode}`, data: { code: stage.trapCode } },
          where,
        );
        return false;
      case null:
        break;
    }

    ctx.pc = stage.next ?? pc + 1;
    if ((stage.switchKind === 'complete' || ctx.pc >= this.program.length) && ctx.status === 'runnable') {
      ctx.status = 'done';
    }
    return ctx.status !== 'runnable' || stage.switchKind === 'yield';
  }

  private capability(ctx: ContextRecord, stage: Stage, pc: number): EngineCapability {
    return {
      registers: ctx.registers,
      stage,
      pc,
      contextId: ctx.id,
      scheduler: this.scheduler,
      context: ctx,
      programLength: this.program.length,
      maxCallDepth: this.config.maxCallDepth,
      store: this.store,
      book: this.book,
      agentId: this.config.agentId,
    };
  }

  /**
   * Staged writes of the failing instruction are already gone; park the session at that pc. A session
   * that halted or aborted in the same step stays terminal.
   */
  private fault(error: unknown): void {
    const ctx = this.scheduler.current;
    const err = error instanceof Error ? error : new Error(String(error));
    if (this.current !== 'Halted' && this.current !== 'Aborted') {
      this.current = 'Trapped';
      this.trap = { contextId: ctx.id, pc: ctx.pc, code: null, error: err };
    }
    const code = isScrawlError(err) ? err.code : err.name;
    this.emit(
      'engine',
      { type: 'engine.fault', severity: 'error', message: err.message, data: { code } },
      { pc: ctx.pc, contextId: ctx.id, tick: this.scheduler.tick },
    );
  }

  private emitEngine(type: string, severity: TraceSeverity, message: string): void {
    const ctx = this.scheduler.current;
    this.emit('engine', { type, severity, message }, { pc: ctx.pc, contextId: ctx.id, tick: this.scheduler.tick });
  }

  private emit(domain: string, pending: PendingEvent, context: TraceContext): void {
    const event: TraceEvent = {
      index: this.eventIndex++,
      type: pending.type,
      severity: pending.severity,
      domain,
      message: pending.message,
      context,
      ...(pending.data ? { data: pending.data } : {}),
    };
    this.log.sink(event);
    this.batch?.events.push(event);
    for (const sink of this.sinks.values()) {
      try {
        sink(event);
      } catch (error) {
        if (this.sinkFailure === null) this.sinkFailure = { error };
      }
    }
  }

  /** A sink that throws still lets the current step commit; its error surfaces once the step is done. */
  private raiseSinkFailure(): void {
    const failure = this.sinkFailure;
    if (failure === null) return;
    this.sinkFailure = null;
    throw failure.error;
  }
}
