import { InvalidTransitionError } from '../errors.js';
import type { RegisterFile } from '../registers/file.js';

export type ContextStatus = 'runnable' | 'sleeping' | 'joining' | 'done' | 'dead';

export interface ContextRecord {
  readonly id: number;
  readonly parent: number | null;
  pc: number;
  status: ContextStatus;
  registers: RegisterFile;
  readonly callStack: number[];
  wakeAt: number;
  joinTarget: number | null;
}

export interface ContextView {
  readonly id: number;
  readonly parent: number | null;
  readonly pc: number;
  readonly status: ContextStatus;
}

export const ROOT_CONTEXT = 0;

function finished(status: ContextStatus): boolean {
  return status === 'done' || status === 'dead';
}

/**
 * Cooperative round-robin over an arena of contexts addressed by index. A context keeps the
 * processor until it yields, blocks, completes or traps. Ids are never reused within a session.
 */
export class Scheduler {
  private readonly arena: ContextRecord[] = [];
  private cursor = ROOT_CONTEXT;
  tick = 0;

  constructor(rootRegisters: RegisterFile) {
    this.arena.push(this.record(ROOT_CONTEXT, null, 0, rootRegisters));
  }

  private record(id: number, parent: number | null, pc: number, registers: RegisterFile): ContextRecord {
    return { id, parent, pc, status: 'runnable', registers, callStack: [], wakeAt: 0, joinTarget: null };
  }

  get current(): ContextRecord {
    return this.arena[this.cursor];
  }

  get root(): ContextRecord {
    return this.arena[ROOT_CONTEXT];
  }

  get(id: number): ContextRecord | undefined {
    return Number.isInteger(id) && id >= 0 ? this.arena[id] : undefined;
  }

  nextId(): number {
    return this.arena.length;
  }

  /** Restarts the root at pc 0 for a new batch; earlier sub-contexts are all finished by now. */
  begin(): void {
    const root = this.root;
    root.pc = 0;
    root.status = 'runnable';
    root.callStack.length = 0;
    root.joinTarget = null;
    this.cursor = ROOT_CONTEXT;
  }

  spawn(parent: number, pc: number, registers: RegisterFile): number {
    const id = this.arena.length;
    this.arena.push(this.record(id, parent, pc, registers));
    return id;
  }

  /** Marks a context dead. Idempotent; the root cannot be killed. */
  kill(id: number): void {
    if (id === ROOT_CONTEXT) throw new InvalidTransitionError('the root context cannot be killed');
    const target = this.get(id);
    if (target && !finished(target.status)) target.status = 'dead';
  }

  killAllButRoot(): void {
    for (const ctx of this.arena) {
      if (ctx.id !== ROOT_CONTEXT && !finished(ctx.status)) ctx.status = 'dead';
    }
  }

  /** True when `id` names a live context other than `self`, i.e. a join would block. */
  joinable(self: number, id: number): boolean {
    const target = this.get(id);
    return target !== undefined && id !== self && !finished(target.status);
  }

  wake(id: number): void {
    const target = this.get(id);
    if (target && target.status === 'sleeping') target.status = 'runnable';
  }

  /** Releases sleepers whose tick has come and joiners whose target finished. */
  private release(): void {
    for (const ctx of this.arena) {
      if (ctx.status === 'sleeping' && ctx.wakeAt <= this.tick) ctx.status = 'runnable';
      if (ctx.status === 'joining') {
        const target = ctx.joinTarget === null ? undefined : this.get(ctx.joinTarget);
        if (!target || finished(target.status)) {
          ctx.status = 'runnable';
          ctx.joinTarget = null;
        }
      }
    }
  }

  /**
   * Picks the context to run next, starting after the current one when `rotate` is set.
   * Returns null once every context has finished. Fast-forwards the tick when only sleepers are
   * left; throws InvalidTransition when contexts remain but all of them wait on joins.
   */
  pick(rotate: boolean): ContextRecord | null {
    for (;;) {
      this.release();
      const n = this.arena.length;
      const start = rotate ? this.cursor + 1 : this.cursor;
      for (let k = 0; k < n; k++) {
        const ctx = this.arena[(start + k) % n];
        if (ctx.status === 'runnable') {
          this.cursor = ctx.id;
          return ctx;
        }
      }
      const sleepers = this.arena.filter((ctx) => ctx.status === 'sleeping');
      if (sleepers.length) {
        this.tick = Math.min(...sleepers.map((ctx) => ctx.wakeAt));
        continue;
      }
      const waiting = this.arena.filter((ctx) => ctx.status === 'joining');
      if (waiting.length) {
        throw new InvalidTransitionError(`deadlock: contexts ${waiting.map((ctx) => ctx.id).join(', ')} wait on joins`, {
          contexts: waiting.length,
        });
      }
      return null;
    }
  }

  contexts(): ContextView[] {
    return this.arena.map(({ id, parent, pc, status }) => ({ id, parent, pc, status }));
  }
}
