import type { TraceSeverity, TraceValue } from '@scrawl/trace';

import { DecodeError } from '../errors.js';
import type { ContextValue, RegisterFile } from '../registers/file.js';
import type { Tensor } from '../registers/tensor.js';

export type SwitchKind = 'none' | 'yield' | 'block' | 'complete';
export type SessionTransition = 'halt' | 'trap' | 'abort';

export interface PendingEvent {
  readonly type: string;
  readonly severity: TraceSeverity;
  readonly message: string;
  readonly data?: Readonly<Record<string, TraceValue>>;
}

/**
 * Everything one instruction wants to change, held back until the instruction has finished inside
 * its time budget. Reads go straight to the live registers; writes are queued as effects and run in
 * order by `commit()`. A fault or timeout drops the stage and nothing it queued happens.
 */
export class Stage {
  private readonly effects: (() => void)[] = [];
  readonly events: PendingEvent[] = [];
  readonly yielded: number[] = [];

  /** Redirected pc, or null to fall through to pc + 1. */
  next: number | null = null;
  switchKind: SwitchKind = 'none';
  transition: SessionTransition | null = null;
  trapCode = 0;

  constructor(
    readonly registers: RegisterFile,
    readonly programLength: number,
  ) {}

  setScalar(index: number, value: number): void {
    this.registers.checkGeneral(index);
    this.effects.push(() => this.registers.set(index, value));
  }

  setTensor(index: number, tensor: Tensor | null): void {
    this.registers.checkTensor(index);
    this.effects.push(() => this.registers.setTensor(index, tensor));
  }

  /** Queues an in-place change to the tensor currently in `index`; the slot must be filled now. */
  mutateTensor(index: number, mutate: (tensor: Tensor) => void): void {
    const tensor = this.registers.requireTensor(index);
    this.effects.push(() => mutate(tensor));
  }

  setContext(index: number, value: ContextValue | null): void {
    this.registers.checkContext(index);
    this.effects.push(() => this.registers.setContext(index, value));
  }

  /** Queues a change to state outside the register file (store, consensus book, scheduler). */
  effect(run: () => void): void {
    this.effects.push(run);
  }

  emit(event: PendingEvent): void {
    this.events.push(event);
  }

  yieldValue(value: number): void {
    this.yielded.push(value);
    this.switchKind = 'yield';
  }

  /** A target equal to the program length is allowed and ends the context. */
  checkTarget(target: number): number {
    if (!Number.isInteger(target) || target < 0 || target > this.programLength) {
      throw new DecodeError(`jump target ${target} outside program of ${this.programLength} instructions`, {
        target,
        length: this.programLength,
      });
    }
    return target;
  }

  jump(target: number): void {
    this.next = this.checkTarget(target);
  }

  commit(): void {
    for (const run of this.effects) run();
    this.effects.length = 0;
  }
}
