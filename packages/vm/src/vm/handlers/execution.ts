import { InvalidTransitionError, StackOverflowError } from '../../errors.js';
import type { ExecutionOp } from '../../opcodes/domains.js';
import { RegisterFile } from '../../registers/file.js';
import type { ExecutionCapability, HandlerTable } from '../capabilities.js';
import { ROOT_CONTEXT } from '../scheduler.js';

function startContext(cx: ExecutionCapability, dst: number, target: number, fresh: boolean): void {
  const { scheduler, stage, registers, contextId } = cx;
  const pc = stage.checkTarget(target);
  const child = scheduler.nextId();
  // The child is created before R[dst] is written, so a forked window still holds the old value.
  stage.effect(() => {
    scheduler.spawn(contextId, pc, fresh ? new RegisterFile(registers.sizes) : registers.clone());
  });
  stage.setScalar(dst, child);
  stage.emit({
    type: fresh ? 'exec.spawn' : 'exec.fork',
    severity: 'debug',
    message: `context ${contextId} started context ${child} at ${pc}`,
    data: { child, target: pc },
  });
}

export const EXECUTION_HANDLERS: HandlerTable<ExecutionOp, ExecutionCapability> = {
  X_NOP: () => {},
  X_HALT: ({ stage }) => {
    stage.transition = 'halt';
  },
  X_JUMP: ({ stage }, [target]) => {
    stage.jump(target);
  },
  X_BRANCH: ({ registers, stage }, [cond, target]) => {
    stage.checkTarget(target);
    if (registers.get(cond) !== 0) stage.jump(target);
  },
  X_LOOP: ({ registers, stage }, [counter, target]) => {
    stage.checkTarget(target);
    const left = registers.get(counter) - 1;
    stage.setScalar(counter, left);
    if (left > 0) stage.jump(target);
  },
  X_CALL: ({ stage, context, pc, maxCallDepth }, [target]) => {
    if (context.callStack.length >= maxCallDepth) throw new StackOverflowError(maxCallDepth);
    stage.jump(target);
    stage.effect(() => {
      context.callStack.push(pc + 1);
    });
  },
  X_RETURN: ({ stage, context }) => {
    if (context.callStack.length === 0) {
      stage.switchKind = 'complete';
      return;
    }
    stage.jump(context.callStack[context.callStack.length - 1]);
    stage.effect(() => {
      context.callStack.pop();
    });
  },
  X_YIELD: ({ registers, stage }, [src]) => {
    stage.yieldValue(registers.get(src));
  },
  X_FORK: (cx, [dst, target]) => {
    startContext(cx, dst, target, false);
  },
  X_SPAWN: (cx, [dst, target]) => {
    startContext(cx, dst, target, true);
  },
  X_JOIN: ({ registers, stage, scheduler, context, contextId }, [ctx]) => {
    const target = registers.get(ctx);
    if (!scheduler.joinable(contextId, target)) return;
    stage.effect(() => {
      context.status = 'joining';
      context.joinTarget = target;
    });
    stage.switchKind = 'block';
  },
  X_KILL: ({ registers, stage, scheduler, contextId }, [ctx]) => {
    const target = registers.get(ctx);
    if (target === ROOT_CONTEXT) throw new InvalidTransitionError('the root context cannot be killed');
    stage.effect(() => scheduler.kill(target));
    stage.emit({
      type: 'exec.kill',
      severity: 'info',
      message: `context ${contextId} killed context ${target}`,
      data: { target },
    });
  },
  X_SLEEP: ({ stage, scheduler, context }, [ticks]) => {
    if (ticks <= 0) {
      stage.switchKind = 'yield';
      return;
    }
    stage.effect(() => {
      context.status = 'sleeping';
      context.wakeAt = scheduler.tick + ticks;
    });
    stage.switchKind = 'block';
  },
  X_WAKE: ({ registers, stage, scheduler }, [ctx]) => {
    const target = registers.get(ctx);
    stage.effect(() => scheduler.wake(target));
  },
  X_TRAP: ({ stage }, [code]) => {
    stage.transition = 'trap';
    stage.trapCode = code;
  },
  X_RESUME: () => {},
  X_ABORT: ({ stage }) => {
    stage.transition = 'abort';
  },
};
