import { afterEach, describe, expect, it, vi } from 'vitest';
import { createMemorySink } from '@scrawl/trace';

import { encodeFrame, writeFrame } from '../src/codec/frame.js';
import { encodePayload } from '../src/codec/payload.js';
import type { ConfigOverrides } from '../src/config.js';
import { DecodeError } from '../src/errors.js';
import { IdentityBaseline } from '../src/identity/baseline.js';
import { ins } from '../src/model/instruction.js';
import { Tensor } from '../src/registers/tensor.js';
import { Session } from '../src/vm/session.js';
import type { ExtensionOp } from '../src/vm/session.js';

const session = (config: ConfigOverrides = {}): Session => new Session({ config, env: {} });

describe('session lifecycle', () => {
  it('halts on X_HALT and reports the batch', () => {
    const s = session();
    const result = s.execute([ins('S_SET', 0, 5), ins('X_HALT')]);
    expect(result).toMatchObject({ state: 'Halted', instructionsExecuted: 2, yielded: [], pc: 2 });
    expect(result.trapCode).toBeUndefined();
    expect(s.state).toBe('Halted');
    expect(s.readRegister(0)).toBe(5);
  });

  it('returns to Idle when a batch runs off the end and keeps state between batches', () => {
    const s = session();
    expect(s.execute([ins('S_SET', 0, 5)])).toMatchObject({ state: 'Idle', pc: 1, instructionsExecuted: 1 });
    s.execute([ins('S_MOVE', 1, 0)]);
    expect(s.readRegister(1)).toBe(5);
  });

  it('treats Halted and Aborted as terminal', () => {
    const s = session();
    s.execute([ins('X_HALT')]);
    expect(() => s.execute([ins('X_NOP')])).toThrowError('E_INVALID_TRANSITION: cannot execute while Halted');
    expect(() => s.abort()).toThrowError('cannot abort while Halted');

    const t = session();
    t.abort();
    expect(t.state).toBe('Aborted');
    expect(t.traceEvents().map((e) => e.type)).toEqual(['session.abort']);
    expect(() => t.execute([ins('X_NOP')])).toThrowError('cannot execute while Aborted');
    expect(() => t.abort()).toThrowError('cannot abort while Aborted');
  });

  it('aborts from inside a program', () => {
    const s = session();
    const result = s.execute([ins('S_SET', 0, 1), ins('X_ABORT'), ins('S_SET', 0, 2)]);
    expect(result.state).toBe('Aborted');
    expect(s.readRegister(0)).toBe(1);
    expect(result.trace.at(-1)).toMatchObject({ type: 'session.abort', severity: 'warn' });
  });

  it('ignores X_RESUME while running', () => {
    const s = session();
    expect(s.execute([ins('X_RESUME'), ins('S_SET', 0, 1)]).state).toBe('Idle');
    expect(s.readRegister(0)).toBe(1);
    expect(() => s.resume()).toThrowError('cannot resume while Idle');
  });

  it('resets to a fresh Idle session', () => {
    const s = session();
    s.execute([ins('S_SET', 0, 5), ins('S_STORE', 1, 0), ins('C_PROPOSE', 1, 0, 1), ins('X_HALT')]);
    s.reset();
    expect(s.state).toBe('Idle');
    expect(s.readRegister(0)).toBe(0);
    expect(s.stored(1)).toBeUndefined();
    expect(s.proposals()).toEqual([]);
    expect(s.traceEvents()).toEqual([]);
    expect(s.contexts()).toEqual([{ id: 0, parent: null, pc: 0, status: 'runnable' }]);
    expect(s.execute([ins('X_HALT')]).trace[0].index).toBe(0);
  });

  it('fails on invalid configuration', () => {
    expect(() => session({ maxSteps: 0 })).toThrowError('E_CONFIG');
  });
});

describe('traps and faults', () => {
  const program = [ins('S_SET', 0, 1), ins('X_TRAP', 7), ins('S_SET', 0, 2), ins('X_HALT')];

  it('traps with a code and resumes after the trap', () => {
    const s = session();
    const trapped = s.execute(program);
    expect(trapped).toMatchObject({ state: 'Trapped', trapCode: 7, pc: 2, instructionsExecuted: 2 });
    expect(s.trapInfo).toEqual({ contextId: 0, pc: 2, code: 7, error: null });
    expect(trapped.trace.at(-1)).toMatchObject({ type: 'session.trap', severity: 'warn', data: { code: 7 } });

    const resumed = s.resume();
    expect(resumed).toMatchObject({ state: 'Halted', instructionsExecuted: 2 });
    expect(resumed.trapCode).toBeUndefined();
    expect(resumed.trace.map((e) => e.type)).toEqual(['session.resume', 'exec.dispatch', 'exec.dispatch', 'session.halt']);
    expect(s.readRegister(0)).toBe(2);
    expect(s.trapInfo).toBeNull();
  });

  it('accepts a lone X_RESUME batch while trapped and nothing else', () => {
    const s = session();
    s.execute(program);
    expect(() => s.execute([ins('S_SET', 0, 9)])).toThrowError('session is Trapped; only X_RESUME may run');
    expect(s.execute([ins('X_RESUME')]).state).toBe('Halted');
  });

  it('traps at the failing instruction, rethrows and re-runs it on resume', () => {
    const s = session();
    expect(() => s.execute([ins('S_SET', 0, 3), ins('T_ADD', 0, 1), ins('X_HALT')])).toThrowError('E_DECODE: TR1 is empty');
    expect(s.state).toBe('Trapped');
    expect(s.readRegister(0)).toBe(3);
    expect(s.trapInfo).toMatchObject({ contextId: 0, pc: 1, code: null });
    expect(s.trapInfo?.error).toBeInstanceOf(DecodeError);

    const [fault] = s.traceEvents('error');
    expect(fault).toMatchObject({
      type: 'engine.fault',
      domain: 'engine',
      data: { code: 'E_DECODE' },
      context: { pc: 1, contextId: 0, tick: 1 },
    });

    s.writeTensor(0, Tensor.from([2], [1, 2]));
    s.writeTensor(1, Tensor.from([2], [10, 20]));
    expect(s.resume().state).toBe('Halted');
    expect(s.readTensor(0)?.toArray()).toEqual([11, 22]);
  });

  it('rejects register indices beyond the bank', () => {
    const s = session();
    expect(() => s.execute([ins('S_SET', 16, 1)])).toThrowError('E_REGISTER_RANGE: R16 out of range (bank size 16)');
    expect(() => s.execute([{ opcode: 0x60, operands: [0] }])).toThrowError('E_INVALID_TRANSITION');
  });

  it('rejects malformed operands and jump targets', () => {
    expect(() => session().execute([{ opcode: 0x60, operands: [0] }])).toThrowError('S_SET takes 2 operands, got 1');
    expect(() => session().execute([ins('X_JUMP', 5)])).toThrowError('jump target 5 outside program of 1 instructions');
    expect(() => session().execute([{ opcode: 0xc7, operands: [] }])).toThrowError('E_UNKNOWN_OPCODE');
  });

  it('stops runaway loops at the step budget', () => {
    const s = session({ maxSteps: 10 });
    expect(() => s.execute([ins('X_JUMP', 0)])).toThrowError('E_INSTRUCTION_TIMEOUT: step budget of 10 instructions exhausted');
    expect(s.trapInfo).toMatchObject({ pc: 0, code: null });
  });

  it('limits call depth', () => {
    expect(() => session({ maxCallDepth: 4 }).execute([ins('X_CALL', 0)])).toThrowError('E_STACK_OVERFLOW: call depth limit 4 exceeded');
  });
});

describe('extensions and budgets', () => {
  it('dispatches extension opcodes to their handlers', () => {
    const ping: ExtensionOp = {
      opcode: 0xc0,
      mnemonic: 'X_PING',
      operands: ['reg'],
      run: ({ stage }, [dst]) => {
        stage.setScalar(dst, 1);
        stage.emit({ type: 'ping', severity: 'info', message: 'pong' });
      },
    };
    const s = new Session({ env: {}, extensions: [ping] });
    const result = s.execute([{ opcode: 0xc0, operands: [3] }]);
    expect(s.readRegister(3)).toBe(1);
    expect(result.trace.map((e) => [e.domain, e.type])).toEqual([
      ['engine', 'exec.dispatch'],
      ['extension', 'ping'],
    ]);
    expect(result.trace[0].message).toBe('X_PING 3');
  });

  it('discards staged writes when an instruction overruns its budget', () => {
    let now = 0;
    const slow: ExtensionOp = {
      opcode: 0xc0,
      mnemonic: 'X_SLOW',
      operands: ['reg'],
      run: ({ stage }, [dst]) => {
        stage.setScalar(dst, 1);
        now += 100;
      },
    };
    const s = new Session({ env: {}, clock: () => now, extensions: [slow] });
    expect(() => s.execute([{ opcode: 0xc0, operands: [0] }])).toThrowError('E_INSTRUCTION_TIMEOUT: X_SLOW took 100ms, budget is 50ms');
    expect(s.readRegister(0)).toBe(0);
    expect(s.state).toBe('Trapped');
  });

  it('discards staged writes when a handler throws', () => {
    const broken: ExtensionOp = {
      opcode: 0xc1,
      mnemonic: 'X_BROKEN',
      operands: ['reg'],
      run: ({ stage }, [dst]) => {
        stage.setScalar(dst, 9);
        throw new Error('sensor offline');
      },
    };
    const s = new Session({ env: {}, extensions: [broken] });
    expect(() => s.execute([{ opcode: 0xc1, operands: [0] }])).toThrowError('sensor offline');
    expect(s.readRegister(0)).toBe(0);
    expect(s.traceEvents('error')[0].data).toEqual({ code: 'Error' });
  });

  it('refuses register writes from outside while running', () => {
    const s: Session = new Session({
      env: {},
      extensions: [{ opcode: 0xc0, mnemonic: 'X_POKE', operands: [], run: () => s.writeRegister(0, 1) }],
    });
    expect(() => s.execute([{ opcode: 0xc0, operands: [] }])).toThrowError('registers cannot be written from outside while Running');
    s.writeRegister(0, 1);
    expect(s.readRegister(0)).toBe(1);
  });

  it('measures elapsed time with the injected clock', () => {
    let now = 1000;
    const s = new Session({ env: {}, clock: () => (now += 2) });
    // batch start, then before and after the one handler, then the final reading
    expect(s.execute([ins('X_NOP')]).elapsedMs).toBe(6);
  });
});

describe('control flow', () => {
  it('loops on a counter', () => {
    const result = session().execute([ins('S_SET', 0, 3), ins('X_YIELD', 0), ins('X_LOOP', 0, 1), ins('X_HALT')]);
    expect(result.yielded).toEqual([3, 2, 1]);
    expect(result.instructionsExecuted).toBe(8);
  });

  it('branches on a non-zero register', () => {
    const program = [ins('X_BRANCH', 0, 3), ins('S_SET', 1, 1), ins('X_HALT'), ins('S_SET', 1, 2), ins('X_HALT')];
    const s = session();
    s.execute(program);
    expect(s.readRegister(1)).toBe(1);
    const t = session();
    t.writeRegister(0, 1);
    t.execute(program);
    expect(t.readRegister(1)).toBe(2);
  });

  it('calls and returns', () => {
    const program = [ins('X_CALL', 3), ins('X_YIELD', 0), ins('X_HALT'), ins('S_SET', 0, 9), ins('X_RETURN')];
    expect(session().execute(program).yielded).toEqual([9]);
  });

  it('completes the root on a return with an empty call stack', () => {
    const s = session();
    const result = s.execute([ins('S_SET', 0, 1), ins('X_RETURN'), ins('S_SET', 0, 2)]);
    expect(result).toMatchObject({ state: 'Idle', instructionsExecuted: 2 });
    expect(s.readRegister(0)).toBe(1);
  });

  it('ends the context on a jump to the program length', () => {
    const s = session();
    expect(s.execute([ins('X_JUMP', 2), ins('S_SET', 0, 1)]).state).toBe('Idle');
    expect(s.readRegister(0)).toBe(0);
  });
});

describe('trace sinks', () => {
  it('records dispatches with their context', () => {
    const result = session().execute([ins('X_HALT')]);
    expect(result.trace).toEqual([
      {
        index: 0,
        type: 'exec.dispatch',
        severity: 'debug',
        domain: 'engine',
        message: 'X_HALT',
        context: { pc: 0, contextId: 0, tick: 0, opcode: 0x41, mnemonic: 'X_HALT' },
      },
      {
        index: 1,
        type: 'session.halt',
        severity: 'info',
        domain: 'engine',
        message: 'session halted',
        context: { pc: 0, contextId: 0, tick: 0, opcode: 0x41, mnemonic: 'X_HALT' },
      },
    ]);
  });

  it('filters buffered events by severity', () => {
    const s = session();
    s.execute([ins('X_HALT')]);
    expect(s.traceEvents('info').map((e) => e.type)).toEqual(['session.halt']);
    s.clearTrace();
    expect(s.traceEvents()).toEqual([]);
  });

  it('feeds registered sinks until they are removed', () => {
    const s = session();
    const memory = createMemorySink();
    const handle = s.addTraceSink(memory.sink);
    s.execute([ins('X_NOP')]);
    expect(memory.take().map((e) => e.type)).toEqual(['exec.dispatch']);
    expect(s.removeTraceSink(handle)).toBe(true);
    expect(s.removeTraceSink(handle)).toBe(false);
    s.execute([ins('X_NOP')]);
    expect(memory.size).toBe(0);
  });

  it('commits the step before surfacing a sink failure', () => {
    const s = session();
    s.writeRegister(1, 3);
    let failures = 0;
    s.addTraceSink((event) => {
      if (event.type === 'exec.dispatch' && failures === 0) {
        failures++;
        throw new Error('sink offline');
      }
    });
    const memory = createMemorySink();
    s.addTraceSink(memory.sink);
    expect(() => s.execute([ins('X_LOOP', 1, 1)])).toThrowError('sink offline');
    expect(s.readRegister(1)).toBe(2);
    expect(s.state).toBe('Trapped');
    expect(s.trapInfo?.pc).toBe(1);
    expect(memory.take().map((e) => e.type)).toEqual(['exec.dispatch', 'engine.fault']);
    expect(s.resume().state).toBe('Idle');
    expect(s.readRegister(1)).toBe(2);
  });

  it('stays halted when a sink fails on the halt event', () => {
    const s = session();
    s.addTraceSink((event) => {
      if (event.type === 'session.halt') throw new Error('sink offline');
    });
    expect(() => s.execute([ins('X_HALT')])).toThrowError('sink offline');
    expect(s.state).toBe('Halted');
    expect(s.trapInfo).toBeNull();
  });

  describe('stdout', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('writes JSON lines when enabled', () => {
      const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
      const result = session({ traceStdout: true }).execute([ins('X_HALT')]);
      expect(write).toHaveBeenCalledWith(`${JSON.stringify(result.trace[0])}\n`);
      expect(write).toHaveBeenCalledWith(`${JSON.stringify(result.trace[1])}\n`);
    });
  });

  it('is deterministic across fresh sessions', () => {
    const program = [
      ins('I_DERIVE', 0, 0xbeef, 16),
      ins('I_FINGERPRINT', 0, 0),
      ins('X_FORK', 1, 6),
      ins('X_SLEEP', 2),
      ins('X_YIELD', 0),
      ins('X_HALT'),
      ins('S_SET', 2, 4),
      ins('X_YIELD', 2),
      ins('X_RETURN'),
    ];
    const a = session();
    const b = session();
    const ra = a.execute(program);
    const rb = b.execute(program);
    expect(ra.yielded).toEqual(rb.yielded);
    expect(ra.trace).toEqual(rb.trace);
    expect(a.snapshotRegisters()).toEqual(b.snapshotRegisters());
  });
});

describe('frames', () => {
  it('executes a framed program', () => {
    const s = session();
    expect(s.executeFrame(encodeFrame([ins('S_SET', 0, 42), ins('X_HALT')])).state).toBe('Halted');
    expect(s.readRegister(0)).toBe(42);
  });

  it('executes a compressed frame under the shared baseline', () => {
    const baseline = IdentityBaseline.derive(0xbeef, 16);
    const s = session();
    s.executeFrame(encodeFrame([ins('S_SET', 1, -7)], { baseline }), { baseline });
    expect(s.readRegister(1)).toBe(-7);
  });

  it('runs nothing from a frame with an invalid operand', () => {
    const s = session();
    const head = encodePayload([ins('S_SET', 0, 42), ins('T_ALLOC', 0, 1, 1)]);
    const fill = new Uint8Array(10);
    fill[0] = 0x01;
    new DataView(fill.buffer).setFloat64(2, Number.NaN, true);
    const payload = new Uint8Array(head.length + fill.length);
    payload.set(head);
    payload.set(fill, head.length);
    expect(() => s.executeFrame(writeFrame(payload, 0))).toThrowError(DecodeError);
    expect(s.readRegister(0)).toBe(0);
    expect(s.readTensor(0)).toBeNull();
    expect(s.state).toBe('Idle');
  });

  it('leaves the session untouched when the frame is corrupt', () => {
    const s = session();
    const frame = encodeFrame([ins('S_SET', 0, 42)]);
    frame[16] ^= 0xff;
    expect(() => s.executeFrame(frame)).toThrowError('E_CORRUPT_FRAME');
    expect(s.state).toBe('Idle');
  });
});
