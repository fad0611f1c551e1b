import { describe, expect, it } from 'vitest';

import { Emulator } from '../src/emulator';
import { EmulatorError } from '../src/errors';
import {
  ADDRESSING_DIRECT,
  ADDRESSING_IMMEDIATE,
  ADDRESSING_INDIRECT,
  encodeInstruction,
  findOpcodeByMnemonic,
  SVC_HALT
} from '../src/instructions';
import { GrowableMemory } from '../src/memory';
import type { EventListener, ExecutionEvent, InputOutput } from '../src/types';

class Io implements InputOutput {
  readonly inputs: number[] = [];

  readonly outLog: Array<{ device: number; data: number }> = [];

  readonly calls: number[] = [];

  input(_device: number): number {
    const value = this.inputs.shift();
    if (value === undefined) {
      throw new Error('no input');
    }
    return value;
  }

  output(device: number, data: number): void {
    this.outLog.push({ device, data });
  }

  supervisorCall(code: number): void {
    this.calls.push(code);
  }
}

class Recorder implements EventListener {
  readonly events: ExecutionEvent[] = [];

  event(event: ExecutionEvent): void {
    this.events.push(event);
  }
}

function op(mnemonic: string, rj = 0, mode = ADDRESSING_IMMEDIATE, addr = 0, ri = 0): number {
  const spec = findOpcodeByMnemonic(mnemonic);
  if (!spec) {
    throw new Error(`unknown mnemonic ${mnemonic}`);
  }
  return encodeInstruction({ opcode: spec.code, rj, mode, ri, addr });
}

const HALT = op('SVC', 6, ADDRESSING_IMMEDIATE, SVC_HALT);

function boot(image: number[]): { emulator: Emulator<GrowableMemory, Io>; io: Io; recorder: Recorder } {
  const io = new Io();
  const emulator = new Emulator(new GrowableMemory(image), io);
  const recorder = new Recorder();
  emulator.addListener(recorder);
  return { emulator, io, recorder };
}

describe('Emulator', () => {
  it('starts with SP and FP at the last image address', () => {
    const { emulator } = boot([op('NOP'), HALT, 5]);
    expect(emulator.context.r[6]).toBe(2);
    expect(emulator.context.r[7]).toBe(2);
    expect(emulator.context.pc).toBe(0);
  });

  it('starts the stack at the configured address', () => {
    const emulator = new Emulator(new GrowableMemory([op('PUSH', 6, ADDRESSING_IMMEDIATE, 9), HALT]), new Io(), {
      initialStackPointer: 10
    });
    expect(emulator.context.r[7]).toBe(10);

    emulator.step();
    expect(emulator.context.r[6]).toBe(11);
    expect(emulator.memory.getData(11)).toBe(9);
    expect(emulator.memory.getData(10)).toBe(0);
  });

  it('loads, outputs and halts', () => {
    const { emulator, io, recorder } = boot([op('LOAD', 1, ADDRESSING_IMMEDIATE, 42), op('OUT', 1, ADDRESSING_IMMEDIATE, 0), HALT]);

    emulator.step();
    expect(recorder.events).toEqual([{ kind: 'register-change', register: 1, data: 42 }]);

    emulator.step();
    expect(io.outLog).toEqual([{ device: 0, data: 42 }]);
    expect(recorder.events[1]).toEqual({ kind: 'output', device: 0, data: 42 });

    emulator.step();
    expect(emulator.halted).toBe(true);
    expect(io.calls).toEqual([SVC_HALT]);
    expect(emulator.context.pc).toBe(3);

    emulator.step();
    expect(emulator.context.pc).toBe(3);
    expect(recorder.events).toHaveLength(3);
  });

  it('resolves direct, indirect and indexed operands', () => {
    const { emulator } = boot([
      op('LOAD', 1, ADDRESSING_DIRECT, 5),
      op('LOAD', 2, ADDRESSING_INDIRECT, 6),
      op('LOAD', 3, ADDRESSING_DIRECT, 4, 4),
      op('NOP'),
      HALT,
      11,
      5
    ]);
    emulator.context.r[4] = 1;

    emulator.step();
    emulator.step();
    emulator.step();

    expect(emulator.context.r[1]).toBe(11);
    expect(emulator.context.r[2]).toBe(11);
    expect(emulator.context.r[3]).toBe(11);
  });

  it('stores through an address operand and reports the memory change', () => {
    const { emulator, recorder } = boot([op('LOAD', 1, ADDRESSING_IMMEDIATE, -3), op('STORE', 1, ADDRESSING_IMMEDIATE, 3), HALT, 0]);

    emulator.run();

    expect(emulator.memory.getData(3)).toBe(-3);
    expect(recorder.events).toContainEqual({ kind: 'memory-change', address: 3, data: -3 });
  });

  it('wraps arithmetic to 32-bit words', () => {
    const { emulator } = boot([
      op('LOAD', 1, ADDRESSING_DIRECT, 4),
      op('ADD', 1, ADDRESSING_IMMEDIATE, 1),
      op('MUL', 1, ADDRESSING_IMMEDIATE, 2),
      HALT,
      0x7fffffff
    ]);

    emulator.run();

    expect(emulator.context.r[1]).toBe(0);
  });

  it('branches on comparison results', () => {
    const { emulator, io } = boot([
      op('LOAD', 1, ADDRESSING_IMMEDIATE, 3),
      op('COMP', 1, ADDRESSING_IMMEDIATE, 5),
      op('JLES', 0, ADDRESSING_IMMEDIATE, 5),
      op('OUT', 1, ADDRESSING_IMMEDIATE, 0),
      HALT,
      op('LOAD', 1, ADDRESSING_IMMEDIATE, 9),
      op('OUT', 1, ADDRESSING_IMMEDIATE, 0),
      HALT
    ]);

    emulator.run();

    expect(io.outLog.map((entry) => entry.data)).toEqual([9]);
  });

  it('calls and exits subroutines through the stack', () => {
    const { emulator, io } = boot([
      op('PUSH', 6, ADDRESSING_IMMEDIATE, 20),
      op('CALL', 6, ADDRESSING_IMMEDIATE, 5),
      op('OUT', 1, ADDRESSING_IMMEDIATE, 0),
      HALT,
      op('NOP'),
      op('LOAD', 1, ADDRESSING_DIRECT, -2, 7),
      op('ADD', 1, ADDRESSING_IMMEDIATE, 1),
      op('EXIT', 6, ADDRESSING_IMMEDIATE, 1)
    ]);

    const sp = emulator.context.r[6];
    emulator.step();
    emulator.step();
    expect(emulator.context.pc).toBe(5);
    expect(emulator.context.r[7]).toBe((sp ?? 0) + 3);

    emulator.run();

    expect(emulator.context.r[6]).toBe(sp);
    expect(io.outLog.map((entry) => entry.data)).toEqual([21]);
  });

  it('leaves the program counter untouched when input is unavailable', () => {
    const { emulator, io, recorder } = boot([op('IN', 1, ADDRESSING_IMMEDIATE, 1), HALT]);

    expect(() => emulator.step()).toThrowError('no input');
    expect(emulator.context.pc).toBe(0);
    expect(recorder.events).toEqual([]);

    io.inputs.push(7);
    emulator.step();
    expect(emulator.context.r[1]).toBe(7);
    expect(emulator.context.pc).toBe(1);
  });

  it('faults on unknown opcodes and division by zero', () => {
    const unknown = boot([encodeInstruction({ opcode: 0x99, rj: 0, mode: 0, ri: 0, addr: 0 })]);
    expect(() => unknown.emulator.step()).toThrowError(/Unknown opcode 0x99/);

    const divide = boot([op('DIV', 1, ADDRESSING_IMMEDIATE, 0)]);
    try {
      divide.emulator.step();
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(EmulatorError);
      expect(error instanceof EmulatorError ? error.kind : undefined).toBe('DIVISION_BY_ZERO');
    }
  });

  it('stops runaway programs at the step limit', () => {
    const { emulator } = boot([op('JUMP', 0, ADDRESSING_IMMEDIATE, 0)]);
    expect(() => emulator.run(100)).toThrowError('Program did not halt within 100 steps');
  });
});
