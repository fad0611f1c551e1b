import { EmulatorError, formatAddress } from './errors';
import {
  decodeInstruction,
  findOpcodeByCode,
  SVC_HALT,
  type DecodedInstruction,
  type OpcodeSpec
} from './instructions';
import {
  FP_REGISTER,
  REGISTER_COUNT,
  SP_REGISTER,
  SR_EQUAL,
  SR_GREATER,
  SR_LESS,
  type CpuContext,
  type EmulatorOptions,
  type EventListener,
  type ExecutionEvent,
  type InputOutput,
  type Memory,
  type RegisterIndex
} from './types';

function toRegisterIndex(value: number): RegisterIndex {
  switch (value & 0x7) {
    case 0:
      return 0;
    case 1:
      return 1;
    case 2:
      return 2;
    case 3:
      return 3;
    case 4:
      return 4;
    case 5:
      return 5;
    case 6:
      return 6;
    default:
      return 7;
  }
}

function shiftLeft(value: number, amount: number): number {
  return amount < 0 || amount > 31 ? 0 : (value << amount) | 0;
}

function shiftRight(value: number, amount: number): number {
  return amount < 0 || amount > 31 ? 0 : (value >>> amount) | 0;
}

function shiftRightArithmetic(value: number, amount: number): number {
  return amount < 0 || amount > 31 ? (value < 0 ? -1 : 0) : value >> amount;
}

export class Emulator<M extends Memory = Memory, IO extends InputOutput = InputOutput> {
  readonly memory: M;

  readonly io: IO;

  readonly context: CpuContext;

  private readonly listeners: EventListener[] = [];

  // 実行中の命令が発生させたイベント。コミット後にまとめて通知する。
  private readonly pending: ExecutionEvent[] = [];

  private haltedFlag = false;

  constructor(memory: M, io: IO, options: EmulatorOptions = {}) {
    this.memory = memory;
    this.io = io;
    const stackStart = options.initialStackPointer ?? memory.size - 1;
    const registers = new Int32Array(REGISTER_COUNT);
    registers[SP_REGISTER] = stackStart;
    registers[FP_REGISTER] = stackStart;
    this.context = { r: registers, pc: 0, sr: 0 };
  }

  get halted(): boolean {
    return this.haltedFlag;
  }

  addListener(listener: EventListener): void {
    this.listeners.push(listener);
  }

  // 1 命令だけ実行する。停止済みなら何もしない。
  step(): void {
    if (this.haltedFlag) {
      return;
    }

    const pc = this.context.pc;
    const decoded = decodeInstruction(this.fetch(pc));
    const spec = findOpcodeByCode(decoded.opcode);
    if (!spec) {
      throw new EmulatorError(
        'ILLEGAL_INSTRUCTION',
        `Unknown opcode 0x${decoded.opcode.toString(16).padStart(2, '0')} at ${formatAddress(pc)}`,
        { pc }
      );
    }
    if (decoded.mode > 2) {
      throw new EmulatorError('ILLEGAL_MODE', `Invalid addressing mode ${decoded.mode} at ${formatAddress(pc)}`, { pc });
    }

    this.pending.length = 0;
    try {
      this.context.pc = this.execute(spec, decoded, pc);
    } catch (error) {
      this.pending.length = 0;
      throw error;
    }

    const events = this.pending.splice(0);
    for (const event of events) {
      for (const listener of this.listeners) {
        listener.event(event);
      }
    }
  }

  // HALT まで実行し、実行した命令数を返す。
  run(maxSteps = Number.POSITIVE_INFINITY): number {
    let steps = 0;
    while (!this.haltedFlag) {
      if (steps >= maxSteps) {
        throw new EmulatorError('RUNAWAY', `Program did not halt within ${maxSteps} steps`, { pc: this.context.pc });
      }
      this.step();
      steps += 1;
    }
    return steps;
  }

  private fetch(pc: number): number {
    try {
      return this.memory.getData(pc);
    } catch (error) {
      if (error instanceof EmulatorError) {
        throw new EmulatorError('MEMORY_ACCESS', `Instruction fetch outside memory at ${formatAddress(pc)}`, {
          pc,
          address: pc
        });
      }
      throw error;
    }
  }

  private execute(spec: OpcodeSpec, ins: DecodedInstruction, pc: number): number {
    const next = pc + 1;
    const rj = toRegisterIndex(ins.rj);
    const a = this.register(rj);

    switch (spec.mnemonic) {
      case 'NOP':
        return next;
      case 'STORE':
        this.writeMemory(this.operand(ins), a);
        return next;
      case 'LOAD':
        this.setRegister(rj, this.operand(ins));
        return next;
      case 'IN': {
        const device = this.operand(ins);
        this.setRegister(rj, this.io.input(device) | 0);
        return next;
      }
      case 'OUT': {
        const device = this.operand(ins);
        this.io.output(device, a);
        this.pending.push({ kind: 'output', device, data: a });
        return next;
      }
      case 'ADD':
        this.setRegister(rj, a + this.operand(ins));
        return next;
      case 'SUB':
        this.setRegister(rj, a - this.operand(ins));
        return next;
      case 'MUL':
        this.setRegister(rj, Math.imul(a, this.operand(ins)));
        return next;
      case 'DIV':
        this.setRegister(rj, Math.trunc(a / this.divisor(ins, pc)));
        return next;
      case 'MOD':
        this.setRegister(rj, a % this.divisor(ins, pc));
        return next;
      case 'AND':
        this.setRegister(rj, a & this.operand(ins));
        return next;
      case 'OR':
        this.setRegister(rj, a | this.operand(ins));
        return next;
      case 'XOR':
        this.setRegister(rj, a ^ this.operand(ins));
        return next;
      case 'SHL':
        this.setRegister(rj, shiftLeft(a, this.operand(ins)));
        return next;
      case 'SHR':
        this.setRegister(rj, shiftRight(a, this.operand(ins)));
        return next;
      case 'SHRA':
        this.setRegister(rj, shiftRightArithmetic(a, this.operand(ins)));
        return next;
      case 'NOT':
        this.setRegister(rj, ~a);
        return next;
      case 'COMP': {
        const b = this.operand(ins);
        this.context.sr = a > b ? SR_GREATER : a === b ? SR_EQUAL : SR_LESS;
        return next;
      }
      case 'JUMP':
        return this.operand(ins);
      case 'JNEG':
        return a < 0 ? this.operand(ins) : next;
      case 'JZER':
        return a === 0 ? this.operand(ins) : next;
      case 'JPOS':
        return a > 0 ? this.operand(ins) : next;
      case 'JNNEG':
        return a >= 0 ? this.operand(ins) : next;
      case 'JNZER':
        return a !== 0 ? this.operand(ins) : next;
      case 'JNPOS':
        return a <= 0 ? this.operand(ins) : next;
      case 'JLES':
        return (this.context.sr & SR_LESS) !== 0 ? this.operand(ins) : next;
      case 'JEQU':
        return (this.context.sr & SR_EQUAL) !== 0 ? this.operand(ins) : next;
      case 'JGRE':
        return (this.context.sr & SR_GREATER) !== 0 ? this.operand(ins) : next;
      case 'JNLES':
        return (this.context.sr & SR_LESS) === 0 ? this.operand(ins) : next;
      case 'JNEQU':
        return (this.context.sr & SR_EQUAL) === 0 ? this.operand(ins) : next;
      case 'JNGRE':
        return (this.context.sr & SR_GREATER) === 0 ? this.operand(ins) : next;
      case 'CALL': {
        const target = this.operand(ins);
        this.push(rj, next);
        this.push(rj, this.register(FP_REGISTER));
        this.setRegister(FP_REGISTER, this.register(rj));
        return target;
      }
      case 'EXIT': {
        const params = this.operand(ins);
        const frame = this.pop(rj);
        const returnAddress = this.pop(rj);
        this.setRegister(FP_REGISTER, frame);
        this.setRegister(rj, this.register(rj) - params);
        return returnAddress;
      }
      case 'PUSH':
        this.push(rj, this.operand(ins));
        return next;
      case 'POP':
        this.setRegister(toRegisterIndex(ins.ri), this.pop(rj));
        return next;
      case 'PUSHR':
        for (let index = 0; index <= 5; index += 1) {
          this.push(rj, this.register(toRegisterIndex(index)));
        }
        return next;
      case 'POPR':
        for (let index = 5; index >= 0; index -= 1) {
          this.setRegister(toRegisterIndex(index), this.pop(rj));
        }
        return next;
      case 'SVC': {
        const code = this.operand(ins);
        this.io.supervisorCall(code);
        this.pending.push({ kind: 'supervisor-call', code });
        if (code === SVC_HALT) {
          this.haltedFlag = true;
        }
        return next;
      }
      default:
        throw new EmulatorError('ILLEGAL_INSTRUCTION', `Unhandled instruction ${spec.mnemonic} at ${formatAddress(pc)}`, {
          pc
        });
    }
  }

  // ADDR + Ri を起点に mode 回メモリを参照した値。
  private operand(ins: DecodedInstruction): number {
    let value = ins.addr + (ins.ri === 0 ? 0 : this.register(toRegisterIndex(ins.ri)));
    for (let i = 0; i < ins.mode; i += 1) {
      value = this.memory.getData(value);
    }
    return value | 0;
  }

  private divisor(ins: DecodedInstruction, pc: number): number {
    const value = this.operand(ins);
    if (value === 0) {
      throw new EmulatorError('DIVISION_BY_ZERO', `Division by zero at ${formatAddress(pc)}`, { pc });
    }
    return value;
  }

  private register(index: RegisterIndex): number {
    return this.context.r[index] ?? 0;
  }

  private setRegister(index: RegisterIndex, value: number): void {
    const data = value | 0;
    this.context.r[index] = data;
    this.pending.push({ kind: 'register-change', register: index, data });
  }

  private writeMemory(address: number, value: number): void {
    const data = value | 0;
    this.memory.setData(address, data);
    this.pending.push({ kind: 'memory-change', address, data });
  }

  private push(stack: RegisterIndex, value: number): void {
    const top = this.register(stack) + 1;
    this.setRegister(stack, top);
    this.writeMemory(top, value);
  }

  private pop(stack: RegisterIndex): number {
    const top = this.register(stack);
    const value = this.memory.getData(top);
    this.setRegister(stack, top - 1);
    return value;
  }
}
