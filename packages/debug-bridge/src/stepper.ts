import type { CompiledProgram } from '@ttk91web/assembler-ttk91';
import {
  Emulator,
  EmulatorError,
  FP_REGISTER,
  GrowableMemory,
  SP_REGISTER,
  formatAddress
} from '@ttk91web/core-ttk91';

import { DeviceQueue } from './device-queue';
import { DebugBridgeError, isBridgeError } from './errors';
import { EventRelay } from './event-relay';
import { SourceMapAdapter } from './source-map';
import type { EventCallback, ListenerTarget, StepReport, StepTrace, StepperOptions, StepperState } from './types';

// イメージをメモリへ載せる。容量超過はエミュレーション障害として扱う。
export function loadMemory(image: ArrayLike<number>): GrowableMemory {
  try {
    return new GrowableMemory(image);
  } catch (error) {
    if (error instanceof EmulatorError) {
      throw new DebugBridgeError('EMULATION_FAULT', error.message, { cause: error });
    }
    throw error;
  }
}

// 1 プログラム分の状態 (エンジン、キュー、リレー、索引) を束ねて 1 命令ずつ進める。
export class ExecutionStepper {
  private readonly emulator: Emulator<GrowableMemory, DeviceQueue>;

  private readonly relay = new EventRelay();

  private readonly lines: SourceMapAdapter;

  private readonly symbols: ReadonlyMap<string, number>;

  private readonly onStepTrace?: (trace: StepTrace) => void;

  private outputCursor = 0;

  private callsCursor = 0;

  private stepCount = 0;

  private stepping = false;

  // イベント配送が始まった時点で命令はコミット済み。
  private committed = false;

  private fault: DebugBridgeError | undefined;

  constructor(source: string, compiled: CompiledProgram, options: StepperOptions = {}) {
    this.emulator = new Emulator(loadMemory(compiled.image), new DeviceQueue(options.input));
    this.emulator.addListener({
      event: (event) => {
        this.committed = true;
        this.relay.dispatch(event);
      }
    });
    this.lines = SourceMapAdapter.fromByteSpans(source, compiled.sourceMap);
    this.symbols = new Map(compiled.symbols.map((symbol) => [symbol.name, symbol.value]));
    this.onStepTrace = options.onStepTrace;
  }

  get state(): StepperState {
    return this.fault ? 'faulted' : 'ready';
  }

  get halted(): boolean {
    return this.emulator.halted;
  }

  get stepsExecuted(): number {
    return this.stepCount;
  }

  registers(): number[] {
    return Array.from(this.emulator.context.r);
  }

  programCounter(): number {
    return this.emulator.context.pc;
  }

  stackPointer(): number {
    return this.emulator.context.r[SP_REGISTER] ?? 0;
  }

  framePointer(): number {
    return this.emulator.context.r[FP_REGISTER] ?? 0;
  }

  currentLine(): number {
    return this.lines.lineFor(this.programCounter()) ?? 0;
  }

  step(): StepReport {
    if (this.stepping) {
      throw new DebugBridgeError('REENTRANT_STEP', 'step() was called from inside an event listener');
    }
    if (this.fault) {
      throw this.fault;
    }
    if (this.emulator.halted) {
      return this.report();
    }

    this.stepping = true;
    this.committed = false;
    try {
      this.emulator.step();
    } catch (error) {
      // リスナーの例外でも命令自体は実行済みなので数える。
      if (this.committed) {
        this.stepCount += 1;
      }
      throw this.classify(error);
    } finally {
      this.stepping = false;
    }

    this.stepCount += 1;
    const report = this.report();
    this.onStepTrace?.({ step: this.stepCount, report: { ...report } });
    return report;
  }

  readAddress(address: number): number {
    try {
      return this.emulator.memory.getData(address);
    } catch (error) {
      if (error instanceof EmulatorError) {
        throw new DebugBridgeError('MEMORY_ACCESS', `Address ${formatAddress(address)} is outside the loaded program`, {
          address,
          cause: error
        });
      }
      throw error;
    }
  }

  symbolTable(): ReadonlyMap<string, number> {
    return this.symbols;
  }

  sourceMap(): SourceMapAdapter {
    return this.lines;
  }

  addListener(target: ListenerTarget, callback: EventCallback): () => void {
    return this.relay.addListener(target, callback);
  }

  pushInput(...values: number[]): void {
    this.emulator.io.pushInput(...values);
  }

  output(): readonly number[] {
    return this.emulator.io.outputLog;
  }

  calls(): readonly number[] {
    return this.emulator.io.callLog;
  }

  pendingInput(): readonly number[] {
    return this.emulator.io.pendingInput;
  }

  private report(): StepReport {
    const { outputLog, callLog } = this.emulator.io;
    const outputDelta = outputLog.slice(this.outputCursor);
    const callsDelta = callLog.slice(this.callsCursor);
    this.outputCursor = outputLog.length;
    this.callsCursor = callLog.length;
    return {
      outputDelta,
      callsDelta,
      sourceLine: this.currentLine(),
      programCounter: this.programCounter(),
      halted: this.emulator.halted
    };
  }

  // エンジン障害だけを致命扱いにし、それ以外はそのまま返す。
  private classify(error: unknown): unknown {
    if (isBridgeError(error)) {
      return error;
    }
    if (error instanceof EmulatorError) {
      this.fault = new DebugBridgeError('EMULATION_FAULT', error.message, {
        address: error.address ?? error.pc,
        cause: error
      });
      return this.fault;
    }
    return error;
  }
}
