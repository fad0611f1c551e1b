import type { InputOutput } from '@ttk91web/core-ttk91';

import { DebugBridgeError } from './errors';

const WORD_MIN = -0x80000000;
const WORD_MAX = 0x7fffffff;

// 32 ビット符号付き整数以外の入力語は受け付けない。
function checkWord(value: number): number {
  if (!Number.isInteger(value) || value < WORD_MIN || value > WORD_MAX) {
    throw new DebugBridgeError('INVALID_INPUT', `Input value ${value} is not a 32-bit signed word`);
  }
  return value;
}

// 全デバイスで 1 本の入力キューと出力ログを共有する。
export class DeviceQueue implements InputOutput {
  private readonly inputQueue: number[];

  private readonly outputValues: number[] = [];

  private readonly callCodes: number[] = [];

  constructor(input: readonly number[] = []) {
    this.inputQueue = input.map(checkWord);
  }

  input(device: number): number {
    const value = this.inputQueue.shift();
    if (value === undefined) {
      throw new DebugBridgeError('QUEUE_UNDERFLOW', `Device ${device} requested input but the input queue is empty`, {
        device
      });
    }
    return value;
  }

  output(_device: number, data: number): void {
    this.outputValues.push(data);
  }

  supervisorCall(code: number): void {
    this.callCodes.push(code);
  }

  pushInput(...values: number[]): void {
    const words = values.map(checkWord);
    this.inputQueue.push(...words);
  }

  get pendingInput(): readonly number[] {
    return this.inputQueue;
  }

  get outputLog(): readonly number[] {
    return this.outputValues;
  }

  get callLog(): readonly number[] {
    return this.callCodes;
  }
}
