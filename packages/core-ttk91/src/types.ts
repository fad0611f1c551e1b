// TTK-91 のレジスタ番号。R6/R7 は慣例で SP/FP として使う。
export type RegisterIndex = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;

export const REGISTER_COUNT = 8;
export const SP_REGISTER: RegisterIndex = 6;
export const FP_REGISTER: RegisterIndex = 7;

// 状態レジスタの比較ビット。
export const SR_GREATER = 0x4;
export const SR_EQUAL = 0x2;
export const SR_LESS = 0x1;

// エミュレータが保持する実行コンテキスト。
export interface CpuContext {
  readonly r: Int32Array;
  pc: number;
  sr: number;
}

// 1 命令の実行で観測される副作用。
export type ExecutionEvent =
  | { kind: 'supervisor-call'; code: number }
  | { kind: 'memory-change'; address: number; data: number }
  | { kind: 'register-change'; register: RegisterIndex; data: number }
  | { kind: 'output'; device: number; data: number };

export type ExecutionEventKind = ExecutionEvent['kind'];

export interface EventListener {
  event(event: ExecutionEvent): void;
}

// 入出力デバイスのバックエンド。
export interface InputOutput {
  input(device: number): number;
  output(device: number, data: number): void;
  supervisorCall(code: number): void;
}

export interface Memory {
  readonly size: number;
  getData(address: number): number;
  setData(address: number, data: number): void;
}

export interface EmulatorOptions {
  // 省略時はイメージ末尾のアドレス。
  initialStackPointer?: number;
}
