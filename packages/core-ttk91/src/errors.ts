export type EmulatorErrorKind =
  | 'ILLEGAL_INSTRUCTION'
  | 'ILLEGAL_MODE'
  | 'MEMORY_ACCESS'
  | 'DIVISION_BY_ZERO'
  | 'RUNAWAY';

export interface EmulatorErrorDetail {
  pc?: number;
  address?: number;
}

// エンジン内部で発生する実行エラー。
export class EmulatorError extends Error {
  readonly kind: EmulatorErrorKind;

  readonly pc: number | undefined;

  readonly address: number | undefined;

  constructor(kind: EmulatorErrorKind, message: string, detail: EmulatorErrorDetail = {}) {
    super(message);
    this.name = 'EmulatorError';
    this.kind = kind;
    this.pc = detail.pc;
    this.address = detail.address;
  }
}

export function formatAddress(address: number): string {
  return `0x${(address & 0xffff).toString(16).padStart(4, '0')}`;
}
