import type { OperandShape } from '@ttk91web/core-ttk91';

// ソース先頭からの UTF-8 バイトオフセットによる半開区間。
export interface ByteSpan {
  start: number;
  end: number;
}

export type ParseContext =
  | { kind: 'suggestion'; span: ByteSpan; message: string }
  | { kind: 'note'; message: string };

export interface ParseFailure {
  message: string;
  span?: ByteSpan;
  context: ParseContext[];
}

export type AddressingMode = 'immediate' | 'direct' | 'indirect';

export type OperandBase =
  | { kind: 'number'; value: number; span: ByteSpan }
  | { kind: 'symbol'; name: string; span: ByteSpan }
  | { kind: 'register'; register: number; span: ByteSpan };

export interface Operand {
  mode: AddressingMode;
  modeSpan?: ByteSpan;
  base: OperandBase;
  index?: number;
  span: ByteSpan;
}

export interface LabelDef {
  name: string;
  key: string;
  span: ByteSpan;
}

export interface InstructionStatement {
  kind: 'instruction';
  label?: LabelDef;
  mnemonic: string;
  opcode: number;
  shape: OperandShape;
  rj: number;
  operand?: Operand;
  // 命令語の mode フィールドへ入る値。
  modeField: number;
  span: ByteSpan;
}

export interface DataStatement {
  kind: 'DC' | 'DS' | 'EQU';
  label: LabelDef;
  value: number;
  span: ByteSpan;
}

export type Statement = InstructionStatement | DataStatement;

export interface ParsedProgram {
  source: string;
  statements: Statement[];
}

export type ParseResult = { ok: true; program: ParsedProgram } | { ok: false; errors: ParseFailure[] };

export interface SymbolEntry {
  name: string;
  value: number;
  kind: 'label' | 'data' | 'equ';
}

export interface CompiledProgram {
  image: Int32Array;
  codeSize: number;
  dataSize: number;
  symbols: SymbolEntry[];
  // アドレスから、そのワードを生成した文の範囲へ。
  sourceMap: ReadonlyMap<number, ByteSpan>;
}
