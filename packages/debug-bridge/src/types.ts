import type { ExecutionEventKind } from '@ttk91web/core-ttk91';

// 1 始まりの行と、直前の改行からのバイト数で表した位置。
export interface Position {
  line: number;
  column: number;
}

export interface Span {
  readonly start: number;
  readonly end: number;
  readonly startLine: number;
  readonly startColumn: number;
  readonly endLine: number;
  readonly endColumn: number;
}

export type DiagnosticLevel = 'error' | 'suggestion';

export interface Diagnostic {
  readonly level: DiagnosticLevel;
  readonly span: Span;
  readonly message: string;
}

export type EventType = ExecutionEventKind;

export interface EventPayloadMap {
  'supervisor-call': { code: number };
  'memory-change': { address: number; data: number };
  'register-change': { register: number; data: number };
  output: { device: number; data: number };
}

// リスナーへ渡すイベントの現行フォーマット。
export type EventMessageV1 = {
  [K in EventType]: { version: 1; type: K; payload: EventPayloadMap[K] };
}[EventType];

export type EventMessage = EventMessageV1;

export type EventCallback = (message: EventMessage) => void;

export type ListenerTarget = EventType | '*';

export interface StepReport {
  // 前回のレポート以降に追記された分だけを持つ。
  outputDelta: number[];
  callsDelta: number[];
  // 0 は対応する行が無いことを表す。
  sourceLine: number;
  programCounter: number;
  halted: boolean;
}

export type StepperState = 'ready' | 'faulted';

export interface StepTrace {
  step: number;
  report: StepReport;
}

export interface StepperOptions {
  input?: readonly number[];
  onStepTrace?: (trace: StepTrace) => void;
}

export interface ExecuteOptions {
  input?: readonly number[];
  maxSteps?: number;
}
