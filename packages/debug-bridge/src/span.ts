import type { ByteSpan } from '@ttk91web/assembler-ttk91';

import type { Position, Span } from './types';

const NEWLINE = 0x0a;

const encoder = new TextEncoder();

// text の先頭 offset バイトを走査して行と桁を求める。
export function calculatePosition(text: string, offset: number): Position {
  const bytes = encoder.encode(text).subarray(0, Math.max(0, offset));
  let line = 1;
  let column = 0;
  for (const byte of bytes) {
    if (byte === NEWLINE) {
      line += 1;
      column = 0;
    } else {
      column += 1;
    }
  }
  return { line, column };
}

// 行頭オフセットを一度だけ求めておき、二分探索で位置を引く。
export class LineIndex {
  readonly byteLength: number;

  private readonly lineStarts: number[] = [0];

  constructor(text: string) {
    const bytes = encoder.encode(text);
    this.byteLength = bytes.length;
    bytes.forEach((byte, index) => {
      if (byte === NEWLINE) {
        this.lineStarts.push(index + 1);
      }
    });
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  position(offset: number): Position {
    const clamped = Math.max(0, Math.min(offset, this.byteLength));
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if ((this.lineStarts[mid] ?? 0) <= clamped) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { line: low + 1, column: clamped - (this.lineStarts[low] ?? 0) };
  }

  span(range: ByteSpan): Span {
    const start = this.position(range.start);
    const end = this.position(range.end);
    return Object.freeze({
      start: range.start,
      end: range.end,
      startLine: start.line,
      startColumn: start.column,
      endLine: end.line,
      endColumn: end.column
    });
  }

  // 位置情報を持たない失敗に使う、末尾の空範囲。
  emptySpanAtEnd(): Span {
    return Object.freeze({
      start: this.byteLength,
      end: this.byteLength,
      startLine: 0,
      startColumn: 0,
      endLine: 0,
      endColumn: 0
    });
  }
}
