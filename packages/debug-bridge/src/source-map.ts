import type { ByteSpan } from '@ttk91web/assembler-ttk91';

import { LineIndex } from './span';

// アドレスから 1 始まりのソース行を引く読み取り専用の索引。
export class SourceMapAdapter {
  private readonly lines: ReadonlyMap<number, number>;

  constructor(lines: ReadonlyMap<number, number>) {
    this.lines = new Map(lines);
  }

  static fromByteSpans(source: string, spans: ReadonlyMap<number, ByteSpan>): SourceMapAdapter {
    const index = new LineIndex(source);
    const lines = new Map<number, number>();
    for (const [address, span] of spans) {
      lines.set(address, index.position(span.start).line);
    }
    return new SourceMapAdapter(lines);
  }

  get size(): number {
    return this.lines.size;
  }

  lineFor(address: number): number | undefined {
    return this.lines.get(address);
  }

  entries(): Array<[number, number]> {
    return Array.from(this.lines.entries()).sort(([left], [right]) => left - right);
  }
}
