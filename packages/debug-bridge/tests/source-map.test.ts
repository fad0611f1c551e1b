import { describe, expect, it } from 'vitest';

import { SourceMapAdapter } from '../src/source-map';

describe('SourceMapAdapter', () => {
  it('resolves addresses to the line where their statement starts', () => {
    const source = 'NOP\n\nX DC 1\n';
    const map = SourceMapAdapter.fromByteSpans(
      source,
      new Map([
        [1, { start: 5, end: 11 }],
        [0, { start: 0, end: 3 }]
      ])
    );

    expect(map.size).toBe(2);
    expect(map.lineFor(0)).toBe(1);
    expect(map.lineFor(1)).toBe(3);
    expect(map.lineFor(2)).toBeUndefined();
    expect(map.entries()).toEqual([
      [0, 1],
      [1, 3]
    ]);
  });
});
