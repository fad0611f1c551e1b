import { parseProgram } from '@ttk91web/assembler-ttk91';
import { describe, expect, it } from 'vitest';

import { convertParseError, formatDiagnostic, toDiagnostics } from '../src/diagnostics';
import { calculatePosition, LineIndex } from '../src/span';

function failuresOf(source: string) {
  const result = parseProgram(source);
  if (result.ok) {
    throw new Error('expected parse failure');
  }
  return result.errors;
}

describe('calculatePosition', () => {
  it('counts lines from 1 and columns in bytes', () => {
    expect(calculatePosition('ab\ncd', 0)).toEqual({ line: 1, column: 0 });
    expect(calculatePosition('ab\ncd', 3)).toEqual({ line: 2, column: 0 });
    expect(calculatePosition('ab\ncd', 4)).toEqual({ line: 2, column: 1 });
    expect(calculatePosition('ä\nx', 2)).toEqual({ line: 1, column: 2 });
  });

  it('agrees with the precomputed line index at every offset', () => {
    const text = 'LOAD R1, =1 ; ä\n\nX DC 5\nOUT R1, =CRT';
    const index = new LineIndex(text);
    for (let offset = 0; offset <= index.byteLength + 2; offset += 1) {
      expect(index.position(offset)).toEqual(calculatePosition(text, offset));
    }
    expect(index.lineCount).toBe(4);
  });
});

describe('convertParseError', () => {
  it('emits the error first and then its suggestions', () => {
    const source = 'LOOP NOP\n     JUMP LOPP\n';
    const [failure] = failuresOf(source);
    if (!failure) {
      throw new Error('missing failure');
    }

    expect(convertParseError(source, failure)).toEqual([
      {
        level: 'error',
        span: { start: 19, end: 23, startLine: 2, startColumn: 10, endLine: 2, endColumn: 14 },
        message: "Undefined symbol 'LOPP'"
      },
      {
        level: 'suggestion',
        span: { start: 0, end: 4, startLine: 1, startColumn: 0, endLine: 1, endColumn: 4 },
        message: "did you mean 'LOOP'?"
      }
    ]);
  });

  it('places a failure without a span at the end of the text with zero positions', () => {
    const source = 'LOAD R1,';
    const diagnostics = toDiagnostics(source, failuresOf(source));
    expect(diagnostics).toEqual([
      {
        level: 'error',
        span: { start: 8, end: 8, startLine: 0, startColumn: 0, endLine: 0, endColumn: 0 },
        message: 'Unexpected end of input, expected an operand'
      }
    ]);
    expect(Object.isFrozen(diagnostics[0]?.span)).toBe(true);
  });

  it('drops notes that carry no source position', () => {
    const source = 'JUMP NOWHERE\n';
    expect(toDiagnostics(source, failuresOf(source))).toEqual([
      {
        level: 'error',
        span: { start: 5, end: 12, startLine: 1, startColumn: 5, endLine: 1, endColumn: 12 },
        message: "Undefined symbol 'NOWHERE'"
      }
    ]);
  });

  it('keeps failure order when flattening', () => {
    const source = 'JUMP NOWHERE\nNOP\nLAOD R1, =5\n';
    const diagnostics = toDiagnostics(source, failuresOf(source));
    expect(diagnostics.map((diagnostic) => `${diagnostic.level}@${diagnostic.span.startLine}`)).toEqual([
      'error@1',
      'error@3',
      'suggestion@3'
    ]);
  });
});

describe('formatDiagnostic', () => {
  it('renders file:line:column with a 1-based column', () => {
    const source = 'LOOP NOP\n     JUMP LOPP\n';
    const [error] = toDiagnostics(source, failuresOf(source));
    if (!error) {
      throw new Error('missing diagnostic');
    }
    expect(formatDiagnostic(error, 'prog.k91')).toBe("prog.k91:2:11: error: Undefined symbol 'LOPP'");
  });

  it('omits the position of a diagnostic without a source location', () => {
    const [error] = toDiagnostics('LOAD R1,', failuresOf('LOAD R1,'));
    if (!error) {
      throw new Error('missing diagnostic');
    }
    expect(formatDiagnostic(error, 'prog.k91')).toBe('prog.k91: error: Unexpected end of input, expected an operand');
  });
});
