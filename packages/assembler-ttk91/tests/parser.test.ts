import { describe, expect, it } from 'vitest';

import { parseNumberLiteral, tokenize } from '../src/lexer';
import { parseProgram } from '../src/parser';
import { closestMatch, editDistance } from '../src/suggest';

function expectFailures(source: string) {
  const result = parseProgram(source);
  expect(result.ok).toBe(false);
  if (result.ok) {
    throw new Error('expected parse failure');
  }
  return result.errors;
}

describe('lexer', () => {
  it('tracks UTF-8 byte offsets and skips comments', () => {
    const tokens = tokenize('; ä\nNOP');
    expect(tokens).toEqual([
      { kind: 'newline', value: '\n', span: { start: 4, end: 5 } },
      { kind: 'identifier', value: 'NOP', span: { start: 5, end: 8 } },
      { kind: 'eof', value: '', span: { start: 8, end: 8 } }
    ]);
  });

  it('reads decimal and hexadecimal literals', () => {
    expect(parseNumberLiteral('-12')).toBe(-12);
    expect(parseNumberLiteral('0x1F')).toBe(31);
    expect(parseNumberLiteral('-0x10')).toBe(-16);
    expect(parseNumberLiteral('12a')).toBeUndefined();
  });
});

describe('suggestions', () => {
  it('counts transpositions as a single edit', () => {
    expect(editDistance('LAOD', 'LOAD')).toBe(1);
    expect(editDistance('kitten', 'sitting')).toBe(3);
  });

  it('returns the closest candidate within the distance limit', () => {
    expect(closestMatch('strre', ['LOAD', 'STORE'])).toBe('STORE');
    expect(closestMatch('xyz', ['LOAD'])).toBeUndefined();
  });
});

describe('parseProgram', () => {
  it('parses labels, registers and addressing modes', () => {
    const result = parseProgram(['START LOAD R1, =42', '      OUT R1, =CRT', '      LOAD R2, @X(R1)', '      SVC SP, =HALT', 'X     DC 3'].join('\n'));
    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }

    const [first, , third, fourth, data] = result.program.statements;
    expect(first).toMatchObject({ kind: 'instruction', mnemonic: 'LOAD', rj: 1, modeField: 0 });
    expect(first?.label?.name).toBe('START');
    expect(third).toMatchObject({ mnemonic: 'LOAD', rj: 2, modeField: 2 });
    expect(third?.kind === 'instruction' ? third.operand?.index : undefined).toBe(1);
    expect(fourth).toMatchObject({ mnemonic: 'SVC', rj: 6 });
    expect(data).toMatchObject({ kind: 'DC', value: 3 });
  });

  it('suggests the closest mnemonic for an unknown instruction', () => {
    expect(expectFailures('LAOD R1, =5\n')).toEqual([
      {
        message: "Unknown instruction 'LAOD'",
        span: { start: 0, end: 4 },
        context: [{ kind: 'suggestion', span: { start: 0, end: 4 }, message: "did you mean 'LOAD'?" }]
      }
    ]);
  });

  it('points undefined symbols at a similarly named label', () => {
    expect(expectFailures('LOOP NOP\n     JUMP LOPP\n')).toEqual([
      {
        message: "Undefined symbol 'LOPP'",
        span: { start: 19, end: 23 },
        context: [{ kind: 'suggestion', span: { start: 0, end: 4 }, message: "did you mean 'LOOP'?" }]
      }
    ]);
  });

  it('reports duplicate labels with the first definition', () => {
    expect(expectFailures('A NOP\nA NOP\n')).toEqual([
      {
        message: "Symbol 'A' is already defined",
        span: { start: 6, end: 7 },
        context: [{ kind: 'suggestion', span: { start: 0, end: 1 }, message: "'A' is first defined here" }]
      }
    ]);
  });

  it('rejects immediate operands where an address is required', () => {
    expect(expectFailures('STORE R1, =5\n')).toEqual([
      {
        message: 'STORE takes a memory address, not an immediate value',
        span: { start: 10, end: 12 },
        context: [{ kind: 'suggestion', span: { start: 10, end: 11 }, message: "remove '=' to use the value as an address" }]
      }
    ]);
  });

  it('reports a statement cut off by the end of input without a span', () => {
    expect(expectFailures('LOAD R1,')).toEqual([
      { message: 'Unexpected end of input, expected an operand', context: [] }
    ]);
  });

  it('reports a statement cut off by a line break at the line break', () => {
    expect(expectFailures('LOAD R1,\nNOP\n')).toEqual([
      { message: 'Unexpected end of line, expected an operand', span: { start: 8, end: 9 }, context: [] }
    ]);
  });

  it('recovers per line and orders failures by position', () => {
    const errors = expectFailures('JUMP NOWHERE\nNOP\nLAOD R1, =5\n');
    expect(errors.map((error) => error.message)).toEqual(["Undefined symbol 'NOWHERE'", "Unknown instruction 'LAOD'"]);
    expect(errors[0]?.context).toEqual([
      { kind: 'note', message: "'NOWHERE' is not a label, a device or a service name" }
    ]);
  });

  it('refuses R0 as an index register', () => {
    expect(expectFailures('LOAD R1, X(R0)\nX DC 1\n')[0]?.message).toBe('R0 cannot be used as an index register');
  });

  it('rejects symbols whose address lands beyond the 16-bit field after layout', () => {
    const source = ['LOAD R1, =Y', 'LOAD R2, Y', 'SVC SP, =HALT', 'X DS 40000', 'Y DC 5', ''].join('\n');
    expect(expectFailures(source)).toEqual([
      { message: "Value of 'Y' (40003) does not fit in the 16-bit address field", span: { start: 10, end: 11 }, context: [] },
      { message: "Value of 'Y' (40003) does not fit in the 16-bit address field", span: { start: 21, end: 22 }, context: [] }
    ]);
  });

  it('accepts data that ends exactly at the top of the address field', () => {
    const result = parseProgram(['LOAD R1, Y', 'X DS 32766', 'Y DC 5', ''].join('\n'));
    expect(result.ok).toBe(true);
  });

  it('requires a label on data directives', () => {
    expect(expectFailures('DC 5\n')[0]).toEqual({
      message: 'DC requires a label',
      span: { start: 0, end: 2 },
      context: []
    });
  });
});
