import { DEVICES, encodeInstruction, SUPERVISOR_CALLS } from '@ttk91web/core-ttk91';

import { layoutProgram } from './layout';
import { normalizeSymbolName } from './parser';
import type { ByteSpan, CompiledProgram, InstructionStatement, OperandBase, ParsedProgram } from './types';

function resolveBase(base: OperandBase, values: ReadonlyMap<string, number>): number {
  switch (base.kind) {
    case 'number':
      return base.value;
    case 'register':
      return 0;
    case 'symbol': {
      const key = normalizeSymbolName(base.name);
      return values.get(key) ?? DEVICES.get(key) ?? SUPERVISOR_CALLS.get(key) ?? 0;
    }
  }
}

function encodeStatement(statement: InstructionStatement, values: ReadonlyMap<string, number>): number {
  const { operand } = statement;
  if (!operand) {
    return encodeInstruction({ opcode: statement.opcode, rj: statement.rj, mode: 0, ri: 0, addr: 0 });
  }
  const ri = operand.base.kind === 'register' ? operand.base.register : (operand.index ?? 0);
  return encodeInstruction({
    opcode: statement.opcode,
    rj: statement.rj,
    mode: statement.modeField,
    ri,
    addr: resolveBase(operand.base, values)
  });
}

export function compile(program: ParsedProgram): CompiledProgram {
  const { codeSize, imageSize, values, symbols } = layoutProgram(program.statements);

  const image = new Int32Array(imageSize);
  const sourceMap = new Map<number, ByteSpan>();

  let codeAddress = 0;
  let dataAddress = codeSize;
  for (const statement of program.statements) {
    switch (statement.kind) {
      case 'instruction':
        image[codeAddress] = encodeStatement(statement, values);
        sourceMap.set(codeAddress, statement.span);
        codeAddress += 1;
        break;
      case 'DC':
        image[dataAddress] = statement.value;
        sourceMap.set(dataAddress, statement.span);
        dataAddress += 1;
        break;
      case 'DS':
        dataAddress += statement.value;
        break;
      case 'EQU':
        break;
    }
  }

  return {
    image,
    codeSize,
    dataSize: image.length - codeSize,
    symbols,
    sourceMap
  };
}
