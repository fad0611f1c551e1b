import type { Statement, SymbolEntry } from './types';

export interface ProgramLayout {
  codeSize: number;
  // データ領域の終端 (イメージの語数)。
  imageSize: number;
  values: Map<string, number>;
  symbols: SymbolEntry[];
}

// コード領域を 0 番地から、その後ろへ DC/DS のデータ領域を割り付ける。
export function layoutProgram(statements: readonly Statement[]): ProgramLayout {
  const codeSize = statements.filter((statement) => statement.kind === 'instruction').length;
  const values = new Map<string, number>();
  const symbols: SymbolEntry[] = [];

  let codeAddress = 0;
  let dataAddress = codeSize;
  for (const statement of statements) {
    let value: number;
    let kind: SymbolEntry['kind'];
    switch (statement.kind) {
      case 'instruction':
        value = codeAddress;
        kind = 'label';
        codeAddress += 1;
        break;
      case 'DC':
        value = dataAddress;
        kind = 'data';
        dataAddress += 1;
        break;
      case 'DS':
        value = dataAddress;
        kind = 'data';
        dataAddress += statement.value;
        break;
      case 'EQU':
        value = statement.value;
        kind = 'equ';
        break;
    }
    if (statement.label) {
      values.set(statement.label.key, value);
      symbols.push({ name: statement.label.name, value, kind });
    }
  }

  return { codeSize, imageSize: dataAddress, values, symbols };
}
