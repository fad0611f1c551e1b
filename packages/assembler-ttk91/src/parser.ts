import {
  ADDR_MAX,
  ADDR_MIN,
  DEVICES,
  findOpcodeByMnemonic,
  SUPERVISOR_CALLS,
  takesAddressOperand,
  TTK91_MNEMONICS,
  type OpcodeSpec
} from '@ttk91web/core-ttk91';

import { layoutProgram } from './layout';
import { parseNumberLiteral, tokenize, type Token } from './lexer';
import { closestMatch } from './suggest';
import type {
  AddressingMode,
  ByteSpan,
  DataStatement,
  InstructionStatement,
  LabelDef,
  Operand,
  OperandBase,
  ParseContext,
  ParseFailure,
  ParseResult,
  Statement
} from './types';

const DIRECTIVES = ['DC', 'DS', 'EQU'] as const;

type Directive = (typeof DIRECTIVES)[number];

const WORD_MIN = -0x80000000;
const WORD_MAX = 0x7fffffff;
const DS_MAX = 0x10000;

const REGISTER_ALIASES = new Map<string, number>([
  ['SP', 6],
  ['FP', 7]
]);

const MODE_LEVEL: Record<AddressingMode, number> = {
  immediate: 0,
  direct: 1,
  indirect: 2
};

class LineParseError extends Error {
  readonly failure: ParseFailure;

  constructor(failure: ParseFailure) {
    super(failure.message);
    this.failure = failure;
  }
}

export function normalizeSymbolName(name: string): string {
  return name.toUpperCase();
}

export function parseRegister(name: string): number | undefined {
  const upper = name.toUpperCase();
  const alias = REGISTER_ALIASES.get(upper);
  if (alias !== undefined) {
    return alias;
  }
  const match = upper.match(/^R([0-7])$/);
  return match ? Number(match[1]) : undefined;
}

function isDirective(name: string): name is Directive {
  return DIRECTIVES.some((directive) => directive === name);
}

function isKeyword(name: string): boolean {
  const upper = name.toUpperCase();
  return isDirective(upper) || findOpcodeByMnemonic(upper) !== undefined;
}

function fail(message: string, span?: ByteSpan, context: ParseContext[] = []): never {
  throw new LineParseError(span ? { message, span, context } : { message, context });
}

// 期待したトークンが無かったときのエラー。入力末尾では位置を持たない。
function unexpected(token: Token, expected: string): never {
  if (token.kind === 'eof') {
    fail(`Unexpected end of input, expected ${expected}`);
  }
  if (token.kind === 'newline') {
    fail(`Unexpected end of line, expected ${expected}`, token.span);
  }
  fail(`Unexpected '${token.value}', expected ${expected}`, token.span);
}

class LineCursor {
  private readonly tokens: Token[];

  private readonly terminator: Token;

  private index = 0;

  lastEnd: number;

  constructor(tokens: Token[], terminator: Token) {
    this.tokens = tokens;
    this.terminator = terminator;
    this.lastEnd = tokens[0]?.span.start ?? terminator.span.start;
  }

  peek(): Token {
    return this.tokens[this.index] ?? this.terminator;
  }

  next(): Token {
    const token = this.peek();
    if (this.index < this.tokens.length) {
      this.index += 1;
      this.lastEnd = token.span.end;
    }
    return token;
  }

  atEnd(): boolean {
    return this.index >= this.tokens.length;
  }
}

function expectRegister(cursor: LineCursor): number {
  const token = cursor.next();
  const register = token.kind === 'identifier' ? parseRegister(token.value) : undefined;
  if (register === undefined) {
    unexpected(token, 'a register');
  }
  return register;
}

function expectComma(cursor: LineCursor): void {
  const token = cursor.next();
  if (token.kind !== 'comma') {
    unexpected(token, "','");
  }
}

function expectEnd(cursor: LineCursor): void {
  if (!cursor.atEnd()) {
    unexpected(cursor.peek(), 'end of line');
  }
}

function expectNumber(cursor: LineCursor): { value: number; span: ByteSpan } {
  const token = cursor.next();
  if (token.kind !== 'number') {
    unexpected(token, 'a number');
  }
  const value = parseNumberLiteral(token.value);
  if (value === undefined) {
    fail(`Invalid number literal '${token.value}'`, token.span);
  }
  return { value, span: token.span };
}

function parseOperand(cursor: LineCursor): Operand {
  const first = cursor.peek();
  let mode: AddressingMode = 'direct';
  let modeSpan: ByteSpan | undefined;
  if (first.kind === 'equals' || first.kind === 'at') {
    cursor.next();
    mode = first.kind === 'equals' ? 'immediate' : 'indirect';
    modeSpan = first.span;
  }

  const token = cursor.next();
  let base: OperandBase;
  if (token.kind === 'number') {
    const value = parseNumberLiteral(token.value);
    if (value === undefined) {
      fail(`Invalid number literal '${token.value}'`, token.span);
    }
    base = { kind: 'number', value, span: token.span };
  } else if (token.kind === 'identifier') {
    const register = parseRegister(token.value);
    base =
      register === undefined
        ? { kind: 'symbol', name: token.value, span: token.span }
        : { kind: 'register', register, span: token.span };
  } else {
    unexpected(token, 'an operand');
  }

  let index: number | undefined;
  let end = base.span.end;
  if (cursor.peek().kind === 'lparen') {
    cursor.next();
    index = expectRegister(cursor);
    const close = cursor.next();
    if (close.kind !== 'rparen') {
      unexpected(close, "')'");
    }
    end = close.span.end;
  }

  const span = { start: (modeSpan ?? base.span).start, end };
  const operand: Operand = { mode, base, span };
  if (modeSpan) {
    operand.modeSpan = modeSpan;
  }
  if (index !== undefined) {
    operand.index = index;
  }
  return operand;
}

// オペランドを命令の形に照らして検査し、mode フィールド値を返す。
function resolveModeField(spec: OpcodeSpec, operand: Operand): number {
  const { base } = operand;
  if (base.kind === 'register' && operand.index !== undefined) {
    fail('A register operand cannot be indexed', operand.span);
  }
  if (base.kind === 'register' && operand.mode === 'immediate') {
    fail("'=' cannot be applied to a register", operand.modeSpan ?? operand.span);
  }
  if (spec.shape !== 'register-register' && (operand.index === 0 || (base.kind === 'register' && base.register === 0))) {
    fail('R0 cannot be used as an index register', operand.span);
  }
  if (base.kind === 'number' && (base.value < ADDR_MIN || base.value > ADDR_MAX)) {
    fail(`Value ${base.value} does not fit in the 16-bit address field`, base.span);
  }

  const addressOnly = takesAddressOperand(spec.shape);
  if (addressOnly && operand.mode === 'immediate') {
    const context: ParseContext[] = operand.modeSpan
      ? [{ kind: 'suggestion', span: operand.modeSpan, message: "remove '=' to use the value as an address" }]
      : [];
    fail(`${spec.mnemonic} takes a memory address, not an immediate value`, operand.span, context);
  }

  const level = MODE_LEVEL[operand.mode] - (base.kind === 'register' ? 1 : 0) - (addressOnly ? 1 : 0);
  if (level < 0) {
    fail(`${spec.mnemonic} requires a memory address operand`, operand.span);
  }
  return level;
}

function parseInstruction(spec: OpcodeSpec, cursor: LineCursor, start: number, label: LabelDef | undefined): InstructionStatement {
  let rj = 0;
  let operand: Operand | undefined;

  switch (spec.shape) {
    case 'none':
      break;
    case 'register':
      rj = expectRegister(cursor);
      break;
    case 'address':
      operand = parseOperand(cursor);
      break;
    case 'register-value':
    case 'register-address':
      rj = expectRegister(cursor);
      expectComma(cursor);
      operand = parseOperand(cursor);
      break;
    case 'register-register':
      rj = expectRegister(cursor);
      expectComma(cursor);
      operand = parseOperand(cursor);
      if (operand.base.kind !== 'register' || operand.mode !== 'direct' || operand.index !== undefined) {
        fail(`${spec.mnemonic} expects a register as its second operand`, operand.span);
      }
      break;
  }
  expectEnd(cursor);

  const statement: InstructionStatement = {
    kind: 'instruction',
    mnemonic: spec.mnemonic,
    opcode: spec.code,
    shape: spec.shape,
    rj,
    modeField: operand ? resolveModeField(spec, operand) : 0,
    span: { start, end: cursor.lastEnd }
  };
  if (label) {
    statement.label = label;
  }
  if (operand) {
    statement.operand = operand;
  }
  return statement;
}

function parseDirective(directive: Directive, head: Token, cursor: LineCursor, label: LabelDef | undefined): DataStatement {
  if (!label) {
    fail(`${directive} requires a label`, head.span);
  }
  const { value, span } = expectNumber(cursor);
  expectEnd(cursor);

  if (directive === 'DS') {
    if (value < 0 || value > DS_MAX) {
      fail(`Invalid DS size ${value}`, span);
    }
  } else if (value < WORD_MIN || value > WORD_MAX) {
    fail(`Value ${value} does not fit in a 32-bit word`, span);
  }

  return { kind: directive, label, value, span: { start: label.span.start, end: cursor.lastEnd } };
}

function makeLabel(token: Token): LabelDef {
  return { name: token.value, key: normalizeSymbolName(token.value), span: token.span };
}

function parseLine(tokens: Token[], terminator: Token): Statement {
  const invalid = tokens.find((token) => token.kind === 'invalid');
  if (invalid) {
    fail(`Unexpected character '${invalid.value}'`, invalid.span);
  }

  const cursor = new LineCursor(tokens, terminator);
  const first = cursor.next();
  if (first.kind !== 'identifier') {
    unexpected(first, 'an instruction');
  }

  let label: LabelDef | undefined;
  let head = first;
  if (!isKeyword(first.value)) {
    const second = cursor.peek();
    if (cursor.atEnd()) {
      fail(`Expected an instruction after label '${first.value}'`, first.span);
    }
    if (second.kind === 'identifier' && parseRegister(second.value) === undefined) {
      label = makeLabel(first);
      head = cursor.next();
    }
  }

  const upper = head.value.toUpperCase();
  if (isDirective(upper)) {
    return parseDirective(upper, head, cursor, label);
  }
  const spec = findOpcodeByMnemonic(upper);
  if (!spec) {
    const match = closestMatch(head.value, [...TTK91_MNEMONICS, ...DIRECTIVES]);
    const context: ParseContext[] = match
      ? [{ kind: 'suggestion', span: head.span, message: `did you mean '${match}'?` }]
      : [];
    fail(`Unknown instruction '${head.value}'`, head.span, context);
  }
  return parseInstruction(spec, cursor, (label?.span ?? head.span).start, label);
}

function isBuiltinSymbol(key: string): boolean {
  return DEVICES.has(key) || SUPERVISOR_CALLS.has(key);
}

// ラベルの重複と未定義シンボル参照を検査する。
function checkSymbols(statements: Statement[], errors: ParseFailure[]): void {
  const definitions = new Map<string, LabelDef>();

  for (const statement of statements) {
    const { label } = statement;
    if (!label) {
      continue;
    }
    const existing = definitions.get(label.key);
    if (existing) {
      errors.push({
        message: `Symbol '${label.name}' is already defined`,
        span: label.span,
        context: [{ kind: 'suggestion', span: existing.span, message: `'${existing.name}' is first defined here` }]
      });
      continue;
    }
    definitions.set(label.key, label);
  }

  // ラベルやデータのアドレスは割り付け後でないと範囲を確かめられない。
  const { values } = layoutProgram(statements);

  for (const statement of statements) {
    if (statement.kind !== 'instruction') {
      continue;
    }
    const base = statement.operand?.base;
    if (base?.kind !== 'symbol') {
      continue;
    }
    const key = normalizeSymbolName(base.name);

    if (definitions.has(key)) {
      const value = values.get(key);
      if (value !== undefined && (value < ADDR_MIN || value > ADDR_MAX)) {
        errors.push({
          message: `Value of '${base.name}' (${value}) does not fit in the 16-bit address field`,
          span: base.span,
          context: []
        });
      }
      continue;
    }
    if (isBuiltinSymbol(key)) {
      continue;
    }

    const names = Array.from(definitions.values(), (definition) => definition.name);
    const match = closestMatch(base.name, names);
    const matchDef = match === undefined ? undefined : definitions.get(normalizeSymbolName(match));
    errors.push({
      message: `Undefined symbol '${base.name}'`,
      span: base.span,
      context: matchDef
        ? [{ kind: 'suggestion', span: matchDef.span, message: `did you mean '${matchDef.name}'?` }]
        : [{ kind: 'note', message: `'${base.name}' is not a label, a device or a service name` }]
    });
  }
}

function compareFailures(left: ParseFailure, right: ParseFailure): number {
  const a = left.span?.start ?? Number.POSITIVE_INFINITY;
  const b = right.span?.start ?? Number.POSITIVE_INFINITY;
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

// ソース全体を解析する。行単位で回復し、すべてのエラーを集める。
export function parseProgram(source: string): ParseResult {
  const tokens = tokenize(source);
  const statements: Statement[] = [];
  const errors: ParseFailure[] = [];

  let line: Token[] = [];
  for (const token of tokens) {
    if (token.kind !== 'newline' && token.kind !== 'eof') {
      line.push(token);
      continue;
    }
    if (line.length > 0) {
      try {
        statements.push(parseLine(line, token));
      } catch (error) {
        if (!(error instanceof LineParseError)) {
          throw error;
        }
        errors.push(error.failure);
      }
    }
    line = [];
  }

  checkSymbols(statements, errors);

  if (errors.length > 0) {
    return { ok: false, errors: errors.sort(compareFailures) };
  }
  return { ok: true, program: { source, statements } };
}
