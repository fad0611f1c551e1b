import type { ByteSpan } from './types';

export type TokenKind =
  | 'identifier'
  | 'number'
  | 'equals'
  | 'at'
  | 'lparen'
  | 'rparen'
  | 'comma'
  | 'invalid'
  | 'newline'
  | 'eof';

export interface Token {
  kind: TokenKind;
  value: string;
  span: ByteSpan;
}

const PUNCTUATION = new Map<string, TokenKind>([
  ['=', 'equals'],
  ['@', 'at'],
  ['(', 'lparen'],
  [')', 'rparen'],
  [',', 'comma']
]);

export function utf8Length(ch: string): number {
  const code = ch.codePointAt(0) ?? 0;
  if (code < 0x80) {
    return 1;
  }
  if (code < 0x800) {
    return 2;
  }
  if (code < 0x10000) {
    return 3;
  }
  return 4;
}

function isIdentifierStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isIdentifierPart(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && /[0-9]/.test(ch);
}

// 数値リテラルを 10 進/16 進で解釈する。
export function parseNumberLiteral(text: string): number | undefined {
  if (/^[+-]?[0-9]+$/.test(text)) {
    return Number.parseInt(text, 10);
  }
  const hex = text.match(/^([+-]?)0[xX]([0-9A-Fa-f]+)$/);
  if (hex) {
    const value = Number.parseInt(hex[2] ?? '', 16);
    return hex[1] === '-' ? -value : value;
  }
  return undefined;
}

// ソース全体をトークン列へ分解する。位置はすべてバイト単位。
export function tokenize(source: string): Token[] {
  const chars = Array.from(source);
  const tokens: Token[] = [];
  let offset = 0;
  let i = 0;

  const take = (count: number): { text: string; span: ByteSpan } => {
    const start = offset;
    let text = '';
    for (let k = 0; k < count; k += 1) {
      const ch = chars[i] ?? '';
      text += ch;
      offset += utf8Length(ch);
      i += 1;
    }
    return { text, span: { start, end: offset } };
  };

  const scan = (from: number, accept: (ch: string) => boolean): number => {
    let j = from;
    while (j < chars.length && accept(chars[j] ?? '')) {
      j += 1;
    }
    return j - i;
  };

  while (i < chars.length) {
    const ch = chars[i] ?? '';

    if (ch === '\n') {
      const { text, span } = take(1);
      tokens.push({ kind: 'newline', value: text, span });
      continue;
    }

    if (/\s/.test(ch)) {
      take(1);
      continue;
    }

    if (ch === ';') {
      take(scan(i, (next) => next !== '\n'));
      continue;
    }

    const punctuation = PUNCTUATION.get(ch);
    if (punctuation) {
      const { text, span } = take(1);
      tokens.push({ kind: punctuation, value: text, span });
      continue;
    }

    if (isDigit(ch) || ((ch === '-' || ch === '+') && isDigit(chars[i + 1]))) {
      const { text, span } = take(scan(i + 1, isIdentifierPart));
      tokens.push({ kind: 'number', value: text, span });
      continue;
    }

    if (isIdentifierStart(ch)) {
      const { text, span } = take(scan(i + 1, isIdentifierPart));
      tokens.push({ kind: 'identifier', value: text, span });
      continue;
    }

    const { text, span } = take(1);
    tokens.push({ kind: 'invalid', value: text, span });
  }

  tokens.push({ kind: 'eof', value: '', span: { start: offset, end: offset } });
  return tokens;
}
