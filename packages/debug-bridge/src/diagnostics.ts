import type { ParseFailure } from '@ttk91web/assembler-ttk91';

import { LineIndex } from './span';
import type { Diagnostic } from './types';

export function convertParseError(text: string, failure: ParseFailure, index = new LineIndex(text)): Diagnostic[] {
  const diagnostics: Diagnostic[] = [
    {
      level: 'error',
      span: failure.span ? index.span(failure.span) : index.emptySpanAtEnd(),
      message: failure.message
    }
  ];

  for (const context of failure.context) {
    if (context.kind !== 'suggestion') {
      continue;
    }
    diagnostics.push({
      level: 'suggestion',
      span: index.span(context.span),
      message: context.message
    });
  }

  return diagnostics;
}

export function toDiagnostics(text: string, failures: readonly ParseFailure[]): Diagnostic[] {
  const index = new LineIndex(text);
  return failures.flatMap((failure) => convertParseError(text, failure, index));
}

// エディタ向けの file:line:column 形式。桁は 1 始まりで表示する。
export function formatDiagnostic(diagnostic: Diagnostic, filename: string): string {
  const { span } = diagnostic;
  if (span.startLine === 0) {
    return `${filename}: ${diagnostic.level}: ${diagnostic.message}`;
  }
  return `${filename}:${span.startLine}:${span.startColumn + 1}: ${diagnostic.level}: ${diagnostic.message}`;
}
