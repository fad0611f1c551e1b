import { compile, parseProgram, type CompiledProgram, type ParsedProgram } from '@ttk91web/assembler-ttk91';
import { Emulator, EmulatorError } from '@ttk91web/core-ttk91';

import { DeviceQueue } from './device-queue';
import { toDiagnostics } from './diagnostics';
import { DebugBridgeError } from './errors';
import { ExecutionStepper, loadMemory } from './stepper';
import type { Diagnostic, ExecuteOptions, StepperOptions } from './types';

export const DEFAULT_MAX_STEPS = 1_000_000;

export type ParseOutcome =
  | { ok: true; program: ParsedProgram }
  | { ok: false; diagnostics: Diagnostic[] };

export function parse(text: string): ParseOutcome {
  const result = parseProgram(text);
  if (!result.ok) {
    return { ok: false, diagnostics: toDiagnostics(text, result.errors) };
  }
  return { ok: true, program: result.program };
}

function load(text: string): CompiledProgram {
  const outcome = parse(text);
  if (!outcome.ok) {
    const errorCount = outcome.diagnostics.filter((diagnostic) => diagnostic.level === 'error').length;
    throw new DebugBridgeError('PARSE_FAILURE', `Source has ${errorCount} error(s)`, {
      diagnostics: outcome.diagnostics
    });
  }
  return compile(outcome.program);
}

export function createStepper(text: string, options: StepperOptions = {}): ExecutionStepper {
  return new ExecutionStepper(text, load(text), options);
}

// リレーを介さずに HALT まで実行し、出力ログを返す。
export function executeToCompletion(text: string, options: ExecuteOptions = {}): number[] {
  const compiled = load(text);
  const queue = new DeviceQueue(options.input);
  const emulator = new Emulator(loadMemory(compiled.image), queue);
  const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;

  try {
    emulator.run(maxSteps);
  } catch (error) {
    if (error instanceof EmulatorError) {
      throw new DebugBridgeError(error.kind === 'RUNAWAY' ? 'RUNAWAY' : 'EMULATION_FAULT', error.message, {
        address: error.address ?? error.pc,
        cause: error
      });
    }
    throw error;
  }

  return [...queue.outputLog];
}
