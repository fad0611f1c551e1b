import path from 'node:path';
import { readFileSync } from 'node:fs';

import { createStepper, DEFAULT_MAX_STEPS, executeToCompletion } from './bridge';
import { formatDiagnostic } from './diagnostics';
import { asDisplayError, DebugBridgeError, isBridgeError } from './errors';
import { describeEvent } from './event-relay';

interface CliOptions {
  inputFile?: string;
  input: number[];
  trace: boolean;
  maxSteps: number;
  help: boolean;
}

function printUsage(): void {
  console.log('Usage: ttk91run -i <program.k91> [--input 1,2,3] [--trace] [--max-steps n]');
}

function parseWords(text: string): number[] {
  return text
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
    .map((item) => Number.parseInt(item, 10))
    .filter((value) => Number.isFinite(value));
}

function parseArgs(args: string[]): CliOptions {
  const opts: CliOptions = { input: [], trace: false, maxSteps: DEFAULT_MAX_STEPS, help: false };
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i] ?? '';
    const next = args[i + 1];
    switch (token) {
      case '-i':
      case '--input-file':
        opts.inputFile = next;
        i += 1;
        break;
      case '--input':
        opts.input.push(...parseWords(next ?? ''));
        i += 1;
        break;
      case '--trace':
        opts.trace = true;
        break;
      case '--max-steps': {
        const value = Number.parseInt(next ?? '', 10);
        if (Number.isFinite(value) && value > 0) {
          opts.maxSteps = value;
        }
        i += 1;
        break;
      }
      case '-h':
      case '--help':
        opts.help = true;
        break;
      default:
        break;
    }
  }
  return opts;
}

// --trace 時はステッパーで 1 命令ずつ進め、イベントも表示する。
function traceProgram(source: string, opts: CliOptions): number[] {
  const stepper = createStepper(source, {
    input: opts.input,
    onStepTrace: ({ step, report }) => {
      console.log(`#${step} pc=${report.programCounter} line=${report.sourceLine}`);
    }
  });
  stepper.addListener('*', (message) => {
    console.log(`  ${describeEvent(message)}`);
  });

  while (!stepper.halted) {
    if (stepper.stepsExecuted >= opts.maxSteps) {
      throw new DebugBridgeError('RUNAWAY', `Program did not halt within ${opts.maxSteps} steps`);
    }
    stepper.step();
  }
  return [...stepper.output()];
}

export function runCli(argv: string[]): number {
  const opts = parseArgs(argv);
  if (opts.help) {
    printUsage();
    return 0;
  }
  if (!opts.inputFile) {
    printUsage();
    return 1;
  }

  const inputPath = path.resolve(process.cwd(), opts.inputFile);
  let source = '';
  try {
    source = readFileSync(inputPath, 'utf8');
  } catch (error) {
    console.error(`Failed to read input: ${inputPath}`);
    if (error instanceof Error) {
      console.error(error.message);
    }
    return 1;
  }

  let output: number[];
  try {
    output = opts.trace
      ? traceProgram(source, opts)
      : executeToCompletion(source, { input: opts.input, maxSteps: opts.maxSteps });
  } catch (error) {
    if (isBridgeError(error, 'PARSE_FAILURE')) {
      for (const diagnostic of error.diagnostics) {
        console.error(formatDiagnostic(diagnostic, inputPath));
      }
      return 1;
    }
    console.error(asDisplayError(error));
    return 2;
  }

  for (const word of output) {
    console.log(String(word));
  }
  return 0;
}

if (import.meta.url === `file://${process.argv[1]}`) {
  const code = runCli(process.argv.slice(2));
  process.exit(code);
}
