import { Command, CommanderError } from 'commander';
import { AppError } from '@codepack/shared';
import { EXIT_CODES, exitCodeForError, ProcessingOrchestrator } from '@codepack/core';
import packageJson from '../package.json';
import { registerPackCommand } from './commands/pack';
import { registerListCommand } from './commands/list';
import { registerModelsCommand } from './commands/models';
import type { CliContext } from './context';

export function createProgram(context: CliContext): Command {
  const program = new Command();

  program
    .name('codepack')
    .description('Pack a codebase into one token-budgeted document for an LLM')
    .version(packageJson.version)
    .option('--json', 'Output results as JSON')
    .option('-c, --config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .exitOverride();

  registerPackCommand(program, context);
  registerListCommand(program);
  registerModelsCommand(program);

  return program;
}

/**
 * Runs the CLI against `argv` (as in `process.argv`) and resolves to the
 * process exit code. Never rejects.
 */
export async function runCli(argv: readonly string[], deps: Partial<CliContext> = {}): Promise<number> {
  let exitCode: number = EXIT_CODES.success;
  const context: CliContext = {
    orchestrator: deps.orchestrator ?? new ProcessingOrchestrator(),
    stdout: deps.stdout ?? ((text) => process.stdout.write(text)),
    setExitCode: (code) => {
      exitCode = code;
      deps.setExitCode?.(code);
    },
  };
  const program = createProgram(context);

  try {
    await program.parseAsync([...argv]);
    return exitCode;
  } catch (e) {
    // Commander has already printed its own message.
    if (e instanceof CommanderError) {
      return e.exitCode === 0 ? EXIT_CODES.success : EXIT_CODES.usage;
    }
    reportError(e, program.opts());
    return exitCodeForError(e);
  }
}

function reportError(e: unknown, opts: Record<string, unknown>) {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
    return;
  }

  console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    console.error(`  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`);
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}
