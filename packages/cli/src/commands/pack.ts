import path from 'node:path';
import { Command, Option } from 'commander';
import { z } from 'zod';
import {
  ConsoleLogger,
  eventBase,
  JsonlLogger,
  UsageError,
  type Logger,
  type PackConfig,
} from '@codepack/shared';
import { ConfigLoader, exitCodeFor, prepareOutput, render, writeDocument } from '@codepack/core';
import { OutputRenderer, statusFor, type PackOutput } from '../output';
import { ConfigFlagsSchema, explicitOptions, GlobalOptionsSchema, parseOptions, toConfigInput } from '../options';
import type { CliContext } from '../context';

const PackOptionsSchema = ConfigFlagsSchema.extend({
  output: z.string().optional(),
  logFile: z.string().optional(),
});

/** Adds every configuration flag shared by `pack` and `list`. */
export function addConfigOptions(command: Command): Command {
  return command
    .option('-m, --model <name>', 'Model whose tokenizer and context window apply')
    .option('--max-tokens-per-file <n>', 'Per-file token cap (0 disables truncation)')
    .option('--max-total-tokens <n>', "Run ceiling (default: the model's context window)")
    .addOption(new Option('--overflow <policy>', 'Files past the ceiling').choices(['keep', 'drop', 'abort']))
    .addOption(new Option('-f, --format <format>', 'Document format').choices(['markdown', 'json', 'yaml', 'text']))
    .option('--no-metadata', 'Omit per-file metadata and statistics')
    .option('--no-timestamp', 'Omit the generation timestamp')
    .option('-w, --workers <n>', 'Worker count (default: available parallelism)')
    .option('--max-file-size <bytes>', 'Skip files larger than this')
    .option('--strip-comments', 'Remove comments where the language is known')
    .option('--max-blank-lines <n>', 'Longest run of blank lines kept')
    .option('--fallback-encodings <list>', 'Comma-separated encodings tried after UTF-8')
    .option('--ignore-file <path>', 'Ignore file used instead of .gitignore and .codepackignore')
    .option('--bypass-ignore', 'Include everything, ignoring all ignore rules')
    .option('--exclude <pattern...>', 'Extra ignore patterns')
    .option('--include-ext <list>', 'Only pack these comma-separated extensions')
    .option('--exclude-ext <list>', 'Never pack these comma-separated extensions');
}

function createLogger(verbose: boolean, json: boolean, logFile?: string): Logger & { flush?: () => Promise<void> } {
  const consoleLogger = new ConsoleLogger({ level: verbose ? 'debug' : json ? 'warn' : 'info' });
  return logFile ? new JsonlLogger(logFile, { delegate: consoleLogger }) : consoleLogger;
}

export function registerPackCommand(program: Command, context: CliContext) {
  const command = program
    .command('pack')
    .argument('<root>', 'Directory to pack')
    .description('Pack a source tree into one token-budgeted document')
    .option('-o, --output <file>', 'Write the document here instead of stdout')
    .option('--log-file <path>', 'Append structured run events to this JSONL file');
  addConfigOptions(command);

  command.action(async (root: string, _options: unknown, cmd: Command) => {
    const globals = parseOptions(GlobalOptionsSchema, program.opts());
    const options = parseOptions(PackOptionsSchema, explicitOptions(cmd));
    const json = globals.json === true;
    if (json && !options.output) {
      throw new UsageError('--json reports on stdout, so the document needs --output');
    }

    const { config, sources } = ConfigLoader.load({
      root,
      configPath: globals.config,
      flags: toConfigInput(options),
    });
    const outputPath = options.output ? path.resolve(options.output) : undefined;
    if (outputPath) await prepareOutput(outputPath);

    const renderer = new OutputRenderer(json);
    const logger = createLogger(globals.verbose === true, json, options.logFile);
    if (globals.verbose) {
      for (const source of sources) renderer.log(`Loaded config from ${source}`);
    }

    const controller = new AbortController();
    const onInterrupt = () => {
      renderer.log('Interrupted; finishing in-flight files...');
      controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    try {
      const result = await context.orchestrator.run(root, config, {
        signal: controller.signal,
        logger,
        exclude: outputPath ? [outputPath] : [],
      });

      const data: PackOutput = {
        status: statusFor(result.summary),
        runId: result.runId,
        summary: result.summary,
        failures: result.failures,
      };

      if (result.summary.processed > 0) {
        const document = render(result, documentOptions(config));
        if (outputPath) {
          const written = await writeDocument(outputPath, document);
          data.output = { path: written.path, format: config.outputFormat, bytes: written.bytes };
          await logger.log({
            ...eventBase(result.runId),
            type: 'DocumentWritten',
            payload: { path: written.path, format: config.outputFormat, bytes: written.bytes },
          });
        } else {
          context.stdout(document);
        }
      }

      renderer.render(data);
      context.setExitCode(exitCodeFor(result.summary));
    } finally {
      process.removeListener('SIGINT', onInterrupt);
      await logger.flush?.();
    }
  });
}

function documentOptions(config: PackConfig) {
  return {
    format: config.outputFormat,
    includeMetadata: config.includeMetadata,
    includeTimestamp: config.includeTimestamp,
  };
}
