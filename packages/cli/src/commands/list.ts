import { Command } from 'commander';
import { z } from 'zod';
import { DirectoryWalker, resolveRoot } from '@codepack/repo';
import { buildRuleSet, ConfigLoader, extensionFilter, formatBytes } from '@codepack/core';
import { OutputRenderer, printTable } from '../output';
import { ConfigFlagsSchema, explicitOptions, GlobalOptionsSchema, parseOptions, toConfigInput } from '../options';
import { addConfigOptions } from './pack';

const ListOptionsSchema = ConfigFlagsSchema.extend({
  limit: z.coerce.number().int().positive().optional(),
});

export function registerListCommand(program: Command) {
  const command = program
    .command('list')
    .argument('<root>', 'Directory to scan')
    .description('List the files a pack would read, without reading them')
    .option('-n, --limit <n>', 'Stop after this many files');
  addConfigOptions(command);

  command.action(async (root: string, _options: unknown, cmd: Command) => {
    const globals = parseOptions(GlobalOptionsSchema, program.opts());
    const options = parseOptions(ListOptionsSchema, explicitOptions(cmd));
    const { config } = ConfigLoader.load({ root, configPath: globals.config, flags: toConfigInput(options) });
    const renderer = new OutputRenderer(globals.json === true);

    const absoluteRoot = await resolveRoot(root);
    const ruleSet = await buildRuleSet(absoluteRoot, config);
    const admit = extensionFilter(config);
    const rows: Array<{ path: string; size: string; bytes: number }> = [];
    const errors: string[] = [];

    const walker = new DirectoryWalker();
    for await (const candidate of walker.walk(absoluteRoot, ruleSet, {
      onError: (relativePath, error) => errors.push(`${relativePath}: ${error.message}`),
    })) {
      if (!admit(candidate.relativePath)) continue;
      rows.push({ path: candidate.relativePath, size: formatBytes(candidate.sizeBytes), bytes: candidate.sizeBytes });
      if (options.limit !== undefined && rows.length >= options.limit) break;
    }

    if (globals.json) {
      console.log(
        JSON.stringify({ files: rows.map(({ path, bytes }) => ({ path, bytes })), errors, ruleCount: ruleSet.rules.length }, null, 2),
      );
      return;
    }

    printTable(rows.map(({ path, size }) => ({ path, size })), { head: ['Path', 'Size'] });
    renderer.log(`${rows.length} file${rows.length === 1 ? '' : 's'}, ${ruleSet.rules.length} ignore rules`);
    errors.forEach((error) => renderer.error(error));
  });
}
