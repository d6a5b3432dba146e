import { Command } from 'commander';
import { knownModels, lookupModel } from '@codepack/core';
import { printTable } from '../output';
import { GlobalOptionsSchema, parseOptions } from '../options';

export function registerModelsCommand(program: Command) {
  program
    .command('models')
    .description('List models with a known tokenizer and context window')
    .action(() => {
      const globals = parseOptions(GlobalOptionsSchema, program.opts());
      const rows = knownModels().map((model) => {
        const profile = lookupModel(model);
        return { model, encoding: profile.encoding, contextWindow: profile.contextWindow };
      });
      if (globals.json) {
        console.log(JSON.stringify(rows, null, 2));
      } else {
        printTable(rows, { head: ['Model', 'Encoding', 'Context window'] });
      }
    });
}
