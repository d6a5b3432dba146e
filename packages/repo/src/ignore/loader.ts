import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { SetupError } from '@codepack/shared';
import { parseRules } from './rules';
import type { IgnoreRule, RuleSource } from './types';

const DEFAULT_IGNORES_PATH = fileURLToPath(new URL('./default-ignores.txt', import.meta.url));

/** Project-level ignore files, read in this order when no explicit file is given. */
export const PROJECT_IGNORE_FILES: ReadonlyArray<[string, RuleSource]> = [
  ['.gitignore', 'gitignore'],
  ['.codepackignore', 'codepackignore'],
];

let defaultRules: Promise<IgnoreRule[]> | undefined;

export function loadDefaultRules(): Promise<IgnoreRule[]> {
  defaultRules ??= fs
    .readFile(DEFAULT_IGNORES_PATH, 'utf8')
    .then((text) => parseRules(text, 'default'))
    .catch((error: unknown) => {
      defaultRules = undefined;
      throw new SetupError(`Cannot read built-in ignore rules at ${DEFAULT_IGNORES_PATH}`, {
        cause: error,
      });
    });
  return defaultRules;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Rules layered over the defaults. An explicit `ignoreFile` replaces the
 * project files and must exist; otherwise `.gitignore` and
 * `.codepackignore` at the root are read when present.
 */
export async function loadSupplementalRules(root: string, ignoreFile?: string): Promise<IgnoreRule[]> {
  if (ignoreFile !== undefined) {
    const filePath = path.resolve(root, ignoreFile);
    try {
      return parseRules(await fs.readFile(filePath, 'utf8'), 'ignore-file');
    } catch (error) {
      const reason = isMissing(error) ? 'does not exist' : 'cannot be read';
      throw new SetupError(`Ignore file ${filePath} ${reason}`, { cause: error });
    }
  }

  const rules: IgnoreRule[] = [];
  for (const [name, source] of PROJECT_IGNORE_FILES) {
    const filePath = path.join(root, name);
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissing(error)) continue;
      throw new SetupError(`Cannot read ${filePath}`, { cause: error });
    }
    rules.push(...parseRules(text, source));
  }
  return rules;
}
