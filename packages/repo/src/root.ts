import * as fs from 'fs/promises';
import * as path from 'path';
import { SetupError } from '@codepack/shared';

/**
 * Resolves `root` to an absolute directory path.
 *
 * @throws SetupError when the path does not exist, is not a directory or
 * cannot be listed.
 */
export async function resolveRoot(root: string): Promise<string> {
  const absolute = path.resolve(root);

  let stats;
  try {
    stats = await fs.stat(absolute);
  } catch (error) {
    throw new SetupError(`Root directory ${absolute} does not exist`, { cause: error });
  }
  if (!stats.isDirectory()) {
    throw new SetupError(`Root ${absolute} is not a directory`);
  }

  try {
    await fs.access(absolute, fs.constants.R_OK | fs.constants.X_OK);
  } catch (error) {
    throw new SetupError(`Root directory ${absolute} is not readable`, { cause: error });
  }

  return absolute;
}
