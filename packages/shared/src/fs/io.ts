import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir } from 'fs-extra';

export async function ensureParentDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

/**
 * Writes `content` to a temp file beside `path`, then renames it over the
 * target. Readers see either the old file or the complete new one.
 */
export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureParentDir(path);
  const tempPath = await tmpName({ dir: dirname(path), prefix: '.codepack-', postfix: '.tmp' });
  try {
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
