import * as fs from 'fs/promises';
import path from 'node:path';
import { atomicWrite, ensureParentDir, OutputError, toFailureReason } from '@codepack/shared';

export interface WrittenDocument {
  path: string;
  bytes: number;
}

function cannotWrite(outputPath: string, reason: string, cause?: unknown): OutputError {
  return new OutputError(outputPath, `Cannot write ${outputPath}: ${reason}`, { cause });
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Checks the target before any file is read: its directory exists (it is
 * created if missing) and is writable, and the target is not a directory.
 *
 * @throws OutputError naming the problem.
 */
export async function prepareOutput(outputPath: string): Promise<void> {
  try {
    await ensureParentDir(outputPath);
  } catch (error) {
    throw cannotWrite(outputPath, toFailureReason(error), error);
  }

  try {
    const stats = await fs.stat(outputPath);
    if (stats.isDirectory()) throw cannotWrite(outputPath, 'it is a directory');
  } catch (error) {
    if (error instanceof OutputError) throw error;
    if (!isNotFound(error)) throw cannotWrite(outputPath, toFailureReason(error), error);
  }

  const dir = path.dirname(outputPath);
  try {
    await fs.access(dir, fs.constants.W_OK);
  } catch (error) {
    throw cannotWrite(outputPath, `${dir} is not writable`, error);
  }
}

/**
 * Writes the document atomically, creating parent directories.
 *
 * @throws OutputError when the target cannot be written.
 */
export async function writeDocument(outputPath: string, content: string): Promise<WrittenDocument> {
  try {
    await atomicWrite(outputPath, content);
  } catch (error) {
    throw cannotWrite(outputPath, toFailureReason(error), error);
  }
  return { path: outputPath, bytes: Buffer.byteLength(content, 'utf8') };
}
