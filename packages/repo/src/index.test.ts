import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { SetupError } from '@codepack/shared';
import { resolveRoot } from './index';

describe('resolveRoot', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'codepack-root-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('returns the absolute directory path', async () => {
    const relativeToCwd = path.relative(process.cwd(), tmpDir);
    await expect(resolveRoot(relativeToCwd)).resolves.toBe(tmpDir);
  });

  it('rejects a missing root', async () => {
    const missing = path.join(tmpDir, 'missing');
    const attempt = resolveRoot(missing);
    await expect(attempt).rejects.toBeInstanceOf(SetupError);
    await expect(attempt).rejects.toThrow(`Root directory ${missing} does not exist`);
  });

  it('rejects a file as root', async () => {
    const file = path.join(tmpDir, 'file.txt');
    await fs.writeFile(file, 'x');
    await expect(resolveRoot(file)).rejects.toThrow(`Root ${file} is not a directory`);
  });
});
