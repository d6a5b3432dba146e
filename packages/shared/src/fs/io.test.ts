import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { atomicWrite } from './io';

describe('atomicWrite', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'codepack-io-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('creates missing parent directories', async () => {
    const target = path.join(tmpDir, 'nested', 'deeper', 'doc.md');
    await atomicWrite(target, '# doc\n');
    expect(await fs.readFile(target, 'utf8')).toBe('# doc\n');
  });

  it('replaces an existing file and leaves no temp files behind', async () => {
    const target = path.join(tmpDir, 'doc.md');
    await fs.writeFile(target, 'old');
    await atomicWrite(target, 'new');

    expect(await fs.readFile(target, 'utf8')).toBe('new');
    expect(await fs.readdir(tmpDir)).toEqual(['doc.md']);
  });

  it('removes the temp file when the rename fails', async () => {
    const target = path.join(tmpDir, 'taken');
    await fs.mkdir(path.join(target, 'child'), { recursive: true });

    await expect(atomicWrite(target, 'content')).rejects.toThrow();
    expect(await fs.readdir(tmpDir)).toEqual(['taken']);
  });
});
