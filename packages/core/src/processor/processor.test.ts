import { describe, it, expect, vi } from 'vitest';
import { TokenAccountant, TRUNCATION_MARKER } from '../tokens';
import { charAccountant } from '../__fixtures__/test-config';
import { FileProcessor } from './processor';
import type { FileReader, ProcessorOptions } from './types';

const options: ProcessorOptions = {
  model: 'gpt-4o',
  maxTokensPerFile: 0,
  maxFileSizeBytes: 1024,
  fallbackEncodings: [],
  stripComments: false,
  maxBlankLines: 2,
};

function candidate(relativePath: string, sizeBytes = 10) {
  return { absolutePath: `/project/${relativePath}`, relativePath, sizeBytes };
}

function readerOf(content: string | Uint8Array): FileReader {
  return async () => (typeof content === 'string' ? new TextEncoder().encode(content) : content);
}

describe('FileProcessor', () => {
  it('produces a record for a text file', async () => {
    const processor = new FileProcessor(await charAccountant(), options, readerOf("print('hi')\r\n"));

    const outcome = await processor.process(candidate('src/app.py'));

    expect(outcome).toEqual({
      kind: 'done',
      file: {
        name: 'app.py',
        absolutePath: '/project/src/app.py',
        relativePath: 'src/app.py',
        language: 'python',
        encoding: 'utf-8',
        sizeBytes: 13,
        originalTokenCount: 12,
        tokenCount: 12,
        content: "print('hi')\n",
        truncated: false,
      },
    });
  });

  it('labels a long extensionless JSON file from its leading sample', async () => {
    const json = `{"values": [${'1, '.repeat(2000)}1]}\n`;
    const processor = new FileProcessor(
      await charAccountant(),
      { ...options, maxFileSizeBytes: 1024 * 1024 },
      readerOf(json),
    );

    const outcome = await processor.process(candidate('fixtures/data', json.length));

    expect(outcome).toMatchObject({ kind: 'done', file: { language: 'json', content: json } });
  });

  it('skips known binary extensions without reading', async () => {
    const reader = vi.fn(readerOf('x'));
    const processor = new FileProcessor(await charAccountant(), options, reader);

    const outcome = await processor.process(candidate('assets/logo.png', 300));

    expect(outcome).toEqual({
      kind: 'skipped',
      skip: { relativePath: 'assets/logo.png', reason: 'binary-extension', sizeBytes: 300 },
    });
    expect(reader).not.toHaveBeenCalled();
  });

  it('skips files over the size limit without reading', async () => {
    const reader = vi.fn(readerOf('x'));
    const processor = new FileProcessor(await charAccountant(), options, reader);

    const outcome = await processor.process(candidate('data/dump.sql', 4096));

    expect(outcome).toEqual({
      kind: 'skipped',
      skip: { relativePath: 'data/dump.sql', reason: 'too-large', sizeBytes: 4096 },
    });
    expect(reader).not.toHaveBeenCalled();
  });

  it('skips content that looks binary', async () => {
    const processor = new FileProcessor(await charAccountant(), options, readerOf(new Uint8Array([0x41, 0x00, 0x42])));
    const outcome = await processor.process(candidate('blob'));
    expect(outcome).toEqual({ kind: 'skipped', skip: { relativePath: 'blob', reason: 'binary-content', sizeBytes: 10 } });
  });

  it('records a read failure without throwing', async () => {
    const denied = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
    const processor = new FileProcessor(await charAccountant(), options, () => Promise.reject(denied));

    const outcome = await processor.process(candidate('secret.txt'));

    expect(outcome).toEqual({
      kind: 'failed',
      failure: { relativePath: 'secret.txt', stage: 'Read', reason: 'Cannot read secret.txt: EACCES: permission denied' },
    });
  });

  it('records undecodable bytes as a decode failure', async () => {
    const invalidUtf8 = new Uint8Array([0x61, 0x62, 0xc3, 0x28]);
    const processor = new FileProcessor(await charAccountant(), options, readerOf(invalidUtf8));

    const outcome = await processor.process(candidate('data.txt'));

    expect(outcome).toEqual({
      kind: 'failed',
      failure: { relativePath: 'data.txt', stage: 'Decode', reason: 'No supported encoding decodes data.txt' },
    });
  });

  it('truncates content to the per-file budget', async () => {
    const processor = new FileProcessor(
      await charAccountant(),
      { ...options, maxTokensPerFile: 50 },
      readerOf('x'.repeat(200)),
    );

    const outcome = await processor.process(candidate('notes.txt'));

    expect(outcome.kind).toBe('done');
    if (outcome.kind !== 'done') return;
    expect(outcome.file.content).toBe('xxxxx' + TRUNCATION_MARKER);
    expect(outcome.file.tokenCount).toBe(50);
    expect(outcome.file.originalTokenCount).toBe(201);
    expect(outcome.file.truncated).toBe(true);
  });

  it('reports counting failures at the Count stage', async () => {
    const processor = new FileProcessor(new TokenAccountant(), options, readerOf('text'));

    const outcome = await processor.process(candidate('a.txt'));

    expect(outcome).toEqual({
      kind: 'failed',
      failure: { relativePath: 'a.txt', stage: 'Count', reason: 'Encoding o200k_base is not loaded' },
    });
  });

  it('reports invalid sanitize options at the Sanitize stage', async () => {
    const processor = new FileProcessor(await charAccountant(), { ...options, maxBlankLines: -1 }, readerOf('text'));

    const outcome = await processor.process(candidate('a.txt'));

    expect(outcome).toEqual({
      kind: 'failed',
      failure: {
        relativePath: 'a.txt',
        stage: 'Sanitize',
        reason: 'maxBlankLines must be a non-negative integer, got -1',
      },
    });
  });
});
