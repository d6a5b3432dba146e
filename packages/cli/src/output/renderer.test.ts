import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { FailureRecord, RunSummary } from '@codepack/shared';
import { OutputRenderer, statusFor, type PackOutput } from './renderer';

function summary(overrides: Partial<RunSummary> = {}): RunSummary {
  return {
    root: '/work/app',
    model: 'gpt-4o',
    encoding: 'o200k_base',
    budget: { maxTokensPerFile: 2000, ceiling: 128000, overflowPolicy: 'keep' },
    discovered: 3,
    processed: 3,
    skippedBinary: 0,
    failed: 0,
    unprocessed: 0,
    truncated: 0,
    overflowed: 0,
    totalTokens: 120,
    totalBytes: 480,
    languages: { TypeScript: 3 },
    encodings: { 'utf-8': 3 },
    ignoreRuleCount: 12,
    workerCount: 2,
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:00:01.000Z',
    durationMs: 250,
    peakMemoryBytes: 0,
    cancelled: false,
    stopReason: 'completed',
    ...overrides,
  };
}

function failure(i: number): FailureRecord {
  return { relativePath: `f${i}.txt`, stage: 'Read', reason: 'EACCES' };
}

describe('statusFor', () => {
  it('classifies runs', () => {
    expect(statusFor(summary())).toBe('SUCCESS');
    expect(statusFor(summary({ failed: 1, processed: 2 }))).toBe('PARTIAL');
    expect(statusFor(summary({ failed: 3, processed: 0 }))).toBe('FAILURE');
    expect(statusFor(summary({ discovered: 0, processed: 0 }))).toBe('EMPTY');
    expect(statusFor(summary({ processed: 0, skippedBinary: 3 }))).toBe('EMPTY');
    expect(statusFor(summary({ processed: 0, skippedBinary: 2, failed: 1 }))).toBe('EMPTY');
    expect(statusFor(summary({ cancelled: true, stopReason: 'cancelled' }))).toBe('CANCELLED');
  });
});

describe('OutputRenderer', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('renders JSON output when json mode is enabled', () => {
    const renderer = new OutputRenderer(true);
    const data: PackOutput = { status: 'SUCCESS', runId: 'run-1', summary: summary(), failures: [] };
    renderer.render(data);

    expect(logSpy).toHaveBeenCalledTimes(1);
    const parsed = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(parsed.status).toBe('SUCCESS');
    expect(parsed.runId).toBe('run-1');
    expect(parsed.summary.totalTokens).toBe(120);
    expect(errSpy).not.toHaveBeenCalled();
  });

  it('keeps stdout free in human mode', () => {
    const renderer = new OutputRenderer(false);
    renderer.render({
      status: 'SUCCESS',
      runId: 'run-1',
      summary: summary(),
      failures: [],
      output: { path: '/tmp/out.md', format: 'markdown', bytes: 100 },
    });

    expect(logSpy).not.toHaveBeenCalled();
    const output = errSpy.mock.calls.map((c) => String(c[0])).join('\n');
    expect(output).toContain('Packed 3 files (120 tokens) in 250ms');
    expect(output).toContain('Processed:   3');
    expect(output).toContain('/tmp/out.md (markdown)');
  });

  it('lists at most ten failed files', () => {
    const renderer = new OutputRenderer(false);
    const failures = Array.from({ length: 12 }, (_, i) => failure(i));
    renderer.render({
      status: 'PARTIAL',
      runId: 'run-1',
      summary: summary({ discovered: 13, processed: 1, failed: 12 }),
      failures,
    });

    const output = errSpy.mock.calls.map((c) => String(c[0])).join('\n');
    expect(output).toContain('Failed files:');
    expect(output).toContain('f9.txt');
    expect(output).not.toContain('f10.txt');
    expect(output).toContain('... and 2 more.');
  });

  it('reports an empty tree on stdout', () => {
    const renderer = new OutputRenderer(false);
    renderer.render({
      status: 'EMPTY',
      runId: 'run-1',
      summary: summary({ discovered: 0, processed: 0 }),
      failures: [],
    });

    expect(String(logSpy.mock.calls[0][0])).toContain('No files to pack under /work/app; nothing was written.');
  });

  it('explains a run where every discovered file was skipped', () => {
    const renderer = new OutputRenderer(false);
    renderer.render({
      status: 'EMPTY',
      runId: 'run-1',
      summary: summary({ discovered: 1, processed: 0, skippedBinary: 1 }),
      failures: [],
    });

    expect(String(logSpy.mock.calls[0][0])).toContain(
      'None of the 1 file under /work/app could be packed (1 binary); nothing was written.',
    );
    expect(errSpy).not.toHaveBeenCalled();
  });

  it('log() is silent in json mode', () => {
    new OutputRenderer(true).log('hello');
    expect(errSpy).not.toHaveBeenCalled();
    new OutputRenderer(false).log('hello');
    expect(String(errSpy.mock.calls[0][0])).toContain('hello');
  });

  it('error() prints a JSON object in json mode', () => {
    new OutputRenderer(true).error(new Error('boom'));
    expect(errSpy).toHaveBeenCalledWith(JSON.stringify({ error: 'boom' }));
  });
});
