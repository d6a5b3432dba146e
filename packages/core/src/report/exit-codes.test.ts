import { describe, it, expect } from 'vitest';
import { ConfigError, OutputError, SetupError, type RunSummary } from '@codepack/shared';
import { exitCodeFor, exitCodeForError } from './exit-codes';

function counts(discovered: number, failed: number, cancelled = false): RunSummary {
  return {
    root: '/r',
    model: 'gpt-4o',
    encoding: 'o200k_base',
    budget: { maxTokensPerFile: 0, ceiling: 100, overflowPolicy: 'keep' },
    discovered,
    processed: discovered - failed,
    skippedBinary: 0,
    failed,
    unprocessed: 0,
    truncated: 0,
    overflowed: 0,
    totalTokens: 0,
    totalBytes: 0,
    languages: {},
    encodings: {},
    ignoreRuleCount: 0,
    workerCount: 1,
    startedAt: '',
    finishedAt: '',
    durationMs: 0,
    peakMemoryBytes: 0,
    cancelled,
    stopReason: cancelled ? 'cancelled' : 'completed',
  };
}

describe('exitCodeFor', () => {
  it('treats partial failure and empty trees as success', () => {
    expect(exitCodeFor(counts(3, 1))).toBe(0);
    expect(exitCodeFor(counts(0, 0))).toBe(0);
  });

  it('fails when every discovered file failed', () => {
    expect(exitCodeFor(counts(2, 2))).toBe(1);
  });

  it('uses 130 for a cancelled run', () => {
    expect(exitCodeFor(counts(2, 0, true))).toBe(130);
  });
});

describe('exitCodeForError', () => {
  it('maps user-correctable errors to 2', () => {
    expect(exitCodeForError(new ConfigError('bad'))).toBe(2);
    expect(exitCodeForError(new SetupError('missing root'))).toBe(2);
    expect(exitCodeForError(new OutputError('/out.md', 'denied'))).toBe(2);
  });

  it('maps anything else to 1', () => {
    expect(exitCodeForError(new Error('boom'))).toBe(1);
    expect(exitCodeForError('boom')).toBe(1);
  });
});
