import path from 'node:path';
import { comparePaths, type FailureRecord, type FileRecord, type RunSummary, type SkipRecord } from '@codepack/shared';

export interface DocumentFile {
  path: string;
  language?: string;
  encoding?: string;
  sizeBytes?: number;
  tokenCount?: number;
  truncated?: boolean;
  overflow?: boolean;
  content: string;
}

export interface OmittedFile {
  path: string;
  reason: string;
}

export interface DocumentStatistics {
  model: string;
  files: number;
  totalTokens: number;
  truncated: number;
  overflowed: number;
  languages: Record<string, number>;
}

/**
 * Format-independent model of the output. Optional fields are absent, never
 * undefined, so every renderer sees the same keys.
 */
export interface PackDocument {
  title: string;
  generatedAt?: string;
  statistics?: DocumentStatistics;
  files: DocumentFile[];
  omitted: OmittedFile[];
}

export interface DocumentInput {
  summary: RunSummary;
  records: readonly FileRecord[];
  skipped: readonly SkipRecord[];
  failures: readonly FailureRecord[];
}

export interface DocumentOptions {
  includeMetadata: boolean;
  includeTimestamp: boolean;
}

function toDocumentFile(record: FileRecord, includeMetadata: boolean): DocumentFile {
  if (!includeMetadata) return { path: record.relativePath, content: record.content };
  return {
    path: record.relativePath,
    language: record.language,
    encoding: record.encoding,
    sizeBytes: record.sizeBytes,
    tokenCount: record.tokenCount,
    ...(record.truncated ? { truncated: true } : {}),
    ...(record.overflow ? { overflow: true } : {}),
    content: record.content,
  };
}

/**
 * Builds the document for a finished run. The title uses the root's base
 * name so output does not depend on where the tree lives.
 */
export function buildDocument(input: DocumentInput, options: DocumentOptions): PackDocument {
  const { summary } = input;
  const omitted: OmittedFile[] = [
    ...input.skipped.map((skip) => ({ path: skip.relativePath, reason: skip.reason })),
    ...input.failures.map((failure) => ({
      path: failure.relativePath,
      reason: `${failure.stage} failed: ${failure.reason}`,
    })),
  ].sort((a, b) => comparePaths(a.path, b.path));

  return {
    title: `Codebase: ${path.basename(summary.root)}`,
    ...(options.includeTimestamp ? { generatedAt: summary.finishedAt } : {}),
    ...(options.includeMetadata
      ? {
          statistics: {
            model: summary.model,
            files: input.records.length,
            totalTokens: summary.totalTokens,
            truncated: summary.truncated,
            overflowed: summary.overflowed,
            languages: { ...summary.languages },
          },
        }
      : {}),
    files: input.records.map((record) => toDocumentFile(record, options.includeMetadata)),
    omitted,
  };
}
