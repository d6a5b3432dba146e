import nodeFs from 'node:fs/promises';
import path from 'node:path';
import {
  DecodeError,
  ReadError,
  SanitizeError,
  toFailureReason,
  tryAsync,
  trySync,
  type CandidatePath,
  type PipelineStage,
  type SkipReason,
} from '@codepack/shared';
import { classify, detect, hasBinaryExtension, sanitize } from '@codepack/repo';
import type { TokenAccountant } from '../tokens';
import type { FileOutcome, FileReader, ProcessorOptions } from './types';

const readFromDisk: FileReader = (absolutePath) => nodeFs.readFile(absolutePath);

function failed(candidate: CandidatePath, stage: PipelineStage, error: unknown): FileOutcome {
  return {
    kind: 'failed',
    failure: Object.freeze({ relativePath: candidate.relativePath, stage, reason: toFailureReason(error) }),
  };
}

function skipped(candidate: CandidatePath, reason: SkipReason): FileOutcome {
  return {
    kind: 'skipped',
    skip: Object.freeze({ relativePath: candidate.relativePath, reason, sizeBytes: candidate.sizeBytes }),
  };
}

/**
 * Runs one candidate through read, decode, classify, sanitize and count.
 *
 * The token encoding for `options.model` must already be loaded on the
 * accountant.
 */
export class FileProcessor {
  constructor(
    private readonly accountant: TokenAccountant,
    private readonly options: ProcessorOptions,
    private readonly readFile: FileReader = readFromDisk,
  ) {}

  async process(candidate: CandidatePath): Promise<FileOutcome> {
    const { relativePath } = candidate;

    if (hasBinaryExtension(relativePath)) return skipped(candidate, 'binary-extension');
    if (candidate.sizeBytes > this.options.maxFileSizeBytes) return skipped(candidate, 'too-large');

    const read = await tryAsync(() => this.readFile(candidate.absolutePath));
    if (!read.ok) {
      return failed(candidate, 'Read', new ReadError(`Cannot read ${relativePath}`, { cause: read.error }));
    }
    const bytes = read.value;

    const detection = detect(bytes, {
      maxBytes: this.options.maxFileSizeBytes,
      fallbackEncodings: this.options.fallbackEncodings,
    });
    if (detection.isBinary) {
      if (detection.reason === 'undecodable') {
        return failed(candidate, 'Decode', new DecodeError(`No supported encoding decodes ${relativePath}`));
      }
      return skipped(candidate, detection.reason);
    }

    const classified = trySync(() => classify(relativePath, detection.text));
    if (!classified.ok) return failed(candidate, 'Classify', classified.error);
    const language = classified.value;

    const sanitized = trySync(() =>
      sanitize(language, detection.text, {
        stripComments: this.options.stripComments,
        maxBlankLines: this.options.maxBlankLines,
      }),
    );
    if (!sanitized.ok) {
      const error =
        sanitized.error instanceof SanitizeError
          ? sanitized.error
          : new SanitizeError(`Cannot sanitize ${relativePath}`, { cause: sanitized.error });
      return failed(candidate, 'Sanitize', error);
    }

    const counted = trySync(() =>
      this.accountant.fitToBudget(this.options.model, sanitized.value, this.options.maxTokensPerFile),
    );
    if (!counted.ok) return failed(candidate, 'Count', counted.error);

    return {
      kind: 'done',
      file: Object.freeze({
        name: path.posix.basename(relativePath),
        absolutePath: candidate.absolutePath,
        relativePath,
        language,
        encoding: detection.encoding,
        sizeBytes: bytes.byteLength,
        originalTokenCount: counted.value.originalTokenCount,
        tokenCount: counted.value.tokenCount,
        content: counted.value.text,
        truncated: counted.value.truncated,
      }),
    };
  }
}
