import { isUserCorrectable, type RunSummary } from '@codepack/shared';

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  usage: 2,
  cancelled: 130,
} as const;

/**
 * Exit status for a finished run. Partial failures and an empty tree are
 * success; a run where every discovered file failed is not.
 */
export function exitCodeFor(summary: RunSummary): number {
  if (summary.cancelled) return EXIT_CODES.cancelled;
  if (summary.discovered > 0 && summary.failed === summary.discovered) return EXIT_CODES.failure;
  return EXIT_CODES.success;
}

/** Exit status for an error that ended the run. */
export function exitCodeForError(error: unknown): number {
  return isUserCorrectable(error) ? EXIT_CODES.usage : EXIT_CODES.failure;
}
