import { SanitizeError } from '@codepack/shared';
import { stripComments } from './comments';
import { resolveRule } from './rules';

export interface SanitizeOptions {
  /** Remove comments where the language has a rule. Default false. */
  stripComments?: boolean;
  /** Longest run of blank lines kept. Default 2. */
  maxBlankLines?: number;
}

export const DEFAULT_MAX_BLANK_LINES = 2;

const HARD_BREAK = /\S {2,}$/;

/**
 * Normalizes decoded text for the document. Never touches identifiers,
 * string literals or indentation.
 *
 * Steps: drop a leading BOM, convert CRLF and CR to LF, optionally strip
 * comments, strip trailing whitespace, cap blank-line runs, end with exactly
 * one newline. Applying it twice gives the same result as applying it once.
 *
 * @throws SanitizeError when the options are invalid.
 */
export function sanitize(language: string, text: string, options: SanitizeOptions = {}): string {
  const maxBlankLines = options.maxBlankLines ?? DEFAULT_MAX_BLANK_LINES;
  if (!Number.isInteger(maxBlankLines) || maxBlankLines < 0) {
    throw new SanitizeError(`maxBlankLines must be a non-negative integer, got ${maxBlankLines}`);
  }

  const rule = resolveRule(language);
  let result = text.startsWith('\uFEFF') ? text.slice(1) : text;
  result = result.replace(/\r\n?/g, '\n');

  if (options.stripComments && rule) {
    result = stripComments(result, rule);
  }

  const kept: string[] = [];
  let blankRun = 0;
  for (const line of result.split('\n')) {
    const trimmed =
      rule?.keepHardBreaks && HARD_BREAK.test(line) ? line.replace(/\s+$/, '  ') : line.replace(/\s+$/, '');
    if (trimmed === '') {
      blankRun++;
      if (blankRun > maxBlankLines) continue;
    } else {
      blankRun = 0;
    }
    kept.push(trimmed);
  }

  while (kept.length > 0 && kept[kept.length - 1] === '') kept.pop();
  return kept.length === 0 ? '' : kept.join('\n') + '\n';
}
