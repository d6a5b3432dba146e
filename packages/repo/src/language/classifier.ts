import path from 'node:path';
import { z } from 'zod';
import table from './languages.json';
import { guessFromContent } from './patterns';

const LanguageTableSchema = z.object({
  filenames: z.record(z.string()),
  extensions: z.record(z.string()),
  interpreters: z.record(z.string()),
  ambiguous: z.record(z.array(z.string()).nonempty()),
});

const LANGUAGES = LanguageTableSchema.parse(table);

export const FALLBACK_LANGUAGE = 'text';
/** Characters of content inspected by the secondary pass. */
export const SAMPLE_CHARS = 4096;

function extensionOf(baseName: string): string {
  const dot = baseName.lastIndexOf('.');
  return dot > 0 ? baseName.slice(dot + 1).toLowerCase() : '';
}

function fromShebang(sample: string): string | undefined {
  const match = /^#!\s*(\S+)(.*)$/m.exec(sample);
  if (!match || match.index !== 0) return undefined;

  let interpreter = path.posix.basename(match[1]);
  if (interpreter === 'env') {
    // `#!/usr/bin/env -S node --flag`: first argument that is not an option.
    const args = match[2].trim().split(/\s+/);
    interpreter = args.find((arg) => arg !== '' && !arg.startsWith('-')) ?? '';
  }

  return LANGUAGES.interpreters[interpreter] ?? LANGUAGES.interpreters[interpreter.replace(/[\d.]+$/, '')];
}

function looksLikeJson(sample: string, complete: boolean): boolean {
  const trimmed = sample.trim();
  if (!/^[{[]/.test(trimmed)) return false;
  if (!complete) return /^[{[]\s*("|\{|\[|\]|\})/.test(trimmed);
  try {
    JSON.parse(trimmed);
    return true;
  } catch {
    return false;
  }
}

/**
 * Lowercase language label for a file. Never throws.
 *
 * Known file names and extensions decide first. Extensionless, unknown or
 * ambiguous files (`.h`, `.m`, `.inc`) fall through to the shebang, then a
 * weighted pattern guess, then a JSON parse check, over at most
 * {@link SAMPLE_CHARS} characters of `sample`.
 */
export function classify(relativePath: string, sample?: string): string {
  const baseName = path.posix.basename(relativePath.replace(/\\/g, '/'));
  const byName = LANGUAGES.filenames[baseName];
  if (byName) return byName;

  const ext = extensionOf(baseName);
  const candidates = LANGUAGES.ambiguous[ext];
  const byExtension = LANGUAGES.extensions[ext];
  if (byExtension && !candidates) return byExtension;

  if (sample !== undefined && sample.trim() !== '') {
    const bounded = sample.slice(0, SAMPLE_CHARS);
    const guessed = candidates
      ? guessFromContent(bounded, candidates)
      : (fromShebang(bounded) ?? guessFromContent(bounded));
    if (guessed) return guessed;
    if (!candidates && looksLikeJson(bounded, bounded.length === sample.length)) return 'json';
  }

  return candidates ? candidates[0] : FALLBACK_LANGUAGE;
}
