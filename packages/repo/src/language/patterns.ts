/**
 * Weighted content signatures. A language's score is the sum of the
 * weights of its patterns found in the sample.
 */
export const LANGUAGE_PATTERNS: ReadonlyArray<{ language: string; patterns: ReadonlyArray<[RegExp, number]> }> = [
  {
    language: 'python',
    patterns: [
      [/^\s*def\s+\w+\s*\(.*\)\s*(->\s*[^:]+)?:\s*$/m, 3],
      [/^\s*class\s+\w+(\(.*\))?\s*:\s*$/m, 3],
      [/^from\s+[\w.]+\s+import\s+/m, 3],
      [/^import\s+\w+(\s+as\s+\w+)?\s*$/m, 1],
      [/if\s+__name__\s*==\s*['"]__main__['"]/, 5],
      [/\bprint\s*\(/, 1],
      [/\bself\./, 1],
    ],
  },
  {
    language: 'typescript',
    patterns: [
      [/\binterface\s+\w+\s*\{/, 3],
      [/\bimport\s+type\b/, 4],
      [/\b(const|let)\s+\w+\s*:\s*(string|number|boolean|unknown)\b/, 3],
      [/\)\s*:\s*(string|number|boolean|void|Promise<)/, 3],
    ],
  },
  {
    language: 'javascript',
    patterns: [
      [/\b(const|let|var)\s+\w+\s*=/, 2],
      [/\bfunction\s+\w+\s*\(/, 2],
      [/=>\s*[{(]/, 2],
      [/\bimport\s+.*\s+from\s+['"]/, 2],
      [/\brequire\(\s*['"]/, 3],
      [/\bmodule\.exports\b/, 3],
      [/\bconsole\.log\(/, 2],
    ],
  },
  {
    language: 'html',
    patterns: [
      [/<!DOCTYPE\s+html/i, 5],
      [/<html[\s>]/i, 4],
      [/<(head|body|div|span|script|style|meta|link)[\s>]/i, 2],
    ],
  },
  {
    language: 'css',
    patterns: [
      [/@media\s/, 3],
      [/@import\s+url\(/, 3],
      [/@keyframes\s/, 3],
      [/\b(margin|padding|color|background)\s*:[^;{}]+;/, 2],
    ],
  },
  {
    language: 'php',
    patterns: [
      [/<\?php/, 6],
      [/\$\w+\s*=/, 1],
      [/\bfunction\s+\w+\s*\(\s*\$/, 2],
    ],
  },
  {
    language: 'objective-c',
    patterns: [
      [/^#import\s+[<"]/m, 4],
      [/@(interface|implementation|property|end)\b/, 4],
      [/\bNS[A-Z]\w+/, 2],
    ],
  },
  {
    language: 'cpp',
    patterns: [
      [/\bstd::/, 4],
      [/\bnamespace\s+\w+/, 3],
      [/\btemplate\s*</, 4],
      [/^#include\s*<[a-z_]+>/m, 2],
      [/^\s*(public|private|protected):/m, 2],
    ],
  },
  {
    language: 'c',
    patterns: [
      [/^#include\s*<[\w/]+\.h>/m, 3],
      [/\b(int|void|char)\s+\*?\w+\s*\(/, 2],
      [/\bprintf\s*\(/, 2],
      [/\btypedef\s+struct\b/, 2],
      [/\bmalloc\s*\(/, 2],
    ],
  },
  {
    language: 'matlab',
    patterns: [
      [/^\s*function\s+(\[[^\]]*\]|\w+)\s*=\s*\w+\s*\(/m, 4],
      [/^\s*%/m, 1],
      [/\b(zeros|ones|disp|fprintf)\s*\(/, 2],
    ],
  },
  {
    language: 'shell',
    patterns: [
      [/^\s*(if|while|for)\s.*;\s*(then|do)\s*$/m, 3],
      [/^\s*(fi|done|esac)\s*$/m, 2],
      [/\becho\s/, 1],
      [/\$\{\w+\}/, 1],
    ],
  },
];

/** Below this score the sample is not attributed to any language. */
export const MIN_SCORE = 2;

/**
 * Best-scoring language among `candidates` (all when omitted), or undefined.
 * Ties go to the language listed first.
 */
export function guessFromContent(sample: string, candidates?: readonly string[]): string | undefined {
  let best: string | undefined;
  let bestScore = MIN_SCORE - 1;

  for (const { language, patterns } of LANGUAGE_PATTERNS) {
    if (candidates && !candidates.includes(language)) continue;
    let score = 0;
    for (const [pattern, weight] of patterns) {
      if (pattern.test(sample)) score += weight;
    }
    if (score > bestScore) {
      best = language;
      bestScore = score;
    }
  }

  return best;
}
