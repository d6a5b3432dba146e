import type { SanitizeRule, StringDelimiter } from './rules';

/**
 * Removes comments from `text` according to `rule`, copying string literals
 * verbatim. Expects LF line endings.
 *
 * A `#!` first line is kept. A line holding nothing but a line comment is
 * removed with its newline. A block comment is replaced by its newlines, or
 * by one space when it has none.
 */
export function stripComments(text: string, rule: SanitizeRule): string {
  let out = '';
  let i = 0;

  if (text.startsWith('#!')) {
    const eol = text.indexOf('\n');
    if (eol === -1) return text;
    out = text.slice(0, eol + 1);
    i = eol + 1;
  }

  const blocks = [...rule.blockComments].sort((a, b) => b[0].length - a[0].length);
  const lines = [...rule.lineComments].sort((a, b) => b.length - a.length);

  outer: while (i < text.length) {
    for (const delimiter of rule.strings) {
      if (text.startsWith(delimiter.open, i)) {
        const end = skipString(text, i, delimiter);
        out += text.slice(i, end);
        i = end;
        continue outer;
      }
    }

    for (const [open, close] of blocks) {
      if (text.startsWith(open, i)) {
        const closeAt = text.indexOf(close, i + open.length);
        const end = closeAt === -1 ? text.length : closeAt + close.length;
        const newlines = text.slice(i, end).split('\n').length - 1;
        out += newlines > 0 ? '\n'.repeat(newlines) : ' ';
        i = end;
        continue outer;
      }
    }

    for (const token of lines) {
      if (text.startsWith(token, i) && (!rule.commentNeedsBoundary || atBoundary(text, i))) {
        const eol = text.indexOf('\n', i);
        const lineStart = out.lastIndexOf('\n') + 1;
        if (out.slice(lineStart).trim() === '') {
          // Whole-line comment: drop the line.
          out = out.slice(0, lineStart);
          i = eol === -1 ? text.length : eol + 1;
        } else {
          i = eol === -1 ? text.length : eol;
        }
        continue outer;
      }
    }

    out += text[i];
    i++;
  }

  return out;
}

function atBoundary(text: string, i: number): boolean {
  return i === 0 || /\s/.test(text[i - 1]);
}

/** Index just past the string literal opening at `start`. */
function skipString(text: string, start: number, delimiter: StringDelimiter): number {
  let i = start + delimiter.open.length;
  while (i < text.length) {
    if (delimiter.escapes && text[i] === '\\') {
      i += 2;
      continue;
    }
    if (text.startsWith(delimiter.close, i)) return i + delimiter.close.length;
    if (!delimiter.multiline && text[i] === '\n') return i;
    i++;
  }
  return text.length;
}
