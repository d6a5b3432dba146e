import { describe, it, expect } from 'vitest';
import { SanitizeError } from '@codepack/shared';
import { sanitize } from './sanitizer';

describe('sanitize', () => {
  it('normalizes line endings, trailing whitespace and the final newline', () => {
    expect(sanitize('python', '\uFEFFx = 1   \r\ny = 2\t\rz = 3')).toBe('x = 1\ny = 2\nz = 3\n');
  });

  it('caps blank-line runs', () => {
    const text = 'a\n\n\n\n\nb\n   \n\t\nc\n';
    expect(sanitize('text', text)).toBe('a\n\n\nb\n\n\nc\n');
    expect(sanitize('text', text, { maxBlankLines: 0 })).toBe('a\nb\nc\n');
    expect(sanitize('text', text, { maxBlankLines: 1 })).toBe('a\n\nb\n\nc\n');
  });

  it('keeps empty input empty', () => {
    expect(sanitize('text', '')).toBe('');
    expect(sanitize('text', '\n\n  \n')).toBe('');
  });

  it('keeps indentation and string contents', () => {
    const text = 'def f():\n    s = "a   \\t  b"\n    return s\n';
    expect(sanitize('python', text)).toBe(text);
  });

  it('keeps Markdown hard breaks as exactly two spaces', () => {
    expect(sanitize('markdown', 'line one    \nline two \n')).toBe('line one  \nline two\n');
    expect(sanitize('text', 'line one    \n')).toBe('line one\n');
  });

  it('leaves comments alone by default', () => {
    const text = '// header\nconst a = 1; // trailing\n';
    expect(sanitize('javascript', text)).toBe(text);
  });

  it('strips comments when asked', () => {
    const text = [
      '// header',
      'const url = "http://example.test"; // trailing',
      'const re = `/* not a comment */`;',
      'let x = 1/* inline */+2;',
      '/* block',
      '   spanning */',
      'done();',
      '',
    ].join('\n');

    expect(sanitize('javascript', text, { stripComments: true })).toBe(
      [
        'const url = "http://example.test";',
        'const re = `/* not a comment */`;',
        'let x = 1 +2;',
        '',
        '',
        'done();',
        '',
      ].join('\n'),
    );
  });

  it('strips hash comments but keeps the shebang and $#', () => {
    const text = '#!/bin/sh\n# setup\necho "# not a comment" $# # count\n';
    expect(sanitize('shell', text, { stripComments: true })).toBe('#!/bin/sh\necho "# not a comment" $#\n');
  });

  it('keeps Python strings that look like comments', () => {
    const text = 'x = "#fff"  # colour\ns = """\n# inside docstring\n"""\n';
    expect(sanitize('python', text, { stripComments: true })).toBe('x = "#fff"\ns = """\n# inside docstring\n"""\n');
  });

  it('ignores stripComments for languages without a rule', () => {
    expect(sanitize('text', '# heading\n', { stripComments: true })).toBe('# heading\n');
  });

  it('rejects a negative blank-line cap', () => {
    expect(() => sanitize('text', 'x', { maxBlankLines: -1 })).toThrow(SanitizeError);
  });

  it('is idempotent', () => {
    const inputs: Array<[string, string]> = [
      ['javascript', '\uFEFF/* a */\r\n\r\n\r\n\r\nfoo();   // x\r\n\r\n'],
      ['python', '#!/usr/bin/env python\n\n\n\n# c\nprint("# x")   \n\t\n'],
      ['markdown', 'Title   \n\n\n\n<!-- note -->\ntext \t\n'],
      ['c', 'int a; /* x\n\n\n\n y */ int b;\n'],
      ['yaml', 'key: value # note\nurl: http://host#frag\n\n\n\n'],
      ['text', '\r\r\r\rabc  \r'],
    ];

    for (const [language, text] of inputs) {
      for (const stripComments of [false, true]) {
        const once = sanitize(language, text, { stripComments });
        expect(sanitize(language, once, { stripComments })).toBe(once);
      }
    }
  });
});
