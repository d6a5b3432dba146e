import { describe, it, expect } from 'vitest';
import { classify, SAMPLE_CHARS } from './classifier';

describe('classify', () => {
  it('uses the extension table', () => {
    expect(classify('src/main.py')).toBe('python');
    expect(classify('web/App.TSX')).toBe('typescript');
    expect(classify('notes.txt')).toBe('text');
    expect(classify('deep/dir/lib.rs', 'fn main() {}')).toBe('rust');
  });

  it('prefers well-known file names', () => {
    expect(classify('Dockerfile')).toBe('dockerfile');
    expect(classify('tools/Makefile')).toBe('makefile');
    expect(classify('CMakeLists.txt')).toBe('cmake');
  });

  it('falls back to text for unknown files without content', () => {
    expect(classify('README')).toBe('text');
    expect(classify('data.unknownext')).toBe('text');
    expect(classify('.eslintrc')).toBe('text');
  });

  it('reads the shebang of extensionless scripts', () => {
    expect(classify('bin/run', '#!/usr/bin/env python3\nprint("hi")\n')).toBe('python');
    expect(classify('bin/serve', '#!/usr/bin/env -S node --no-warnings\n')).toBe('javascript');
    expect(classify('bin/setup', '#!/bin/bash\nset -e\n')).toBe('shell');
    expect(classify('bin/tool', '#!/usr/local/bin/python3.11\n')).toBe('python');
  });

  it('guesses from content patterns', () => {
    const python = 'import os\n\ndef main():\n    pass\n\nif __name__ == "__main__":\n    main()\n';
    expect(classify('script', python)).toBe('python');

    const html = '<!DOCTYPE html>\n<html>\n<body><div>hi</div></body>\n</html>\n';
    expect(classify('page', html)).toBe('html');
  });

  it('recognizes JSON by parsing it', () => {
    expect(classify('config', '{"a": [1, 2, 3]}')).toBe('json');
    expect(classify('config', '{not json')).toBe('text');
  });

  it('recognizes JSON longer than the sample by its opening', () => {
    const long = `{"values": [${'1, '.repeat(2000)}1]}`;
    expect(long.length).toBeGreaterThan(SAMPLE_CHARS);
    expect(classify('config', long)).toBe('json');
  });

  it('disambiguates .h and .m files', () => {
    expect(classify('include/vec.h', '#include <vector>\nnamespace geo {\ntemplate <typename T> class Vec {};\n}\n')).toBe(
      'cpp',
    );
    expect(classify('include/util.h', '#include <stdio.h>\nint add(int a, int b);\n')).toBe('c');
    expect(classify('include/util.h')).toBe('c');
    expect(classify('App/View.m', '#import "View.h"\n@implementation View\n@end\n')).toBe('objective-c');
    expect(classify('calc/area.m', 'function r = area(x)\n  r = zeros(1, x);\nend\n')).toBe('matlab');
  });

  it('bounds the content sample', () => {
    const padded = ' '.repeat(SAMPLE_CHARS) + '<?php echo 1;';
    expect(classify('tail', padded)).toBe('text');
  });

  it('returns text for blank samples', () => {
    expect(classify('empty', '   \n')).toBe('text');
  });
});
