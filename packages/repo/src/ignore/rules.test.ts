import { describe, it, expect } from 'vitest';
import { parseRules, compile, matches } from './rules';

describe('parseRules', () => {
  it('skips blanks and comments and reads rule flags', () => {
    const rules = parseRules(
      ['# comment', '', '*.log', '!keep.log', 'build/', '/root-only.txt', 'docs/*.md', '**/tmp', '\\#hash', '  '].join(
        '\n',
      ),
      'gitignore',
    );

    expect(rules.map((r) => [r.pattern, r.negated, r.anchored, r.directoryOnly])).toEqual([
      ['*.log', false, false, false],
      ['keep.log', true, false, false],
      ['build', false, false, true],
      ['root-only.txt', false, true, false],
      ['docs/*.md', false, true, false],
      ['**/tmp', false, false, false],
      ['#hash', false, false, false],
    ]);
    expect(rules.every((r) => r.source === 'gitignore')).toBe(true);
  });

  it('keeps escaped trailing spaces and handles CRLF', () => {
    const rules = parseRules('a.txt   \r\nb\\ \r\n', 'config');
    expect(rules.map((r) => r.raw)).toEqual(['a.txt', 'b\\ ']);
  });
});

describe('matches', () => {
  it('excludes by extension and re-includes with a later negation', () => {
    const set = compile(parseRules('*.log\n!keep.log', 'ignore-file'), []);
    expect(matches(set, 'a.log', false)).toBe(true);
    expect(matches(set, 'keep.log', false)).toBe(false);
    expect(matches(set, 'sub/a.log', false)).toBe(true);
  });

  it('includes everything when bypassed', () => {
    const set = compile(parseRules('*.log\n!keep.log', 'ignore-file'), [], true);
    expect(set.bypassed).toBe(true);
    expect(set.rules).toHaveLength(0);
    expect(matches(set, 'a.log', false)).toBe(false);
    expect(matches(set, 'keep.log', false)).toBe(false);
  });

  it('applies directory-only rules to directories', () => {
    const set = compile(parseRules('node_modules/', 'default'), []);
    expect(matches(set, 'node_modules', true)).toBe(true);
    expect(matches(set, 'pkg/node_modules', true)).toBe(true);
    expect(matches(set, 'node_modules', false)).toBe(false);
  });

  it('anchors leading-slash rules to the root', () => {
    const set = compile([], parseRules('/config.json', 'gitignore'));
    expect(matches(set, 'config.json', false)).toBe(true);
    expect(matches(set, 'src/config.json', false)).toBe(false);
  });

  it('crosses segments with double star', () => {
    const set = compile([], parseRules('docs/**/*.png', 'gitignore'));
    expect(matches(set, 'docs/a/b/c.png', false)).toBe(true);
    expect(matches(set, 'docs/c.png', false)).toBe(true);
    expect(matches(set, 'img/c.png', false)).toBe(false);
  });

  it('lets supplemental rules override base rules', () => {
    const set = compile(parseRules('dist/', 'default'), parseRules('!dist/', 'gitignore'));
    expect(matches(set, 'dist', true)).toBe(false);
  });

  it('normalizes leading ./ and backslashes', () => {
    const set = compile(parseRules('*.log', 'default'), []);
    expect(matches(set, './a.log', false)).toBe(true);
    expect(matches(set, 'sub\\a.log', false)).toBe(true);
    expect(matches(set, '', true)).toBe(false);
  });

  it('re-includes exactly the negated path', () => {
    const paths = ['a.log', 'b.log', 'keep.log', 'notes.txt', 'sub/keep.log'];
    const before = compile(parseRules('*.log', 'ignore-file'), []);
    const after = compile(parseRules('*.log\n!/keep.log', 'ignore-file'), []);

    const changed = paths.filter((p) => matches(before, p, false) !== matches(after, p, false));
    expect(changed).toEqual(['keep.log']);
  });

  it('is frozen', () => {
    const set = compile(parseRules('*.log', 'default'), []);
    expect(Object.isFrozen(set)).toBe(true);
    expect(Object.isFrozen(set.rules)).toBe(true);
  });
});
