export interface StringDelimiter {
  readonly open: string;
  readonly close: string;
  /** Backslash escapes the next character */
  readonly escapes: boolean;
  /** May span lines; otherwise a newline ends it */
  readonly multiline: boolean;
}

/**
 * How one language writes comments and strings, and whether trailing
 * whitespace is meaningful.
 */
export interface SanitizeRule {
  readonly lineComments: readonly string[];
  readonly blockComments: ReadonlyArray<readonly [open: string, close: string]>;
  /** Checked in order; list longer openers first */
  readonly strings: readonly StringDelimiter[];
  /** Line comments only start at the beginning of a line or after whitespace */
  readonly commentNeedsBoundary?: boolean;
  /** Two trailing spaces are a hard line break */
  readonly keepHardBreaks?: boolean;
}

const str = (open: string, close = open, escapes = true, multiline = false): StringDelimiter => ({
  open,
  close,
  escapes,
  multiline,
});

const C_STRINGS = [str('"'), str("'")];

const C_FAMILY: SanitizeRule = {
  lineComments: ['//'],
  blockComments: [['/*', '*/']],
  strings: C_STRINGS,
};

const JS_FAMILY: SanitizeRule = {
  ...C_FAMILY,
  strings: [str('`', '`', true, true), ...C_STRINGS],
};

const HASH: SanitizeRule = {
  lineComments: ['#'],
  blockComments: [],
  strings: C_STRINGS,
  commentNeedsBoundary: true,
};

const MARKUP: SanitizeRule = {
  lineComments: [],
  blockComments: [['<!--', '-->']],
  strings: [],
};

const RULES: ReadonlyMap<string, SanitizeRule> = new Map<string, SanitizeRule>([
  ['javascript', JS_FAMILY],
  ['typescript', JS_FAMILY],
  ['vue', JS_FAMILY],
  ['svelte', JS_FAMILY],
  ['c', C_FAMILY],
  ['cpp', C_FAMILY],
  ['objective-c', C_FAMILY],
  ['csharp', { ...C_FAMILY, strings: [str('@"', '"', false, true), ...C_STRINGS] }],
  ['java', { ...C_FAMILY, strings: [str('"""', '"""', true, true), ...C_STRINGS] }],
  ['kotlin', { ...C_FAMILY, strings: [str('"""', '"""', false, true), ...C_STRINGS] }],
  ['scala', { ...C_FAMILY, strings: [str('"""', '"""', false, true), str('"')] }],
  ['swift', { ...C_FAMILY, strings: [str('"""', '"""', true, true), str('"')] }],
  ['go', { ...C_FAMILY, strings: [str('`', '`', false, true), ...C_STRINGS] }],
  ['rust', { ...C_FAMILY, strings: [str('"', '"', true, true)] }],
  ['dart', { ...C_FAMILY, strings: [str("'''", "'''", true, true), str('"""', '"""', true, true), ...C_STRINGS] }],
  ['groovy', { ...C_FAMILY, strings: [str("'''", "'''", true, true), str('"""', '"""', true, true), ...C_STRINGS] }],
  ['protobuf', C_FAMILY],
  ['css', { lineComments: [], blockComments: [['/*', '*/']], strings: C_STRINGS }],
  ['scss', C_FAMILY],
  ['less', C_FAMILY],
  ['php', { ...C_FAMILY, lineComments: ['//', '#'] }],
  [
    'python',
    {
      lineComments: ['#'],
      blockComments: [],
      strings: [str('"""', '"""', true, true), str("'''", "'''", true, true), ...C_STRINGS],
    },
  ],
  ['cython', { lineComments: ['#'], blockComments: [], strings: [str('"""', '"""', true, true), ...C_STRINGS] }],
  ['ruby', HASH],
  ['perl', HASH],
  ['r', { lineComments: ['#'], blockComments: [], strings: C_STRINGS }],
  ['elixir', { ...HASH, strings: [str('"""', '"""', true, true), ...C_STRINGS] }],
  ['shell', HASH],
  ['fish', HASH],
  ['makefile', HASH],
  ['dockerfile', HASH],
  ['cmake', HASH],
  ['yaml', HASH],
  ['toml', { ...HASH, strings: [str('"""', '"""', true, true), str("'''", "'''", false, true), ...C_STRINGS] }],
  ['powershell', { ...HASH, blockComments: [['<#', '#>']] }],
  ['sql', { lineComments: ['--'], blockComments: [['/*', '*/']], strings: [str("'", "'", false), str('"', '"', false)] }],
  ['lua', { lineComments: ['--'], blockComments: [['--[[', ']]']], strings: C_STRINGS }],
  ['haskell', { lineComments: ['--'], blockComments: [['{-', '-}']], strings: [str('"')] }],
  ['html', MARKUP],
  ['xml', MARKUP],
  ['markdown', { ...MARKUP, keepHardBreaks: true }],
]);

/**
 * The rule for a language label, or undefined when comments cannot be
 * recognized for it.
 */
export function resolveRule(language: string): SanitizeRule | undefined {
  return RULES.get(language);
}
