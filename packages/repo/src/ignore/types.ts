import type ignore from 'ignore';

export type IgnoreMatcher = ReturnType<typeof ignore>;

/** Where a rule came from, for diagnostics. */
export type RuleSource = 'default' | 'gitignore' | 'codepackignore' | 'ignore-file' | 'config';

export interface IgnoreRule {
  /** Line as handed to the matcher, trailing whitespace removed */
  readonly raw: string;
  /** Pattern body without `!`, leading `/` or trailing `/` */
  readonly pattern: string;
  readonly negated: boolean;
  /** Only matches relative to the root */
  readonly anchored: boolean;
  readonly directoryOnly: boolean;
  readonly source: RuleSource;
}

/**
 * Ordered, immutable rules plus their compiled matcher. Later rules win.
 */
export interface IgnoreRuleSet {
  readonly rules: readonly IgnoreRule[];
  readonly bypassed: boolean;
  readonly matcher: IgnoreMatcher;
}
