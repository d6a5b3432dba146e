import ignore from 'ignore';
import { normalizePath } from '@codepack/shared';
import type { IgnoreRule, IgnoreRuleSet, RuleSource } from './types';

/**
 * Parses ignore-file text into rules, gitignore syntax.
 *
 * Blank lines and `#` comments are skipped. `\#` and `\!` escape a literal
 * first character, `!` negates, a trailing `/` limits the rule to
 * directories. A leading `/`, or a slash anywhere but the end, anchors the
 * rule to the root.
 */
export function parseRules(text: string, source: RuleSource): IgnoreRule[] {
  const rules: IgnoreRule[] = [];

  for (const line of text.split(/\r?\n/)) {
    // Trailing spaces are insignificant unless escaped.
    const raw = line.replace(/(?<!\\)\s+$/, '');
    if (raw === '' || raw.startsWith('#')) continue;

    let body = raw;
    const negated = body.startsWith('!');
    if (negated) body = body.slice(1);
    if (body.startsWith('\\#') || body.startsWith('\\!')) body = body.slice(1);

    const directoryOnly = body.endsWith('/');
    if (directoryOnly) body = body.replace(/\/+$/, '');

    const leadingSlash = body.startsWith('/');
    if (leadingSlash) body = body.replace(/^\/+/, '');
    const anchored = leadingSlash || (body.includes('/') && !body.startsWith('**/'));

    if (body === '') continue;

    rules.push({ raw, pattern: body, negated, anchored, directoryOnly, source });
  }

  return rules;
}

/**
 * Builds the rule set used for one run: base rules first, then the
 * supplemental ones, so a project rule can re-include a default exclusion.
 * `bypass` yields a set that excludes nothing.
 */
export function compile(
  baseRules: readonly IgnoreRule[],
  supplementalRules: readonly IgnoreRule[],
  bypass = false,
): IgnoreRuleSet {
  const rules = bypass ? [] : [...baseRules, ...supplementalRules];
  const matcher = ignore().add(rules.map((rule) => rule.raw));
  return Object.freeze({
    rules: Object.freeze(rules),
    bypassed: bypass,
    matcher,
  });
}

/**
 * True when `relativePath` is excluded. Unmatched paths are included.
 */
export function matches(ruleSet: IgnoreRuleSet, relativePath: string, isDirectory: boolean): boolean {
  if (ruleSet.rules.length === 0) return false;
  const normalized = normalizePath(relativePath)
    .replace(/^(\.\/)+/, '')
    .replace(/^\/+/, '')
    .replace(/\/+$/, '');
  if (normalized === '' || normalized === '.') return false;
  return ruleSet.matcher.ignores(isDirectory ? `${normalized}/` : normalized);
}
