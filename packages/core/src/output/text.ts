import type { PackDocument } from './document';

const RULE = '='.repeat(80);
const SUBRULE = '-'.repeat(40);

/** Plain text with ruled sections, for tools that mangle Markdown. */
export function renderText(doc: PackDocument): string {
  const lines = [doc.title, RULE, ''];

  if (doc.generatedAt !== undefined) lines.push(`Generated: ${doc.generatedAt}`, '');

  if (doc.statistics) {
    lines.push('Statistics:', SUBRULE);
    lines.push(`Model: ${doc.statistics.model}`);
    lines.push(`Files: ${doc.statistics.files}`);
    lines.push(`Total tokens: ${doc.statistics.totalTokens}`);
    lines.push('');
  }

  lines.push('Files:', SUBRULE);
  for (const file of doc.files) {
    lines.push(`Path: ${file.path}`);
    if (file.language !== undefined) lines.push(`Language: ${file.language}`);
    if (file.tokenCount !== undefined) lines.push(`Tokens: ${file.tokenCount}`);
    lines.push('', file.content.replace(/\n$/, ''), SUBRULE);
  }

  if (doc.omitted.length > 0) {
    lines.push('', 'Omitted:');
    for (const entry of doc.omitted) lines.push(`${entry.path}: ${entry.reason}`);
  }

  return `${lines.join('\n')}\n`;
}
