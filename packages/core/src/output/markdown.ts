import type { DocumentFile, PackDocument } from './document';

/**
 * Backtick fence longer than any backtick run in `content`, minimum three.
 */
export function fenceFor(content: string): string {
  let longest = 0;
  for (const run of content.match(/`+/g) ?? []) {
    longest = Math.max(longest, run.length);
  }
  return '`'.repeat(Math.max(3, longest + 1));
}

function fileSection(file: DocumentFile): string[] {
  const lines = [`### ${file.path}`, ''];

  const meta: string[] = [];
  if (file.language !== undefined) meta.push(`- Language: ${file.language}`);
  if (file.encoding !== undefined) meta.push(`- Encoding: ${file.encoding}`);
  if (file.sizeBytes !== undefined) meta.push(`- Size: ${file.sizeBytes} bytes`);
  if (file.tokenCount !== undefined) {
    const flags = [file.truncated ? 'truncated' : '', file.overflow ? 'over budget' : ''].filter(Boolean);
    meta.push(`- Tokens: ${file.tokenCount}${flags.length > 0 ? ` (${flags.join(', ')})` : ''}`);
  }
  if (meta.length > 0) lines.push(...meta, '');

  const fence = fenceFor(file.content);
  const body = file.content === '' || file.content.endsWith('\n') ? file.content : `${file.content}\n`;
  lines.push(`${fence}${file.language ?? ''}`, `${body}${fence}`, '');
  return lines;
}

export function renderMarkdown(doc: PackDocument): string {
  const lines = [`# ${doc.title}`, ''];

  if (doc.generatedAt !== undefined) lines.push(`Generated: ${doc.generatedAt}`, '');

  if (doc.statistics) {
    const { statistics } = doc;
    const languages = Object.entries(statistics.languages)
      .map(([language, count]) => `${language} (${count})`)
      .join(', ');
    lines.push(
      '## Summary',
      '',
      `- Model: ${statistics.model}`,
      `- Files: ${statistics.files}`,
      `- Total tokens: ${statistics.totalTokens}`,
    );
    if (statistics.truncated > 0) lines.push(`- Truncated: ${statistics.truncated}`);
    if (statistics.overflowed > 0) lines.push(`- Over budget: ${statistics.overflowed}`);
    if (languages) lines.push(`- Languages: ${languages}`);
    lines.push('');
  }

  lines.push('## Files', '');
  for (const file of doc.files) lines.push(...fileSection(file));

  if (doc.omitted.length > 0) {
    lines.push('## Omitted', '');
    for (const entry of doc.omitted) lines.push(`- ${entry.path}: ${entry.reason}`);
    lines.push('');
  }

  return lines.join('\n').replace(/\n+$/, '\n');
}
