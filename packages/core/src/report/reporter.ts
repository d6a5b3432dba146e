import type { FailureRecord, RunSummary } from '@codepack/shared';

export interface MetricsReport {
  /** One line, suitable for a status message */
  headline: string;
  lines: string[];
  /** `lines` joined, newline-terminated */
  text: string;
}

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes < 0) return 'N/A';
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

export function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs < 0) return 'N/A';
  if (durationMs < 1000) return `${Math.round(durationMs)}ms`;
  const totalSeconds = Math.round(durationMs / 1000);
  if (totalSeconds < 60) return `${totalSeconds}s`;

  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes < 60) return `${minutes}m ${seconds}s`;

  const hours = Math.floor(minutes / 60);
  return `${hours}h ${minutes % 60}m`;
}

function table(title: string, counts: Readonly<Record<string, number>>): string[] {
  const entries = Object.entries(counts).sort(([a, x], [b, y]) => y - x || (a < b ? -1 : a > b ? 1 : 0));
  if (entries.length === 0) return [];
  const width = Math.max(...entries.map(([name]) => name.length));
  return [`${title}:`, ...entries.map(([name, count]) => `  ${name.padEnd(width)}  ${count}`)];
}

function headlineFor(summary: RunSummary): string {
  const files = `${summary.processed} file${summary.processed === 1 ? '' : 's'}`;
  const base = `Packed ${files} (${summary.totalTokens} tokens) in ${formatDuration(summary.durationMs)}`;
  if (summary.stopReason === 'cancelled') return `Cancelled: ${base.charAt(0).toLowerCase()}${base.slice(1)}`;
  if (summary.stopReason === 'token-ceiling') return `${base}; stopped at the ${summary.budget.ceiling}-token ceiling`;
  return base;
}

/**
 * Human-readable run report. Pure: the same summary always gives the same
 * text.
 */
export function summarize(summary: RunSummary, failures: readonly FailureRecord[] = []): MetricsReport {
  const lines = [
    headlineFor(summary),
    '',
    `Root:        ${summary.root}`,
    `Model:       ${summary.model} (${summary.encoding})`,
    `Workers:     ${summary.workerCount}`,
    `Discovered:  ${summary.discovered}`,
    `Processed:   ${summary.processed}`,
    `Skipped:     ${summary.skippedBinary}`,
    `Failed:      ${summary.failed}`,
  ];
  if (summary.unprocessed > 0) lines.push(`Unprocessed: ${summary.unprocessed}`);
  lines.push(
    `Truncated:   ${summary.truncated}`,
    `Tokens:      ${summary.totalTokens} / ${summary.budget.ceiling}`,
  );
  if (summary.overflowed > 0) {
    lines.push(`Over budget: ${summary.overflowed} (${summary.budget.overflowPolicy})`);
  }
  lines.push(
    `Size:        ${formatBytes(summary.totalBytes)}`,
    `Peak memory: ${formatBytes(summary.peakMemoryBytes)}`,
  );

  const languages = table('Languages', summary.languages);
  if (languages.length > 0) lines.push('', ...languages);
  const encodings = table('Encodings', summary.encodings);
  if (encodings.length > 0) lines.push('', ...encodings);

  if (failures.length > 0) {
    lines.push('', 'Failures:', ...failures.map((f) => `  ${f.relativePath} [${f.stage}] ${f.reason}`));
  }

  return { headline: lines[0], lines, text: `${lines.join('\n')}\n` };
}
