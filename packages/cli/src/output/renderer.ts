import pc from 'picocolors';
import type { FailureRecord, RunSummary } from '@codepack/shared';
import { summarize } from '@codepack/core';

export type PackStatus = 'SUCCESS' | 'PARTIAL' | 'FAILURE' | 'CANCELLED' | 'EMPTY';

export interface PackOutput {
  status: PackStatus;
  runId: string;
  summary: RunSummary;
  failures: FailureRecord[];
  /** Absent when the document went to stdout or was not written */
  output?: { path: string; format: string; bytes: number };
}

/** `EMPTY`: nothing was packed, so no document is written. */
export function statusFor(summary: RunSummary): PackStatus {
  if (summary.cancelled) return 'CANCELLED';
  if (summary.discovered > 0 && summary.failed === summary.discovered) return 'FAILURE';
  if (summary.processed === 0) return 'EMPTY';
  return summary.failed > 0 ? 'PARTIAL' : 'SUCCESS';
}

const MAX_LISTED_FAILURES = 10;

function emptyMessage(summary: RunSummary): string {
  const { root, discovered, skippedBinary } = summary;
  if (discovered === 0) return `No files to pack under ${root}; nothing was written.`;
  const noun = discovered === 1 ? 'file' : 'files';
  return `None of the ${discovered} ${noun} under ${root} could be packed (${skippedBinary} binary); nothing was written.`;
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  render(data: PackOutput): void {
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
    } else {
      this.renderHuman(data);
    }
  }

  private renderHuman(data: PackOutput): void {
    if (data.status === 'EMPTY') {
      console.log(pc.yellow(emptyMessage(data.summary)));
      return;
    }

    const report = summarize(data.summary);
    const headline =
      data.status === 'SUCCESS'
        ? pc.green(report.headline)
        : data.status === 'PARTIAL'
          ? pc.yellow(report.headline)
          : pc.red(report.headline);
    console.error(`\n${headline}`);
    for (const line of report.lines.slice(1)) console.error(pc.gray(line));

    if (data.failures.length > 0) {
      console.error(pc.bold('\nFailed files:'));
      data.failures
        .slice(0, MAX_LISTED_FAILURES)
        .forEach((f) => console.error(`  - ${f.relativePath} ${pc.gray(`[${f.stage}]`)} ${f.reason}`));
      if (data.failures.length > MAX_LISTED_FAILURES) {
        console.error(`  ... and ${data.failures.length - MAX_LISTED_FAILURES} more.`);
      }
    }

    if (data.output) {
      console.error(`\n${pc.bold('Document:')} ${data.output.path} (${data.output.format})`);
    }
  }

  log(message: string): void {
    if (!this.isJson) console.error(pc.gray(message));
  }

  error(message: string | Error): void {
    const msg = message instanceof Error ? message.message : message;
    if (this.isJson) {
      console.error(JSON.stringify({ error: msg }));
    } else {
      console.error(pc.red(msg));
    }
  }
}
