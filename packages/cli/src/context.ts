import { ProcessingOrchestrator } from '@codepack/core';

/** What commands need from their surroundings; replaced in tests. */
export interface CliContext {
  orchestrator: ProcessingOrchestrator;
  /** Receives the document when no output file is given */
  stdout(text: string): void;
  setExitCode(code: number): void;
}
