export const name = '@codepack/cli';

export { createProgram, runCli } from './program';
export type { CliContext } from './context';
