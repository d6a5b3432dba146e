export { summarize, formatBytes, formatDuration, type MetricsReport } from './reporter';
export { exitCodeFor, exitCodeForError, EXIT_CODES } from './exit-codes';
