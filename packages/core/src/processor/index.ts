export { FileProcessor } from './processor';
export { extensionFilter, extensionOf, type ExtensionFilterOptions } from './filters';
export type { FileOutcome, FileReader, ProcessorOptions } from './types';
