export { render, type Renderer, type RenderOptions } from './formatter';
export { buildDocument } from './document';
export type {
  DocumentFile,
  DocumentInput,
  DocumentOptions,
  DocumentStatistics,
  OmittedFile,
  PackDocument,
} from './document';
export { renderMarkdown, fenceFor } from './markdown';
export { renderJson, renderYaml } from './structured';
export { renderText } from './text';
export { prepareOutput, writeDocument, type WrittenDocument } from './writer';
