import type { OutputFormat } from '@codepack/shared';
import { buildDocument, type DocumentInput, type DocumentOptions, type PackDocument } from './document';
import { renderMarkdown } from './markdown';
import { renderJson, renderYaml } from './structured';
import { renderText } from './text';

export type Renderer = (doc: PackDocument) => string;

const RENDERERS: Record<OutputFormat, Renderer> = {
  markdown: renderMarkdown,
  json: renderJson,
  yaml: renderYaml,
  text: renderText,
};

export interface RenderOptions extends DocumentOptions {
  format: OutputFormat;
}

/**
 * Renders a run as one document. Records must already be in path order;
 * the same input always yields the same string.
 */
export function render(input: DocumentInput, options: RenderOptions): string {
  return RENDERERS[options.format](buildDocument(input, options));
}
