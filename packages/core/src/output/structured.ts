import yaml from 'js-yaml';
import type { PackDocument } from './document';

export function renderJson(doc: PackDocument): string {
  return `${JSON.stringify(doc, null, 2)}\n`;
}

export function renderYaml(doc: PackDocument): string {
  // Block scalars keep file contents readable; no line folding.
  return `---\n${yaml.dump(doc, { lineWidth: -1, noRefs: true })}`;
}
