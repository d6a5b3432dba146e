import path from 'node:path';

export interface ExtensionFilterOptions {
  /** When set, only these extensions are admitted */
  includeExtensions?: readonly string[];
  excludeExtensions?: readonly string[];
}

/**
 * Lowercased extension without the dot, or '' for none. Dotfiles such as
 * `.env` have no extension.
 */
export function extensionOf(relativePath: string): string {
  return path.posix.extname(relativePath).slice(1).toLowerCase();
}

/**
 * Predicate admitting paths by extension. Exclusion wins over inclusion.
 */
export function extensionFilter(options: ExtensionFilterOptions): (relativePath: string) => boolean {
  const include = options.includeExtensions ? new Set(options.includeExtensions) : undefined;
  const exclude = new Set(options.excludeExtensions ?? []);
  return (relativePath) => {
    const ext = extensionOf(relativePath);
    if (exclude.has(ext)) return false;
    return include === undefined || include.has(ext);
  };
}
