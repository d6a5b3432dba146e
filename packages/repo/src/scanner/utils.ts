import isBinaryPath from 'is-binary-path';

/**
 * True for extensions that are always binary (images, archives, fonts, ...).
 * Such files are skipped without reading their contents.
 */
export function hasBinaryExtension(filePath: string): boolean {
  return isBinaryPath(filePath);
}
