/**
 * Normalizes a path to use forward slashes, the form used for every
 * relative path codepack stores, matches and renders.
 *
 * @param p The path to normalize.
 * @returns The normalized path with forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Joins a relative directory and an entry name into a POSIX relative path.
 * An empty directory means the root.
 */
export function joinRelative(relativeDir: string, name: string): string {
  return relativeDir ? `${relativeDir}/${name}` : name;
}

/**
 * Orders relative paths by Unicode code point, independent of the host
 * locale. Output documents are sorted with this so that two runs on
 * different machines produce the same bytes.
 */
export function comparePaths(a: string, b: string): number {
  if (a === b) return 0;
  let i = 0;
  while (i < a.length && i < b.length) {
    const left = a.codePointAt(i) ?? 0;
    const right = b.codePointAt(i) ?? 0;
    if (left !== right) return left < right ? -1 : 1;
    // Equal code points span the same number of code units.
    i += left > 0xffff ? 2 : 1;
  }
  return a.length < b.length ? -1 : 1;
}
