/**
 * Link target resolution inside a tree of tree-relative POSIX paths.
 */
import * as path from 'node:path';

const MARKDOWN_EXTENSION = /\.(md|markdown)$/i;

/**
 * Resolve a link path against the directory of its source document.
 * An empty path is the source itself; a leading `/` starts at the tree root.
 * The result may start with `..` when the link leaves the tree.
 */
export function resolveLinkPath(source: string, linkPath: string): string {
  if (linkPath === '') {
    return source;
  }
  const joined = linkPath.startsWith('/')
    ? linkPath.slice(1)
    : path.posix.join(path.posix.dirname(source), linkPath);
  const normalized = path.posix.normalize(joined).replace(/\/+$/, '');
  return normalized === '' ? '.' : normalized;
}

export function isMarkdownPath(filePath: string): boolean {
  return MARKDOWN_EXTENSION.test(filePath);
}

/**
 * Whether `filePath` lies under one of the given directories.
 */
export function isUnderRoot(filePath: string, roots: string[]): boolean {
  return roots.some((root) => {
    const prefix = root.replace(/\/+$/, '');
    return prefix === '.' || prefix === '' || filePath.startsWith(`${prefix}/`);
  });
}
