/**
 * File discovery for the navigation graph.
 */
import { globFiles } from '../../utils/file-system.js';
import type { NavigationSettings } from '../config/schema.js';

export interface DiscoveredTree {
  /** Markdown documents to parse: content roots plus existing index files, sorted */
  documents: string[];
  files: Set<string>;
  directories: Set<string>;
}

/**
 * Collect documents, files and directories of a tree as tree-relative POSIX paths.
 */
export async function discoverDocuments(
  root: string,
  settings: Pick<NavigationSettings, 'content_roots' | 'index_files' | 'exclude'>
): Promise<DiscoveredTree> {
  const ignore = settings.exclude;

  const allFiles = await globFiles('**/*', { cwd: root, ignore, absolute: false, dot: true });
  const allDirectories = await globFiles('**', {
    cwd: root,
    ignore,
    absolute: false,
    dot: true,
    onlyDirectories: true,
  });
  const files = new Set(allFiles);

  const patterns = settings.content_roots.map((contentRoot) => `${contentRoot.replace(/\/+$/, '')}/**/*.md`);
  const content = patterns.length > 0
    ? await globFiles(patterns, { cwd: root, ignore, absolute: false })
    : [];

  const documents = new Set(content);
  for (const indexFile of settings.index_files) {
    if (files.has(indexFile)) {
      documents.add(indexFile);
    }
  }

  return {
    documents: [...documents].sort(),
    files,
    directories: new Set(['.', ...allDirectories.map((dir) => dir.replace(/\/+$/, ''))]),
  };
}
