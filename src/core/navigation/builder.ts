/**
 * Builds the navigation graph of a standards tree from disk.
 */
import * as path from 'node:path';
import { ParseError } from '../../utils/errors.js';
import { readFile } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import { parseDocument, parseHeadings } from '../markdown/parser.js';
import { splitLines } from '../markdown/lines.js';
import type { DocumentNode, LinkEdge } from '../markdown/types.js';
import type { NavigationSettings } from '../config/schema.js';
import { discoverDocuments } from './discovery.js';
import { isMarkdownPath, isUnderRoot, resolveLinkPath } from './paths.js';
import type { IndexEntry, NavigationGraph } from './types.js';

/**
 * Parses every discovered document and assembles index entries and link edges.
 * A ParseError is recorded against its document, which is then read without its marker blocks.
 */
export class NavigationGraphBuilder {
  private readonly root: string;
  private readonly settings: NavigationSettings;

  constructor(root: string, settings: NavigationSettings) {
    this.root = path.resolve(root);
    this.settings = settings;
  }

  async build(): Promise<NavigationGraph> {
    const tree = await discoverDocuments(this.root, this.settings);
    const documents = new Map<string, DocumentNode>();
    const anchors = new Map<string, Set<string>>();
    const parseErrors: ParseError[] = [];

    for (const docPath of tree.documents) {
      const text = await readFile(path.join(this.root, docPath));
      let node: DocumentNode;
      try {
        node = parseDocument(docPath, text);
      } catch (error) {
        if (!(error instanceof ParseError)) {
          throw error;
        }
        log.debug(`Skipping marker blocks of ${docPath}: ${error.message}`);
        parseErrors.push(error);
        node = parseDocument(docPath, text, { blocks: false });
      }
      documents.set(docPath, node);
      anchors.set(docPath, node.slugs);
    }
    log.debug(`Parsed ${documents.size} document(s) under ${this.root}`);

    const exists = (target: string): boolean =>
      tree.files.has(target) || tree.directories.has(target);

    const edges: LinkEdge[] = [];
    for (const node of documents.values()) {
      for (const link of node.links) {
        link.resolved = exists(resolveLinkPath(node.path, link.path));
        edges.push(link);
      }
    }

    const indexFiles = this.settings.index_files.filter((file) => documents.has(file));
    const indexEntries = this.collectIndexEntries(indexFiles, documents);
    for (const entry of indexEntries) {
      await this.loadAnchors(entry.target, entry.anchor, tree.files, anchors);
    }
    for (const edge of edges) {
      await this.loadAnchors(resolveLinkPath(edge.source, edge.path), edge.anchor, tree.files, anchors);
    }

    const guides = [...documents.keys()]
      .filter((doc) => !this.settings.index_files.includes(doc) && isUnderRoot(doc, this.settings.guide_roots))
      .sort();

    return {
      root: this.root,
      documents,
      anchors,
      files: tree.files,
      directories: tree.directories,
      requiredIndexFiles: [...this.settings.index_files],
      indexFiles,
      guides,
      contentsGuides: guides.filter((doc) => isUnderRoot(doc, this.settings.contents_roots)),
      indexEntries,
      edges,
      parseErrors,
    };
  }

  private collectIndexEntries(indexFiles: string[], documents: Map<string, DocumentNode>): IndexEntry[] {
    const entries: IndexEntry[] = [];
    for (const indexFile of indexFiles) {
      const node = documents.get(indexFile);
      if (!node) continue;
      for (const row of node.tableRows) {
        entries.push({
          indexFile,
          target: resolveLinkPath(indexFile, row.target.path),
          raw: row.target.raw,
          anchor: row.target.anchor,
          title: row.title,
          line: row.line,
        });
      }
    }
    return entries;
  }

  /**
   * Heading slugs of a markdown link target outside the parsed documents.
   * Only headings are read, so marker problems in such files do not abort the build.
   */
  private async loadAnchors(
    target: string,
    anchor: string | undefined,
    files: Set<string>,
    anchors: Map<string, Set<string>>
  ): Promise<void> {
    if (!anchor || anchors.has(target) || !files.has(target) || !isMarkdownPath(target)) {
      return;
    }
    const text = await readFile(path.join(this.root, target));
    const slugs = parseHeadings(splitLines(text))
      .map((heading) => heading.slug)
      .filter((slug) => slug !== '');
    anchors.set(target, new Set(slugs));
  }
}
