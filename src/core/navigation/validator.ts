/**
 * Completeness and link validation over a navigation graph.
 *
 * Error order: malformed documents, orphan guides, broken links, stale index entries;
 * within each category by file path, then line.
 */
import { BrokenLinkError, OrphanGuideError, StaleIndexError } from '../../utils/errors.js';
import type { NavigationSettings } from '../config/schema.js';
import type { LinkEdge } from '../markdown/types.js';
import { NavigationGraphBuilder } from './builder.js';
import { isMarkdownPath, resolveLinkPath } from './paths.js';
import type {
  NavigationGraph,
  NavigationIssue,
  NavigationReport,
  NavigationWarning,
  ValidateOptions,
} from './types.js';

type TargetProblem = 'missing-file' | 'missing-anchor' | null;

const CONTENTS_HEADING = /^Contents\b/;

/**
 * Validate a navigation graph. Pure: the same graph always yields the same report.
 * In strict mode the checks stop at the first error.
 */
export function validateNavigation(graph: NavigationGraph, options: ValidateOptions = {}): NavigationReport {
  const mode = options.mode ?? 'report-all';
  const checks: Array<() => NavigationIssue[]> = [
    () => graph.parseErrors,
    () => checkOrphans(graph),
    () => checkLinks(graph),
    () => checkIndexEntries(graph),
  ];

  const errors: NavigationIssue[] = [];
  for (const check of checks) {
    const found = sortByLocation(check());
    if (mode === 'strict' && found.length > 0) {
      errors.push(found[0]);
      break;
    }
    errors.push(...found);
  }

  const warnings = [
    ...checkIndexFiles(graph),
    ...checkDuplicateListings(graph),
    ...checkContentsTables(graph),
  ];

  return {
    mode,
    errors,
    warnings: sortByLocation(warnings),
    stats: {
      documents: graph.documents.size,
      links: graph.edges.length,
      indexEntries: graph.indexEntries.length,
      guides: graph.guides.length,
    },
    passed: errors.length === 0,
  };
}

/**
 * Build the graph of a tree and validate it.
 */
export async function validateNavigationTree(
  root: string,
  settings: NavigationSettings,
  options: ValidateOptions = {}
): Promise<NavigationReport> {
  const graph = await new NavigationGraphBuilder(root, settings).build();
  return validateNavigation(graph, options);
}

/**
 * Every guide must be listed in every required index. A missing index lists nothing.
 */
function checkOrphans(graph: NavigationGraph): OrphanGuideError[] {
  const listed = new Set(graph.indexEntries.map((entry) => listingKey(entry.indexFile, entry.target)));
  const errors: OrphanGuideError[] = [];

  for (const guide of graph.guides) {
    for (const indexFile of graph.requiredIndexFiles) {
      if (!listed.has(listingKey(indexFile, guide))) {
        errors.push(new OrphanGuideError(guide, indexFile));
      }
    }
  }

  return errors;
}

function checkIndexFiles(graph: NavigationGraph): NavigationWarning[] {
  return graph.requiredIndexFiles
    .filter((indexFile) => !graph.indexFiles.includes(indexFile))
    .map((indexFile): NavigationWarning => ({
      code: 'missing-index-file',
      message: `Index file '${indexFile}' does not exist; no guide is listed in it`,
      file: indexFile,
    }));
}

function checkDuplicateListings(graph: NavigationGraph): NavigationWarning[] {
  const warnings: NavigationWarning[] = [];

  for (const guide of graph.guides) {
    for (const indexFile of graph.indexFiles) {
      const listings = graph.indexEntries.filter(
        (entry) => entry.indexFile === indexFile && entry.target === guide
      );
      if (listings.length > 1) {
        warnings.push({
          code: 'duplicate-index-entry',
          message: `Guide '${guide}' is listed ${listings.length} times in ${indexFile}`,
          file: indexFile,
          line: listings[1].line,
        });
      }
    }
  }

  return warnings;
}

/**
 * A guide needs a `## Contents` section, and its table may not list more
 * same-document entries than the guide has other level-2 sections.
 */
function checkContentsTables(graph: NavigationGraph): NavigationWarning[] {
  const warnings: NavigationWarning[] = [];

  for (const guide of graph.contentsGuides) {
    const node = graph.documents.get(guide);
    if (!node) continue;

    const sections = node.headings.filter((heading) => heading.level === 2);
    const contents = sections.find((heading) => CONTENTS_HEADING.test(heading.text));
    if (!contents) {
      warnings.push({ code: 'missing-contents-table', message: 'Guide has no Contents table', file: guide });
      continue;
    }

    const sectionCount = sections.filter((heading) => !CONTENTS_HEADING.test(heading.text)).length;
    const entryCount = node.tableRows.filter((row) => row.target.path === '' && row.target.anchor).length;
    if (entryCount > sectionCount) {
      warnings.push({
        code: 'stale-contents-table',
        message: `Contents table lists ${entryCount} entries but the guide has ${sectionCount} sections`,
        file: guide,
        line: contents.line,
      });
    }
  }

  return warnings;
}

function checkLinks(graph: NavigationGraph): BrokenLinkError[] {
  const indexRows = new Set(graph.indexEntries.map((entry) => entryKey(entry.indexFile, entry.line, entry.raw)));
  const errors: BrokenLinkError[] = [];

  for (const edge of graph.edges) {
    if (edge.inTable && indexRows.has(entryKey(edge.source, edge.line, edge.raw))) {
      continue;
    }
    const problem = checkTarget(graph, resolveLinkPath(edge.source, edge.path), edge.anchor);
    if (problem) {
      errors.push(new BrokenLinkError(edge.source, edge.raw, edge.line, problem));
    }
  }

  return errors;
}

function checkIndexEntries(graph: NavigationGraph): StaleIndexError[] {
  const errors: StaleIndexError[] = [];
  for (const entry of graph.indexEntries) {
    if (checkTarget(graph, entry.target, entry.anchor)) {
      errors.push(new StaleIndexError(entry.indexFile, entry.raw, entry.line, entry.title));
    }
  }
  return errors;
}

/**
 * The target must exist; an anchor on a markdown target must equal one of its slugs exactly.
 */
function checkTarget(graph: NavigationGraph, target: string, anchor: LinkEdge['anchor']): TargetProblem {
  if (!graph.files.has(target) && !graph.directories.has(target)) {
    return 'missing-file';
  }
  if (anchor && isMarkdownPath(target)) {
    const slugs = graph.anchors.get(target);
    if (!slugs || !slugs.has(anchor)) {
      return 'missing-anchor';
    }
  }
  return null;
}

function entryKey(file: string, line: number, raw: string): string {
  return `${file}\u0000${line}\u0000${raw}`;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function listingKey(indexFile: string, target: string): string {
  return `${indexFile}\u0000${target}`;
}

function sortByLocation<T extends { file: string; line?: number | null }>(items: T[]): T[] {
  return [...items].sort((a, b) => compareText(a.file, b.file) || (a.line ?? 0) - (b.line ?? 0));
}
