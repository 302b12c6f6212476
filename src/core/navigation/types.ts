/**
 * Types for the navigation graph and its validation report.
 */
import type { DocumentNode, LinkEdge } from '../markdown/types.js';
import type { NavigationError, ParseError } from '../../utils/errors.js';

/**
 * A table row in a designated index file that links to a document.
 */
export interface IndexEntry {
  /** Index file listing the entry */
  indexFile: string;
  /** Tree-relative path the entry resolves to */
  target: string;
  /** Link target exactly as written */
  raw: string;
  anchor?: string;
  /** Link text */
  title: string;
  line: number;
}

/**
 * Everything the validator needs, with no further disk access.
 */
export interface NavigationGraph {
  /** Absolute root of the tree (informational) */
  root: string;
  /** Parsed documents by tree-relative POSIX path */
  documents: Map<string, DocumentNode>;
  /** Heading slugs of every parsed markdown file, including link targets outside the content roots */
  anchors: Map<string, Set<string>>;
  /** Every file in the tree */
  files: Set<string>;
  /** Every directory in the tree */
  directories: Set<string>;
  /** Configured index files, in configuration order */
  requiredIndexFiles: string[];
  /** Configured index files that exist */
  indexFiles: string[];
  /** Guide documents (under the guide roots, not index files), sorted */
  guides: string[];
  /** Guides under the contents roots */
  contentsGuides: string[];
  indexEntries: IndexEntry[];
  edges: LinkEdge[];
  /** Marker problems; the affected documents are parsed without their blocks */
  parseErrors: ParseError[];
}

export type ValidationMode = 'strict' | 'report-all';

export type NavigationWarningCode =
  | 'duplicate-index-entry'
  | 'missing-index-file'
  | 'missing-contents-table'
  | 'stale-contents-table';

/** A reported error: a navigation violation or a malformed document */
export type NavigationIssue = NavigationError | ParseError;

export interface NavigationWarning {
  code: NavigationWarningCode;
  message: string;
  file: string;
  line?: number;
}

export interface NavigationStats {
  documents: number;
  links: number;
  indexEntries: number;
  guides: number;
}

export interface NavigationReport {
  mode: ValidationMode;
  errors: NavigationIssue[];
  warnings: NavigationWarning[];
  stats: NavigationStats;
  passed: boolean;
}

export interface ValidateOptions {
  mode?: ValidationMode;
}
