/**
 * Types for parsed markdown documents.
 */

/**
 * An ATX heading (`#`..`######`).
 */
export interface Heading {
  /** Heading text without the leading hashes or closing sequence */
  text: string;
  /** 1-6 */
  level: number;
  /** Anchor slug after duplicate disambiguation ('' when the text has no slug characters) */
  slug: string;
  /** 1-based line number */
  line: number;
}

/**
 * How a link was written.
 */
export type LinkKind = 'inline' | 'image' | 'reference';

/**
 * A markdown link from one document to a path and/or anchor.
 */
export interface LinkEdge {
  /** Project-relative path of the document containing the link */
  source: string;
  /** Target exactly as written */
  raw: string;
  /** Decoded path part of the target ('' for same-document anchors) */
  path: string;
  /** Decoded fragment without '#', if any */
  anchor?: string;
  kind: LinkKind;
  /** 1-based line number */
  line: number;
  /** Whether the link sits inside a table row */
  inTable: boolean;
  /** Whether the target path exists in the tree; set by the graph builder */
  resolved: boolean;
}

/**
 * A table body row whose first or second cell holds a link.
 * Becomes an index entry when the document is a designated index file.
 */
export interface TableLinkRow {
  line: number;
  /** Link text of the first link in the leading cells */
  title: string;
  target: LinkEdge;
}

/**
 * A `<!-- BEGIN:id -->` ... `<!-- END:id -->` region.
 */
export interface MergeBlock {
  id: string;
  /** 0-based index of the BEGIN marker line */
  beginLine: number;
  /** 0-based index of the END marker line */
  endLine: number;
  /** Inner lines joined with '\n', excluding the source-hash trailer */
  content: string;
  /** Hash recorded in the `<!-- source-hash: ... -->` trailer, if present */
  storedHash?: string;
  /** Checksum of `content` */
  contentHash: string;
}

/**
 * One parsed markdown file.
 */
export interface DocumentNode {
  /** Unique project-relative POSIX path */
  path: string;
  headings: Heading[];
  /** All non-empty heading slugs */
  slugs: Set<string>;
  links: LinkEdge[];
  tableRows: TableLinkRow[];
  blocks: MergeBlock[];
}
