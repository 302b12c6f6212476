/**
 * Types for the managed-block merge engine.
 */
import type { MergeConflictError } from '../../utils/errors.js';

/**
 * Where new blocks go in an existing file.
 */
export type InsertAnchor =
  | { kind: 'end' }
  | { kind: 'start' }
  | { kind: 'before-first-section' }
  | { kind: 'after-section'; heading: string };

/**
 * What happened to one marker id.
 * - inserted: absent downstream, added at the anchor
 * - updated: replaced with the template content
 * - unchanged: already identical to the template
 * - conflict: edited locally, left as is
 * - forced: edited locally, replaced because of `force`
 * - retained: only present downstream, left as is
 */
export type BlockOutcomeKind = 'inserted' | 'updated' | 'unchanged' | 'conflict' | 'forced' | 'retained';

export interface BlockOutcome {
  id: string;
  outcome: BlockOutcomeKind;
  conflict?: MergeConflictError;
}

export interface MergeOptions {
  /** Default: before the first `##` section */
  anchor?: InsertAnchor;
  /** Replace locally edited blocks instead of reporting a conflict */
  force?: boolean;
  /** Names used in parse errors */
  templatePath?: string;
  downstreamPath?: string;
}

export interface MergeResult {
  content: string;
  /** Template blocks in template order, then downstream-only blocks */
  outcomes: BlockOutcome[];
  conflicts: MergeConflictError[];
  changed: boolean;
  /** Anchor fallbacks and similar notices */
  warnings: string[];
}
