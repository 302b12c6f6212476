/**
 * Barrel exports for the merge module.
 */
export { mergeManagedBlocks, markTemplate, renderBlock, isBlockPristine } from './engine.js';
export { parseInsertAnchor, formatInsertAnchor, findInsertPosition } from './anchors.js';
export type { InsertPosition } from './anchors.js';
export type {
  InsertAnchor,
  BlockOutcome,
  BlockOutcomeKind,
  MergeOptions,
  MergeResult,
} from './types.js';
