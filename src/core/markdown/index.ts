/**
 * Barrel exports for the markdown module.
 */
export { slugify, SlugRegistry } from './slugify.js';
export { splitLines, codeFenceMask } from './lines.js';
export {
  scanMergeBlocks,
  beginMarker,
  endMarker,
  hashTrailer,
  isValidMarkerId,
} from './markers.js';
export {
  parseDocument,
  parseHeadings,
  parseLinks,
  splitTarget,
  splitTableCells,
} from './parser.js';
export type { ParseDocumentOptions } from './parser.js';
export type {
  Heading,
  LinkKind,
  LinkEdge,
  TableLinkRow,
  MergeBlock,
  DocumentNode,
} from './types.js';
