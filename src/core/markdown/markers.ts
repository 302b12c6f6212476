/**
 * Managed marker blocks:
 *
 *   <!-- BEGIN:<id> -->
 *   ...content...
 *   <!-- source-hash: <hex> -->
 *   <!-- END:<id> -->
 *
 * Markers must sit on their own line; markers inside fenced code are text.
 */
import { ParseError } from '../../utils/errors.js';
import { computeChecksum } from '../../utils/checksum.js';
import { codeFenceMask, splitLines } from './lines.js';
import type { MergeBlock } from './types.js';

const MARKER_ID = '[A-Za-z0-9_.-]+';
const BEGIN_PATTERN = new RegExp(`^<!--\\s*BEGIN:(${MARKER_ID})\\s*-->$`);
const END_PATTERN = new RegExp(`^<!--\\s*END:(${MARKER_ID})\\s*-->$`);
const HASH_PATTERN = /^<!--\s*source-hash:\s*([0-9a-f]+)\s*-->$/;

export function beginMarker(id: string): string {
  return `<!-- BEGIN:${id} -->`;
}

export function endMarker(id: string): string {
  return `<!-- END:${id} -->`;
}

export function hashTrailer(hash: string): string {
  return `<!-- source-hash: ${hash} -->`;
}

export function isValidMarkerId(id: string): boolean {
  return new RegExp(`^${MARKER_ID}$`).test(id);
}

/**
 * Find every managed block in a file.
 * Throws ParseError for unterminated, nested, overlapping, stray or duplicate markers.
 */
export function scanMergeBlocks(text: string, file: string): MergeBlock[] {
  const lines = splitLines(text);
  const inCode = codeFenceMask(lines);
  const blocks: MergeBlock[] = [];
  const seen = new Set<string>();
  let open: { id: string; line: number } | null = null;

  for (let i = 0; i < lines.length; i++) {
    if (inCode[i]) continue;
    const trimmed = lines[i].trim();

    const begin = BEGIN_PATTERN.exec(trimmed);
    if (begin) {
      const id = begin[1];
      if (open) {
        const what = open.id === id ? 'nested' : 'overlaps';
        throw new ParseError(
          `marker BEGIN:${id} ${what} open block '${open.id}' (opened at line ${open.line + 1})`,
          file,
          i + 1
        );
      }
      if (seen.has(id)) {
        throw new ParseError(`duplicate marker id '${id}'`, file, i + 1);
      }
      open = { id, line: i };
      continue;
    }

    const end = END_PATTERN.exec(trimmed);
    if (end) {
      const id = end[1];
      if (!open) {
        throw new ParseError(`marker END:${id} has no matching BEGIN`, file, i + 1);
      }
      if (open.id !== id) {
        throw new ParseError(
          `marker END:${id} closes block '${open.id}' (opened at line ${open.line + 1})`,
          file,
          i + 1
        );
      }
      blocks.push(buildBlock(id, open.line, i, lines.slice(open.line + 1, i)));
      seen.add(id);
      open = null;
    }
  }

  if (open) {
    throw new ParseError(`marker BEGIN:${open.id} has no matching END`, file, open.line + 1);
  }

  return blocks;
}

function buildBlock(id: string, beginLine: number, endLine: number, inner: string[]): MergeBlock {
  let storedHash: string | undefined;
  let contentLines = inner;

  const last = inner.length > 0 ? inner[inner.length - 1].trim() : '';
  const trailer = HASH_PATTERN.exec(last);
  if (trailer) {
    storedHash = trailer[1];
    contentLines = inner.slice(0, -1);
  }

  const content = contentLines.join('\n');
  return {
    id,
    beginLine,
    endLine,
    content,
    storedHash,
    contentHash: computeChecksum(content),
  };
}
