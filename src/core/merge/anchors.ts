/**
 * Insert positions for new managed blocks.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { parseHeadings } from '../markdown/parser.js';
import { slugify } from '../markdown/slugify.js';
import type { MergeBlock } from '../markdown/types.js';
import type { InsertAnchor } from './types.js';

const AFTER_SECTION_PREFIX = 'after-section:';

/**
 * Parse the `insert_anchor` setting.
 */
export function parseInsertAnchor(value: string): InsertAnchor {
  if (value === 'end' || value === 'start' || value === 'before-first-section') {
    return { kind: value };
  }
  if (value.startsWith(AFTER_SECTION_PREFIX) && value.length > AFTER_SECTION_PREFIX.length) {
    return { kind: 'after-section', heading: value.slice(AFTER_SECTION_PREFIX.length).trim() };
  }
  throw new ConfigError(
    ErrorCodes.CONFIG_INVALID,
    `Invalid insert anchor '${value}': expected end, start, before-first-section or after-section:<heading>`,
    { value }
  );
}

export function formatInsertAnchor(anchor: InsertAnchor): string {
  return anchor.kind === 'after-section' ? `${AFTER_SECTION_PREFIX}${anchor.heading}` : anchor.kind;
}

export interface InsertPosition {
  /** Insert before this 0-based line index */
  index: number;
  /** Set when the requested anchor was not found and the end of the file was used */
  fallback?: string;
}

/**
 * Index of the line before which new blocks are inserted.
 * Headings inside existing managed blocks are never used as anchors.
 */
export function findInsertPosition(lines: string[], blocks: MergeBlock[], anchor: InsertAnchor): InsertPosition {
  const end = lines.length > 0 && lines[lines.length - 1] === '' ? lines.length - 1 : lines.length;

  if (anchor.kind === 'end') {
    return { index: end };
  }
  if (anchor.kind === 'start') {
    return { index: 0 };
  }

  const insideBlock = (index: number): boolean =>
    blocks.some((block) => index >= block.beginLine && index <= block.endLine);
  const headings = parseHeadings(lines).filter((heading) => !insideBlock(heading.line - 1));

  if (anchor.kind === 'before-first-section') {
    const section = headings.find((heading) => heading.level === 2);
    if (section) {
      return { index: section.line - 1 };
    }
    return { index: end, fallback: 'no level-2 section found; appending at the end' };
  }

  const wanted = slugify(anchor.heading);
  const position = headings.findIndex((heading) => slugify(heading.text) === wanted);
  if (position === -1) {
    return { index: end, fallback: `section '${anchor.heading}' not found; appending at the end` };
  }

  const section = headings[position];
  const next = headings.slice(position + 1).find((heading) => heading.level <= section.level);
  if (!next) {
    return { index: end };
  }
  // Blocks start after the section's trailing blank lines
  let index = next.line - 1;
  while (index > section.line && lines[index - 1].trim() === '') {
    index--;
  }
  return { index };
}
