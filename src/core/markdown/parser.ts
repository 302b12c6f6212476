/**
 * Markdown structure extraction: headings, links, index-table rows and marker blocks.
 * Works line by line; fenced code blocks and inline code spans are ignored.
 */
import { SlugRegistry } from './slugify.js';
import { scanMergeBlocks } from './markers.js';
import { codeFenceMask, splitLines } from './lines.js';
import type { DocumentNode, Heading, LinkEdge, LinkKind, TableLinkRow } from './types.js';

const HEADING_PATTERN = /^ {0,3}(#{1,6})(?:[ \t]+(.*))?$/;
const CLOSING_HASHES = /(^|[ \t]+)#+$/;

// Groups: 1 image bang, 2 text, 3 <angle> target, 4 bare target (one level of balanced parens)
const INLINE_LINK_PATTERN =
  /(!?)\[((?:\\.|[^[\]\\]|\[[^\]]*\])*)\]\(\s*(?:<([^>]*)>|((?:[^\s()]|\([^\s()]*\))*))(?:\s+(?:"[^"]*"|'[^']*'|\([^)]*\)))?\s*\)/g;
const REFERENCE_DEFINITION_PATTERN = /^ {0,3}\[([^\]]+)\]:\s*(?:<([^>]*)>|(\S+))/;
const INLINE_CODE_PATTERN = /(`+)[^`]*?\1/g;
const URL_SCHEME_PATTERN = /^[a-zA-Z][a-zA-Z0-9+.-]*:/;
const TABLE_DELIMITER_PATTERN = /^\s*\|?\s*:?-+:?\s*(\|\s*:?-+:?\s*)*\|?\s*$/;

export interface ParseDocumentOptions {
  /** Scan managed marker blocks (default true) */
  blocks?: boolean;
}

/**
 * Parse one markdown file into a DocumentNode.
 * Throws ParseError when marker blocks are malformed, unless `blocks` is false.
 */
export function parseDocument(path: string, text: string, options: ParseDocumentOptions = {}): DocumentNode {
  const lines = splitLines(text);
  const inCode = codeFenceMask(lines);
  const headings = parseHeadings(lines, inCode);
  const tableLines = findTableLines(lines, inCode);

  return {
    path,
    headings,
    slugs: new Set(headings.map((h) => h.slug).filter((slug) => slug !== '')),
    links: parseLinks(path, lines, inCode, tableLines.rows),
    tableRows: parseTableRows(path, lines, tableLines.body),
    blocks: options.blocks === false ? [] : scanMergeBlocks(text, path),
  };
}

/**
 * Extract ATX headings in document order with disambiguated slugs.
 */
export function parseHeadings(lines: string[], inCode: boolean[] = codeFenceMask(lines)): Heading[] {
  const registry = new SlugRegistry();
  const headings: Heading[] = [];

  lines.forEach((line, index) => {
    if (inCode[index]) return;
    const match = HEADING_PATTERN.exec(line);
    if (!match) return;

    const text = (match[2] ?? '').trim().replace(CLOSING_HASHES, '').trim();
    headings.push({
      text,
      level: match[1].length,
      slug: registry.register(text),
      line: index + 1,
    });
  });

  return headings;
}

/**
 * Split a link target into its path and anchor parts.
 * Returns null for external targets (URL schemes, protocol-relative URLs) and empty targets.
 */
export function splitTarget(raw: string): { path: string; anchor?: string } | null {
  const target = raw.trim();
  if (target === '' || URL_SCHEME_PATTERN.test(target) || target.startsWith('//')) {
    return null;
  }

  const hashIndex = target.indexOf('#');
  const beforeHash = hashIndex === -1 ? target : target.slice(0, hashIndex);
  const queryIndex = beforeHash.indexOf('?');
  const path = decode(queryIndex === -1 ? beforeHash : beforeHash.slice(0, queryIndex));

  if (hashIndex === -1) {
    return { path };
  }
  return { path, anchor: decode(target.slice(hashIndex + 1)) };
}

function decode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Malformed escapes are matched literally
    return value;
  }
}

function makeEdge(source: string, raw: string, kind: LinkKind, line: number, inTable: boolean): LinkEdge | null {
  const split = splitTarget(raw);
  if (!split) return null;
  return {
    source,
    raw,
    path: split.path,
    anchor: split.anchor,
    kind,
    line,
    inTable,
    resolved: false,
  };
}

function maskInlineCode(line: string): string {
  return line.replace(INLINE_CODE_PATTERN, (span) => ' '.repeat(span.length));
}

/**
 * Inline links on a single line (code spans masked).
 */
function inlineLinks(line: string): Array<{ text: string; target: string; image: boolean }> {
  const found: Array<{ text: string; target: string; image: boolean }> = [];
  for (const match of maskInlineCode(line).matchAll(INLINE_LINK_PATTERN)) {
    found.push({
      text: match[2],
      target: match[3] ?? match[4] ?? '',
      image: match[1] === '!',
    });
  }
  return found;
}

/**
 * Extract inline links, images and reference definitions.
 */
export function parseLinks(
  source: string,
  lines: string[],
  inCode: boolean[] = codeFenceMask(lines),
  tableLines: Set<number> = new Set()
): LinkEdge[] {
  const edges: LinkEdge[] = [];

  lines.forEach((line, index) => {
    if (inCode[index]) return;
    const lineNumber = index + 1;
    const inTable = tableLines.has(index);

    const definition = REFERENCE_DEFINITION_PATTERN.exec(line);
    if (definition && !definition[1].startsWith('^')) {
      const edge = makeEdge(source, definition[2] ?? definition[3] ?? '', 'reference', lineNumber, inTable);
      if (edge) edges.push(edge);
      return;
    }

    for (const link of inlineLinks(line)) {
      const edge = makeEdge(source, link.target, link.image ? 'image' : 'inline', lineNumber, inTable);
      if (edge) edges.push(edge);
    }
  });

  return edges;
}

/**
 * Locate table lines: `rows` holds header, delimiter and body lines,
 * `body` only the body rows.
 */
function findTableLines(lines: string[], inCode: boolean[]): { rows: Set<number>; body: number[] } {
  const rows = new Set<number>();
  const body: number[] = [];

  for (let i = 1; i < lines.length; i++) {
    if (inCode[i] || inCode[i - 1]) continue;
    if (!lines[i - 1].includes('|') || !lines[i].includes('|')) continue;
    if (!TABLE_DELIMITER_PATTERN.test(lines[i]) || !lines[i].includes('-')) continue;
    if (rows.has(i - 1)) continue;

    rows.add(i - 1);
    rows.add(i);
    let j = i + 1;
    while (j < lines.length && !inCode[j] && lines[j].trim() !== '' && lines[j].includes('|')) {
      rows.add(j);
      body.push(j);
      j++;
    }
    i = j - 1;
  }

  return { rows, body };
}

/**
 * Split a table row into trimmed cells, honouring `\|` escapes.
 */
export function splitTableCells(line: string): string[] {
  let row = line.trim();
  if (row.startsWith('|')) row = row.slice(1);
  if (row.endsWith('|') && !row.endsWith('\\|')) row = row.slice(0, -1);
  return row.split(/(?<!\\)\|/).map((cell) => cell.trim());
}

function parseTableRows(source: string, lines: string[], body: number[]): TableLinkRow[] {
  const rows: TableLinkRow[] = [];

  for (const index of body) {
    const cells = splitTableCells(maskInlineCode(lines[index]));
    for (const cell of cells.slice(0, 2)) {
      const link = inlineLinks(cell).find((candidate) => !candidate.image);
      if (!link) continue;
      const edge = makeEdge(source, link.target, 'inline', index + 1, true);
      if (edge) {
        rows.push({ line: index + 1, title: link.text, target: edge });
      }
      break;
    }
  }

  return rows;
}
