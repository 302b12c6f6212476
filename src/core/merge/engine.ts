/**
 * Marker-based merge of template blocks into a downstream file.
 *
 * Managed blocks belong to the tool and may be rewritten; everything outside
 * them belongs to the author and is never touched.
 */
import { MergeConflictError } from '../../utils/errors.js';
import { computeChecksum } from '../../utils/checksum.js';
import { beginMarker, endMarker, hashTrailer, scanMergeBlocks } from '../markdown/markers.js';
import type { MergeBlock } from '../markdown/types.js';
import { findInsertPosition } from './anchors.js';
import type { BlockOutcome, MergeOptions, MergeResult } from './types.js';

interface Splice {
  start: number;
  deleteCount: number;
  lines: string[];
}

/**
 * The lines of a file, each with the terminator that followed it ('' after the last).
 * Untouched lines keep their own terminator; new lines take the file's dominant one.
 */
class LineBuffer {
  readonly lines: string[] = [];
  private readonly breaks: string[] = [];
  private readonly eol: string;

  constructor(text: string) {
    const parts = text.split(/(\r?\n)/);
    for (let i = 0; i < parts.length; i += 2) {
      this.lines.push(parts[i]);
      this.breaks.push(parts[i + 1] ?? '');
    }
    const crlf = this.breaks.filter((brk) => brk === '\r\n').length;
    const lf = this.breaks.filter((brk) => brk === '\n').length;
    this.eol = crlf > lf ? '\r\n' : '\n';
  }

  /**
   * Replace `deleteCount` lines at `start` with `added` (non-empty).
   * The last added line inherits the terminator of the last deleted one.
   */
  splice(start: number, deleteCount: number, added: string[]): void {
    const addedBreaks = added.map(() => this.eol);
    if (deleteCount > 0) {
      addedBreaks[addedBreaks.length - 1] = this.breaks[start + deleteCount - 1];
    } else if (start >= this.lines.length) {
      // Appending after an unterminated last line
      addedBreaks[addedBreaks.length - 1] = '';
      if (start > 0) {
        this.breaks[start - 1] = this.eol;
      }
    }
    this.lines.splice(start, deleteCount, ...added);
    this.breaks.splice(start, deleteCount, ...addedBreaks);
  }

  toString(): string {
    return this.lines.map((line, index) => line + this.breaks[index]).join('');
  }
}

function renderBlockLines(id: string, content: string): string[] {
  return [beginMarker(id), ...content.split('\n'), hashTrailer(computeChecksum(content)), endMarker(id)];
}

/**
 * Canonical text of one managed block, trailer included.
 */
export function renderBlock(id: string, content: string): string {
  return renderBlockLines(id, content).join('\n');
}

/**
 * Put a current `source-hash` trailer on every block of a rendered template.
 */
export function markTemplate(text: string, file = 'template'): string {
  const buffer = new LineBuffer(text);
  const blocks = scanMergeBlocks(text, file);

  for (const block of [...blocks].reverse()) {
    buffer.splice(block.beginLine, block.endLine - block.beginLine + 1, renderBlockLines(block.id, block.content));
  }
  return buffer.toString();
}

/**
 * Whether a downstream block still holds what the tool last wrote into it.
 */
export function isBlockPristine(block: MergeBlock): boolean {
  return block.storedHash !== undefined && block.storedHash === block.contentHash;
}

/**
 * Apply every managed block of `template` to `downstream`.
 * Conflicts are reported per marker; the other blocks are still applied.
 */
export function mergeManagedBlocks(template: string, downstream: string, options: MergeOptions = {}): MergeResult {
  const templateBlocks = scanMergeBlocks(template, options.templatePath ?? 'template');
  const downstreamBlocks = scanMergeBlocks(downstream, options.downstreamPath ?? 'downstream');
  const buffer = new LineBuffer(downstream);
  const lines = buffer.lines;
  const byId = new Map(downstreamBlocks.map((block) => [block.id, block]));
  const templateIds = new Set(templateBlocks.map((block) => block.id));

  const outcomes: BlockOutcome[] = [];
  const conflicts: MergeConflictError[] = [];
  const warnings: string[] = [];
  const splices: Splice[] = [];
  const missing: MergeBlock[] = [];

  for (const block of templateBlocks) {
    const existing = byId.get(block.id);
    if (!existing) {
      missing.push(block);
      outcomes.push({ id: block.id, outcome: 'inserted' });
      continue;
    }

    const replace = (): void => {
      splices.push({
        start: existing.beginLine,
        deleteCount: existing.endLine - existing.beginLine + 1,
        lines: renderBlockLines(block.id, block.content),
      });
    };

    if (isBlockPristine(existing)) {
      if (existing.content === block.content) {
        outcomes.push({ id: block.id, outcome: 'unchanged' });
      } else {
        replace();
        outcomes.push({ id: block.id, outcome: 'updated' });
      }
    } else if (existing.storedHash === undefined && existing.content === block.content) {
      // Same content, trailer never written
      replace();
      outcomes.push({ id: block.id, outcome: 'updated' });
    } else if (options.force) {
      replace();
      outcomes.push({ id: block.id, outcome: 'forced' });
    } else {
      const conflict = new MergeConflictError(block.id, existing.content, block.content);
      conflicts.push(conflict);
      outcomes.push({ id: block.id, outcome: 'conflict', conflict });
    }
  }

  for (const block of downstreamBlocks) {
    if (!templateIds.has(block.id)) {
      outcomes.push({ id: block.id, outcome: 'retained' });
    }
  }

  if (missing.length > 0) {
    const position = findInsertPosition(lines, downstreamBlocks, options.anchor ?? { kind: 'before-first-section' });
    if (position.fallback) {
      warnings.push(position.fallback);
    }
    splices.push({
      start: position.index,
      deleteCount: 0,
      lines: insertionLines(lines, position.index, missing),
    });
  }

  // Bottom-up so earlier indices stay valid; at equal positions replacements go first
  splices.sort((a, b) => b.start - a.start || b.deleteCount - a.deleteCount);
  for (const splice of splices) {
    buffer.splice(splice.start, splice.deleteCount, splice.lines);
  }

  const content = buffer.toString();
  return { content, outcomes, conflicts, changed: content !== downstream, warnings };
}

/**
 * New blocks in template order, separated from each other and from
 * neighbouring text by one blank line.
 */
function insertionLines(lines: string[], index: number, blocks: MergeBlock[]): string[] {
  const chunk: string[] = [];
  blocks.forEach((block, i) => {
    if (i > 0) chunk.push('');
    chunk.push(...renderBlockLines(block.id, block.content));
  });

  const before = index > 0 ? lines[index - 1] : undefined;
  const after = index < lines.length ? lines[index] : undefined;
  const atEnd = index >= lines.length || (index === lines.length - 1 && after === '');

  if (before !== undefined && before.trim() !== '') {
    chunk.unshift('');
  }
  if (!atEnd && after !== undefined && after.trim() !== '') {
    chunk.push('');
  }
  return chunk;
}
