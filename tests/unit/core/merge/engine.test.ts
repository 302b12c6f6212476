/**
 * Tests for the managed-block merge engine.
 */
import { describe, it, expect } from 'vitest';
import { markTemplate, mergeManagedBlocks, renderBlock } from '../../../../src/core/merge/engine.js';
import { beginMarker, endMarker, hashTrailer } from '../../../../src/core/markdown/markers.js';
import { computeChecksum } from '../../../../src/utils/checksum.js';
import { MergeConflictError } from '../../../../src/utils/errors.js';

const TEMPLATE = [
  '# Agents',
  beginMarker('a'),
  'alpha',
  endMarker('a'),
  '',
  beginMarker('b'),
  'beta',
  endMarker('b'),
  '',
].join('\n');

const DOWNSTREAM = '# My Project\n\nIntro text.\n\n## Notes\n\nKeep me.\n';

describe('renderBlock', () => {
  it('wraps content in markers with a source-hash trailer', () => {
    expect(renderBlock('a', 'alpha')).toBe(
      `<!-- BEGIN:a -->\nalpha\n<!-- source-hash: ${computeChecksum('alpha')} -->\n<!-- END:a -->`
    );
  });
});

describe('markTemplate', () => {
  it('adds trailers to blocks that lack them', () => {
    const text = `x\n${beginMarker('a')}\nalpha\n${endMarker('a')}\n`;

    expect(markTemplate(text)).toBe(`x\n${renderBlock('a', 'alpha')}\n`);
  });
});

describe('mergeManagedBlocks', () => {
  it('inserts missing blocks before the first section', () => {
    const result = mergeManagedBlocks(TEMPLATE, DOWNSTREAM);

    expect(result.content).toBe(
      `# My Project\n\nIntro text.\n\n${renderBlock('a', 'alpha')}\n\n${renderBlock('b', 'beta')}\n\n## Notes\n\nKeep me.\n`
    );
    expect(result.outcomes).toEqual([
      { id: 'a', outcome: 'inserted' },
      { id: 'b', outcome: 'inserted' },
    ]);
    expect(result.changed).toBe(true);
    expect(result.conflicts).toEqual([]);
  });

  it('is idempotent', () => {
    const first = mergeManagedBlocks(TEMPLATE, DOWNSTREAM);
    const second = mergeManagedBlocks(TEMPLATE, first.content);

    expect(second.content).toBe(first.content);
    expect(second.changed).toBe(false);
    expect(second.outcomes.map((outcome) => outcome.outcome)).toEqual(['unchanged', 'unchanged']);
  });

  it('updates pristine blocks whose template content changed', () => {
    const downstream = `# P\n\n${renderBlock('a', 'old')}\n\n${renderBlock('b', 'beta')}\n`;

    const result = mergeManagedBlocks(TEMPLATE, downstream);

    expect(result.content).toBe(`# P\n\n${renderBlock('a', 'alpha')}\n\n${renderBlock('b', 'beta')}\n`);
    expect(result.outcomes.map((outcome) => outcome.outcome)).toEqual(['updated', 'unchanged']);
  });

  it('reports locally edited blocks as conflicts and leaves them alone', () => {
    const edited = [beginMarker('a'), 'alpha edited', hashTrailer(computeChecksum('alpha')), endMarker('a')].join('\n');
    const downstream = `# P\n\n${edited}\n\n## Notes\n`;

    const result = mergeManagedBlocks(TEMPLATE, downstream);

    expect(result.content).toBe(`# P\n\n${edited}\n\n${renderBlock('b', 'beta')}\n\n## Notes\n`);
    expect(result.conflicts).toHaveLength(1);
    expect(result.conflicts[0]).toBeInstanceOf(MergeConflictError);
    expect(result.conflicts[0].markerId).toBe('a');
    expect(result.conflicts[0].downstreamContent).toBe('alpha edited');
    expect(result.conflicts[0].templateContent).toBe('alpha');
    expect(result.outcomes.map((outcome) => outcome.outcome)).toEqual(['conflict', 'inserted']);
  });

  it('replaces edited blocks when forced', () => {
    const edited = [beginMarker('a'), 'alpha edited', hashTrailer(computeChecksum('alpha')), endMarker('a')].join('\n');

    const result = mergeManagedBlocks(TEMPLATE, `# P\n\n${edited}\n`, { force: true });

    expect(result.conflicts).toEqual([]);
    expect(result.outcomes[0]).toEqual({ id: 'a', outcome: 'forced' });
    expect(result.content.startsWith(`# P\n\n${renderBlock('a', 'alpha')}\n`)).toBe(true);
  });

  it('adds a trailer to an unmarked block with matching content', () => {
    const downstream = `${beginMarker('a')}\nalpha\n${endMarker('a')}\n`;
    const template = `${beginMarker('a')}\nalpha\n${endMarker('a')}\n`;

    const result = mergeManagedBlocks(template, downstream);

    expect(result.content).toBe(`${renderBlock('a', 'alpha')}\n`);
    expect(result.outcomes).toEqual([{ id: 'a', outcome: 'updated' }]);
  });

  it('treats an unmarked block with different content as a conflict', () => {
    const downstream = `${beginMarker('a')}\nmine\n${endMarker('a')}\n`;
    const template = `${beginMarker('a')}\nalpha\n${endMarker('a')}\n`;

    const result = mergeManagedBlocks(template, downstream);

    expect(result.content).toBe(downstream);
    expect(result.outcomes.map((outcome) => outcome.outcome)).toEqual(['conflict']);
  });

  it('retains blocks that only exist downstream', () => {
    const downstream = `${renderBlock('a', 'alpha')}\n\n${renderBlock('local', 'mine')}\n`;
    const template = `${beginMarker('a')}\nalpha\n${endMarker('a')}\n`;

    const result = mergeManagedBlocks(template, downstream);

    expect(result.content).toBe(downstream);
    expect(result.outcomes).toEqual([
      { id: 'a', outcome: 'unchanged' },
      { id: 'local', outcome: 'retained' },
    ]);
  });

  it('preserves CRLF line endings of the downstream file', () => {
    const downstream = ['A', beginMarker('a'), 'old', hashTrailer(computeChecksum('old')), endMarker('a'), 'B', ''].join('\r\n');
    const template = `${beginMarker('a')}\nalpha\n${endMarker('a')}\n`;

    const result = mergeManagedBlocks(template, downstream);

    expect(result.content).toBe(
      ['A', beginMarker('a'), 'alpha', hashTrailer(computeChecksum('alpha')), endMarker('a'), 'B', ''].join('\r\n')
    );
  });

  it('keeps the line ending of every line outside the blocks', () => {
    const downstream = `# Title\r\nintro line\n\n${renderBlock('a', 'old')}\n\n## Notes\r\nKeep me.\n`;
    const template = `${beginMarker('a')}\nalpha\n${endMarker('a')}\n`;

    const result = mergeManagedBlocks(template, downstream);

    expect(result.content).toBe(`# Title\r\nintro line\n\n${renderBlock('a', 'alpha')}\n\n## Notes\r\nKeep me.\n`);
  });

  it('writes inserted blocks with the dominant line ending', () => {
    const template = `${beginMarker('a')}\nalpha\n${endMarker('a')}\n`;

    const result = mergeManagedBlocks(template, 'A\r\nB\nC\r\n', { anchor: { kind: 'end' } });

    expect(result.content).toBe(`A\r\nB\nC\r\n\r\n${renderBlock('a', 'alpha').split('\n').join('\r\n')}\r\n`);
  });

  it('keeps a missing final newline when appending', () => {
    const template = `${beginMarker('a')}\nalpha\n${endMarker('a')}\n`;

    const result = mergeManagedBlocks(template, '# P\n\nText.', { anchor: { kind: 'end' } });

    expect(result.content).toBe(`# P\n\nText.\n\n${renderBlock('a', 'alpha')}`);
  });

  describe('insert anchors', () => {
    const template = `${beginMarker('a')}\nalpha\n${endMarker('a')}\n`;

    it('appends at the end', () => {
      const result = mergeManagedBlocks(template, '# P\n\nText.\n', { anchor: { kind: 'end' } });

      expect(result.content).toBe(`# P\n\nText.\n\n${renderBlock('a', 'alpha')}\n`);
    });

    it('prepends at the start', () => {
      const result = mergeManagedBlocks(template, '# P\n\nText.\n', { anchor: { kind: 'start' } });

      expect(result.content).toBe(`${renderBlock('a', 'alpha')}\n\n# P\n\nText.\n`);
    });

    it('inserts at the end of a named section', () => {
      const downstream = '# P\n\n## Setup\n\nSteps.\n\n## Usage\n\nUse it.\n';

      const result = mergeManagedBlocks(template, downstream, { anchor: { kind: 'after-section', heading: 'Setup' } });

      expect(result.content).toBe(
        `# P\n\n## Setup\n\nSteps.\n\n${renderBlock('a', 'alpha')}\n\n## Usage\n\nUse it.\n`
      );
      expect(result.warnings).toEqual([]);
    });

    it('falls back to the end when the section is missing', () => {
      const result = mergeManagedBlocks(template, '# P\n\nText.\n', {
        anchor: { kind: 'after-section', heading: 'Missing' },
      });

      expect(result.content).toBe(`# P\n\nText.\n\n${renderBlock('a', 'alpha')}\n`);
      expect(result.warnings).toEqual(["section 'Missing' not found; appending at the end"]);
    });

    it('falls back to the end when there is no level-2 section', () => {
      const result = mergeManagedBlocks(template, '# P\n\nText.\n');

      expect(result.warnings).toEqual(['no level-2 section found; appending at the end']);
    });
  });
});
