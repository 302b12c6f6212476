/**
 * Tests for navigation validation over a real tree on disk.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { validateNavigationTree } from '../../../../src/core/navigation/validator.js';
import type { NavigationSettings } from '../../../../src/core/config/schema.js';
import { BrokenLinkError, OrphanGuideError, ParseError, StaleIndexError } from '../../../../src/utils/errors.js';

const SETTINGS: NavigationSettings = {
  index_files: ['README.md', 'AGENTS.md'],
  guide_roots: ['guides'],
  content_roots: ['guides', 'docs'],
  contents_roots: [],
  exclude: [],
};

const INDEX = [
  '# Standards',
  '',
  '| Guide | Path |',
  '| --- | --- |',
  '| [Testing](guides/testing.md) | testing |',
  '| [Review](guides/review.md#section-1) | review |',
  '',
].join('\n');

const TESTING = [
  '# Testing',
  '',
  'See [review](review.md#section) and [second](review.md#section-2).',
  '',
  '```',
  '[ignored](nowhere.md)',
  '```',
  'External [docs](https://example.com/missing.md) are not checked.',
  '',
].join('\n');

const REVIEW = ['# Review', '', '## Section', '', '## Section', '', '## Section', ''].join('\n');

async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [file, content] of Object.entries(files)) {
    const target = path.join(root, file);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
}

describe('validateNavigationTree', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'gk-nav-'));
    await writeTree(root, {
      'README.md': INDEX,
      'AGENTS.md': INDEX,
      'guides/testing.md': TESTING,
      'guides/review.md': REVIEW,
    });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('passes a complete tree with numbered anchors', async () => {
    const report = await validateNavigationTree(root, SETTINGS);

    expect(report.errors).toEqual([]);
    expect(report.warnings).toEqual([]);
    expect(report.passed).toBe(true);
    expect(report.stats).toEqual({ documents: 4, links: 6, indexEntries: 4, guides: 2 });
  });

  it('reports a guide missing from every index', async () => {
    await writeTree(root, { 'guides/orphan.md': '# Orphan\n' });

    const report = await validateNavigationTree(root, SETTINGS);

    expect(report.passed).toBe(false);
    expect(report.errors).toHaveLength(2);
    expect(report.errors[0]).toBeInstanceOf(OrphanGuideError);
    expect(report.errors.map((error) => error.message)).toEqual([
      "Guide 'guides/orphan.md' is not listed in README.md",
      "Guide 'guides/orphan.md' is not listed in AGENTS.md",
    ]);
    expect(report.errors[0].code).toBe('N001');
  });

  it('reports links to unknown anchors and missing files', async () => {
    await writeTree(root, {
      'guides/testing.md': '# Testing\n\n[third](review.md#section-3)\n[gone](missing.md)\n',
    });

    const report = await validateNavigationTree(root, SETTINGS);

    expect(report.errors.map((error) => error.message)).toEqual([
      'guides/testing.md:3 links to unknown anchor: review.md#section-3',
      'guides/testing.md:4 links to non-existent file: missing.md',
    ]);
    expect(report.errors.every((error) => error instanceof BrokenLinkError)).toBe(true);
  });

  it('reports index entries pointing at missing guides', async () => {
    await writeTree(root, { 'README.md': `${INDEX}| [Gone](guides/gone.md) | gone |\n` });

    const report = await validateNavigationTree(root, SETTINGS);

    expect(report.errors).toHaveLength(1);
    expect(report.errors[0]).toBeInstanceOf(StaleIndexError);
    expect(report.errors[0].message).toBe(
      "README.md:7 index entry 'Gone' points at missing target: guides/gone.md"
    );
    expect(report.errors[0].code).toBe('N003');
  });

  it('orders errors by category: orphans, broken links, stale entries', async () => {
    await writeTree(root, {
      'README.md': `${INDEX}| [Gone](guides/gone.md) | gone |\n`,
      'guides/orphan.md': '# Orphan\n\n[gone](missing.md)\n',
    });

    const report = await validateNavigationTree(root, SETTINGS);

    expect(report.errors.map((error) => error.code)).toEqual(['N001', 'N001', 'N002', 'N003']);
  });

  it('returns only the first error in strict mode', async () => {
    await writeTree(root, {
      'README.md': `${INDEX}| [Gone](guides/gone.md) | gone |\n`,
      'guides/orphan.md': '# Orphan\n\n[gone](missing.md)\n',
    });

    const report = await validateNavigationTree(root, SETTINGS, { mode: 'strict' });

    expect(report.mode).toBe('strict');
    expect(report.errors).toHaveLength(1);
    expect(report.errors[0].message).toBe("Guide 'guides/orphan.md' is not listed in README.md");
  });

  it('reports every guide as unlisted in a missing index file', async () => {
    await fs.rm(path.join(root, 'AGENTS.md'));

    const report = await validateNavigationTree(root, SETTINGS);

    expect(report.passed).toBe(false);
    expect(report.errors.map((error) => error.message)).toEqual([
      "Guide 'guides/review.md' is not listed in AGENTS.md",
      "Guide 'guides/testing.md' is not listed in AGENTS.md",
    ]);
    expect(report.warnings).toEqual([
      {
        code: 'missing-index-file',
        message: "Index file 'AGENTS.md' does not exist; no guide is listed in it",
        file: 'AGENTS.md',
      },
    ]);
  });

  it('fails a tree with no index files at all', async () => {
    await fs.rm(path.join(root, 'AGENTS.md'));
    await fs.rm(path.join(root, 'README.md'));

    const report = await validateNavigationTree(root, SETTINGS);

    expect(report.passed).toBe(false);
    expect(report.errors.map((error) => error.code)).toEqual(['N001', 'N001', 'N001', 'N001']);
    expect(report.warnings.map((warning) => warning.file)).toEqual(['AGENTS.md', 'README.md']);
  });

  it('records malformed markers and keeps validating the rest of the tree', async () => {
    await writeTree(root, {
      'guides/broken.md': '# Broken\n\n<!-- BEGIN:x -->\n[gone](missing.md)\n',
    });

    const report = await validateNavigationTree(root, SETTINGS);

    expect(report.passed).toBe(false);
    expect(report.errors.map((error) => error.code)).toEqual(['P001', 'N001', 'N001', 'N002']);
    expect(report.errors[0]).toBeInstanceOf(ParseError);
    expect(report.errors[0].message).toBe('guides/broken.md:3: marker BEGIN:x has no matching END');
    expect(report.errors[3].message).toBe('guides/broken.md:4 links to non-existent file: missing.md');
  });

  it('reports a malformed document first in strict mode', async () => {
    await writeTree(root, {
      'guides/broken.md': '# Broken\n\n<!-- BEGIN:x -->\n[gone](missing.md)\n',
    });

    const report = await validateNavigationTree(root, SETTINGS, { mode: 'strict' });

    expect(report.errors).toHaveLength(1);
    expect(report.errors[0]).toBeInstanceOf(ParseError);
  });

  it('warns about a guide listed twice in one index', async () => {
    await writeTree(root, { 'AGENTS.md': `${INDEX}| [Testing again](guides/testing.md) | testing |\n` });

    const report = await validateNavigationTree(root, SETTINGS);

    expect(report.passed).toBe(true);
    expect(report.warnings).toEqual([
      {
        code: 'duplicate-index-entry',
        message: "Guide 'guides/testing.md' is listed 2 times in AGENTS.md",
        file: 'AGENTS.md',
        line: 7,
      },
    ]);
  });

  it('resolves root-relative links and links to directories', async () => {
    await writeTree(root, {
      'guides/testing.md': '# Testing\n\n[home](/README.md#standards) and [all guides](./)\n',
    });

    const report = await validateNavigationTree(root, SETTINGS);

    expect(report.errors).toEqual([]);
  });

  describe('Contents tables', () => {
    const WITH_CONTENTS: NavigationSettings = { ...SETTINGS, contents_roots: ['guides'] };

    it('accepts guides whose Contents table lists existing sections', async () => {
      await writeTree(root, {
        'guides/review.md': [
          '# Review',
          '',
          '## Contents',
          '',
          '| Section | Notes |',
          '| --- | --- |',
          '| [Section](#section) | first |',
          '',
          '## Section',
          '',
          '## Section',
          '',
          '## Section',
          '',
        ].join('\n'),
        'guides/testing.md': '# Testing\n\n## Contents\n\n| Section | Notes |\n| --- | --- |\n| [Setup](#setup) | first |\n\n## Setup\n',
      });

      const report = await validateNavigationTree(root, WITH_CONTENTS);

      expect(report.errors).toEqual([]);
      expect(report.warnings).toEqual([]);
    });

    it('warns about missing and stale Contents tables', async () => {
      await writeTree(root, {
        'guides/testing.md': [
          '# Testing',
          '',
          '## Contents',
          '',
          '| Section | Notes |',
          '| --- | --- |',
          '| [Setup](#setup) | first |',
          '| [Setup again](#setup) | second |',
          '',
          '## Setup',
          '',
        ].join('\n'),
      });

      const report = await validateNavigationTree(root, WITH_CONTENTS);

      expect(report.passed).toBe(true);
      expect(report.warnings).toEqual([
        { code: 'missing-contents-table', message: 'Guide has no Contents table', file: 'guides/review.md' },
        {
          code: 'stale-contents-table',
          message: 'Contents table lists 2 entries but the guide has 1 sections',
          file: 'guides/testing.md',
          line: 3,
        },
      ]);
    });
  });
});
