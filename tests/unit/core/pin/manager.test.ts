/**
 * Tests for pinned snapshots.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  computeManifestHash,
  MANIFEST_FILE,
  PinManager,
  sanitizeTag,
} from '../../../../src/core/pin/manager.js';
import { hashContent } from '../../../../src/utils/checksum.js';
import { copyFile } from '../../../../src/utils/file-system.js';
import { SnapshotError, SnapshotHashMismatchError } from '../../../../src/utils/errors.js';

vi.mock('../../../../src/utils/file-system.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../../src/utils/file-system.js')>();
  return { ...actual, copyFile: vi.fn(actual.copyFile) };
});

async function write(file: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content);
}

async function overwrite(file: string, content: string): Promise<void> {
  await fs.chmod(file, 0o644);
  await fs.writeFile(file, content);
}

async function captureMismatch(manager: PinManager, tag: string): Promise<SnapshotHashMismatchError> {
  try {
    await manager.verifySnapshot(tag);
  } catch (error) {
    if (error instanceof SnapshotHashMismatchError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a hash mismatch');
}

describe('sanitizeTag', () => {
  it('replaces separators with hyphens', () => {
    expect(sanitizeTag('release/1.0 beta@x')).toBe('release-1.0-beta-x');
  });

  it('drops other unsafe characters', () => {
    expect(sanitizeTag(' v1!# ')).toBe('v1');
  });
});

describe('PinManager', () => {
  let project: string;
  let standards: string;
  let manager: PinManager;
  const now = (): Date => new Date('2026-03-04T05:06:07.000Z');

  beforeEach(async () => {
    project = await fs.mkdtemp(path.join(os.tmpdir(), 'gk-pin-'));
    standards = path.join(project, 'standards');
    await write(path.join(standards, 'README.md'), '# Standards\n');
    await write(path.join(standards, 'guides', 'a.md'), '# A\n');
    manager = new PinManager(project, { standardsPath: standards, pinsDir: '.guidekeeper/pins', now });
  });

  afterEach(async () => {
    await fs.rm(project, { recursive: true, force: true });
  });

  it('copies the tree and writes a manifest', async () => {
    const result = await manager.createSnapshot('v1.0.0');
    const files = {
      'README.md': hashContent('# Standards\n'),
      'guides/a.md': hashContent('# A\n'),
    };

    expect(result.created).toBe(true);
    expect(result.path).toBe(path.join(project, '.guidekeeper', 'pins', 'v1.0.0'));
    expect(result.manifest).toEqual({
      version: 'v1.0.0',
      created_at: '2026-03-04T05:06:07.000Z',
      source_path: standards,
      file_count: 2,
      manifest_hash: computeManifestHash(files),
      files,
    });
    expect(await fs.readFile(path.join(result.path, 'guides', 'a.md'), 'utf-8')).toBe('# A\n');
  });

  it('leaves nothing behind when a copy fails partway', async () => {
    const actual = await vi.importActual<typeof import('../../../../src/utils/file-system.js')>(
      '../../../../src/utils/file-system.js'
    );
    vi.mocked(copyFile).mockImplementationOnce(actual.copyFile).mockRejectedValueOnce(new Error('disk full'));

    await expect(manager.createSnapshot('v1')).rejects.toThrow('disk full');
    expect(await fs.readdir(path.join(project, '.guidekeeper', 'pins'))).toEqual([]);

    const retry = await manager.createSnapshot('v1');
    expect(retry.created).toBe(true);
    expect(retry.manifest.file_count).toBe(2);
    expect(await manager.listSnapshots()).toEqual(['v1']);
  });

  it('makes snapshot files read-only', async () => {
    const result = await manager.createSnapshot('v1');
    const stats = await fs.stat(path.join(result.path, 'README.md'));
    const manifestStats = await fs.stat(path.join(result.path, MANIFEST_FILE));

    expect(stats.mode & 0o222).toBe(0);
    expect(manifestStats.mode & 0o222).toBe(0);
  });

  it('returns an identical existing snapshot without rewriting it', async () => {
    await manager.createSnapshot('v1');

    const again = await manager.createSnapshot('v1');

    expect(again.created).toBe(false);
  });

  it('refuses to reuse a tag for different content', async () => {
    await manager.createSnapshot('v1');
    await write(path.join(standards, 'guides', 'a.md'), '# A changed\n');

    await expect(manager.createSnapshot('v1')).rejects.toMatchObject({ code: 'S004' });
  });

  it('rejects tags that sanitize to nothing', async () => {
    await expect(manager.createSnapshot('!!!')).rejects.toMatchObject({ code: 'S006' });
    expect(() => manager.snapshotPath('..')).toThrow(SnapshotError);
  });

  it('fails when the standards path does not exist', async () => {
    const missing = new PinManager(project, { standardsPath: 'nowhere', pinsDir: 'pins' });

    await expect(missing.createSnapshot('v1')).rejects.toMatchObject({ code: 'S002' });
  });

  it('keeps the pins directory out of a snapshot of the project itself', async () => {
    const self = new PinManager(standards, { standardsPath: standards, pinsDir: '.guidekeeper/pins' });
    await self.createSnapshot('v1');

    const second = await self.createSnapshot('v2');

    expect(Object.keys(second.manifest.files)).toEqual(['README.md', 'guides/a.md']);
  });

  it('verifies an intact snapshot', async () => {
    await manager.createSnapshot('v1');

    const info = await manager.verifySnapshot('v1');

    expect(info.tag).toBe('v1');
    expect(info.manifest.file_count).toBe(2);
  });

  it('names the tampered file', async () => {
    const snapshot = await manager.createSnapshot('v1');
    await overwrite(path.join(snapshot.path, 'guides', 'a.md'), '# A tampered\n');

    const error = await captureMismatch(manager, 'v1');

    expect(error.path).toBe('guides/a.md');
    expect(error.expected).toBe(hashContent('# A\n'));
    expect(error.actual).toBe(hashContent('# A tampered\n'));
    expect(error.code).toBe('S005');
    expect(error.details?.kind).toBe('changed');
  });

  it('reports a deleted file as missing', async () => {
    const snapshot = await manager.createSnapshot('v1');
    await fs.rm(path.join(snapshot.path, 'README.md'), { force: true });

    const error = await captureMismatch(manager, 'v1');

    expect(error.path).toBe('README.md');
    expect(error.details?.kind).toBe('missing');
  });

  it('reports an added file as unexpected', async () => {
    const snapshot = await manager.createSnapshot('v1');
    await write(path.join(snapshot.path, 'extra.md'), 'extra\n');

    const error = await captureMismatch(manager, 'v1');

    expect(error.path).toBe('extra.md');
    expect(error.details?.kind).toBe('unexpected');
  });

  it('fails to verify an unknown tag', async () => {
    await expect(manager.verifySnapshot('v9')).rejects.toMatchObject({ code: 'S003' });
  });

  it('diffs two snapshots', async () => {
    await manager.createSnapshot('v1');
    await write(path.join(standards, 'README.md'), '# Standards v2\n');
    await fs.rm(path.join(standards, 'guides', 'a.md'));
    await write(path.join(standards, 'guides', 'b.md'), '# B\n');
    await manager.createSnapshot('v2');

    expect(await manager.diffSnapshots('v1', 'v2')).toEqual([
      { path: 'README.md', change: 'modified' },
      { path: 'guides/a.md', change: 'removed' },
      { path: 'guides/b.md', change: 'added' },
    ]);
  });

  it('lists snapshots that have a manifest', async () => {
    await manager.createSnapshot('v2');
    await manager.createSnapshot('v1');
    await fs.mkdir(path.join(project, '.guidekeeper', 'pins', 'partial'), { recursive: true });

    expect(await manager.listSnapshots()).toEqual(['v1', 'v2']);
  });
});
