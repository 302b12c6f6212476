/**
 * Immutable, hashed snapshots of the standards tree.
 *
 * Layout: <pinsDir>/<tag>/ holds a copy of every standards file plus
 * pin-manifest.json. Snapshots are never rewritten; a new tag supersedes them.
 * A snapshot is assembled in <pinsDir>/.<tag>.partial/ and renamed into place when complete.
 */
import * as path from 'node:path';
import { hashContent } from '../../utils/checksum.js';
import {
  ErrorCodes,
  SnapshotError,
  SnapshotHashMismatchError,
  SystemError,
} from '../../utils/errors.js';
import {
  copyFile,
  fileExists,
  globFiles,
  isDirectory,
  listSubdirectories,
  movePath,
  pathExists,
  readBytes,
  readFile,
  relativePosix,
  removePath,
  setReadOnly,
  writeFile,
} from '../../utils/file-system.js';
import { formatZodError } from '../../utils/yaml.js';
import { logger as log } from '../../utils/logger.js';
import {
  SnapshotManifestSchema,
  type CreateSnapshotResult,
  type PinManagerOptions,
  type SnapshotDiffEntry,
  type SnapshotInfo,
  type SnapshotManifest,
  type SnapshotMismatch,
} from './types.js';

export const MANIFEST_FILE = 'pin-manifest.json';

const SOURCE_IGNORE = ['**/.git/**', '**/node_modules/**'];

/**
 * Make a version tag safe as a directory name:
 * `/`, `:`, `@` and spaces become `-`, anything else outside `[A-Za-z0-9._-]` is dropped.
 */
export function sanitizeTag(tag: string): string {
  return tag.trim().replace(/[/:@ ]/g, '-').replace(/[^A-Za-z0-9._-]/g, '');
}

/**
 * Combined hash over the sorted (path, hash) list.
 */
export function computeManifestHash(files: Record<string, string>): string {
  const lines = Object.keys(files)
    .sort()
    .map((file) => `${file}\u0000${files[file]}\n`);
  return hashContent(lines.join(''));
}

export class PinManager {
  private readonly projectDir: string;
  private readonly standardsPath?: string;
  private readonly pinsDir: string;
  private readonly now: () => Date;

  constructor(projectDir: string, options: PinManagerOptions) {
    this.projectDir = path.resolve(projectDir);
    this.standardsPath = options.standardsPath ? path.resolve(this.projectDir, options.standardsPath) : undefined;
    this.pinsDir = path.resolve(this.projectDir, options.pinsDir);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Absolute directory of a snapshot.
   */
  snapshotPath(versionTag: string): string {
    return path.join(this.pinsDir, this.requireTag(versionTag));
  }

  /**
   * Copy the standards tree into a new read-only snapshot.
   * An identical existing snapshot is returned unchanged.
   */
  async createSnapshot(versionTag: string): Promise<CreateSnapshotResult> {
    const tag = this.requireTag(versionTag);
    const source = this.standardsPath;
    if (!source || !(await isDirectory(source))) {
      throw new SystemError(
        ErrorCodes.FILE_NOT_FOUND,
        `Standards path not found: ${source ?? '(not configured)'}`,
        { path: source }
      );
    }

    const sourceFiles = await globFiles('**/*', {
      cwd: source,
      ignore: [...SOURCE_IGNORE, ...this.pinsIgnore(source)],
      absolute: false,
      dot: true,
    });
    sourceFiles.sort();

    const files: Record<string, string> = {};
    for (const file of sourceFiles) {
      files[file] = hashContent(await readBytes(path.join(source, file)));
    }
    const manifestHash = computeManifestHash(files);
    const target = path.join(this.pinsDir, tag);

    if (await pathExists(target)) {
      if (!(await fileExists(path.join(target, MANIFEST_FILE)))) {
        throw new SnapshotError(
          ErrorCodes.SNAPSHOT_EXISTS,
          `Snapshot directory for '${tag}' exists without ${MANIFEST_FILE}: ${target}`,
          { tag, path: target }
        );
      }
      const existing = await this.loadManifest(tag);
      if (existing.manifest_hash === manifestHash) {
        log.debug(`Snapshot ${tag} already matches the standards tree`);
        return { tag, path: target, manifest: existing, created: false };
      }
      throw new SnapshotError(
        ErrorCodes.SNAPSHOT_EXISTS,
        `Snapshot '${tag}' already exists with different content; pin a new version tag instead`,
        { tag, existing: existing.manifest_hash, current: manifestHash }
      );
    }

    const manifest: SnapshotManifest = {
      version: tag,
      created_at: this.now().toISOString(),
      source_path: source,
      file_count: sourceFiles.length,
      manifest_hash: manifestHash,
      files,
    };

    const staging = path.join(this.pinsDir, `.${tag}.partial`);
    await removePath(staging);
    try {
      for (const file of sourceFiles) {
        const destination = path.join(staging, file);
        await copyFile(path.join(source, file), destination);
        await setReadOnly(destination);
      }
      const manifestPath = path.join(staging, MANIFEST_FILE);
      await writeFile(manifestPath, `${JSON.stringify(manifest, null, 2)}\n`);
      await setReadOnly(manifestPath);
      await movePath(staging, target);
    } catch (error) {
      log.debug(`Discarding partial snapshot ${tag}`);
      await removePath(staging);
      throw error;
    }

    log.debug(`Created snapshot ${tag} with ${sourceFiles.length} file(s)`);
    return { tag, path: target, manifest, created: true };
  }

  /**
   * Recompute every hash under a snapshot and compare with its manifest.
   * Throws SnapshotHashMismatchError naming the first mismatching path.
   */
  async verifySnapshot(versionTag: string): Promise<SnapshotInfo> {
    const tag = this.requireTag(versionTag);
    const manifest = await this.loadManifest(tag);
    const root = path.join(this.pinsDir, tag);

    const present = await globFiles('**/*', { cwd: root, ignore: [], absolute: false, dot: true });
    const onDisk = new Set(present.filter((file) => file !== MANIFEST_FILE));
    const mismatches: SnapshotMismatch[] = [];

    for (const [file, expected] of Object.entries(manifest.files)) {
      if (!onDisk.has(file)) {
        mismatches.push({ path: file, kind: 'missing', expected, actual: null });
        continue;
      }
      const actual = hashContent(await readBytes(path.join(root, file)));
      if (actual !== expected) {
        mismatches.push({ path: file, kind: 'changed', expected, actual });
      }
    }
    for (const file of onDisk) {
      if (!(file in manifest.files)) {
        mismatches.push({ path: file, kind: 'unexpected', expected: null, actual: null });
      }
    }

    const recomputed = computeManifestHash(manifest.files);
    if (recomputed !== manifest.manifest_hash) {
      mismatches.push({ path: MANIFEST_FILE, kind: 'manifest', expected: manifest.manifest_hash, actual: recomputed });
    }

    if (mismatches.length > 0) {
      mismatches.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
      const first = mismatches[0];
      throw new SnapshotHashMismatchError(first.path, first.expected, first.actual, {
        tag,
        kind: first.kind,
        mismatches,
      });
    }

    return { tag, path: root, manifest };
  }

  /**
   * Paths that differ between two snapshots, sorted.
   */
  async diffSnapshots(versionA: string, versionB: string): Promise<SnapshotDiffEntry[]> {
    const a = (await this.loadManifest(versionA)).files;
    const b = (await this.loadManifest(versionB)).files;
    const paths = [...new Set([...Object.keys(a), ...Object.keys(b)])].sort();

    const entries: SnapshotDiffEntry[] = [];
    for (const file of paths) {
      if (!(file in a)) {
        entries.push({ path: file, change: 'added' });
      } else if (!(file in b)) {
        entries.push({ path: file, change: 'removed' });
      } else if (a[file] !== b[file]) {
        entries.push({ path: file, change: 'modified' });
      }
    }
    return entries;
  }

  /**
   * Tags of every snapshot with a manifest, sorted.
   */
  async listSnapshots(): Promise<string[]> {
    const tags: string[] = [];
    for (const name of await listSubdirectories(this.pinsDir)) {
      if (await fileExists(path.join(this.pinsDir, name, MANIFEST_FILE))) {
        tags.push(name);
      }
    }
    return tags.sort();
  }

  async loadManifest(versionTag: string): Promise<SnapshotManifest> {
    const tag = this.requireTag(versionTag);
    const manifestPath = path.join(this.pinsDir, tag, MANIFEST_FILE);
    if (!(await fileExists(manifestPath))) {
      throw new SnapshotError(
        ErrorCodes.SNAPSHOT_NOT_FOUND,
        `Snapshot '${tag}' not found (no ${MANIFEST_FILE} under ${relativePosix(this.projectDir, path.dirname(manifestPath))})`,
        { tag, path: manifestPath }
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(manifestPath));
    } catch (error) {
      throw new SnapshotError(
        ErrorCodes.SNAPSHOT_NOT_FOUND,
        `Snapshot manifest is not valid JSON: ${manifestPath}`,
        { tag, path: manifestPath, originalError: error instanceof Error ? error.message : String(error) }
      );
    }

    const result = SnapshotManifestSchema.safeParse(raw);
    if (!result.success) {
      throw new SnapshotError(
        ErrorCodes.SNAPSHOT_NOT_FOUND,
        `Invalid snapshot manifest ${manifestPath}: ${formatZodError(result.error)}`,
        { tag, path: manifestPath, errors: result.error.issues }
      );
    }
    return result.data;
  }

  private requireTag(versionTag: string): string {
    const tag = sanitizeTag(versionTag);
    if (tag === '' || tag === '.' || tag === '..') {
      throw new SnapshotError(
        ErrorCodes.SNAPSHOT_TAG_INVALID,
        `Invalid version tag '${versionTag}'`,
        { tag: versionTag }
      );
    }
    return tag;
  }

  /**
   * Keep the pins directory out of a snapshot when it lives inside the standards tree.
   */
  private pinsIgnore(source: string): string[] {
    const relative = path.relative(source, this.pinsDir);
    if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
      return [];
    }
    return [`${relative.split(path.sep).join('/')}/**`];
  }
}
