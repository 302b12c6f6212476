/**
 * Companion instruction file (CLAUDE.md by default) kept in step with the agent file.
 */
import * as path from 'node:path';
import {
  backupIfExists,
  copyFile,
  createSymlink,
  pathExists,
  readFile,
  readSymlink,
  removePath,
} from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import type { CompanionMode } from '../config/schema.js';
import type { CompanionResult } from './types.js';

export interface CompanionOptions {
  force?: boolean;
  now?: () => Date;
}

/**
 * Symlink target stored for the companion: the agent file relative to the companion's directory.
 */
function linkTarget(targetPath: string, companionPath: string): string {
  return path.relative(path.dirname(companionPath), targetPath);
}

/**
 * Whether an existing companion already mirrors the agent file.
 */
export async function describeCompanion(
  targetPath: string,
  companionPath: string
): Promise<'missing' | 'symlink' | 'copy' | 'wrong-symlink' | 'different'> {
  if (!(await pathExists(companionPath))) {
    return 'missing';
  }
  const link = await readSymlink(companionPath);
  if (link !== null) {
    return path.resolve(path.dirname(companionPath), link) === path.resolve(targetPath) ? 'symlink' : 'wrong-symlink';
  }
  const [target, companion] = await Promise.all([readFile(targetPath), readFile(companionPath)]);
  return target === companion ? 'copy' : 'different';
}

async function writeCompanion(
  targetPath: string,
  companionPath: string,
  mode: Exclude<CompanionMode, 'skip'>
): Promise<'symlink' | 'copy'> {
  if (mode === 'copy') {
    await copyFile(targetPath, companionPath);
    return 'copy';
  }
  if (mode === 'symlink') {
    await createSymlink(linkTarget(targetPath, companionPath), companionPath);
    return 'symlink';
  }
  try {
    await createSymlink(linkTarget(targetPath, companionPath), companionPath);
    return 'symlink';
  } catch (error) {
    log.debug(`Symlink not possible (${error instanceof Error ? error.message : String(error)}); copying instead`);
    await copyFile(targetPath, companionPath);
    return 'copy';
  }
}

/**
 * Create or check the companion file. An existing companion that differs
 * is reported and kept unless `force`, which backs it up and replaces it.
 */
export async function syncCompanion(
  targetPath: string,
  companionPath: string,
  mode: CompanionMode,
  options: CompanionOptions = {}
): Promise<CompanionResult> {
  if (mode === 'skip') {
    return { path: companionPath, status: 'skipped' };
  }

  const state = await describeCompanion(targetPath, companionPath);
  if (state === 'missing') {
    const written = await writeCompanion(targetPath, companionPath, mode);
    return { path: companionPath, status: written === 'symlink' ? 'created-symlink' : 'created-copy' };
  }

  if (options.force) {
    const backupPath = (await backupIfExists(companionPath, options.now?.())) ?? undefined;
    await removePath(companionPath);
    await writeCompanion(targetPath, companionPath, mode);
    return { path: companionPath, status: 'overwritten', backupPath };
  }

  if (state === 'symlink') {
    return { path: companionPath, status: 'kept-existing-symlink' };
  }
  if (state === 'copy') {
    return { path: companionPath, status: 'kept-existing-copy' };
  }
  return {
    path: companionPath,
    status: 'kept-existing-different',
    warning: `${path.basename(companionPath)} exists and differs from ${path.basename(targetPath)}; use --force to replace it`,
  };
}
