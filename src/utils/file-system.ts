/**
 * File system operations - reading, writing, globbing and path helpers.
 */
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import fg from 'fast-glob';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Read a file as raw bytes.
 */
export async function readBytes(filePath: string): Promise<Buffer> {
  return fs.promises.readFile(filePath);
}

/**
 * Write content to a file, creating parent directories.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Check if a path exists without following a final symlink.
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.lstat(filePath);
    return true;
  } catch { /* path not found */ }
  return false;
}

/**
 * Check if a path is a directory.
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Find files matching glob patterns.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
    dot?: boolean;
    onlyDirectories?: boolean;
  } = {}
): Promise<string[]> {
  const onlyDirectories = options.onlyDirectories ?? false;
  return fg(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore || ['**/node_modules/**', '**/dist/**', '**/.git/**'],
    absolute: options.absolute ?? true,
    dot: options.dot ?? false,
    onlyFiles: !onlyDirectories,
    onlyDirectories,
  });
}

/**
 * Get file stats.
 */
export async function getStats(filePath: string): Promise<fs.Stats> {
  return fs.promises.stat(filePath);
}

/**
 * Convert a platform path to forward slashes.
 */
export function toPosix(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

/**
 * Project-relative POSIX path of an absolute path.
 */
export function relativePosix(root: string, filePath: string): string {
  return toPosix(path.relative(root, filePath));
}

/**
 * Expand a leading `~/` to the current user's home directory.
 */
export function expandHome(value: string): string {
  if (value === '~') return os.homedir();
  if (value.startsWith('~/')) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
}

/**
 * Resolve a user-supplied path against a project directory,
 * expanding `~/` and dropping a trailing slash.
 */
export function resolveFromProject(projectDir: string, value: string): string {
  return path.resolve(projectDir, expandHome(value));
}

/**
 * Compact UTC timestamp used in backup file names (yyyymmddhhmmss).
 */
export function backupTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace(/[-:T]/g, '').slice(0, 14);
}

/**
 * Move an existing file aside as `<file>.bak.<timestamp>`.
 * Returns the backup path, or null when nothing was there.
 */
export async function backupIfExists(filePath: string, date: Date = new Date()): Promise<string | null> {
  if (!(await pathExists(filePath))) {
    return null;
  }
  const backup = `${filePath}.bak.${backupTimestamp(date)}`;
  await fs.promises.copyFile(filePath, backup);
  return backup;
}

/**
 * Copy a file, creating the destination's parent directories.
 */
export async function copyFile(source: string, destination: string): Promise<void> {
  await ensureDir(path.dirname(destination));
  await fs.promises.copyFile(source, destination);
}

/**
 * Rename a file or directory, creating the destination's parent directories.
 */
export async function movePath(source: string, destination: string): Promise<void> {
  await ensureDir(path.dirname(destination));
  await fs.promises.rename(source, destination);
}

/**
 * Drop write permission from a file.
 */
export async function setReadOnly(filePath: string): Promise<void> {
  await fs.promises.chmod(filePath, 0o444);
}

/**
 * Names of the direct subdirectories of a directory ([] when it does not exist).
 */
export async function listSubdirectories(dirPath: string): Promise<string[]> {
  if (!(await isDirectory(dirPath))) {
    return [];
  }
  const entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
  return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
}

/**
 * Target of a symbolic link, or null when the path is not a symlink.
 */
export async function readSymlink(linkPath: string): Promise<string | null> {
  try {
    const stat = await fs.promises.lstat(linkPath);
    if (!stat.isSymbolicLink()) return null;
  } catch { /* path not found */
    return null;
  }
  return fs.promises.readlink(linkPath);
}

/**
 * Create a symbolic link at `linkPath` pointing at `target` (stored as given).
 */
export async function createSymlink(target: string, linkPath: string): Promise<void> {
  await ensureDir(path.dirname(linkPath));
  await fs.promises.symlink(target, linkPath);
}

/**
 * Remove a file, symlink or directory tree if present.
 */
export async function removePath(filePath: string): Promise<void> {
  await fs.promises.rm(filePath, { recursive: true, force: true });
}
