/**
 * File system operations used by the tree walker and the config loader.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';

// A leading byte order mark stays in the decoded text so rewrites keep it.
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** What a path points at, without following symbolic links. */
export type PathKind = 'file' | 'directory' | 'symlink' | 'other' | 'missing';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Read a file as strict UTF-8.
 * Returns null when the bytes do not decode as text (binary assets).
 */
export async function readTextFile(filePath: string): Promise<string | null> {
  const bytes = await fs.promises.readFile(filePath);
  try {
    return utf8.decode(bytes);
  } catch {
    return null;
  }
}

/**
 * Write content to a file, creating parent directories as needed.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
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
 * Classify a path. Symbolic links are reported as such, not followed.
 */
export async function getPathKind(filePath: string): Promise<PathKind> {
  let stat: fs.Stats;
  try {
    stat = await fs.promises.lstat(filePath);
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return 'missing';
    }
    throw error;
  }
  if (stat.isSymbolicLink()) return 'symlink';
  if (stat.isDirectory()) return 'directory';
  if (stat.isFile()) return 'file';
  return 'other';
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Move a file or directory. Missing parents of the destination are created first.
 */
export async function movePath(from: string, to: string): Promise<void> {
  await ensureDir(path.dirname(to));
  await fs.promises.rename(from, to);
}

/**
 * Whether two existing paths name the same filesystem entry (same device and inode).
 */
export async function isSameEntry(a: string, b: string): Promise<boolean> {
  const [statA, statB] = await Promise.all([fs.promises.lstat(a), fs.promises.lstat(b)]);
  return statA.dev === statB.dev && statA.ino === statB.ino;
}

/**
 * Directories that `movePath(..., to)` would create: missing ancestors of
 * `to`, outermost first.
 */
export async function missingParents(to: string): Promise<string[]> {
  const missing: string[] = [];
  let dir = path.dirname(to);
  while (dir !== path.dirname(dir) && !(await fileExists(dir))) {
    missing.unshift(dir);
    dir = path.dirname(dir);
  }
  return missing;
}

/**
 * Convert platform separators to forward slashes.
 */
export function toPosixPath(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}

/**
 * Last non-empty segment of a path, accepting either separator.
 */
export function lastSegment(filePath: string): string {
  const segments = toPosixPath(filePath).split('/').filter(Boolean);
  return segments.length > 0 ? segments[segments.length - 1] : '';
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
