/**
 * File system operations used by the loaders and the file emitter.
 * Generation itself is synchronous; only the loaders are async.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
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
 * Check if a path exists (sync).
 */
export function pathExistsSync(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/**
 * Check if a path is a directory (sync).
 */
export function isDirectorySync(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Create a directory and its parents (sync). Existing directories are fine.
 */
export function ensureDirSync(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

/**
 * Resolve a file path to its canonical absolute form.
 *
 * The deepest existing ancestor is resolved through symlinks and the
 * remaining segments are appended as-is, so paths of files that do not
 * exist yet still compare equal to the paths they will have once written.
 */
export function canonicalPath(filePath: string): string {
  const absolute = path.resolve(filePath);
  const pending: string[] = [];
  let current = absolute;

  while (!fs.existsSync(current)) {
    const parent = path.dirname(current);
    if (parent === current) {
      return absolute;
    }
    pending.unshift(path.basename(current));
    current = parent;
  }

  return path.join(fs.realpathSync(current), ...pending);
}

/**
 * Convert path separators to forward slashes.
 */
export function toUnixPath(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}

/**
 * Join path segments.
 */
export function joinPath(...segments: string[]): string {
  return path.join(...segments);
}

/**
 * Get the directory name of a path.
 */
export function dirname(filePath: string): string {
  return path.dirname(filePath);
}
