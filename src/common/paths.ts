import * as fs from 'fs';
import path from 'path';

/**
 * Ensure a directory exists, creating it if necessary
 */
export function ensureDirectory(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Names of the immediate subdirectories of a directory
 */
export function listSubdirectories(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter(dirent => dirent.isDirectory())
    .map(dirent => dirent.name);
}

/**
 * Last path segment, ignoring trailing separators ("frames/" -> "frames")
 */
export function baseName(dir: string): string {
  return path.basename(dir.replace(/[\\/]+$/, ''));
}
