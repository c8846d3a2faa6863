/**
 * File Utilities
 *
 * Utility functions for file system operations.
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Get basename of file without extension
 * Example: "/path/to/helmet.glb" -> "helmet"
 */
export function getBasenameWithoutExt(filePath: string): string {
  const basename = path.basename(filePath);
  return basename.replace(/\.[^/.]+$/, '');
}

/**
 * Replace the extension of a path
 * Example: ("/path/to/helmet.glb", ".metro.json") -> "/path/to/helmet.metro.json"
 */
export function replaceExtension(filePath: string, extension: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}${extension}`);
}

/**
 * Write a whole buffer next to the target, then rename it into place.
 * The target is left as it was when the write fails.
 */
export function writeFileAtomic(filePath: string, content: string | Uint8Array): void {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);

  try {
    fs.writeFileSync(tmpPath, content, typeof content === 'string' ? { encoding: 'utf-8' } : undefined);
    fs.renameSync(tmpPath, filePath);
  } catch (error) {
    fs.rmSync(tmpPath, { force: true });
    throw error;
  }
}
