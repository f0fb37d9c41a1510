/**
 * Path Utilities
 */

import { join, extname, basename } from 'node:path';

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Path of `filePath` moved into `targetDir` with its extension replaced
 */
export function withExtensionIn(targetDir: string, filePath: string, extension: string): string {
  const ext = extension.startsWith('.') ? extension : `.${extension}`;
  return join(targetDir, getBasename(filePath) + ext);
}
