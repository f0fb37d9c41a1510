/**
 * File Operations
 *
 * Safe file operations with proper error handling.
 */

import { mkdir, readFile, readdir, appendFile, stat } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { sleep } from './time.js';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Safely read a file, returning null if it doesn't exist
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Append a single line to a file, creating the file and its directory if needed
 */
export async function appendLine(filePath: string, line: string): Promise<void> {
  await ensureDir(dirname(filePath));
  await appendFile(filePath, `${line}\n`, 'utf8');
}

/**
 * List the regular files directly inside a directory (non-recursive), sorted by name
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  const entries = await readdir(dirPath, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile())
    .map(entry => join(dirPath, entry.name))
    .sort();
}

/**
 * Split files into those whose size and mtime held still for `waitMs` and
 * those still changing. A file that disappears counts as changing.
 */
export async function partitionSettled(
  filePaths: readonly string[],
  waitMs: number
): Promise<{ settled: string[]; changing: string[] }> {
  const settled: string[] = [];
  const changing: string[] = [];
  if (filePaths.length === 0) {
    return { settled, changing };
  }

  const before = await Promise.all(filePaths.map(fingerprint));
  await sleep(waitMs);
  const after = await Promise.all(filePaths.map(fingerprint));

  filePaths.forEach((filePath, i) => {
    const first = before[i];
    if (first && first === after[i]) {
      settled.push(filePath);
    } else {
      changing.push(filePath);
    }
  });

  return { settled, changing };
}

async function fingerprint(filePath: string): Promise<string | null> {
  const stats = await stat(filePath).catch(() => null);
  return stats ? `${stats.size}:${stats.mtimeMs}` : null;
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
