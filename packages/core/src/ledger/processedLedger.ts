/**
 * Processed-Files Ledger
 *
 * Durable set of source files that were already encoded successfully.
 *
 * - Identity is the file's basename, so equally named files in different
 *   directories are the same entry.
 * - Storage is a plain text file with one id per line.
 * - Writes only ever append. Callers check `contains` before encoding and call
 *   `record` after a successful encode.
 */

import { basename } from 'node:path';
import { appendLine, logger, safeReadFile, type Logger } from '@autoencoder/utils';
import { LedgerReadError, LedgerWriteError } from '../errors/index.js';

export interface ProcessedLedger {
  /**
   * Whether the id has been recorded
   */
  contains(id: string): Promise<boolean>;

  /**
   * Append the id
   */
  record(id: string): Promise<void>;

  /**
   * All recorded ids in insertion order
   */
  entries(): Promise<string[]>;
}

/**
 * Ledger id for a source file
 */
export function ledgerId(filePath: string): string {
  return basename(filePath);
}

/**
 * Line-oriented file ledger.
 *
 * The file is read once and cached for the lifetime of the instance; `record`
 * keeps the cache in step with what it appends.
 */
export class FileLedger implements ProcessedLedger {
  private readonly filePath: string;
  private readonly log: Logger;
  private cache: string[] | null = null;

  constructor(filePath: string, log: Logger = logger) {
    this.filePath = filePath;
    this.log = log.child({ component: 'ledger' });
  }

  get path(): string {
    return this.filePath;
  }

  async contains(id: string): Promise<boolean> {
    const ids = await this.load();
    return ids.includes(id);
  }

  async record(id: string): Promise<void> {
    try {
      await appendLine(this.filePath, id);
    } catch (error) {
      throw new LedgerWriteError(this.filePath, id, error);
    }

    this.cache?.push(id);
    this.log.debug({ id }, 'Recorded processed file');
  }

  async entries(): Promise<string[]> {
    return [...(await this.load())];
  }

  /**
   * Drop the cache so the next call reads the file again
   */
  invalidate(): void {
    this.cache = null;
  }

  private async load(): Promise<string[]> {
    if (this.cache) {
      return this.cache;
    }

    let content: string | null;
    try {
      content = await safeReadFile(this.filePath);
    } catch (error) {
      throw new LedgerReadError(this.filePath, error);
    }

    if (content === null) {
      this.log.debug({ path: this.filePath }, 'Ledger does not exist yet, starting empty');
    }

    this.cache = parseLedger(content ?? '');
    return this.cache;
  }
}

/**
 * In-memory ledger with the same contract, for dry runs and tests
 */
export class MemoryLedger implements ProcessedLedger {
  private readonly ids: string[];

  constructor(initial: Iterable<string> = []) {
    this.ids = [...initial];
  }

  async contains(id: string): Promise<boolean> {
    return this.ids.includes(id);
  }

  async record(id: string): Promise<void> {
    this.ids.push(id);
  }

  async entries(): Promise<string[]> {
    return [...this.ids];
  }
}

/**
 * Parse ledger file content: one id per line, blank lines ignored
 */
export function parseLedger(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}
