import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LedgerReadError, LedgerWriteError } from '../errors/index.js';
import { FileLedger, MemoryLedger, ledgerId, parseLedger } from '../ledger/processedLedger.js';

describe('FileLedger', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'autoencoder-ledger-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('treats a missing file as an empty ledger', async () => {
    const ledger = new FileLedger(join(root, 'processed_files.txt'));

    expect(await ledger.contains('film.mkv')).toBe(false);
    expect(await ledger.entries()).toEqual([]);
  });

  it('appends one basename per line, creating the directory', async () => {
    const path = join(root, 'temp', 'processed_files.txt');
    const ledger = new FileLedger(path);

    await ledger.record('a.mkv');
    await ledger.record('b.mkv');

    expect(await readFile(path, 'utf8')).toBe('a.mkv\nb.mkv\n');
    expect(await ledger.contains('b.mkv')).toBe(true);
  });

  it('sees entries recorded by an earlier instance', async () => {
    const path = join(root, 'processed_files.txt');
    await new FileLedger(path).record('a.mkv');

    const restarted = new FileLedger(path);

    expect(await restarted.contains('a.mkv')).toBe(true);
    expect(await restarted.contains('c.mkv')).toBe(false);
  });

  it('ignores blank lines and surrounding whitespace', async () => {
    const path = join(root, 'processed_files.txt');
    await writeFile(path, 'a.mkv\r\n\n  b.mkv  \n');

    expect(await new FileLedger(path).entries()).toEqual(['a.mkv', 'b.mkv']);
  });

  it('rereads the file after invalidate', async () => {
    const path = join(root, 'processed_files.txt');
    const ledger = new FileLedger(path);
    expect(await ledger.contains('a.mkv')).toBe(false);

    await writeFile(path, 'a.mkv\n');
    expect(await ledger.contains('a.mkv')).toBe(false);

    ledger.invalidate();
    expect(await ledger.contains('a.mkv')).toBe(true);
  });

  it('reports an unreadable ledger as LedgerReadError', async () => {
    const path = join(root, 'is-a-directory');
    await mkdir(path);

    await expect(new FileLedger(path).contains('a.mkv')).rejects.toBeInstanceOf(LedgerReadError);
  });

  it('reports a failed append as LedgerWriteError', async () => {
    const path = join(root, 'is-a-directory');
    await mkdir(path);

    await expect(new FileLedger(path).record('a.mkv')).rejects.toBeInstanceOf(LedgerWriteError);
  });
});

describe('MemoryLedger', () => {
  it('starts from the given entries', async () => {
    const ledger = new MemoryLedger(['a.mkv']);
    await ledger.record('b.mkv');

    expect(await ledger.contains('a.mkv')).toBe(true);
    expect(await ledger.entries()).toEqual(['a.mkv', 'b.mkv']);
  });
});

describe('ledgerId', () => {
  it('uses the basename', () => {
    expect(ledgerId('/videos/input/Film One.mkv')).toBe('Film One.mkv');
  });
});

describe('parseLedger', () => {
  it('returns nothing for empty content', () => {
    expect(parseLedger('')).toEqual([]);
  });
});
