import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { appendFile, mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { appendLine, listFiles, partitionSettled, safeReadFile } from '../file.js';
import { getBasename, withExtensionIn } from '../path.js';
import { formatDuration } from '../time.js';
import { isNonEmptyString } from '../guards.js';

describe('file helpers', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'autoencoder-utils-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('lists regular files only, sorted, without descending', async () => {
    await writeFile(join(root, 'b.mkv'), '');
    await writeFile(join(root, 'a.vob'), '');
    await mkdir(join(root, 'nested'));
    await writeFile(join(root, 'nested', 'c.mkv'), '');

    expect(await listFiles(root)).toEqual([join(root, 'a.vob'), join(root, 'b.mkv')]);
  });

  it('returns null for a missing file', async () => {
    expect(await safeReadFile(join(root, 'missing.txt'))).toBeNull();
  });

  it('appends lines, creating parent directories', async () => {
    const path = join(root, 'deep', 'log.txt');
    await appendLine(path, 'one');
    await appendLine(path, 'two');

    expect(await readFile(path, 'utf8')).toBe('one\ntwo\n');
  });

  it('separates files that keep changing from settled ones', async () => {
    const stable = join(root, 'stable.mkv');
    const growing = join(root, 'growing.mkv');
    const missing = join(root, 'missing.mkv');
    await writeFile(stable, 'done');
    await writeFile(growing, 'start');

    setTimeout(() => void appendFile(growing, ' and more'), 30);
    const result = await partitionSettled([stable, growing, missing], 150);

    expect(result).toEqual({ settled: [stable], changing: [growing, missing] });
  });
});

describe('path helpers', () => {
  it('strips only the last extension', () => {
    expect(getBasename('/in/film.part1.vob')).toBe('film.part1');
  });

  it('moves a file into a directory with a new extension', () => {
    expect(withExtensionIn('/out', '/in/film.vob', 'mkv')).toBe(join('/out', 'film.mkv'));
    expect(withExtensionIn('/out', '/in/film.vob', '.mkv')).toBe(join('/out', 'film.mkv'));
  });
});

describe('formatDuration', () => {
  it('formats milliseconds, seconds, minutes and hours', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(42_000)).toBe('42s');
    expect(formatDuration(125_000)).toBe('2m 5s');
    expect(formatDuration(3_723_000)).toBe('1h 2m 3s');
  });
});

describe('isNonEmptyString', () => {
  it('rejects blank strings and non-strings', () => {
    expect(isNonEmptyString('de')).toBe(true);
    expect(isNonEmptyString('  ')).toBe(false);
    expect(isNonEmptyString(undefined)).toBe(false);
  });
});
