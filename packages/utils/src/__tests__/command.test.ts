import { describe, it, expect } from 'vitest';
import { appendTail, executeCommand, formatCommandLine, isCommandNotFound } from '../command.js';

describe('formatCommandLine', () => {
  it('quotes arguments containing whitespace and empty arguments', () => {
    expect(formatCommandLine('HandBrakeCLI', ['--input', '/in/My Film.mkv', '--aname', ''])).toBe(
      'HandBrakeCLI --input "/in/My Film.mkv" --aname ""'
    );
  });
});

describe('isCommandNotFound', () => {
  it('recognises ENOENT and EACCES spawn errors', () => {
    expect(isCommandNotFound(Object.assign(new Error('x'), { code: 'ENOENT' }))).toBe(true);
    expect(isCommandNotFound(Object.assign(new Error('x'), { code: 'EACCES' }))).toBe(true);
  });

  it('ignores other errors', () => {
    expect(isCommandNotFound(Object.assign(new Error('x'), { code: 'EPIPE' }))).toBe(false);
    expect(isCommandNotFound('ENOENT')).toBe(false);
  });
});

describe('executeCommand', () => {
  it('rejects with ENOENT when the binary does not exist', async () => {
    const error = await executeCommand('autoencoder-no-such-binary', ['--version']).catch((e: unknown) => e);

    expect(isCommandNotFound(error)).toBe(true);
  });
});

describe('appendTail', () => {
  it('keeps everything while under the limit', () => {
    expect(appendTail('abc', 'def', 10)).toBe('abcdef');
  });

  it('drops the oldest output once the limit is exceeded', () => {
    const progress = 'Encoding: 50%\n'.repeat(10);
    const stderr = appendTail(progress, 'x265 [error]: cannot open output\n', 40);

    expect(stderr).toBe('g: 50%\nx265 [error]: cannot open output\n');
    expect(stderr).toHaveLength(40);
  });
});
