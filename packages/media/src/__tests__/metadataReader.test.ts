import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MetadataUnavailableError } from '@autoencoder/core';
import type { CommandResult, CommandRunner } from '@autoencoder/utils';
import { MediaInfoProbe } from '../probes/mediainfo.js';
import { MetadataReader, parseMediaInfoStreams } from '../metadataReader.js';

const MEDIAINFO_JSON = JSON.stringify({
  media: {
    '@ref': '/videos/input/film.mkv',
    track: [
      { '@type': 'General', Format: 'Matroska' },
      { '@type': 'Video', Format: 'MPEG Video' },
      { '@type': 'Audio', Format: 'AC-3', Language: 'en', Default: 'No' },
      { '@type': 'Audio', Format: 'AC-3', Language: 'DE', Default: 'Yes', Title: 'Deutsch 5.1' },
      { '@type': 'Text', Format: 'VobSub', Language: 'en', StreamSize: '52428', StreamSize_Proportion: '0.00030' },
      { '@type': 'Text', Format: 'VobSub', Language: 'de', StreamSize: '8738', StreamSize_Proportion: '0.00005' },
      { '@type': 'Text', Format: 'VobSub', StreamSize_Proportion: 'n/a' },
      { '@type': 'Menu' },
    ],
  },
});

function ok(stdout: string): CommandResult {
  return { exitCode: 0, stdout, stderr: '', duration: 5, timedOut: false };
}

function readerWith(run: CommandRunner): MetadataReader {
  return new MetadataReader(new MediaInfoProbe('/opt/mediainfo', run));
}

describe('MetadataReader', () => {
  let root: string;
  let file: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'autoencoder-media-'));
    file = join(root, 'film.mkv');
    await writeFile(file, 'not really video');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('describes audio and text tracks from mediainfo output', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue(ok(MEDIAINFO_JSON));

    const result = await readerWith(run).read(file);

    expect(run).toHaveBeenCalledWith('/opt/mediainfo', ['--Output=JSON', file], { timeout: 60000 });
    expect(result.status).toBe('available');
    expect(result.audio).toEqual([
      { index: 0, kind: 'audio', language: 'en', sizeBytes: null, proportion: null, isDefaultFlagged: false, format: 'AC-3' },
      {
        index: 1,
        kind: 'audio',
        language: 'de',
        sizeBytes: null,
        proportion: null,
        isDefaultFlagged: true,
        format: 'AC-3',
        title: 'Deutsch 5.1',
      },
    ]);
    expect(result.subtitles).toEqual([
      { index: 0, kind: 'subtitle', language: 'en', sizeBytes: 52428, proportion: 0.0003, isDefaultFlagged: false, format: 'VobSub' },
      { index: 1, kind: 'subtitle', language: 'de', sizeBytes: 8738, proportion: 0.00005, isDefaultFlagged: false, format: 'VobSub' },
      { index: 2, kind: 'subtitle', language: null, sizeBytes: null, proportion: null, isDefaultFlagged: false, format: 'VobSub' },
    ]);
  });

  it('degrades to empty lists for a missing file without running mediainfo', async () => {
    const run = vi.fn<CommandRunner>();

    const result = await readerWith(run).read(join(root, 'missing.mkv'));

    expect(result.status).toBe('unavailable');
    expect(result.audio).toEqual([]);
    expect(result.subtitles).toEqual([]);
    expect(run).not.toHaveBeenCalled();
    if (result.status === 'unavailable') {
      expect(result.error).toBeInstanceOf(MetadataUnavailableError);
      expect(result.error.details).toEqual({ filePath: join(root, 'missing.mkv'), reason: 'file not found' });
    }
  });

  it('degrades for a directory', async () => {
    const result = await readerWith(vi.fn<CommandRunner>()).read(root);

    expect(result.status === 'unavailable' && result.error.details?.['reason']).toBe('not a regular file');
  });

  it('degrades when mediainfo is not installed', async () => {
    const missing = Object.assign(new Error('spawn /opt/mediainfo ENOENT'), { code: 'ENOENT' });

    const result = await readerWith(vi.fn<CommandRunner>().mockRejectedValue(missing)).read(file);

    expect(result.status === 'unavailable' && result.error.message).toBe(
      `Metadata unavailable for ${file}: mediainfo not found at /opt/mediainfo`
    );
  });

  it('degrades when mediainfo exits non-zero', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue({ ...ok(''), exitCode: 1, stderr: 'cannot open\n' });

    const result = await readerWith(run).read(file);

    expect(result.status === 'unavailable' && result.error.details?.['reason']).toBe('mediainfo failed: cannot open');
  });

  it('degrades when mediainfo prints something other than JSON', async () => {
    const result = await readerWith(vi.fn<CommandRunner>().mockResolvedValue(ok('General\nFormat: ?'))).read(file);

    expect(result.status).toBe('unavailable');
  });

  it('degrades for a container mediainfo does not recognise', async () => {
    const result = await readerWith(vi.fn<CommandRunner>().mockResolvedValue(ok('{"media":null}'))).read(file);

    expect(result.status === 'unavailable' && result.error.details?.['reason']).toBe(
      'unrecognised or unsupported container'
    );
  });
});

describe('parseMediaInfoStreams', () => {
  it('returns empty lists when there are no audio or text tracks', () => {
    expect(parseMediaInfoStreams([{ '@type': 'General' }, { '@type': 'Video' }])).toEqual({
      audio: [],
      subtitles: [],
    });
  });

  it('returns frozen descriptors', () => {
    const { audio } = parseMediaInfoStreams([{ '@type': 'Audio', Language: 'de' }]);

    expect(Object.isFrozen(audio[0])).toBe(true);
  });
});
