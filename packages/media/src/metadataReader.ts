/**
 * Media Metadata Reader
 *
 * Turns MediaInfo output into audio and subtitle stream descriptors.
 *
 * A file that cannot be inspected is not an error for the pipeline: the reader
 * returns the `unavailable` branch with empty stream lists and the encode
 * still runs, just without track selection.
 */

import { stat } from 'node:fs/promises';
import { MetadataUnavailableError, errorMessage } from '@autoencoder/core';
import { isCommandNotFound, isNonEmptyString, logger, type Logger } from '@autoencoder/utils';
import { MediaInfoProbe, type MediaInfoTrack } from './probes/mediainfo.js';
import type { MetadataReadResult, StreamDescriptor, StreamKind } from './types.js';

export class MetadataReader {
  private probe: MediaInfoProbe;
  private log: Logger;

  constructor(probe: MediaInfoProbe = new MediaInfoProbe(), log: Logger = logger) {
    this.probe = probe;
    this.log = log.child({ component: 'metadata' });
  }

  async read(filePath: string): Promise<MetadataReadResult> {
    try {
      const stats = await stat(filePath);
      if (!stats.isFile()) {
        return this.unavailable(filePath, 'not a regular file');
      }
    } catch (error) {
      return this.unavailable(filePath, 'file not found', error);
    }

    let tracks: MediaInfoTrack[];
    try {
      const result = await this.probe.probe(filePath);
      if (!result.media) {
        return this.unavailable(filePath, 'unrecognised or unsupported container');
      }
      tracks = result.media.track;
    } catch (error) {
      const reason = isCommandNotFound(error)
        ? `mediainfo not found at ${this.probe.binary}`
        : errorMessage(error);
      return this.unavailable(filePath, reason, error);
    }

    const { audio, subtitles } = parseMediaInfoStreams(tracks);

    if (audio.length === 0) {
      this.log.warn({ file: filePath }, 'No audio tracks found in media file');
    }
    this.log.debug(
      { file: filePath, audio: audio.length, subtitles: subtitles.length },
      'Read media metadata'
    );

    return { status: 'available', audio, subtitles };
  }

  private unavailable(filePath: string, reason: string, cause?: unknown): MetadataReadResult {
    const error = new MetadataUnavailableError(filePath, reason, cause);
    this.log.error({ file: filePath, reason }, 'Media metadata unavailable, continuing without track selection');
    return { status: 'unavailable', audio: [], subtitles: [], error };
  }
}

/**
 * Read a file's streams with a default mediainfo probe
 */
export async function readMetadata(filePath: string): Promise<MetadataReadResult> {
  return new MetadataReader().read(filePath);
}

/**
 * Map MediaInfo tracks to stream descriptors.
 *
 * Indexes count tracks of the same kind in the order MediaInfo lists them.
 */
export function parseMediaInfoStreams(tracks: readonly MediaInfoTrack[]): {
  audio: StreamDescriptor[];
  subtitles: StreamDescriptor[];
} {
  const audio: StreamDescriptor[] = [];
  const subtitles: StreamDescriptor[] = [];

  for (const track of tracks) {
    if (track['@type'] === 'Audio') {
      audio.push(toDescriptor(track, 'audio', audio.length));
    } else if (track['@type'] === 'Text') {
      subtitles.push(toDescriptor(track, 'subtitle', subtitles.length));
    }
  }

  return { audio, subtitles };
}

function toDescriptor(track: MediaInfoTrack, kind: StreamKind, index: number): StreamDescriptor {
  const isSubtitle = kind === 'subtitle';
  const descriptor: StreamDescriptor = {
    index,
    kind,
    language: isNonEmptyString(track.Language) ? track.Language.trim().toLowerCase() : null,
    sizeBytes: isSubtitle ? parseNumber(track.StreamSize, parseInt) : null,
    proportion: isSubtitle ? parseNumber(track.StreamSize_Proportion, parseFloat) : null,
    isDefaultFlagged: track.Default?.toLowerCase() === 'yes',
  };

  if (isNonEmptyString(track.Format)) descriptor.format = track.Format;
  if (isNonEmptyString(track.Title)) descriptor.title = track.Title;

  return Object.freeze(descriptor);
}

function parseNumber(value: string | undefined, parse: (raw: string) => number): number | null {
  if (value === undefined) return null;
  const parsed = parse(value);
  return Number.isFinite(parsed) ? parsed : null;
}
