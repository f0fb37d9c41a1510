/**
 * Media Types
 *
 * Stream descriptors produced by the metadata reader and consumed by the
 * track selectors.
 */

import type { MetadataUnavailableError } from '@autoencoder/core';

export type StreamKind = 'audio' | 'subtitle';

/**
 * One audio or text track of a source file.
 *
 * Snapshot of a single metadata read; never mutated.
 */
export interface StreamDescriptor {
  // 0-based position among tracks of the same kind
  index: number;
  kind: StreamKind;
  // Lower-cased language code as reported by MediaInfo (e.g. 'de'), null if unknown
  language: string | null;
  // Subtitle tracks only
  sizeBytes: number | null;
  // Fraction of the file occupied by this track, in [0, 1]; subtitle tracks only
  proportion: number | null;
  isDefaultFlagged: boolean;
  format?: string;
  title?: string;
}

export type MetadataReadResult =
  | {
      status: 'available';
      audio: readonly StreamDescriptor[];
      subtitles: readonly StreamDescriptor[];
    }
  | {
      status: 'unavailable';
      audio: readonly [];
      subtitles: readonly [];
      error: MetadataUnavailableError;
    };
