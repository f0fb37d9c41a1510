/**
 * @autoencoder/media
 *
 * Media inspection layer.
 *
 * Responsibilities:
 * - Probe files with mediainfo
 * - Describe audio and text tracks for track selection
 * - Degrade to empty stream lists when a file cannot be inspected
 */

// Probing
export {
  MediaInfoProbe,
  type MediaInfoResult,
  type MediaInfoTrack,
} from './probes/mediainfo.js';

// Metadata reader
export {
  MetadataReader,
  readMetadata,
  parseMediaInfoStreams,
} from './metadataReader.js';

// Types
export type {
  StreamKind,
  StreamDescriptor,
  MetadataReadResult,
} from './types.js';
