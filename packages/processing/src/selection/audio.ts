/**
 * Audio Track Selector
 *
 * Picks at most one audio track per preferred language, in preference order.
 */

import type { StreamDescriptor } from '@autoencoder/media';
import type { SelectedAudioTrack } from '../types.js';

export const DEFAULT_LANGUAGES: readonly string[] = ['de', 'en'];

/**
 * Select the first audio track of each preferred language.
 *
 * Languages without a match are skipped; a language listed twice is only
 * selected once.
 */
export function selectAudioTracks(
  streams: readonly StreamDescriptor[],
  preference: readonly string[] = DEFAULT_LANGUAGES
): SelectedAudioTrack[] {
  const ordered = [...streams].sort((a, b) => a.index - b.index);
  const selected: SelectedAudioTrack[] = [];
  const seen = new Set<string>();

  for (const language of preference) {
    if (seen.has(language)) continue;
    seen.add(language);

    const match = ordered.find(stream => stream.language === language);
    if (match) {
      selected.push({ streamIndex: match.index + 1, language });
    }
  }

  return selected;
}

/**
 * 1-based indices of the selected audio tracks, in preference order
 */
export function selectAudio(
  streams: readonly StreamDescriptor[],
  preference: readonly string[] = DEFAULT_LANGUAGES
): number[] {
  return selectAudioTracks(streams, preference).map(track => track.streamIndex);
}
