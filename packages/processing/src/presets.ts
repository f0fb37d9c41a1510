/**
 * Encoding Presets
 *
 * Baseline HandBrake profiles for PAL DVD sources (720x576, interlaced-era
 * grain, AC3/DTS audio).
 */

import { ValidationError } from '@autoencoder/core';
import type { EncodingProfile } from './commandBuilder.js';

export const PRESETS: Readonly<Record<string, EncodingProfile>> = {
  'pal-dvd': {
    name: 'PAL DVD',
    description: 'x265 10-bit RF 17.5, light sharpen and denoise, audio passthrough.',
    video: {
      encoder: 'x265',
      preset: 'medium',
      profile: 'main10',
      quality: 17.5,
      vfr: true,
      cropMode: 'auto',
      autoAnamorphic: true,
      sharpen: { filter: 'lapsharp', preset: 'light' },
      denoise: { filter: 'hqdn3d', preset: 'light' },
    },
    audio: {
      encoder: 'copy',
      copyMask: ['ac3', 'aac', 'eac3', 'truehd', 'dts', 'dtshd', 'flac'],
      fallback: 'av_aac',
    },
    container: {
      format: 'av_mkv',
      nativeLanguage: 'deu',
      markers: true,
      turbo: true,
    },
  },

  'pal-dvd-stereo': {
    name: 'PAL DVD Stereo',
    description: 'x265 10-bit RF 17 at 720x576, AAC Dolby Pro Logic downmix, multi-pass.',
    video: {
      encoder: 'x265',
      preset: 'medium',
      profile: 'main10',
      quality: 17,
      vfr: true,
      width: 720,
      height: 576,
      autoAnamorphic: true,
      sharpen: { filter: 'unsharp', tune: 'fine' },
      denoise: { filter: 'hqdn3d', preset: 'light' },
    },
    audio: {
      encoder: 'av_aac',
      mixdown: 'dpl1',
      quality: 5,
    },
    container: {
      format: 'av_mkv',
      markers: true,
      multiPass: true,
      turbo: true,
    },
  },
};

export const DEFAULT_PRESET = 'pal-dvd';

/**
 * Get a preset by name
 */
export function getPreset(name: string): EncodingProfile {
  const preset = PRESETS[name];
  if (!preset) {
    throw new ValidationError(
      'preset',
      `unknown preset "${name}" (available: ${listPresets().join(', ')})`
    );
  }
  return preset;
}

export function listPresets(): string[] {
  return Object.keys(PRESETS);
}
