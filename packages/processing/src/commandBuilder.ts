/**
 * HandBrakeCLI Command Builder
 *
 * Fluent API for assembling HandBrakeCLI argument lists.
 *
 * Token order is fixed: input/output, baseline profile, audio selection,
 * subtitle selection. The binary itself is not part of the list.
 */

import type {
  DefaultSubtitleStrategy,
  SelectedAudioTrack,
  SelectedSubtitle,
} from './types.js';

export interface VideoOptions {
  encoder: 'x265' | 'x265_10bit' | 'x264' | 'x264_10bit' | 'svt_av1' | 'svt_av1_10bit';
  preset?: string;        // --encoder-preset
  profile?: string;       // --encoder-profile
  quality?: number;       // --quality (constant quality RF)
  vfr?: boolean;          // --vfr
  width?: number;         // --width
  height?: number;        // --height
  cropMode?: 'auto' | 'conservative' | 'none';
  autoAnamorphic?: boolean;
  sharpen?: {
    filter: 'lapsharp' | 'unsharp';
    preset?: string;      // --lapsharp=<preset>
    tune?: string;        // --lapsharp-tune <tune>
  };
  denoise?: {
    filter: 'hqdn3d' | 'nlmeans';
    preset: string;
  };
  extraArgs?: string[];
}

export interface AudioOptions {
  encoder: string;        // --aencoder, 'copy' for passthrough
  copyMask?: string[];    // --audio-copy-mask
  fallback?: string;      // --audio-fallback
  mixdown?: string;       // --mixdown
  quality?: number;       // --aq
  extraArgs?: string[];
}

export interface ContainerOptions {
  format: 'av_mkv' | 'av_mp4' | 'av_webm';
  nativeLanguage?: string; // --native-language (ISO 639-2)
  markers?: boolean;       // chapter markers
  multiPass?: boolean;
  turbo?: boolean;
  extraArgs?: string[];
}

/**
 * Fixed, non-computed part of an encode
 */
export interface EncodingProfile {
  name: string;
  description: string;
  video: VideoOptions;
  audio: AudioOptions;
  container: ContainerOptions;
}

export const DEFAULT_AUDIO_TRACK_NAMES: Readonly<Record<string, string>> = {
  de: 'Deutsch',
  en: 'English',
};

/**
 * Render a profile into its baseline tokens
 */
export function profileToArgs(profile: EncodingProfile): string[] {
  const args: string[] = [];
  const { video, audio, container } = profile;

  // Video
  args.push('--encoder', video.encoder);
  if (video.preset) args.push('--encoder-preset', video.preset);
  if (video.profile) args.push('--encoder-profile', video.profile);
  if (video.quality !== undefined) args.push('--quality', video.quality.toString());
  if (video.vfr) args.push('--vfr');
  if (video.width !== undefined) args.push('--width', video.width.toString());
  if (video.height !== undefined) args.push('--height', video.height.toString());
  if (video.cropMode) args.push('--crop-mode', video.cropMode);
  if (video.autoAnamorphic) args.push('--auto-anamorphic');
  if (video.sharpen) {
    const { filter, preset, tune } = video.sharpen;
    args.push(preset ? `--${filter}=${preset}` : `--${filter}`);
    if (tune) args.push(`--${filter}-tune`, tune);
  }
  if (video.denoise) {
    args.push(`--${video.denoise.filter}=${video.denoise.preset}`);
  }
  if (video.extraArgs) args.push(...video.extraArgs);

  // Audio
  args.push('--aencoder', audio.encoder);
  if (audio.copyMask && audio.copyMask.length > 0) {
    args.push('--audio-copy-mask', audio.copyMask.join(','));
  }
  if (audio.fallback) args.push('--audio-fallback', audio.fallback);
  if (audio.mixdown) args.push('--mixdown', audio.mixdown);
  if (audio.quality !== undefined) args.push('--aq', audio.quality.toString());
  if (audio.extraArgs) args.push(...audio.extraArgs);

  // Container
  if (container.nativeLanguage) args.push('--native-language', container.nativeLanguage);
  if (container.markers) args.push('--markers');
  if (container.multiPass) args.push('--multi-pass');
  if (container.turbo) args.push('--turbo');
  args.push('--format', container.format);
  if (container.extraArgs) args.push(...container.extraArgs);

  return args;
}

export class HandBrakeCommandBuilder {
  private inputFile: string = '';
  private outputFile: string = '';
  private profile: EncodingProfile | null = null;
  private audioTracks: SelectedAudioTrack[] = [];
  private audioNames: Readonly<Record<string, string>> = DEFAULT_AUDIO_TRACK_NAMES;
  private subtitles: SelectedSubtitle[] = [];
  private defaultSubtitle: DefaultSubtitleStrategy = 'first';

  /**
   * Set input file
   */
  setInput(file: string): this {
    this.inputFile = file;
    return this;
  }

  /**
   * Set output file
   */
  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Set the baseline encoding profile
   */
  setProfile(profile: EncodingProfile): this {
    this.profile = profile;
    return this;
  }

  /**
   * Select audio tracks; `names` maps language codes to display names
   */
  setAudioTracks(
    tracks: readonly SelectedAudioTrack[],
    names: Readonly<Record<string, string>> = DEFAULT_AUDIO_TRACK_NAMES
  ): this {
    this.audioTracks = [...tracks];
    this.audioNames = names;
    return this;
  }

  /**
   * Select subtitle tracks, already in output order
   */
  setSubtitles(
    subtitles: readonly SelectedSubtitle[],
    defaultSubtitle: DefaultSubtitleStrategy = 'first'
  ): this {
    this.subtitles = [...subtitles];
    this.defaultSubtitle = defaultSubtitle;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    if (!this.inputFile) {
      throw new Error('Input file not specified');
    }
    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    if (!this.profile) {
      throw new Error('Encoding profile not specified');
    }

    const args: string[] = ['--input', this.inputFile, '--output', this.outputFile];

    args.push(...profileToArgs(this.profile));
    args.push(...this.buildAudioArgs());
    args.push(...this.buildSubtitleArgs());

    return args;
  }

  private buildAudioArgs(): string[] {
    if (this.audioTracks.length === 0) {
      return [];
    }

    const indices = this.audioTracks.map(track => track.streamIndex.toString());
    const names = this.audioTracks.map(track => this.audioNames[track.language] ?? track.language);

    return ['--audio', indices.join(','), '--aname', names.join(',')];
  }

  private buildSubtitleArgs(): string[] {
    if (this.subtitles.length === 0) {
      return [];
    }

    const args = [
      '--subtitle-burned=none',
      '--subtitle', this.subtitles.map(s => s.streamIndex.toString()).join(','),
      '--subname', this.subtitles.map(s => s.ruleName).join(','),
    ];

    const defaultTrack = this.defaultSubtitle === 'forced'
      ? this.subtitles.find(s => s.isDefault)
      : this.subtitles[0];

    if (defaultTrack) {
      args.push('--subtitle-default', defaultTrack.streamIndex.toString());
    }

    return args;
  }
}

export interface BuildCommandInput {
  inputPath: string;
  outputPath: string;
  audio: readonly SelectedAudioTrack[];
  subtitles: readonly SelectedSubtitle[];
  profile: EncodingProfile;
  audioTrackNames?: Readonly<Record<string, string>>;
  defaultSubtitle?: DefaultSubtitleStrategy;
}

/**
 * Assemble the full HandBrakeCLI argument list for one file
 */
export function buildCommand(input: BuildCommandInput): string[] {
  return new HandBrakeCommandBuilder()
    .setInput(input.inputPath)
    .setOutput(input.outputPath)
    .setProfile(input.profile)
    .setAudioTracks(input.audio, input.audioTrackNames)
    .setSubtitles(input.subtitles, input.defaultSubtitle)
    .build();
}
