/**
 * @autoencoder/processing
 *
 * Track selection, HandBrake command assembly and the batch loop.
 *
 * Rules:
 * - Selection and command assembly are pure; only the runner and the batch
 *   loop touch the outside world
 * - Subtitle rules are data, evaluated by one generic matcher
 * - Files are encoded one at a time
 */

// Types
export type {
  SubtitleRule,
  SubtitleRuleInput,
  SubtitleRuleDefinition,
  SelectedSubtitle,
  SelectedAudioTrack,
  DefaultSubtitleStrategy,
} from './types.js';

// Track selection
export { selectAudio, selectAudioTracks, DEFAULT_LANGUAGES } from './selection/audio.js';
export { selectSubtitles, toRuleInput, PROPORTION_SCALE } from './selection/subtitles.js';
export {
  compileSubtitleRule,
  compileSubtitleRules,
  subtitleRuleDefinitionSchema,
  subtitleRuleSetSchema,
  DEFAULT_SUBTITLE_RULE_DEFINITIONS,
  DEFAULT_SUBTITLE_RULES,
} from './selection/rules.js';

// Command Builder
export {
  HandBrakeCommandBuilder,
  buildCommand,
  profileToArgs,
  DEFAULT_AUDIO_TRACK_NAMES,
  type BuildCommandInput,
  type EncodingProfile,
  type VideoOptions,
  type AudioOptions,
  type ContainerOptions,
} from './commandBuilder.js';

// Encoding Presets
export {
  PRESETS,
  DEFAULT_PRESET,
  getPreset,
  listPresets,
} from './presets.js';

// HandBrake runner
export {
  HandBrakeRunner,
  type Encoder,
  type EncodeOutcome,
  type HandBrakeRunnerOptions,
} from './handbrake.js';

// Batch loop
export {
  BatchProcessor,
  type BatchProcessorConfig,
  type BatchProcessorDeps,
  type MetadataSource,
  type EncodePlan,
  type FileOutcome,
  type BatchSummary,
} from './batchProcessor.js';
