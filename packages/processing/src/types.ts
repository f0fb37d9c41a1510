/**
 * Processing Types
 */

/**
 * What a subtitle rule predicate sees of a stream
 */
export interface SubtitleRuleInput {
  language: string | null;
  // Stream size proportion scaled by 1000, null if unknown
  proportion: number | null;
}

export interface SubtitleRule {
  // Unique; also the track name written into the output
  name: string;
  // Lower sorts first in the output
  priority: number;
  forcedDefault: boolean;
  predicate: (input: SubtitleRuleInput) => boolean;
}

/**
 * Data-only form of a subtitle rule, as found in configuration files
 */
export interface SubtitleRuleDefinition {
  name: string;
  priority: number;
  forcedDefault: boolean;
  language?: string;
  // Bounds on the scaled proportion: min inclusive, max exclusive
  minProportion?: number;
  maxProportion?: number;
}

export interface SelectedSubtitle {
  // 1-based track number for the encoder
  streamIndex: number;
  ruleName: string;
  isDefault: boolean;
  priority: number;
  language: string | null;
}

export interface SelectedAudioTrack {
  // 1-based track number for the encoder
  streamIndex: number;
  language: string;
}

/**
 * Which selected subtitle the `--subtitle-default` directive names:
 * - first: the first entry of the priority-sorted selection
 * - forced: the first entry whose rule has forcedDefault, none if no such entry
 */
export type DefaultSubtitleStrategy = 'first' | 'forced';
