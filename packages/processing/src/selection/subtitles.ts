/**
 * Subtitle Track Selector
 *
 * Each rule fires at most once per file: the first stream (by index) that
 * satisfies a rule which has not fired yet takes that rule, and a stream takes
 * at most one rule. The result is ordered by rule priority, not by stream
 * position.
 */

import type { StreamDescriptor } from '@autoencoder/media';
import type { SelectedSubtitle, SubtitleRule, SubtitleRuleInput } from '../types.js';

export const PROPORTION_SCALE = 1000;

export function selectSubtitles(
  streams: readonly StreamDescriptor[],
  rules: readonly SubtitleRule[]
): SelectedSubtitle[] {
  const fired = new Array<boolean>(rules.length).fill(false);
  const selected: SelectedSubtitle[] = [];

  const ordered = [...streams].sort((a, b) => a.index - b.index);

  for (const stream of ordered) {
    const input = toRuleInput(stream);

    const ruleIndex = rules.findIndex((rule, i) => !fired[i] && rule.predicate(input));
    const rule = rules[ruleIndex];
    if (!rule) continue;

    fired[ruleIndex] = true;
    selected.push({
      streamIndex: stream.index + 1,
      ruleName: rule.name,
      isDefault: rule.forcedDefault,
      priority: rule.priority,
      language: stream.language,
    });
  }

  // Array.prototype.sort is stable, equal priorities keep stream order
  return selected.sort((a, b) => a.priority - b.priority);
}

export function toRuleInput(stream: StreamDescriptor): SubtitleRuleInput {
  return {
    language: stream.language,
    proportion: stream.proportion === null ? null : stream.proportion * PROPORTION_SCALE,
  };
}
