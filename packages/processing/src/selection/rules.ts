/**
 * Subtitle Rule Table
 *
 * Rules are configuration records evaluated by one generic matcher, so a rule
 * set can be reordered or extended without touching the selector.
 */

import { z } from 'zod';
import { ValidationError } from '@autoencoder/core';
import type { SubtitleRule, SubtitleRuleDefinition, SubtitleRuleInput } from '../types.js';

export const subtitleRuleDefinitionSchema = z
  .object({
    name: z.string().min(1).regex(/^[^,]+$/, 'must not contain commas'),
    priority: z.number().int(),
    forcedDefault: z.boolean().default(false),
    language: z.string().min(1).transform(s => s.toLowerCase()).optional(),
    minProportion: z.number().min(0).optional(),
    maxProportion: z.number().positive().optional(),
  })
  .refine(
    rule => rule.minProportion === undefined
      || rule.maxProportion === undefined
      || rule.minProportion < rule.maxProportion,
    { message: 'minProportion must be below maxProportion' }
  );

export const subtitleRuleSetSchema = z
  .array(subtitleRuleDefinitionSchema)
  .refine(
    rules => new Set(rules.map(rule => rule.name)).size === rules.length,
    { message: 'rule names must be unique' }
  );

/**
 * Default rules for German PAL DVDs, proportions scaled by 1000:
 * a tiny German track only carries foreign-language dialogue, larger German
 * and English tracks are full subtitles.
 */
export const DEFAULT_SUBTITLE_RULE_DEFINITIONS: readonly SubtitleRuleDefinition[] = [
  {
    name: 'Fremdsprache',
    priority: 1,
    forcedDefault: true,
    language: 'de',
    maxProportion: 0.1,
  },
  {
    name: 'Deutsch',
    priority: 2,
    forcedDefault: false,
    language: 'de',
    maxProportion: 1,
  },
  {
    name: 'English',
    priority: 3,
    forcedDefault: false,
    language: 'en',
    maxProportion: 1,
  },
];

/**
 * Build the predicate for a rule definition.
 *
 * A definition with proportion bounds never matches a stream of unknown size.
 */
export function compileSubtitleRule(definition: SubtitleRuleDefinition): SubtitleRule {
  const { name, priority, forcedDefault, minProportion, maxProportion } = definition;
  const language = definition.language?.toLowerCase();
  const hasBounds = minProportion !== undefined || maxProportion !== undefined;

  const predicate = (input: SubtitleRuleInput): boolean => {
    if (language !== undefined && input.language !== language) {
      return false;
    }
    if (!hasBounds) {
      return true;
    }
    if (input.proportion === null) {
      return false;
    }
    if (minProportion !== undefined && input.proportion < minProportion) {
      return false;
    }
    if (maxProportion !== undefined && input.proportion >= maxProportion) {
      return false;
    }
    return true;
  };

  return { name, priority, forcedDefault, predicate };
}

/**
 * Compile a rule set, keeping its evaluation order
 */
export function compileSubtitleRules(definitions: readonly SubtitleRuleDefinition[]): SubtitleRule[] {
  const names = new Set<string>();
  for (const definition of definitions) {
    if (names.has(definition.name)) {
      throw new ValidationError('subtitleRules', `duplicate rule name "${definition.name}"`);
    }
    names.add(definition.name);
  }

  return definitions.map(compileSubtitleRule);
}

export const DEFAULT_SUBTITLE_RULES: readonly SubtitleRule[] =
  compileSubtitleRules(DEFAULT_SUBTITLE_RULE_DEFINITIONS);
