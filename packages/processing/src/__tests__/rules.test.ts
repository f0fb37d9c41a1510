import { describe, it, expect } from 'vitest';
import { ValidationError } from '@autoencoder/core';
import {
  DEFAULT_SUBTITLE_RULE_DEFINITIONS,
  compileSubtitleRule,
  compileSubtitleRules,
  subtitleRuleSetSchema,
} from '../selection/rules.js';

describe('compileSubtitleRule', () => {
  const bounded = compileSubtitleRule({
    name: 'Small',
    priority: 1,
    forcedDefault: false,
    language: 'DE',
    minProportion: 0.1,
    maxProportion: 1,
  });

  it('matches the language case-insensitively from the definition', () => {
    expect(bounded.predicate({ language: 'de', proportion: 0.5 })).toBe(true);
    expect(bounded.predicate({ language: 'en', proportion: 0.5 })).toBe(false);
  });

  it('treats the lower bound as inclusive and the upper bound as exclusive', () => {
    expect(bounded.predicate({ language: 'de', proportion: 0.1 })).toBe(true);
    expect(bounded.predicate({ language: 'de', proportion: 0.09 })).toBe(false);
    expect(bounded.predicate({ language: 'de', proportion: 1 })).toBe(false);
  });

  it('rejects an unknown proportion when bounds are set', () => {
    expect(bounded.predicate({ language: 'de', proportion: null })).toBe(false);
  });

  it('accepts any proportion when no bounds are set', () => {
    const rule = compileSubtitleRule({ name: 'Any', priority: 1, forcedDefault: true });

    expect(rule.predicate({ language: null, proportion: null })).toBe(true);
    expect(rule.forcedDefault).toBe(true);
  });
});

describe('compileSubtitleRules', () => {
  it('keeps the evaluation order of the definitions', () => {
    const rules = compileSubtitleRules(DEFAULT_SUBTITLE_RULE_DEFINITIONS);

    expect(rules.map(rule => rule.name)).toEqual(['Fremdsprache', 'Deutsch', 'English']);
    expect(rules.map(rule => rule.priority)).toEqual([1, 2, 3]);
  });

  it('rejects duplicate rule names', () => {
    const definition = { name: 'Deutsch', priority: 1, forcedDefault: false };

    expect(() => compileSubtitleRules([definition, { ...definition, priority: 2 }])).toThrow(ValidationError);
  });
});

describe('subtitleRuleSetSchema', () => {
  it('fills in forcedDefault and lower-cases the language', () => {
    const parsed = subtitleRuleSetSchema.parse([{ name: 'English', priority: 3, language: 'EN', maxProportion: 1 }]);

    expect(parsed).toEqual([
      { name: 'English', priority: 3, forcedDefault: false, language: 'en', maxProportion: 1 },
    ]);
  });

  it('rejects names containing commas', () => {
    expect(subtitleRuleSetSchema.safeParse([{ name: 'a,b', priority: 1 }]).success).toBe(false);
  });

  it('rejects inverted bounds', () => {
    const result = subtitleRuleSetSchema.safeParse([
      { name: 'Bad', priority: 1, minProportion: 2, maxProportion: 1 },
    ]);

    expect(result.success).toBe(false);
  });

  it('rejects duplicate names', () => {
    const result = subtitleRuleSetSchema.safeParse([
      { name: 'Same', priority: 1 },
      { name: 'Same', priority: 2 },
    ]);

    expect(result.success).toBe(false);
  });
});
