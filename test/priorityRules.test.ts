import { describe, expect, it } from 'vitest';

import { loadDefaultRuleset, parsePriorityRuleset } from '../src/crawler/priority/rules.js';
import { CrawlerError } from '../src/errors.js';

describe('loadDefaultRuleset', () => {
  it('loads the bundled ruleset in order', () => {
    const ruleset = loadDefaultRuleset();

    expect(ruleset.defaultPriority).toBe(0.51);
    expect(ruleset.rules).toHaveLength(18);
    expect(ruleset.rules[0]).toEqual({ name: 'root', priority: 1, when: [{ equals: ['/', ''] }] });
    expect(ruleset.rules.at(-1)?.name).toBe('deep-page');
  });
});

describe('parsePriorityRuleset', () => {
  it('lowercases path patterns', () => {
    const ruleset = parsePriorityRuleset({
      defaultPriority: 0.5,
      rules: [{ name: 'docs', priority: 0.7, when: [{ contains: ['/Docs/'] }, { startsWith: '/API' }] }],
    });

    expect(ruleset.rules[0]?.when).toEqual([{ contains: ['/docs/'] }, { startsWith: '/api' }]);
  });

  it('rejects priorities outside [0, 1]', () => {
    expect(() =>
      parsePriorityRuleset({ defaultPriority: 0.5, rules: [{ name: 'x', priority: 1.5, when: [{ equals: ['/'] }] }] }),
    ).toThrowError('priority rules: rules[0]: priority must be a number between 0 and 1.');
  });

  it('rejects unknown conditions as configuration errors', () => {
    let caught: unknown;
    try {
      parsePriorityRuleset({ defaultPriority: 0.5, rules: [{ name: 'x', priority: 0.5, when: [{ regex: '.*' }] }] });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CrawlerError);
    expect(caught).toMatchObject({ kind: 'config', severity: 'fatal' });
  });

  it('rejects conditions that combine several keys', () => {
    expect(() =>
      parsePriorityRuleset({
        defaultPriority: 0.5,
        rules: [{ name: 'x', priority: 0.5, when: [{ equals: ['/'], contains: ['/a'] }] }],
      }),
    ).toThrowError('priority rules: rules[0].when[0] must have exactly one key.');
  });

  it('rejects rules without conditions', () => {
    expect(() => parsePriorityRuleset({ defaultPriority: 0.5, rules: [{ name: 'x', priority: 0.5, when: [] }] })).toThrowError(
      'priority rules: rules[0]: when must be a non-empty array.',
    );
  });
});
