import type { NormalizedUrl } from '../../types.js';
import type { PathCondition, PriorityRule, PriorityRuleset } from './rules.js';

export type PriorityClassifier = (url: NormalizedUrl) => number;

export function classifyPriority(url: NormalizedUrl, ruleset: PriorityRuleset): number {
  const path = pathOf(url);
  if (path === undefined) {
    return ruleset.defaultPriority;
  }

  const rule = findMatchingRule(path, ruleset.rules);
  return rule ? rule.priority : ruleset.defaultPriority;
}

export function createPriorityClassifier(ruleset: PriorityRuleset): PriorityClassifier {
  return (url) => classifyPriority(url, ruleset);
}

export function findMatchingRule(path: string, rules: PriorityRule[]): PriorityRule | undefined {
  return rules.find((rule) => rule.when.every((condition) => matchesCondition(path, condition)));
}

function matchesCondition(path: string, condition: PathCondition): boolean {
  if ('equals' in condition) {
    return condition.equals.includes(path);
  }
  if ('contains' in condition) {
    return condition.contains.some((marker) => path.includes(marker));
  }
  if ('excludes' in condition) {
    return !condition.excludes.some((marker) => path.includes(marker));
  }
  if ('startsWith' in condition) {
    return path.startsWith(condition.startsWith);
  }
  if ('separators' in condition) {
    return countSeparators(path) === condition.separators;
  }
  return countSeparators(path) > condition.deeperThan;
}

function countSeparators(path: string): number {
  let count = 0;
  for (const char of path) {
    if (char === '/') {
      count += 1;
    }
  }
  return count;
}

function pathOf(url: NormalizedUrl): string | undefined {
  try {
    return new URL(url).pathname.toLowerCase();
  } catch {
    return undefined;
  }
}
