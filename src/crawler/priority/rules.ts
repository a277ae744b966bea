import { readFileSync } from 'node:fs';

import { createConfigurationError } from '../../errors.js';
import { isRecord, isStringArray } from '../../util/guards.js';

/** A single test against the lowercased URL path. */
export type PathCondition =
  | { equals: string[] }
  | { contains: string[] }
  | { startsWith: string }
  | { separators: number }
  | { deeperThan: number }
  | { excludes: string[] };

export interface PriorityRule {
  name: string;
  priority: number;
  /** Every condition must hold for the rule to match. */
  when: PathCondition[];
}

/**
 * Rules are checked in order and the first match wins, so an entry near the top
 * shadows any later rule that would also match the same path.
 */
export interface PriorityRuleset {
  defaultPriority: number;
  rules: PriorityRule[];
}

const DEFAULT_RULES_URL = new URL('../../../config/priority-rules.json', import.meta.url);

let defaultRuleset: PriorityRuleset | undefined;

export function loadDefaultRuleset(): PriorityRuleset {
  if (!defaultRuleset) {
    const raw: unknown = JSON.parse(readFileSync(DEFAULT_RULES_URL, 'utf8'));
    defaultRuleset = parsePriorityRuleset(raw, DEFAULT_RULES_URL.pathname);
  }

  return defaultRuleset;
}

export function parsePriorityRuleset(value: unknown, source = 'priority rules'): PriorityRuleset {
  if (!isRecord(value)) {
    throw createConfigurationError(`${source} must be an object.`, { source });
  }

  const defaultPriority = parsePriority(value.defaultPriority, `${source}: defaultPriority`);

  if (!Array.isArray(value.rules)) {
    throw createConfigurationError(`${source}: rules must be an array.`, { source });
  }

  const rules = value.rules.map((rule: unknown, index: number) =>
    parseRule(rule, `${source}: rules[${index}]`),
  );

  return { defaultPriority, rules };
}

function parseRule(value: unknown, label: string): PriorityRule {
  if (!isRecord(value)) {
    throw createConfigurationError(`${label} must be an object.`);
  }

  if (typeof value.name !== 'string' || value.name.length === 0) {
    throw createConfigurationError(`${label}: name must be a non-empty string.`);
  }

  const priority = parsePriority(value.priority, `${label}: priority`);

  if (!Array.isArray(value.when) || value.when.length === 0) {
    throw createConfigurationError(`${label}: when must be a non-empty array.`);
  }

  const when = value.when.map((condition: unknown, index: number) =>
    parseCondition(condition, `${label}.when[${index}]`),
  );

  return { name: value.name, priority, when };
}

function parseCondition(value: unknown, label: string): PathCondition {
  if (!isRecord(value)) {
    throw createConfigurationError(`${label} must be an object.`);
  }

  const keys = Object.keys(value);
  if (keys.length !== 1) {
    throw createConfigurationError(`${label} must have exactly one key.`, { keys });
  }

  if ('equals' in value) {
    return { equals: parseStringList(value.equals, `${label}.equals`) };
  }
  if ('contains' in value) {
    return { contains: parseStringList(value.contains, `${label}.contains`) };
  }
  if ('excludes' in value) {
    return { excludes: parseStringList(value.excludes, `${label}.excludes`) };
  }
  if ('startsWith' in value) {
    if (typeof value.startsWith !== 'string') {
      throw createConfigurationError(`${label}.startsWith must be a string.`);
    }
    return { startsWith: value.startsWith.toLowerCase() };
  }
  if ('separators' in value) {
    return { separators: parseCount(value.separators, `${label}.separators`) };
  }
  if ('deeperThan' in value) {
    return { deeperThan: parseCount(value.deeperThan, `${label}.deeperThan`) };
  }

  throw createConfigurationError(`${label}: unknown condition "${keys[0]}".`, { keys });
}

function parsePriority(value: unknown, label: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
    throw createConfigurationError(`${label} must be a number between 0 and 1.`, { value });
  }

  return value;
}

function parseCount(value: unknown, label: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw createConfigurationError(`${label} must be a non-negative integer.`, { value });
  }

  return value;
}

// Paths are lowercased before matching, so patterns are too.
function parseStringList(value: unknown, label: string): string[] {
  if (!isStringArray(value)) {
    throw createConfigurationError(`${label} must be an array of strings.`, { value });
  }

  return value.map((entry) => entry.toLowerCase());
}
