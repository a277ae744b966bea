import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { parsePriorityRuleset } from '../crawler/priority/rules.js';
import { createConfigurationError } from '../errors.js';
import type { SitemapConfig } from '../types.js';
import { isRecord, isStringArray } from '../util/guards.js';

export const DEFAULT_CONFIG_FILE = 'sitemap.config.json';

/** The subset of {@link SitemapConfig} that can live in a JSON file. */
export type FileConfig = Partial<Omit<SitemapConfig, 'handlers' | 'fetcher' | 'now'>>;

const STRING_FIELDS = ['startUrl', 'domain', 'outputDir', 'logLevel'] as const;
const NUMBER_FIELDS = ['workers', 'maxInFlight', 'timeoutMs'] as const;
const BOOLEAN_FIELDS = ['verifyTls', 'quiet'] as const;

const KNOWN_FIELDS = new Set<string>([
  ...STRING_FIELDS,
  ...NUMBER_FIELDS,
  ...BOOLEAN_FIELDS,
  'exclusions',
  'priorityRules',
]);

/**
 * Reads a JSON config file. A missing file is only an error when the caller named it
 * explicitly; the default location is optional.
 */
export async function loadConfigFile(
  configPath = DEFAULT_CONFIG_FILE,
  options: { required?: boolean } = {},
): Promise<FileConfig> {
  const full = path.resolve(configPath);

  if (!existsSync(full)) {
    if (options.required) {
      throw createConfigurationError(`Config file not found: ${configPath}`, { configPath: full });
    }
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(full, 'utf8'));
  } catch (error) {
    throw createConfigurationError(`Unable to read config file ${configPath}`, { configPath: full }, { cause: error });
  }

  return parseFileConfig(raw, configPath);
}

export function parseFileConfig(raw: unknown, source = DEFAULT_CONFIG_FILE): FileConfig {
  if (!isRecord(raw)) {
    throw createConfigurationError(`${source} must contain a JSON object.`, { source });
  }

  const unknownKeys = Object.keys(raw).filter((key) => !KNOWN_FIELDS.has(key));
  if (unknownKeys.length > 0) {
    throw createConfigurationError(`${source}: unknown option(s) ${unknownKeys.join(', ')}.`, {
      source,
      unknownKeys,
    });
  }

  const config: FileConfig = {};

  for (const field of STRING_FIELDS) {
    const value = raw[field];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== 'string') {
      throw createConfigurationError(`${source}: ${field} must be a string.`, { field, value });
    }
    config[field] = value;
  }

  for (const field of NUMBER_FIELDS) {
    const value = raw[field];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== 'number') {
      throw createConfigurationError(`${source}: ${field} must be a number.`, { field, value });
    }
    config[field] = value;
  }

  for (const field of BOOLEAN_FIELDS) {
    const value = raw[field];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== 'boolean') {
      throw createConfigurationError(`${source}: ${field} must be true or false.`, { field, value });
    }
    config[field] = value;
  }

  if (raw.exclusions !== undefined) {
    if (!isStringArray(raw.exclusions)) {
      throw createConfigurationError(`${source}: exclusions must be an array of strings.`, {
        value: raw.exclusions,
      });
    }
    config.exclusions = raw.exclusions;
  }

  if (raw.priorityRules !== undefined) {
    config.priorityRules = parsePriorityRuleset(raw.priorityRules, `${source}: priorityRules`);
  }

  return config;
}
