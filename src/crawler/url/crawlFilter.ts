import type { NormalizedUrl } from '../../types.js';

export const DEFAULT_EXCLUSIONS: readonly string[] = [
  '.pdf',
  '.jpg',
  '.png',
  '.gif',
  '.zip',
  '.svg',
  '.webp',
  '.ico',
  '.ttf',
  '.woff',
  '.jpeg',
  '.mp4',
  '.mp3',
  '.mov',
  '/search',
  '/login',
  '/admin',
];

export interface CrawlFilterRules {
  domain: string;
  exclusions: readonly string[];
}

export type CrawlFilter = (url: NormalizedUrl) => boolean;

/**
 * Exclusions are plain substrings of the lowercased URL, so `/admin` also rejects
 * `/administration`. Callers pass URLs that are already normalized.
 */
export function shouldCrawl(url: NormalizedUrl, rules: CrawlFilterRules): boolean {
  const host = hostOf(url);
  if (!host || host !== hostOf(rules.domain)) {
    return false;
  }

  const lowered = url.toLowerCase();
  return !rules.exclusions.some((pattern) => lowered.includes(pattern.toLowerCase()));
}

export function createCrawlFilter(rules: CrawlFilterRules): CrawlFilter {
  return (url) => shouldCrawl(url, rules);
}

function hostOf(value: string): string | undefined {
  try {
    return new URL(value).host || undefined;
  } catch {
    return undefined;
  }
}
