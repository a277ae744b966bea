import { ensureCrawlerError, type CrawlerError } from '../../errors.js';
import { getLogger } from '../../logger.js';
import type { NormalizedUrl } from '../../types.js';
import type { CrawlFilter } from '../url/crawlFilter.js';
import { normalizeUrl } from '../url/normalizeUrl.js';
import { parseLinks } from './parseLinks.js';

export interface ExtractResult {
  links: NormalizedUrl[];
  error?: CrawlerError;
}

/**
 * Resolves every href on the page against `sourceUrl`, normalizes it and keeps the ones the
 * filter accepts. An href that cannot be resolved is skipped on its own; a document that
 * cannot be parsed at all yields no links and a recoverable parse error.
 */
export function extractLinks(html: string, sourceUrl: NormalizedUrl, filter: CrawlFilter): ExtractResult {
  let hrefs: string[];
  try {
    hrefs = parseLinks(html);
  } catch (error) {
    const crawlerError = ensureCrawlerError(error, {
      kind: 'parse',
      severity: 'recoverable',
      details: { url: sourceUrl },
    });
    getLogger().debug({ err: crawlerError, url: sourceUrl }, 'link extraction failed');
    return { links: [], error: crawlerError };
  }

  const links = new Set<NormalizedUrl>();
  for (const href of hrefs) {
    const absolute = resolveHref(href, sourceUrl);
    if (!absolute) {
      continue;
    }

    const normalized = normalizeUrl(absolute);
    if (filter(normalized)) {
      links.add(normalized);
    }
  }

  return { links: [...links] };
}

function resolveHref(href: string, base: string): string | undefined {
  try {
    return new URL(href, base).href;
  } catch {
    return undefined;
  }
}
