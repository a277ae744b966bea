import { crawl } from './crawler/crawl.js';
import { createHtmlFetcher } from './crawler/network/fetchPage.js';
import { createPriorityClassifier } from './crawler/priority/classifyPriority.js';
import { loadDefaultRuleset } from './crawler/priority/rules.js';
import { createCrawlFilter, DEFAULT_EXCLUSIONS } from './crawler/url/crawlFilter.js';
import { normalizeUrl } from './crawler/url/normalizeUrl.js';
import { createConfigurationError } from './errors.js';
import { configureLogger } from './logger.js';
import { writeSnapshots } from './snapshot/writeSnapshots.js';
import type {
  ChangeSet,
  CrawlHandlers,
  CrawlOptions,
  CrawlSummary,
  PageFetcher,
  PageRecord,
  PriorityRuleset,
  SitemapConfig,
  SitemapRunResult,
} from './types.js';
import { resetOutputConfig, setOutputConfig, writeRunReport } from './util/output.js';

const DEFAULT_OPTIONS = {
  workers: 10,
  maxInFlight: 5,
  timeoutMs: 10_000,
  outputDir: 'sitemaps',
  verifyTls: false,
  quiet: false,
  logLevel: 'silent',
} as const;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Crawls the site, writes the sitemap files into the output directory and prints the run
 * report. Configuration problems and unwritable output are fatal; page failures are not.
 */
export async function generateSitemap(config: SitemapConfig): Promise<SitemapRunResult> {
  const options = resolveOptions(config);

  if (config.logLevel !== undefined) {
    configureLogger({ level: options.logLevel });
  }
  setOutputConfig({ quiet: options.quiet });

  const { fetch: fetcher, close } = config.fetcher
    ? { fetch: config.fetcher, close: async (): Promise<void> => undefined }
    : createHtmlFetcher({ timeoutMs: options.timeoutMs, verifyTls: options.verifyTls });

  try {
    const { store, summary } = await crawl({
      startUrl: options.startUrl,
      workers: options.workers,
      maxInFlight: options.maxInFlight,
      filter: createCrawlFilter({ domain: options.domain, exclusions: options.exclusions }),
      classify: createPriorityClassifier(options.priorityRules),
      fetcher,
      handlers: config.handlers,
      now: config.now,
    });

    const records = store.entries();
    const { files, changes } = await writeSnapshots({
      records,
      outputDir: options.outputDir,
      now: config.now?.(),
    });

    writeRunReport({ summary, totalUrls: records.length, files, changes });

    return { summary, records, files, changes };
  } finally {
    resetOutputConfig();
    await close();
  }
}

export function resolveOptions(config: SitemapConfig): CrawlOptions {
  const start = validateHttpUrl(config.startUrl, 'Start URL');
  const domain = validateHttpUrl(config.domain ?? start.origin, 'Domain');

  if (start.protocol !== domain.protocol || start.host !== domain.host) {
    throw createConfigurationError('Start URL must be on the crawl domain.', {
      startUrl: start.href,
      domain: domain.href,
    });
  }

  return {
    startUrl: normalizeUrl(start.href),
    domain: domain.href,
    workers: coercePositiveInteger(config.workers ?? DEFAULT_OPTIONS.workers, 'workers'),
    maxInFlight: coercePositiveInteger(
      config.maxInFlight ?? DEFAULT_OPTIONS.maxInFlight,
      'max-in-flight',
    ),
    timeoutMs: coercePositiveInteger(config.timeoutMs ?? DEFAULT_OPTIONS.timeoutMs, 'timeout-ms'),
    exclusions: [...(config.exclusions ?? DEFAULT_EXCLUSIONS)],
    priorityRules: config.priorityRules ?? loadDefaultRuleset(),
    verifyTls: config.verifyTls ?? DEFAULT_OPTIONS.verifyTls,
    outputDir: resolveOutputDir(config.outputDir),
    quiet: config.quiet ?? DEFAULT_OPTIONS.quiet,
    logLevel: resolveLogLevel(config.logLevel),
  };
}

function resolveLogLevel(value: string | undefined): string {
  const level = value ?? DEFAULT_OPTIONS.logLevel;
  if (!LOG_LEVELS.includes(level)) {
    throw createConfigurationError(`log-level must be one of ${LOG_LEVELS.join(', ')}.`, { value });
  }
  return level;
}

function validateHttpUrl(value: string, label: string): URL {
  let url: URL;

  try {
    url = new URL(value);
  } catch {
    throw createConfigurationError(`Invalid URL: ${value}`, { [label]: value });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw createConfigurationError(`${label} must use http or https protocol.`, {
      protocol: url.protocol,
      url: value,
    });
  }

  return url;
}

function resolveOutputDir(value: string | undefined): string {
  const outputDir = value ?? DEFAULT_OPTIONS.outputDir;
  if (outputDir.trim().length === 0) {
    throw createConfigurationError('output-dir must not be empty.');
  }
  return outputDir;
}

function coercePositiveInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 1) {
    throw createConfigurationError(`${field} must be a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

export { crawl } from './crawler/crawl.js';
export { fetchPage, createHtmlFetcher } from './crawler/network/fetchPage.js';
export { extractLinks } from './crawler/parsing/extractLinks.js';
export { classifyPriority, createPriorityClassifier } from './crawler/priority/classifyPriority.js';
export { loadDefaultRuleset, parsePriorityRuleset } from './crawler/priority/rules.js';
export { SitemapStore } from './crawler/state/sitemapStore.js';
export { createCrawlFilter, DEFAULT_EXCLUSIONS, shouldCrawl } from './crawler/url/crawlFilter.js';
export { normalizeUrl } from './crawler/url/normalizeUrl.js';
export { computeChangeSet } from './snapshot/changeSet.js';
export { renderSitemapXml } from './snapshot/xmlSitemap.js';
export { writeSnapshots } from './snapshot/writeSnapshots.js';
export { CrawlerError } from './errors.js';

export type {
  ChangeSet,
  CrawlHandlers,
  CrawlOptions,
  CrawlSummary,
  PageFetcher,
  PageRecord,
  PriorityRuleset,
  SitemapConfig,
  SitemapRunResult,
};
