import pLimit from 'p-limit';

import { createInternalError, isCrawlerError, type CrawlerError } from '../errors.js';
import type {
  CrawlHandlers,
  CrawlSummary,
  FetchOutcome,
  NormalizedUrl,
  PageFetcher,
  PageRecord,
} from '../types.js';
import { reportCrawlerError } from '../util/errorHandler.js';
import { formatDate } from '../util/time.js';
import { createDefaultHandlers } from './handlers/defaultHandlers.js';
import { extractLinks } from './parsing/extractLinks.js';
import type { PriorityClassifier } from './priority/classifyPriority.js';
import { buildCrawlSummary } from './reporting/summary.js';
import { Frontier, VisitedSet } from './state/frontier.js';
import { SitemapStore } from './state/sitemapStore.js';
import { initializeStats, recordDiscard, recordFrontierSize, type CrawlStats } from './state/stats.js';
import type { CrawlFilter } from './url/crawlFilter.js';

export interface CrawlRuntimeOptions {
  startUrl: NormalizedUrl;
  /** Number of workers polling the frontier. */
  workers: number;
  /** Admission gate: fetches allowed in flight at once, whatever the worker count. */
  maxInFlight: number;
  filter: CrawlFilter;
  classify: PriorityClassifier;
  fetcher: PageFetcher;
  handlers?: CrawlHandlers;
  now?: () => Date;
}

export interface CrawlResult {
  store: SitemapStore;
  summary: CrawlSummary;
}

/**
 * Drives a pool of workers over one shared frontier until it drains.
 *
 * Workers never wait on an empty frontier; they exit. A worker that later enqueues links
 * tops the pool back up, so the run is over only once every worker has exited, which
 * cannot happen while a fetch is still in flight.
 */
class CrawlerEngine {
  private readonly frontier: Frontier;
  private readonly visited = new VisitedSet();
  private readonly store = new SitemapStore();
  private readonly stats: CrawlStats;
  private readonly gate: ReturnType<typeof pLimit>;
  private readonly workers = new Set<Promise<void>>();
  private readonly startTime = Date.now();
  private readonly now: () => Date;

  constructor(
    private readonly options: CrawlRuntimeOptions,
    private readonly handlers: CrawlHandlers,
  ) {
    this.frontier = new Frontier(options.startUrl);
    this.stats = initializeStats(this.frontier.pending);
    this.gate = pLimit(options.maxInFlight);
    this.now = options.now ?? (() => new Date());
  }

  async run(): Promise<CrawlResult> {
    this.spawnWorkers();
    while (this.workers.size > 0) {
      await Promise.allSettled([...this.workers]);
    }

    return {
      store: this.store,
      summary: buildCrawlSummary({ stats: this.stats, startTime: this.startTime }),
    };
  }

  // Each new worker dequeues synchronously before its first await, so this loop
  // never starts more workers than there are pending URLs.
  private spawnWorkers(): void {
    while (this.workers.size < this.options.workers && this.frontier.pending > 0) {
      const worker: Promise<void> = this.runWorker().finally(() => {
        this.workers.delete(worker);
      });
      this.workers.add(worker);
    }
  }

  private async runWorker(): Promise<void> {
    for (let url = this.frontier.dequeue(); url !== undefined; url = this.frontier.dequeue()) {
      if (!this.visited.claim(url)) {
        this.stats.duplicatesSkipped += 1;
        continue;
      }

      this.stats.urlsClaimed += 1;
      const visitedCount = this.visited.size;
      this.notify(url, () => this.handlers.onProgress?.(url, visitedCount));

      try {
        await this.processUrl(url);
      } catch (error) {
        this.reportFailure(error, url);
      }
    }
  }

  // Every claimed URL ends either recorded or discarded, never both: once the record is
  // stored, later failures are reported but leave the outcome alone.
  private async processUrl(url: NormalizedUrl): Promise<void> {
    const fetched = await this.fetchRecord(url);
    if (!fetched) {
      return;
    }

    this.store.record(fetched.record);
    this.stats.pagesRecorded += 1;
    this.notify(url, () => this.handlers.onRecord?.(fetched.record));

    try {
      this.enqueueLinks(fetched.html, url);
    } catch (error) {
      this.reportFailure(error, url);
    }
  }

  private async fetchRecord(url: NormalizedUrl): Promise<{ record: PageRecord; html: string } | undefined> {
    try {
      const outcome = await this.gate(() => this.fetchTracked(url));
      if (!outcome.ok) {
        this.discard(url, outcome.reason);
        return undefined;
      }

      const record: PageRecord = {
        url,
        lastModified: formatDate(this.now()),
        priority: this.options.classify(url),
      };
      return { record, html: outcome.html };
    } catch (error) {
      this.discard(url, this.reportFailure(error, url).message);
      return undefined;
    }
  }

  private enqueueLinks(html: string, url: NormalizedUrl): void {
    const { links } = extractLinks(html, url, this.options.filter);
    this.stats.linksExtracted += links.length;

    for (const link of links) {
      if (!this.visited.has(link)) {
        this.frontier.enqueue(link);
      }
    }

    recordFrontierSize(this.stats, this.frontier.pending);
    this.spawnWorkers();
  }

  private async fetchTracked(url: NormalizedUrl): Promise<FetchOutcome> {
    this.stats.inFlight += 1;
    this.stats.peakInFlight = Math.max(this.stats.peakInFlight, this.stats.inFlight);
    try {
      return await this.options.fetcher(url);
    } finally {
      this.stats.inFlight -= 1;
    }
  }

  private discard(url: NormalizedUrl, reason: string): void {
    recordDiscard(this.stats, reason);
    this.notify(url, () => this.handlers.onDiscard?.(url, reason));
  }

  /** A throwing hook is reported; the page keeps the outcome it already had. */
  private notify(url: NormalizedUrl, invoke: () => void): void {
    try {
      invoke();
    } catch (error) {
      this.reportFailure(error, url);
    }
  }

  private reportFailure(error: unknown, url: NormalizedUrl): CrawlerError {
    const crawlerError = isCrawlerError(error)
      ? error
      : createInternalError(
          error instanceof Error ? error.message : String(error),
          { url },
          { severity: 'recoverable', cause: error },
        );
    return reportCrawlerError(crawlerError, { stage: 'crawl', url }, { throwOnFatal: false });
  }
}

export async function crawl(options: CrawlRuntimeOptions): Promise<CrawlResult> {
  const handlers: CrawlHandlers = {
    ...createDefaultHandlers(),
    ...(options.handlers ?? {}),
  };

  const engine = new CrawlerEngine(options, handlers);
  const result = await engine.run();
  handlers.onComplete?.(result.summary);
  return result;
}
