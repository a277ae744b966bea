import type { PriorityRuleset } from './crawler/priority/rules.js';

export type { PriorityRuleset };

/** Canonical page identity: no fragment, no query, no trailing slash. */
export type NormalizedUrl = string;

export interface PageRecord {
  url: NormalizedUrl;
  /** Calendar date of the successful fetch, `YYYY-MM-DD`. */
  lastModified: string;
  priority: number;
}

export type FetchOutcome =
  | { ok: true; status: number; html: string }
  | { ok: false; status: number | null; reason: string };

export type PageFetcher = (url: NormalizedUrl) => Promise<FetchOutcome>;

export interface CrawlOptions {
  startUrl: NormalizedUrl;
  domain: string;
  workers: number;
  maxInFlight: number;
  timeoutMs: number;
  exclusions: string[];
  priorityRules: PriorityRuleset;
  verifyTls: boolean;
  outputDir: string;
  quiet: boolean;
  logLevel: string;
}

export interface CrawlSummary {
  urlsClaimed: number;
  pagesRecorded: number;
  pagesDiscarded: number;
  duplicatesSkipped: number;
  linksExtracted: number;
  peakFrontierSize: number;
  peakInFlight: number;
  discardReasons: Record<string, number>;
  durationMs: number;
}

export interface CrawlHandlers {
  onProgress?(url: NormalizedUrl, visitedCount: number): void;
  onRecord?(record: PageRecord): void;
  onDiscard?(url: NormalizedUrl, reason: string): void;
  onComplete?(summary: CrawlSummary): void;
}

export interface ChangeSet {
  newUrls: NormalizedUrl[];
  removedUrls: NormalizedUrl[];
  updatedUrls: NormalizedUrl[];
  countDelta: number;
}

export interface SnapshotFiles {
  xmlPath: string;
  jsonPath: string;
  changesPath?: string;
}

export interface SitemapRunResult {
  summary: CrawlSummary;
  records: PageRecord[];
  files: SnapshotFiles;
  changes?: ChangeSet;
}

/** Everything a caller may supply; omitted fields take the built-in defaults. */
export interface SitemapConfig {
  startUrl: string;
  domain?: string;
  workers?: number;
  maxInFlight?: number;
  timeoutMs?: number;
  exclusions?: string[];
  priorityRules?: PriorityRuleset;
  verifyTls?: boolean;
  outputDir?: string;
  quiet?: boolean;
  logLevel?: string;
  handlers?: CrawlHandlers;
  fetcher?: PageFetcher;
  now?: () => Date;
}
