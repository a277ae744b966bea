import type { CrawlSummary } from '../../types.js';
import type { CrawlStats } from '../state/stats.js';

export function buildCrawlSummary(options: {
  stats: CrawlStats;
  startTime: number;
  now?: number;
}): CrawlSummary {
  const { stats, startTime, now = Date.now() } = options;

  return {
    urlsClaimed: stats.urlsClaimed,
    pagesRecorded: stats.pagesRecorded,
    pagesDiscarded: stats.pagesDiscarded,
    duplicatesSkipped: stats.duplicatesSkipped,
    linksExtracted: stats.linksExtracted,
    peakFrontierSize: stats.peakFrontierSize,
    peakInFlight: stats.peakInFlight,
    discardReasons: Object.fromEntries(stats.discardReasons.entries()),
    durationMs: now - startTime,
  };
}
