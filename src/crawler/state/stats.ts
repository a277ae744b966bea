export interface CrawlStats {
  urlsClaimed: number;
  pagesRecorded: number;
  pagesDiscarded: number;
  duplicatesSkipped: number;
  linksExtracted: number;
  peakFrontierSize: number;
  inFlight: number;
  peakInFlight: number;
  discardReasons: Map<string, number>;
}

export function initializeStats(initialFrontierSize: number): CrawlStats {
  return {
    urlsClaimed: 0,
    pagesRecorded: 0,
    pagesDiscarded: 0,
    duplicatesSkipped: 0,
    linksExtracted: 0,
    peakFrontierSize: initialFrontierSize,
    inFlight: 0,
    peakInFlight: 0,
    discardReasons: new Map<string, number>(),
  };
}

export function recordDiscard(stats: CrawlStats, reason: string): void {
  stats.pagesDiscarded += 1;
  const current = stats.discardReasons.get(reason) ?? 0;
  stats.discardReasons.set(reason, current + 1);
}

export function recordFrontierSize(stats: CrawlStats, pending: number): void {
  stats.peakFrontierSize = Math.max(stats.peakFrontierSize, pending);
}
