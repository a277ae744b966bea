import { afterEach, describe, expect, it, vi } from 'vitest';

import type { CrawlSummary } from '../src/types.js';
import {
  formatSigned,
  logError,
  renderRunReport,
  resetOutputConfig,
  setOutputConfig,
  writeProgress,
} from '../src/util/output.js';

const summary: CrawlSummary = {
  urlsClaimed: 12,
  pagesRecorded: 10,
  pagesDiscarded: 2,
  duplicatesSkipped: 30,
  linksExtracted: 80,
  peakFrontierSize: 9,
  peakInFlight: 5,
  discardReasons: { 'HTTP 404': 2 },
  durationMs: 1_250,
};

afterEach(() => {
  resetOutputConfig();
  vi.restoreAllMocks();
});

describe('writeProgress', () => {
  it('prints one line per page on stdout', () => {
    const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    writeProgress('https://x.io/docs', 3);

    expect(stdoutSpy).toHaveBeenCalledWith('Crawling: https://x.io/docs (3 URLs found)\n');
  });

  it('stays silent in quiet mode', () => {
    const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    setOutputConfig({ quiet: true });

    writeProgress('https://x.io/docs', 3);

    expect(stdoutSpy).not.toHaveBeenCalled();
  });
});

describe('logError', () => {
  it('writes to stderr with a trailing newline', () => {
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    logError('Error: Start URL must be on the crawl domain.');

    expect(stderrSpy).toHaveBeenCalledWith('Error: Start URL must be on the crawl domain.\n');
  });
});

describe('renderRunReport', () => {
  it('lists the saved files for a first run', () => {
    const report = renderRunReport({
      summary,
      totalUrls: 10,
      files: { xmlPath: 'out/sitemap.xml', jsonPath: 'out/sitemap_20261019_080503.json' },
    });

    expect(report).toBe(
      [
        '',
        'Crawl finished: 12 URLs visited, 10 recorded, 2 discarded in 1.25s',
        '',
        'Sitemaps saved:',
        '  XML: out/sitemap.xml',
        '  JSON: out/sitemap_20261019_080503.json',
        '  Total URLs: 10',
        '',
      ].join('\n'),
    );
  });

  it('adds the change summary when a previous snapshot existed', () => {
    const report = renderRunReport({
      summary: { ...summary, durationMs: 420 },
      totalUrls: 10,
      files: {
        xmlPath: 'out/sitemap.xml',
        jsonPath: 'out/sitemap_20261019_080503.json',
        changesPath: 'out/changes_20261019_080503.json',
      },
      changes: {
        newUrls: ['https://x.io/new'],
        removedUrls: ['https://x.io/old-1', 'https://x.io/old-2'],
        updatedUrls: [],
        countDelta: -1,
      },
    });

    expect(report.split('\n')).toEqual([
      '',
      'Crawl finished: 12 URLs visited, 10 recorded, 2 discarded in 420ms',
      '',
      'Changes summary:',
      '  New URLs: 1',
      '  Removed URLs: 2',
      '  URL count change: -1',
      '',
      'Sitemaps saved:',
      '  XML: out/sitemap.xml',
      '  JSON: out/sitemap_20261019_080503.json',
      '  Changes: out/changes_20261019_080503.json',
      '  Total URLs: 10',
      '',
    ]);
  });
});

describe('formatSigned', () => {
  it('always shows the sign of the delta', () => {
    expect(formatSigned(3)).toBe('+3');
    expect(formatSigned(0)).toBe('+0');
    expect(formatSigned(-2)).toBe('-2');
  });
});
