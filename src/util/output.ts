import type { ChangeSet, CrawlSummary, NormalizedUrl, SnapshotFiles } from '../types.js';

export interface RunReport {
  summary: CrawlSummary;
  totalUrls: number;
  files: SnapshotFiles;
  changes?: ChangeSet;
}

let quietMode = false;

export function setOutputConfig(config: { quiet: boolean }): void {
  quietMode = config.quiet;
}

export function resetOutputConfig(): void {
  setOutputConfig({ quiet: false });
}

export function writeProgress(url: NormalizedUrl, visitedCount: number): void {
  if (quietMode) {
    return;
  }

  process.stdout.write(`Crawling: ${url} (${visitedCount} URLs found)\n`);
}

export function writeRunReport(report: RunReport): void {
  process.stdout.write(renderRunReport(report));
}

export function logError(message: string): void {
  const payload = message.endsWith('\n') ? message : `${message}\n`;
  process.stderr.write(payload);
}

export function renderRunReport({ summary, totalUrls, files, changes }: RunReport): string {
  const lines: string[] = [
    '',
    `Crawl finished: ${summary.urlsClaimed} URLs visited, ${summary.pagesRecorded} recorded, ` +
      `${summary.pagesDiscarded} discarded in ${formatDuration(summary.durationMs)}`,
  ];

  if (changes) {
    lines.push(
      '',
      'Changes summary:',
      `  New URLs: ${changes.newUrls.length}`,
      `  Removed URLs: ${changes.removedUrls.length}`,
      `  URL count change: ${formatSigned(changes.countDelta)}`,
    );
  }

  lines.push('', 'Sitemaps saved:', `  XML: ${files.xmlPath}`, `  JSON: ${files.jsonPath}`);

  if (files.changesPath) {
    lines.push(`  Changes: ${files.changesPath}`);
  }

  lines.push(`  Total URLs: ${totalUrls}`);

  return `${lines.join('\n')}\n`;
}

export function formatSigned(value: number): string {
  return value >= 0 ? `+${value}` : String(value);
}

function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    return '0ms';
  }

  if (durationMs < 1_000) {
    return `${Math.round(durationMs)}ms`;
  }

  const seconds = durationMs / 1_000;
  if (seconds < 60) {
    const precision = seconds >= 10 ? 1 : 2;
    return `${seconds.toFixed(precision)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  const secondsPart =
    remainingSeconds >= 10 ? remainingSeconds.toFixed(0) : remainingSeconds.toFixed(1);
  return `${minutes}m ${secondsPart}s`;
}
