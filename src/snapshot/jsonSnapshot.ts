import { readFile } from 'node:fs/promises';

import { createOutputError } from '../errors.js';
import type { NormalizedUrl, PageRecord } from '../types.js';
import { isRecord } from '../util/guards.js';

export interface SnapshotDocument {
  generated_at: string;
  total_urls: number;
  urls: Record<NormalizedUrl, { lastmod: string; priority: number }>;
}

export function buildSnapshotDocument(records: readonly PageRecord[], generatedAt: Date): SnapshotDocument {
  const sorted = [...records].sort((a, b) => (a.url < b.url ? -1 : a.url > b.url ? 1 : 0));
  const urls: SnapshotDocument['urls'] = {};
  for (const record of sorted) {
    urls[record.url] = { lastmod: record.lastModified, priority: record.priority };
  }

  return {
    generated_at: generatedAt.toISOString(),
    total_urls: sorted.length,
    urls,
  };
}

export function renderJsonSnapshot(records: readonly PageRecord[], generatedAt: Date): string {
  return JSON.stringify(buildSnapshotDocument(records, generatedAt), null, 2);
}

/** URL keys of a snapshot written by an earlier run. Only the `urls` object is required. */
export async function readSnapshotUrls(path: string): Promise<NormalizedUrl[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw createOutputError(
      `Unable to read previous snapshot ${path}`,
      { path },
      { severity: 'recoverable', cause: error },
    );
  }

  if (!isRecord(parsed) || !isRecord(parsed.urls)) {
    throw createOutputError(
      `Previous snapshot ${path} has no "urls" object`,
      { path },
      { severity: 'recoverable' },
    );
  }

  return Object.keys(parsed.urls);
}
