import { mkdir, readdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { createOutputError, isCrawlerError } from '../errors.js';
import { getLogger } from '../logger.js';
import type { ChangeSet, PageRecord, SnapshotFiles } from '../types.js';
import { reportCrawlerError } from '../util/errorHandler.js';
import { formatTimestamp } from '../util/time.js';
import { computeChangeSet, toChangesDocument } from './changeSet.js';
import { readSnapshotUrls, renderJsonSnapshot } from './jsonSnapshot.js';
import { renderSitemapXml } from './xmlSitemap.js';

export const SITEMAP_XML_FILE = 'sitemap.xml';

const SNAPSHOT_PATTERN = /^sitemap_(\d{8}_\d{6})(?:_(\d+))?\.json$/;

export interface WriteSnapshotsOptions {
  records: readonly PageRecord[];
  outputDir: string;
  now?: Date;
}

export interface WriteSnapshotsResult {
  files: SnapshotFiles;
  changes?: ChangeSet;
}

interface SnapshotName {
  file: string;
  stamp: string;
  sequence: number;
}

/**
 * Writes `sitemap.xml`, a new timestamped JSON snapshot and, when an older snapshot sits
 * in the same directory, a change log against the newest of those.
 */
export async function writeSnapshots(options: WriteSnapshotsOptions): Promise<WriteSnapshotsResult> {
  const { records, outputDir } = options;
  const now = options.now ?? new Date();
  const logger = getLogger();

  await ensureDirectory(outputDir);

  const existing = await listSnapshots(outputDir);
  const current = nextSnapshotName(existing, formatTimestamp(now));
  const suffix = current.file.slice('sitemap_'.length);

  const xmlPath = path.join(outputDir, SITEMAP_XML_FILE);
  const jsonPath = path.join(outputDir, current.file);

  await writeOutputFile(xmlPath, renderSitemapXml(records));
  await writeOutputFile(jsonPath, renderJsonSnapshot(records, now));
  logger.info({ xmlPath, jsonPath, urls: records.length }, 'sitemaps written');

  const previous = existing.sort(compareSnapshots).at(-1);
  if (!previous) {
    return { files: { xmlPath, jsonPath } };
  }

  const previousPath = path.join(outputDir, previous.file);
  let previousUrls: string[];
  try {
    previousUrls = await readSnapshotUrls(previousPath);
  } catch (error) {
    if (!isCrawlerError(error) || error.severity === 'fatal') {
      throw error;
    }
    reportCrawlerError(error, { stage: 'diff', path: previousPath }, { throwOnFatal: false });
    return { files: { xmlPath, jsonPath } };
  }

  const changes = computeChangeSet(
    previousUrls,
    records.map((record) => record.url),
  );
  const changesPath = path.join(outputDir, `changes_${suffix}`);
  await writeOutputFile(changesPath, JSON.stringify(toChangesDocument(changes), null, 2));
  logger.info({ changesPath, previous: previousPath }, 'change log written');

  return { files: { xmlPath, jsonPath, changesPath }, changes };
}

export function parseSnapshotName(file: string): SnapshotName | undefined {
  const match = SNAPSHOT_PATTERN.exec(file);
  if (!match) {
    return undefined;
  }

  return { file, stamp: match[1], sequence: match[2] ? Number(match[2]) : 1 };
}

export function compareSnapshots(a: SnapshotName, b: SnapshotName): number {
  if (a.stamp !== b.stamp) {
    return a.stamp < b.stamp ? -1 : 1;
  }
  return a.sequence - b.sequence;
}

// Two runs inside the same second would otherwise share a file name.
export function nextSnapshotName(existing: readonly SnapshotName[], stamp: string): SnapshotName {
  const taken = existing.filter((snapshot) => snapshot.stamp === stamp);
  if (taken.length === 0) {
    return { file: `sitemap_${stamp}.json`, stamp, sequence: 1 };
  }

  const sequence = Math.max(...taken.map((snapshot) => snapshot.sequence)) + 1;
  return { file: `sitemap_${stamp}_${sequence}.json`, stamp, sequence };
}

async function listSnapshots(outputDir: string): Promise<SnapshotName[]> {
  let files: string[];
  try {
    files = await readdir(outputDir);
  } catch (error) {
    throw createOutputError(`Unable to list output directory ${outputDir}`, { outputDir }, { cause: error });
  }

  return files.flatMap((file) => {
    const parsed = parseSnapshotName(file);
    return parsed ? [parsed] : [];
  });
}

async function ensureDirectory(outputDir: string): Promise<void> {
  try {
    await mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw createOutputError(`Unable to create output directory ${outputDir}`, { outputDir }, { cause: error });
  }
}

async function writeOutputFile(filePath: string, contents: string): Promise<void> {
  try {
    await writeFile(filePath, contents, 'utf8');
  } catch (error) {
    throw createOutputError(`Unable to write ${filePath}`, { path: filePath }, { cause: error });
  }
}
