import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { buildSnapshotDocument, readSnapshotUrls, renderJsonSnapshot } from '../src/snapshot/jsonSnapshot.js';

const generatedAt = new Date(Date.UTC(2026, 9, 19, 8, 30, 0));

describe('buildSnapshotDocument', () => {
  it('keys pages by URL in sorted order', () => {
    const document = buildSnapshotDocument(
      [
        { url: 'https://x.io/b', lastModified: '2026-10-19', priority: 0.51 },
        { url: 'https://x.io', lastModified: '2026-10-19', priority: 1 },
      ],
      generatedAt,
    );

    expect(document).toEqual({
      generated_at: '2026-10-19T08:30:00.000Z',
      total_urls: 2,
      urls: {
        'https://x.io': { lastmod: '2026-10-19', priority: 1 },
        'https://x.io/b': { lastmod: '2026-10-19', priority: 0.51 },
      },
    });
    expect(Object.keys(document.urls)).toEqual(['https://x.io', 'https://x.io/b']);
  });

  it('renders with two-space indentation', () => {
    const json = renderJsonSnapshot([], generatedAt);

    expect(json).toBe(
      ['{', '  "generated_at": "2026-10-19T08:30:00.000Z",', '  "total_urls": 0,', '  "urls": {}', '}'].join('\n'),
    );
  });
});

describe('readSnapshotUrls', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'snapshot-read-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns the URL keys of a stored snapshot', async () => {
    const file = path.join(dir, 'sitemap_20261019_083000.json');
    await writeFile(file, JSON.stringify({ urls: { 'https://x.io': {}, 'https://x.io/a': {} } }));

    await expect(readSnapshotUrls(file)).resolves.toEqual(['https://x.io', 'https://x.io/a']);
  });

  it('fails recoverably on unparseable files', async () => {
    const file = path.join(dir, 'broken.json');
    await writeFile(file, '{not json');

    await expect(readSnapshotUrls(file)).rejects.toMatchObject({
      kind: 'output',
      severity: 'recoverable',
      message: `Unable to read previous snapshot ${file}`,
    });
  });

  it('fails recoverably when the urls object is missing', async () => {
    const file = path.join(dir, 'empty.json');
    await writeFile(file, JSON.stringify({ total_urls: 3 }));

    await expect(readSnapshotUrls(file)).rejects.toMatchObject({
      kind: 'output',
      severity: 'recoverable',
      message: `Previous snapshot ${file} has no "urls" object`,
    });
  });
});
