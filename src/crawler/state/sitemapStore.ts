import type { NormalizedUrl, PageRecord } from '../../types.js';

/**
 * Pages recorded during one crawl, keyed by normalized URL.
 * Lookups of unknown URLs return `undefined`; nothing is created on read.
 */
export class SitemapStore {
  private readonly records = new Map<NormalizedUrl, PageRecord>();

  record(record: PageRecord): void {
    this.records.set(record.url, record);
  }

  get(url: NormalizedUrl): PageRecord | undefined {
    return this.records.get(url);
  }

  has(url: NormalizedUrl): boolean {
    return this.records.has(url);
  }

  /** URLs in code-unit order, the order every serialized form uses. */
  urls(): NormalizedUrl[] {
    return [...this.records.keys()].sort();
  }

  entries(): PageRecord[] {
    return this.urls().flatMap((url) => {
      const record = this.records.get(url);
      return record ? [record] : [];
    });
  }

  get size(): number {
    return this.records.size;
  }
}
