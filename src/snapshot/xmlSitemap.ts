import { XMLBuilder } from 'fast-xml-parser';

import type { PageRecord } from '../types.js';

export const SITEMAP_NAMESPACE = 'http://www.sitemaps.org/schemas/sitemap/0.9';
const XSI_NAMESPACE = 'http://www.w3.org/2001/XMLSchema-instance';
const SCHEMA_LOCATION = `${SITEMAP_NAMESPACE} ${SITEMAP_NAMESPACE}/sitemap.xsd`;
const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: true,
  indentBy: '  ',
});

/** Renders a `urlset` document; entries are sorted by URL regardless of input order. */
export function renderSitemapXml(records: readonly PageRecord[]): string {
  const urls = [...records]
    .sort((a, b) => (a.url < b.url ? -1 : a.url > b.url ? 1 : 0))
    .map((record) => ({
      loc: record.url,
      lastmod: record.lastModified,
      priority: record.priority.toFixed(2),
    }));

  const body: string = builder.build({
    urlset: {
      '@_xmlns': SITEMAP_NAMESPACE,
      '@_xmlns:xsi': XSI_NAMESPACE,
      '@_xsi:schemaLocation': SCHEMA_LOCATION,
      url: urls,
    },
  });

  return `${XML_DECLARATION}\n${body}`;
}
