import { load, type CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

import { createParseError } from '../../errors.js';

// `<link href>` covers canonical, alternate and pagination links in the head.
const LINK_SELECTOR = 'a[href], link[href]';

/** Raw `href` values in document order, trimmed, blank ones dropped, first occurrence kept. */
export function parseLinks(html: string): string[] {
  let $: CheerioAPI;
  try {
    $ = load(html);
  } catch (error) {
    throw createParseError('Failed to parse links from HTML', { htmlLength: html.length }, { cause: error });
  }

  const hrefs = $(LINK_SELECTOR)
    .toArray()
    .map((element: Element) => $(element).attr('href')?.trim() ?? '')
    .filter((href) => href.length > 0);

  return [...new Set(hrefs)];
}
