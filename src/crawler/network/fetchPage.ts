import { Agent, fetch, type Dispatcher, type Response } from 'undici';

import { createFetchError, isCrawlerError, type CrawlerError } from '../../errors.js';
import { getLogger } from '../../logger.js';
import type { FetchOutcome, NormalizedUrl, PageFetcher } from '../../types.js';

export interface FetchPageOptions {
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

export interface HtmlFetcher {
  fetch: PageFetcher;
  close(): Promise<void>;
}

const USER_AGENT = 'sitemap-crawler/1.0';

/**
 * One GET per call, no retries. Only a 200 with an HTML content type counts as content;
 * every other response and every transport error comes back as `ok: false`.
 */
export async function fetchPage(url: NormalizedUrl, options: FetchPageOptions): Promise<FetchOutcome> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      redirect: 'follow',
      signal: controller.signal,
      dispatcher: options.dispatcher,
      headers: {
        'user-agent': USER_AGENT,
        accept: 'text/html,application/xhtml+xml,*/*;q=0.9',
      },
    });

    if (response.status !== 200) {
      await discardBody(response);
      return { ok: false, status: response.status, reason: `HTTP ${response.status}` };
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (!contentType.toLowerCase().includes('text/html')) {
      await discardBody(response);
      return {
        ok: false,
        status: response.status,
        reason: `Not HTML (${contentType || 'no content-type'})`,
      };
    }

    // The timer stays armed while the body streams in.
    const html = await response.text();
    return { ok: true, status: response.status, html };
  } catch (error) {
    const fetchError = toFetchError(error, url, options.timeoutMs, controller.signal.aborted);
    return { ok: false, status: null, reason: fetchError.message };
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Builds the fetcher used for a crawl. With `verifyTls` off the agent accepts any
 * certificate, which is how sites behind self-signed or broken chains still get mapped.
 */
export function createHtmlFetcher(options: { timeoutMs: number; verifyTls: boolean }): HtmlFetcher {
  const dispatcher = new Agent({ connect: { rejectUnauthorized: options.verifyTls } });

  return {
    fetch: (url) => fetchPage(url, { timeoutMs: options.timeoutMs, dispatcher }),
    close: () => dispatcher.close(),
  };
}

function toFetchError(error: unknown, url: string, timeoutMs: number, aborted: boolean): CrawlerError {
  const err = error instanceof Error ? error : new Error(String(error));
  const code = extractErrorCode(err);

  let message: string;
  if (aborted) {
    message = `Request timed out after ${timeoutMs}ms`;
  } else if (code) {
    message = `${err.message || 'Request failed'} (${code})`;
  } else {
    message = err.message || 'Request failed';
  }

  return createFetchError(
    message,
    { url, timeoutMs, ...(code ? { code } : {}) },
    { cause: err },
  );
}

async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    getLogger().debug({ err: error, url: response.url }, 'failed to cancel response body');
  }
}

function extractErrorCode(error: Error | CrawlerError): string | undefined {
  const detailsCode = isCrawlerError(error) ? error.details?.code : undefined;
  if (typeof detailsCode === 'string') {
    return detailsCode;
  }

  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }

  const cause = error.cause;
  if (cause instanceof Error) {
    return extractErrorCode(cause);
  }

  return undefined;
}
