import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MockInstance } from 'vitest';

import { createFetchError, createInternalError, createOutputError, ensureCrawlerError } from '../src/errors.js';
import { buildLogMessage, reportCrawlerError } from '../src/util/errorHandler.js';

let warnSpy: MockInstance<(...args: unknown[]) => void>;
let errorSpy: MockInstance<(...args: unknown[]) => void>;

beforeEach(() => {
  warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  warnSpy.mockRestore();
  errorSpy.mockRestore();
});

describe('reportCrawlerError', () => {
  it('logs recoverable errors without throwing', () => {
    const error = createFetchError('HTTP 503', { url: 'https://x.io/busy' });

    expect(() => {
      reportCrawlerError(error, { stage: 'fetch' });
    }).not.toThrow();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).not.toHaveBeenCalled();
    expect(warnSpy.mock.calls[0]?.[0]).toBe('[fetch/recoverable] HTTP 503 (stage="fetch" url="https://x.io/busy")');
  });

  it('throws on fatal errors by default', () => {
    const fatalError = createOutputError('Unable to write sitemap.xml');
    expect(() => reportCrawlerError(fatalError, { stage: 'output' })).toThrowError(fatalError);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('can suppress throwing on fatal errors when requested', () => {
    const fatalError = createInternalError('boom');
    expect(() =>
      reportCrawlerError(fatalError, { stage: 'crawl' }, { throwOnFatal: false }),
    ).not.toThrow();
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('wraps unknown errors as fatal internal errors', () => {
    const result = reportCrawlerError('oops', { stage: 'cli' }, { throwOnFatal: false });
    expect(result.kind).toBe('internal');
    expect(result.severity).toBe('fatal');
    expect(result.name).toBe('InternalError');
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});

describe('ensureCrawlerError', () => {
  it('passes crawler errors through untouched', () => {
    const error = createFetchError('HTTP 500');
    expect(ensureCrawlerError(error, { kind: 'internal' })).toBe(error);
  });

  it('keeps the original error as the cause', () => {
    const original = new Error('disk full');
    const wrapped = ensureCrawlerError(original, { kind: 'output', severity: 'recoverable' });

    expect(wrapped.message).toBe('disk full');
    expect(wrapped.kind).toBe('output');
    expect(wrapped.severity).toBe('recoverable');
    expect(wrapped.cause).toBe(original);
  });
});

describe('buildLogMessage', () => {
  it('omits the detail suffix when nothing is set', () => {
    expect(buildLogMessage(createInternalError('boom'), { url: undefined })).toBe('[internal/fatal] boom');
  });
});
