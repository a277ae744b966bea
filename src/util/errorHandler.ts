import {
  ensureCrawlerError,
  type CrawlerError,
  type ErrorDetails,
  type ErrorKind,
  type ErrorSeverity,
} from '../errors.js';

/** Where in the run the error surfaced; merged over the error's own details. */
export interface ErrorContext extends ErrorDetails {
  stage?: 'cli' | 'crawl' | 'fetch' | 'diff' | 'output';
  url?: string;
  path?: string;
}

export interface ErrorHandlingOptions {
  defaultKind?: ErrorKind;
  defaultSeverity?: ErrorSeverity;
  /** Defaults to true: a fatal error is rethrown after it has been printed. */
  throwOnFatal?: boolean;
}

const SINKS: Record<ErrorSeverity, (line: string) => void> = {
  recoverable: (line) => console.warn(line),
  fatal: (line) => console.error(line),
};

export function reportCrawlerError(
  error: unknown,
  context: ErrorContext = {},
  options: ErrorHandlingOptions = {},
): CrawlerError {
  const crawlerError = ensureCrawlerError(error, {
    kind: options.defaultKind ?? 'internal',
    severity: options.defaultSeverity,
    details: context,
  });

  SINKS[crawlerError.severity](buildLogMessage(crawlerError, { ...crawlerError.details, ...context }));

  if (crawlerError.severity === 'fatal' && (options.throwOnFatal ?? true)) {
    throw crawlerError;
  }

  return crawlerError;
}

/** `[kind/severity] message (key="value" …)` with keys sorted and unset values left out. */
export function buildLogMessage(error: CrawlerError, details: ErrorDetails): string {
  const head = `[${error.kind}/${error.severity}] ${error.message}`;
  const pairs = Object.keys(details)
    .filter((key) => details[key] !== undefined)
    .sort()
    .map((key) => `${key}=${JSON.stringify(details[key])}`);

  return pairs.length > 0 ? `${head} (${pairs.join(' ')})` : head;
}
