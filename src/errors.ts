export type ErrorKind = 'fetch' | 'parse' | 'config' | 'output' | 'internal';

export type ErrorSeverity = 'recoverable' | 'fatal';

export type ErrorDetails = Record<string, unknown>;

export interface CrawlerErrorProps {
  message: string;
  kind: ErrorKind;
  severity?: ErrorSeverity;
  details?: ErrorDetails;
  cause?: unknown;
}

/**
 * Every failure the crawler raises or reports. `severity` decides whether the run goes on:
 * recoverable errors cost one page or one file, fatal ones end the run.
 */
export class CrawlerError extends Error {
  readonly kind: ErrorKind;
  readonly severity: ErrorSeverity;
  readonly details?: ErrorDetails;

  constructor({ message, kind, severity = 'recoverable', details, cause }: CrawlerErrorProps) {
    super(message, cause ? { cause } : undefined);
    this.name = `${kind.charAt(0).toUpperCase()}${kind.slice(1)}Error`;
    this.kind = kind;
    this.severity = severity;
    this.details = details;
  }
}

export function isCrawlerError(value: unknown): value is CrawlerError {
  return value instanceof CrawlerError;
}

/** Wraps anything thrown into a CrawlerError; foreign errors default to fatal. */
export function ensureCrawlerError(
  error: unknown,
  fallback: Partial<CrawlerErrorProps> & Pick<CrawlerErrorProps, 'kind'> = { kind: 'internal' },
): CrawlerError {
  if (isCrawlerError(error)) {
    return error;
  }

  return new CrawlerError({
    message: error instanceof Error ? error.message : String(error),
    kind: fallback.kind,
    severity: fallback.severity ?? 'fatal',
    details: fallback.details,
    cause: error instanceof Error ? error : undefined,
  });
}

interface FactoryOptions {
  severity?: ErrorSeverity;
  cause?: unknown;
}

type ErrorFactory = (message: string, details?: ErrorDetails, options?: FactoryOptions) => CrawlerError;

function errorFactory(kind: ErrorKind, defaultSeverity: ErrorSeverity): ErrorFactory {
  return (message, details = {}, options = {}) =>
    new CrawlerError({
      message,
      kind,
      severity: options.severity ?? defaultSeverity,
      details,
      cause: options.cause,
    });
}

/** Transport failures and unusable responses; they only ever cost the page. */
export const createFetchError = errorFactory('fetch', 'recoverable');

export const createParseError = errorFactory('parse', 'recoverable');

const configurationError = errorFactory('config', 'fatal');

/** Bad input is never recoverable: there is nothing sensible to crawl. */
export function createConfigurationError(
  message: string,
  details: ErrorDetails = {},
  options: { cause?: unknown } = {},
): CrawlerError {
  return configurationError(message, details, { cause: options.cause });
}

/**
 * Snapshot persistence failures. Fatal unless the caller can carry on without the file,
 * e.g. an unreadable previous snapshot only costs the change log.
 */
export const createOutputError = errorFactory('output', 'fatal');

export const createInternalError = errorFactory('internal', 'fatal');
