import pino, { type DestinationStream } from 'pino';

/** The slice of pino the crawler calls; tests swap in anything with these methods. */
export interface LoggerLike {
  debug(bindings: Record<string, unknown>, message: string): void;
  info(bindings: Record<string, unknown>, message: string): void;
}

export interface LoggerConfiguration {
  /** A pino level name, or `silent`. */
  level?: string;
  destination?: DestinationStream;
}

const SERVICE = 'sitemap-crawler';

// Stdout belongs to the progress lines and run report, so structured logs go elsewhere.
const STDERR_FD = 2;

let activeLogger: LoggerLike = pino({ level: 'silent', base: { service: SERVICE } });

export function configureLogger({ level = 'silent', destination }: LoggerConfiguration = {}): void {
  activeLogger = pino({ level, base: { service: SERVICE } }, destination ?? pino.destination(STDERR_FD));
}

export function setLoggerInstance(logger: LoggerLike): void {
  activeLogger = logger;
}

export function getLogger(): LoggerLike {
  return activeLogger;
}
