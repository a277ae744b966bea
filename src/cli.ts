#!/usr/bin/env node
import { createRequire } from 'node:module';
import { Command } from 'commander';

import { DEFAULT_CONFIG_FILE, loadConfigFile, type FileConfig } from './config/loadConfig.js';
import { createConfigurationError } from './errors.js';
import { generateSitemap } from './index.js';
import type { SitemapConfig } from './types.js';
import { reportCrawlerError } from './util/errorHandler.js';
import { logError } from './util/output.js';

const require = createRequire(import.meta.url);
// eslint-disable-next-line @typescript-eslint/no-var-requires -- package.json access for CLI metadata
const pkg = require('../package.json') as { version?: string };

const program = new Command();

program
  .name('sitemap-crawler')
  .description('Crawl one site and write sitemap.xml, a JSON snapshot and a change log.')
  .version(pkg.version ?? '0.0.0');

program
  .command('crawl')
  .description('Crawl from the start URL and write sitemaps into the output directory.')
  .argument('[startUrl]', 'Starting URL for the crawl (or "startUrl" in the config file).')
  .option('--domain <url>', 'URL whose host bounds the crawl. (default: the start URL origin)')
  .option('--output-dir <path>', 'Directory for sitemap.xml and snapshots. (default: sitemaps)')
  .option('--workers <number>', 'Workers polling the frontier. (default: 10)')
  .option('--max-in-flight <number>', 'Maximum fetches in flight at once. (default: 5)')
  .option('--timeout-ms <number>', 'Timeout per request in milliseconds. (default: 10000)')
  .option('--exclude <pattern...>', 'Substrings that exclude a URL; replaces the default list.')
  .option('--verify-tls', 'Reject invalid TLS certificates instead of accepting them.')
  .option('--config <path>', `JSON config file. (default: ${DEFAULT_CONFIG_FILE} when present)`)
  .option('--quiet', 'Suppress per-page progress lines.')
  .option('--log-level <level>', 'Enable pino logs on stderr (trace|debug|info|warn|error|fatal).')
  .action(async (startUrl: string | undefined, options: Record<string, unknown>) => {
    try {
      const fileConfig = await loadConfigFile(
        typeof options.config === 'string' ? options.config : DEFAULT_CONFIG_FILE,
        { required: options.config !== undefined },
      );
      const config = buildConfig(startUrl, options, fileConfig);
      await generateSitemap(config);
    } catch (error) {
      reportCliError(error);
    }
  });

await program.parseAsync(process.argv);

/** Flags win over the config file, which wins over built-in defaults. */
function buildConfig(
  startUrl: string | undefined,
  rawOptions: Record<string, unknown>,
  fileConfig: FileConfig,
): SitemapConfig {
  const resolvedStart = startUrl ?? fileConfig.startUrl;
  if (!resolvedStart) {
    throw createConfigurationError('A start URL is required (argument or "startUrl" in the config file).');
  }

  const config: SitemapConfig = { ...fileConfig, startUrl: resolvedStart };

  if (rawOptions.domain !== undefined) {
    config.domain = String(rawOptions.domain);
  }

  if (rawOptions.outputDir !== undefined) {
    config.outputDir = String(rawOptions.outputDir);
  }

  if (rawOptions.workers !== undefined) {
    config.workers = asNumber(rawOptions.workers, 'workers');
  }

  if (rawOptions.maxInFlight !== undefined) {
    config.maxInFlight = asNumber(rawOptions.maxInFlight, 'max-in-flight');
  }

  if (rawOptions.timeoutMs !== undefined) {
    config.timeoutMs = asNumber(rawOptions.timeoutMs, 'timeout-ms');
  }

  if (Array.isArray(rawOptions.exclude)) {
    config.exclusions = rawOptions.exclude.map((pattern) => String(pattern));
  }

  if (rawOptions.verifyTls === true) {
    config.verifyTls = true;
  }

  if (rawOptions.quiet === true) {
    config.quiet = true;
  }

  if (rawOptions.logLevel !== undefined) {
    config.logLevel = String(rawOptions.logLevel);
  }

  return config;
}

function asNumber(value: unknown, label: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw createConfigurationError(`${label} must be a finite number.`, { value });
  }

  return parsed;
}

function reportCliError(error: unknown): void {
  const crawlerError = reportCrawlerError(error, { stage: 'cli' }, {
    defaultKind: 'internal',
    defaultSeverity: 'fatal',
    throwOnFatal: false,
  });
  logError(`Error: ${crawlerError.message}`);
  process.exitCode = 1;
}
