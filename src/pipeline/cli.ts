/**
 * Command-line wiring: configuration → dependencies → run → JSON summary.
 *
 * Exit codes: 0 on a completed run (even with per-item failures), 1 when the
 * feed cannot be fetched or parsed, 2 on invalid configuration.
 */

import { type FeedFetch, HttpFeedSource } from '../adapters/feed-source';
import { type EnvironmentConfig, loadEnvironmentConfig } from '../config/environment';
import type { RunSummary } from '../types/feed';
import { ConfigError, FeedError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { ContentExtractor } from './extractor';
import { type DraftRunDependencies, emptyRunSummary, runDrafts } from './runDrafts';
import { SeenStore } from './seen-store';
import { createSummarizer } from './summarizer';

export const EXIT_OK = 0;
export const EXIT_FEED_FAILURE = 1;
export const EXIT_CONFIG_ERROR = 2;

export interface CliOptions {
  argv?: string[];
  env?: Record<string, string | undefined>;
  cwd?: string;
  fetch?: FeedFetch;
  now?: Date;
  write?: (line: string) => void;
}

export function parseArgs(argv: string[]): { dryRun?: boolean } {
  return argv.includes('--dry-run') ? { dryRun: true } : {};
}

export async function createDependencies(
  config: EnvironmentConfig,
  fetchImpl?: FeedFetch
): Promise<Omit<DraftRunDependencies, 'now'>> {
  return {
    config,
    feedSource: new HttpFeedSource({
      url: config.feed.url,
      timeoutMs: config.feed.timeoutMs,
      retries: config.feed.retries,
      userAgent: config.extraction.userAgent,
      fetch: fetchImpl
    }),
    extractor: new ContentExtractor({
      minWords: config.extraction.minWords,
      timeoutMs: config.extraction.timeoutMs,
      userAgent: config.extraction.userAgent,
      fetch: fetchImpl
    }),
    summarizer: createSummarizer(config),
    store: await SeenStore.load(config.output.stateFile, config.output.seenLimit)
  };
}

export async function executeCli(options: CliOptions = {}): Promise<number> {
  const write = options.write ?? ((line: string) => process.stdout.write(`${line}\n`));
  const print = (summary: RunSummary) => write(JSON.stringify(summary));

  let config: EnvironmentConfig;
  try {
    config = loadEnvironmentConfig(options.env ?? process.env, {
      ...parseArgs(options.argv ?? process.argv.slice(2)),
      cwd: options.cwd
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return EXIT_CONFIG_ERROR;
    }
    throw error;
  }

  logger.setLevel(config.logging.level);

  try {
    const deps = await createDependencies(config, options.fetch);
    const summary = await runDrafts({ ...deps, now: options.now });
    print(summary);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof FeedError) {
      logger.error('Feed could not be loaded, nothing drafted', error.message);
      print({ ...emptyRunSummary(config.output.dryRun), error: errorMessage(error) });
      return EXIT_FEED_FAILURE;
    }
    throw error;
  }
}
