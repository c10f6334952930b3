/**
 * Feed source adapter
 *
 * Fetches the configured feed once per run and hands back the raw entries.
 * JSON feeds (a top-level array or an object with `items`) are read as-is;
 * anything else is parsed as RSS/Atom with rss-parser.
 */

import pRetry, { AbortError } from 'p-retry';
import Parser from 'rss-parser';
import { z } from 'zod';
import type { RawItem } from '../types/feed';
import { FeedError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface FeedSource {
  fetchItems(): Promise<RawItem[]>;
}

export type FeedFetch = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpFeedSourceOptions {
  url: string;
  timeoutMs: number;
  retries: number;
  userAgent: string;
  minRetryDelayMs?: number;
  fetch?: FeedFetch;
}

const JsonFeedBody = z.union([
  z.array(z.unknown()),
  z.object({ items: z.array(z.unknown()) }).passthrough()
]);

const JsonEntry = z.record(z.unknown());

const parser = new Parser({
  customFields: {
    item: ['updated', 'published', 'summary', ['dc:date', 'dcDate']]
  }
});

function looksLikeJson(body: string, contentType: string): boolean {
  if (/json/i.test(contentType)) return true;
  const first = body.trimStart().charAt(0);
  return first === '[' || first === '{';
}

function parseJsonFeed(body: string): RawItem[] {
  let decoded: unknown;
  try {
    decoded = JSON.parse(body);
  } catch (error) {
    throw new FeedError(`Feed body is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = JsonFeedBody.safeParse(decoded);
  if (!parsed.success) {
    throw new FeedError('JSON feed has neither a top-level array nor an "items" array');
  }

  const entries = Array.isArray(parsed.data) ? parsed.data : parsed.data.items;
  const items: RawItem[] = [];
  for (const entry of entries) {
    const record = JsonEntry.safeParse(entry);
    if (record.success) {
      items.push(record.data);
    } else {
      logger.debug('Ignoring non-object feed entry');
    }
  }
  return items;
}

async function parseXmlFeed(body: string): Promise<RawItem[]> {
  try {
    const feed = await parser.parseString(body);
    return feed.items.map((item): RawItem => ({ ...item }));
  } catch (error) {
    throw new FeedError(`Feed body could not be parsed as RSS/Atom: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Decode a fetched feed body into raw entries, in feed order.
 */
export async function parseFeedBody(body: string, contentType = ''): Promise<RawItem[]> {
  if (looksLikeJson(body, contentType)) {
    return parseJsonFeed(body);
  }
  return parseXmlFeed(body);
}

export class HttpFeedSource implements FeedSource {
  constructor(private readonly options: HttpFeedSourceOptions) {}

  private async fetchOnce(): Promise<{ body: string; contentType: string }> {
    const { url, timeoutMs, userAgent } = this.options;
    const fetchImpl: FeedFetch = this.options.fetch ?? ((input, init) => fetch(input, init));
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetchImpl(url, {
        method: 'GET',
        redirect: 'follow',
        signal: controller.signal,
        headers: {
          'User-Agent': userAgent,
          Accept: 'application/feed+json, application/json, application/rss+xml, application/atom+xml, text/xml;q=0.9, */*;q=0.8'
        }
      });

      if (!response.ok) {
        const failure = new FeedError(`Feed request returned HTTP ${response.status}`);
        // Client errors will not fix themselves on retry
        if (response.status >= 400 && response.status < 500 && response.status !== 408 && response.status !== 429) {
          throw new AbortError(failure);
        }
        throw failure;
      }

      return {
        body: await response.text(),
        contentType: response.headers.get('content-type') ?? ''
      };
    } catch (error) {
      if (error instanceof AbortError || error instanceof FeedError) {
        throw error;
      }
      const message =
        error instanceof Error && error.name === 'AbortError'
          ? `Feed request timeout after ${timeoutMs}ms`
          : `Feed request failed: ${errorMessage(error)}`;
      throw new FeedError(message, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }

  async fetchItems(): Promise<RawItem[]> {
    const { url, retries } = this.options;
    const minTimeout = this.options.minRetryDelayMs ?? 1000;

    let fetched: { body: string; contentType: string };
    try {
      fetched = await pRetry(() => this.fetchOnce(), {
        retries,
        factor: 2,
        minTimeout,
        maxTimeout: Math.max(minTimeout, 5000),
        onFailedAttempt: (error) => {
          logger.warn(`Feed fetch attempt ${error.attemptNumber} failed (${error.retriesLeft} retries left)`, {
            url,
            error: error.message
          });
        }
      });
    } catch (error) {
      if (error instanceof FeedError) {
        throw error;
      }
      throw new FeedError(`Feed request failed: ${errorMessage(error)}`, { cause: error });
    }

    const items = await parseFeedBody(fetched.body, fetched.contentType);
    logger.info(`Fetched ${items.length} feed entries from ${url}`);
    return items;
  }
}
