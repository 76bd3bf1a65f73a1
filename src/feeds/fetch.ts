/**
 * Newswire Relay — Feed Polling
 *
 * Pull-mode fallback for topics the hub does not push: GET each feed and run
 * the payload through the same parser as pushes.
 */

import pLimit from 'p-limit';
import { errorMessage, logger } from '../lib/logger';
import type { Item } from '../types';
import { parseItems } from './parser';

const log = logger.child({ component: 'feed-fetch' });

export interface FetchFeedsOptions {
  timeoutMs?: number;
  concurrency?: number;
}

export interface FeedFetchResult {
  url: string;
  success: boolean;
  items: Item[];
  error?: string;
}

/**
 * Fetch and parse one feed. Throws on HTTP or parse failure.
 */
export async function fetchFeed(url: string, timeoutMs = 15_000): Promise<Item[]> {
  const response = await fetch(url, {
    headers: {
      Accept: 'application/rss+xml, application/atom+xml, application/xml;q=0.9, */*;q=0.8',
    },
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!response.ok) {
    throw new Error(`HTTP ${response.status} from ${url}`);
  }

  const body = Buffer.from(await response.arrayBuffer());
  return parseItems(body, url);
}

/**
 * Fetch every feed. A failing feed is logged and reported, never thrown.
 */
export async function fetchFeeds(
  urls: readonly string[],
  options: FetchFeedsOptions = {}
): Promise<FeedFetchResult[]> {
  const limit = pLimit(options.concurrency ?? 4);

  return Promise.all(
    urls.map(url =>
      limit(async (): Promise<FeedFetchResult> => {
        try {
          const items = await fetchFeed(url, options.timeoutMs);
          return { url, success: true, items };
        } catch (error) {
          log.warn('Feed fetch failed', { url, error: errorMessage(error) });
          return { url, success: false, items: [], error: errorMessage(error) };
        }
      })
    )
  );
}
