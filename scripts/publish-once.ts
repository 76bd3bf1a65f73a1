/**
 * Newswire Relay — Publish Once Script
 *
 * One polling pass: fetch every FEEDS topic and run new items through the
 * same dedup → rewrite → fanout pipeline as pushes.
 *
 * Usage:
 *   npm run publish-once
 *   npm run publish-once -- --limit 5   # at most 5 items per run
 */

import 'dotenv/config';
import { fetchFeeds } from '../src/feeds/fetch';
import { loadConfig } from '../src/lib/config';
import { errorMessage, logger, timeOperation } from '../src/lib/logger';
import { buildRelayContext } from '../src/server/context';

function parseLimit(args: string[]): number | undefined {
  const index = args.indexOf('--limit');
  if (index === -1 || !args[index + 1]) return undefined;
  const limit = parseInt(args[index + 1], 10);
  return Number.isFinite(limit) && limit > 0 ? limit : undefined;
}

async function main(): Promise<void> {
  const limit = parseLimit(process.argv.slice(2));
  const config = loadConfig();

  if (config.feeds.length === 0) {
    logger.error('FEEDS is empty; nothing to poll');
    process.exit(1);
  }

  const relay = buildRelayContext(config);

  const fetched = await timeOperation('fetchFeeds', () => fetchFeeds(config.feeds));
  const items = fetched.flatMap(result => result.items).slice(0, limit);

  const outcomes = await timeOperation('pipeline', () => relay.pipeline.run(items));

  const count = (status: string) => outcomes.filter(o => o.status === status).length;
  logger.info('Polling pass complete', {
    feeds: fetched.length,
    feedsFailed: fetched.filter(r => !r.success).length,
    items: items.length,
    published: count('published'),
    deferred: count('deferred'),
    duplicates: count('duplicate'),
  });
}

main().catch(error => {
  logger.error('Polling pass failed', { error: errorMessage(error) });
  process.exit(1);
});
