/**
 * Newswire Relay — Server Entry Point
 *
 * Deploy anywhere a long-running Node process can accept the hub's callbacks.
 * Run with: npm run server
 */

import 'dotenv/config';
import { checkDatabaseHealth } from '../db/client';
import { loadConfig, requireHubSecret } from '../lib/config';
import { errorMessage, logger } from '../lib/logger';
import { buildRelayContext } from './context';
import { createApp } from './webhook';

const RENEWAL_INTERVAL_MS = 60 * 60 * 1000;
const RENEWAL_WINDOW_SECONDS = 2 * 60 * 60;

async function main(): Promise<void> {
  const config = loadConfig();
  const secret = requireHubSecret(config);
  const relay = buildRelayContext(config);

  const db = await checkDatabaseHealth();
  if (!db.healthy) {
    logger.warn('Dedup storage unreachable at startup', { error: db.error, latencyMs: db.latencyMs });
  }

  try {
    await relay.dedup.sweepExpired();
  } catch (error) {
    logger.warn('Startup dedup sweep failed', { error: errorMessage(error) });
  }

  if (config.publish.destinations.length === 0) {
    logger.warn('No publish destinations configured');
  }

  const app = createApp({
    subscriptions: relay.subscriptions,
    pipeline: relay.pipeline,
    secret,
    requestDeadlineMs: config.requestDeadlineMs,
  });

  const callbackUrl = config.callbackUrl;
  if (callbackUrl) {
    const timer = setInterval(() => {
      relay.subscriptions
        .renewExpiring(callbackUrl, RENEWAL_WINDOW_SECONDS)
        .then(report => {
          if (report.renewed.length > 0 || report.failed.length > 0) {
            logger.info('Lease renewal pass', {
              renewed: report.renewed.length,
              failed: report.failed.length,
            });
          }
        })
        .catch(error => logger.error('Lease renewal pass failed', { error: errorMessage(error) }));
    }, RENEWAL_INTERVAL_MS);
    timer.unref();
  }

  app.listen(config.port, () => {
    logger.info(`Webhook server listening on port ${config.port}`, {
      feeds: config.feeds.length,
      destinations: config.publish.destinations.map(d => `${d.platform}:${d.accountRef}`),
      keys: relay.keyPool.snapshot().map(slot => slot.key),
    });
  });
}

main().catch(error => {
  logger.error('Server failed to start', { error: errorMessage(error) });
  process.exit(1);
});
