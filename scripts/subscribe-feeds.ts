/**
 * Newswire Relay — Subscribe Feeds Script
 *
 * Subscribes the webhook callback to every topic in FEEDS at the hub.
 *
 * Usage:
 *   npm run subscribe                      # subscribe every FEEDS topic
 *   npm run subscribe -- --unsubscribe     # unsubscribe them instead
 */

import 'dotenv/config';
import { loadConfig, requireHubSecret } from '../src/lib/config';
import { errorMessage, logger } from '../src/lib/logger';
import { SubscriptionManager } from '../src/websub/subscription';

async function main(): Promise<void> {
  const unsubscribe = process.argv.slice(2).includes('--unsubscribe');
  const config = loadConfig();
  const secret = requireHubSecret(config);
  const callbackUrl = config.callbackUrl;

  if (!callbackUrl) {
    logger.error('CALLBACK_URL is required to subscribe');
    process.exit(1);
  }
  if (config.feeds.length === 0) {
    logger.error('FEEDS is empty; nothing to subscribe');
    process.exit(1);
  }

  const manager = new SubscriptionManager(
    {
      hubUrl: config.hub.url,
      user: config.hub.user,
      password: config.hub.password,
      secret,
      leaseSeconds: config.hub.leaseSeconds,
    },
    config.feeds
  );

  const failed: string[] = [];

  for (const topic of config.feeds) {
    try {
      if (unsubscribe) {
        await manager.unsubscribe(topic, callbackUrl);
      } else {
        await manager.subscribe(topic, callbackUrl);
      }
    } catch (error) {
      logger.error(unsubscribe ? 'Unsubscribe failed' : 'Subscribe failed', {
        topic,
        error: errorMessage(error),
      });
      failed.push(topic);
    }
  }

  logger.info('Subscription run complete', {
    mode: unsubscribe ? 'unsubscribe' : 'subscribe',
    total: config.feeds.length,
    failed: failed.length,
  });

  if (failed.length > 0) {
    process.exit(1);
  }
}

main().catch(error => {
  logger.error('Subscription run failed', { error: errorMessage(error) });
  process.exit(1);
});
