/**
 * Newswire Relay — Publisher Fanout
 *
 * Sends one rewrite to every enabled destination. Destinations are
 * independent: each gets its own attempts, its own retries and its own
 * result, and a failure on one never stops the others.
 */

import pLimit from 'p-limit';
import pRetry from 'p-retry';
import { PublishError } from '../lib/errors';
import { errorMessage, logger } from '../lib/logger';
import type { Destination, Item, Platform, PublishResult, RephrasedContent } from '../types';
import { FacebookPublisher } from './facebook';
import { TwitterPublisher } from './twitter';
import type { PlatformPublisher } from './types';

export { composeTweet, TwitterPublisher } from './twitter';
export { FacebookPublisher } from './facebook';
export type { PlatformPublisher } from './types';

// ============================================================
// TYPES
// ============================================================

export interface FanoutOptions {
  /** Immediate retries after a retryable failure (timeout, network, 429, 5xx). */
  maxRetries?: number;
  /** Destinations published in parallel. */
  concurrency?: number;
  publishers?: Partial<Record<Platform, PlatformPublisher>>;
}

export interface FanoutSummary {
  targetsAttempted: number;
  targetsSucceeded: number;
  targetsFailed: number;
  durationMs: number;
}

function toPublishError(error: unknown): PublishError {
  if (error instanceof PublishError) return error;
  return new PublishError(errorMessage(error), undefined, false);
}

export function summarizeResults(results: PublishResult[], durationMs: number): FanoutSummary {
  const succeeded = results.filter(r => r.success).length;
  return {
    targetsAttempted: results.length,
    targetsSucceeded: succeeded,
    targetsFailed: results.length - succeeded,
    durationMs,
  };
}

// ============================================================
// FANOUT
// ============================================================

export class PublisherFanout {
  private readonly maxRetries: number;
  private readonly concurrency: number;
  private readonly publishers: Partial<Record<Platform, PlatformPublisher>>;
  private readonly logger = logger.child({ component: 'fanout' });

  constructor(options: FanoutOptions = {}) {
    this.maxRetries = options.maxRetries ?? 2;
    this.concurrency = options.concurrency ?? 4;
    this.publishers = {
      facebook: new FacebookPublisher(),
      twitter: new TwitterPublisher(),
      ...options.publishers,
    };
  }

  /**
   * Publish to every enabled destination. Never rejects; results keep the
   * order of the enabled destinations.
   */
  async publish(
    content: RephrasedContent,
    item: Item,
    destinations: readonly Destination[]
  ): Promise<PublishResult[]> {
    const start = Date.now();
    const enabled = destinations.filter(d => d.enabled);
    const limit = pLimit(Math.max(1, this.concurrency));

    const results = await Promise.all(
      enabled.map(destination => limit(() => this.publishOne(destination, content, item)))
    );

    const summary = summarizeResults(results, Date.now() - start);
    this.logger.info('Fanout complete', { itemId: item.id, ...summary });

    return results;
  }

  private async publishOne(
    destination: Destination,
    content: RephrasedContent,
    item: Item
  ): Promise<PublishResult> {
    const target = { platform: destination.platform, account: destination.accountRef, itemId: item.id };
    const publisher = this.publishers[destination.platform];

    if (!publisher) {
      this.logger.error('No publisher for platform', target);
      return {
        destination,
        success: false,
        attempts: 0,
        errorDetail: `No publisher for platform ${destination.platform}`,
      };
    }

    let attempts = 0;

    try {
      const postId = await pRetry(
        async attempt => {
          attempts = attempt;
          try {
            return await publisher.publish(destination, content, item);
          } catch (error) {
            throw toPublishError(error);
          }
        },
        {
          retries: this.maxRetries,
          minTimeout: 0,
          shouldRetry: error => toPublishError(error).retryable,
          onFailedAttempt: error => {
            const failure = toPublishError(error);
            if (failure.retryable && error.retriesLeft > 0) {
              this.logger.warn('Publish failed, retrying', {
                ...target,
                attempts: error.attemptNumber,
                status: failure.status,
                error: failure.message,
              });
            }
          },
        }
      );

      this.logger.info('Published', { ...target, postId, attempts });
      return { destination, success: true, postId, attempts };
    } catch (error) {
      const failure = toPublishError(error);
      this.logger.warn('Publish failed', { ...target, attempts, status: failure.status, error: failure.message });
      return { destination, success: false, attempts, errorDetail: failure.message };
    }
  }
}
