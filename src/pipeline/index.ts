/**
 * Newswire Relay — Relay Pipeline
 *
 * Per item: claim in the dedup store → rewrite → fanout → commit.
 *
 * The claim is taken before rewriting, so two deliveries of the same item
 * race on the claim and only one reaches the fanout. A failed rewrite
 * releases the claim (the item stays eligible for redelivery); once the
 * fanout has been attempted the record stays, whatever the per-destination
 * outcomes, since replaying would duplicate the posts that did go out.
 */

import type { PublisherFanout } from '../delivery';
import type { DedupStore } from '../feeds/dedup';
import { sleep } from '../lib/clock';
import { errorMessage, logger } from '../lib/logger';
import type { RephraseClient } from '../rephrase/client';
import type { Destination, Item, PublishResult } from '../types';

export interface PipelineDeps {
  dedup: Pick<DedupStore, 'claim' | 'release' | 'markSeen'>;
  rephraser: Pick<RephraseClient, 'rewrite'>;
  fanout: Pick<PublisherFanout, 'publish'>;
  destinations: readonly Destination[];
  /** Pause between items of one batch. */
  processDelayMs?: number;
}

export type ItemOutcome =
  | { itemId: string; status: 'published'; results: PublishResult[] }
  | { itemId: string; status: 'deferred'; error: string }
  | { itemId: string; status: 'duplicate' };

export interface ClaimResult {
  claimed: Item[];
  duplicates: Item[];
}

export class RelayPipeline {
  private readonly logger = logger.child({ component: 'pipeline' });

  constructor(private readonly deps: PipelineDeps) {}

  /**
   * Dedup stage. Storage errors propagate so the caller can refuse the
   * delivery and let the hub retry it; claims already taken for the batch
   * are released first, or the redelivery would see them as duplicates.
   */
  async claimItems(items: readonly Item[]): Promise<ClaimResult> {
    const claimed: Item[] = [];
    const duplicates: Item[] = [];

    try {
      for (const item of items) {
        if (await this.deps.dedup.claim(item.id)) {
          claimed.push(item);
        } else {
          duplicates.push(item);
        }
      }
    } catch (error) {
      this.logger.error('Claim failed, releasing batch', {
        claimed: claimed.map(i => i.id),
        error: errorMessage(error),
      });
      for (const item of claimed) {
        await this.releaseClaim(item);
      }
      throw error;
    }

    if (duplicates.length > 0) {
      this.logger.info('Skipping already seen items', {
        duplicates: duplicates.map(i => i.id),
      });
    }

    return { claimed, duplicates };
  }

  /**
   * Rewrite and publish one claimed item. Never rejects.
   */
  async processClaimed(item: Item): Promise<ItemOutcome> {
    let content;
    try {
      content = await this.deps.rephraser.rewrite(item);
    } catch (error) {
      this.logger.warn('Rewrite failed, item deferred', { itemId: item.id, error: errorMessage(error) });
      await this.releaseClaim(item);
      return { itemId: item.id, status: 'deferred', error: errorMessage(error) };
    }

    const results = await this.deps.fanout.publish(content, item, this.deps.destinations);

    try {
      await this.deps.dedup.markSeen(item.id);
    } catch (error) {
      // The claim record is still live and keeps blocking duplicates
      this.logger.error('Failed to refresh dedup record', { itemId: item.id, error: errorMessage(error) });
    }

    return { itemId: item.id, status: 'published', results };
  }

  /**
   * Process claimed items in order. Never rejects.
   */
  async processAll(items: readonly Item[]): Promise<ItemOutcome[]> {
    const outcomes: ItemOutcome[] = [];

    for (const [index, item] of items.entries()) {
      if (index > 0 && this.deps.processDelayMs) {
        await sleep(this.deps.processDelayMs);
      }
      outcomes.push(await this.processClaimed(item));
    }

    return outcomes;
  }

  /**
   * Claim, then process. Used by the polling path.
   */
  async run(items: readonly Item[]): Promise<ItemOutcome[]> {
    const { claimed, duplicates } = await this.claimItems(items);
    const outcomes = await this.processAll(claimed);

    return [
      ...outcomes,
      ...duplicates.map(item => ({ itemId: item.id, status: 'duplicate' as const })),
    ];
  }

  private async releaseClaim(item: Item): Promise<void> {
    try {
      await this.deps.dedup.release(item.id);
    } catch (error) {
      this.logger.error('Failed to release claim; item blocked until its TTL ends', {
        itemId: item.id,
        error: errorMessage(error),
      });
    }
  }
}
