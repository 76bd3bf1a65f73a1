/**
 * Newswire Relay — Feed Deduplication
 *
 * Durable "already published" set with a time-to-live. `claim` is the
 * check-and-mark step: for a given item id at most one caller wins it per
 * TTL window, across concurrent deliveries and across restarts.
 */

import type { DedupRecord } from '../types';
import type { DedupRepository } from '../db/queries';
import { systemClock, type Clock } from '../lib/clock';
import { errorMessage, logger } from '../lib/logger';

export interface DedupStoreOptions {
  ttlSeconds: number;
  /** Minimum gap between on-access sweeps of expired rows. */
  sweepIntervalSeconds?: number;
  clock?: Clock;
}

export class DedupStore {
  private readonly ttlSeconds: number;
  private readonly sweepIntervalMs: number;
  private readonly clock: Clock;
  private readonly locks = new Map<string, Promise<unknown>>();
  private lastSweepAt = Number.NEGATIVE_INFINITY;
  private readonly logger = logger.child({ component: 'dedup' });

  constructor(
    private readonly repository: DedupRepository,
    options: DedupStoreOptions
  ) {
    this.ttlSeconds = options.ttlSeconds;
    this.sweepIntervalMs = (options.sweepIntervalSeconds ?? 3600) * 1000;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * True while a live record exists. Expired rows count as not seen even
   * before the sweep removes them.
   */
  async hasSeen(itemId: string): Promise<boolean> {
    const record = await this.repository.find(itemId);
    return record !== null && this.isLive(record);
  }

  /**
   * Record an item as published, keeping the first-seen time of a live record.
   */
  async markSeen(itemId: string, ttlSeconds: number = this.ttlSeconds): Promise<void> {
    await this.withLock(itemId, async () => {
      const existing = await this.repository.find(itemId);
      const record = this.newRecord(itemId, ttlSeconds);
      if (existing && this.isLive(existing)) {
        record.firstSeenAt = existing.firstSeenAt;
      }
      await this.repository.upsert(record);
    });
  }

  /**
   * Atomic check-and-mark. Returns true only for the caller that created
   * the record; false means the item is already seen (a duplicate, not an error).
   */
  async claim(itemId: string, ttlSeconds: number = this.ttlSeconds): Promise<boolean> {
    await this.maybeSweep();

    return this.withLock(itemId, async () => {
      const now = new Date(this.clock.now()).toISOString();
      // A logically expired row would block the insert below
      await this.repository.deleteIfExpired(itemId, now);
      const claimed = await this.repository.insert(this.newRecord(itemId, ttlSeconds));

      this.logger.debug(claimed ? 'Item claimed' : 'Item already seen', { itemId });
      return claimed;
    });
  }

  /**
   * Drop a claim whose item was never published, so a redelivery can retry it.
   */
  async release(itemId: string): Promise<void> {
    await this.withLock(itemId, () => this.repository.delete(itemId));
    this.logger.debug('Claim released', { itemId });
  }

  /**
   * Physically delete expired rows.
   */
  async sweepExpired(): Promise<number> {
    this.lastSweepAt = this.clock.now();
    const removed = await this.repository.deleteExpired(new Date(this.clock.now()).toISOString());

    if (removed > 0) {
      this.logger.info('Expired dedup records removed', { removed });
    }
    return removed;
  }

  private async maybeSweep(): Promise<void> {
    if (this.clock.now() - this.lastSweepAt < this.sweepIntervalMs) return;

    try {
      await this.sweepExpired();
    } catch (error) {
      // Storage growth only; claims stay correct without the sweep
      this.logger.warn('Dedup sweep failed', { error: errorMessage(error) });
    }
  }

  private newRecord(itemId: string, ttlSeconds: number): DedupRecord {
    const now = this.clock.now();
    return {
      itemId,
      firstSeenAt: new Date(now).toISOString(),
      expiresAt: new Date(now + ttlSeconds * 1000).toISOString(),
    };
  }

  private isLive(record: DedupRecord): boolean {
    return Date.parse(record.expiresAt) > this.clock.now();
  }

  /**
   * Serialize operations on one item id within this process. The
   * repository's atomic insert covers other processes.
   */
  private async withLock<T>(key: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const run = previous.then(operation, operation);
    this.locks.set(key, run);

    try {
      return await run;
    } finally {
      if (this.locks.get(key) === run) {
        this.locks.delete(key);
      }
    }
  }
}
