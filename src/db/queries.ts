/**
 * Newswire Relay — Database Query Helpers
 *
 * Storage for dedup records. Table (see db/schema.sql):
 *   processed_items(item_id text primary key, first_seen_at timestamptz, expires_at timestamptz)
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { DedupRecord } from '../types';
import { DEDUP_TABLE, getAdminClient, handleSupabaseError, UNIQUE_VIOLATION } from './client';

const TABLE = DEDUP_TABLE;

const ProcessedItemRowSchema = z.object({
  item_id: z.string(),
  first_seen_at: z.string(),
  expires_at: z.string(),
});
type ProcessedItemRow = z.infer<typeof ProcessedItemRowSchema>;

function toRow(record: DedupRecord): ProcessedItemRow {
  return {
    item_id: record.itemId,
    first_seen_at: record.firstSeenAt,
    expires_at: record.expiresAt,
  };
}

function fromRow(row: ProcessedItemRow): DedupRecord {
  return {
    itemId: row.item_id,
    firstSeenAt: row.first_seen_at,
    expiresAt: row.expires_at,
  };
}

/**
 * Durable storage behind the dedup store.
 * `insert` must be atomic per item id: it reports false when a row already exists.
 */
export interface DedupRepository {
  find(itemId: string): Promise<DedupRecord | null>;
  insert(record: DedupRecord): Promise<boolean>;
  upsert(record: DedupRecord): Promise<void>;
  delete(itemId: string): Promise<void>;
  /** Delete the row for `itemId` only if it expired at or before `now`. */
  deleteIfExpired(itemId: string, now: string): Promise<void>;
  /** Delete every row expired at or before `now`; returns the count removed. */
  deleteExpired(now: string): Promise<number>;
}

export class SupabaseDedupRepository implements DedupRepository {
  constructor(private readonly client: SupabaseClient = getAdminClient()) {}

  async find(itemId: string): Promise<DedupRecord | null> {
    const { data, error } = await this.client
      .from(TABLE)
      .select('item_id, first_seen_at, expires_at')
      .eq('item_id', itemId)
      .maybeSingle();

    if (error) throw handleSupabaseError(error);
    if (!data) return null;
    return fromRow(ProcessedItemRowSchema.parse(data));
  }

  async insert(record: DedupRecord): Promise<boolean> {
    const { error } = await this.client.from(TABLE).insert(toRow(record));

    if (error) {
      if (error.code === UNIQUE_VIOLATION) return false;
      throw handleSupabaseError(error);
    }
    return true;
  }

  async upsert(record: DedupRecord): Promise<void> {
    const { error } = await this.client
      .from(TABLE)
      .upsert(toRow(record), { onConflict: 'item_id' });

    if (error) throw handleSupabaseError(error);
  }

  async delete(itemId: string): Promise<void> {
    const { error } = await this.client.from(TABLE).delete().eq('item_id', itemId);
    if (error) throw handleSupabaseError(error);
  }

  async deleteIfExpired(itemId: string, now: string): Promise<void> {
    const { error } = await this.client
      .from(TABLE)
      .delete()
      .eq('item_id', itemId)
      .lte('expires_at', now);

    if (error) throw handleSupabaseError(error);
  }

  async deleteExpired(now: string): Promise<number> {
    const { error, count } = await this.client
      .from(TABLE)
      .delete({ count: 'exact' })
      .lte('expires_at', now);

    if (error) throw handleSupabaseError(error);
    return count ?? 0;
  }
}
