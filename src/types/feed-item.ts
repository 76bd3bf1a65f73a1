/**
 * Newswire Relay — Feed Item Types
 *
 * Every pushed or polled entry, RSS or Atom, is normalized to an Item
 * before it reaches dedup, rewriting or publishing.
 */

import { z } from 'zod';

// ============================================================
// ITEM
// ============================================================

export const ItemSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  link: z.string().optional(),
  summary: z.string(),
  publishedAt: z.string().optional(), // ISO-8601 when the feed date parsed
  imageUrl: z.string().optional(),
  source: z.string().optional(), // topic/feed URL the item arrived from
});
export type Item = z.infer<typeof ItemSchema>;

export type FeedFormat = 'rss2' | 'rss1' | 'atom';

/**
 * Outcome of parsing one entry element. Routine malformed entries are
 * reported here instead of thrown.
 */
export type EntryParseResult =
  | { ok: true; item: Item }
  | { ok: false; index: number; reason: string };

export interface ParsedFeed {
  format: FeedFormat;
  /** Re-iterable; every pass yields the same results. */
  entries: Iterable<EntryParseResult>;
}

// ============================================================
// DEDUP
// ============================================================

export interface DedupRecord {
  itemId: string;
  firstSeenAt: string;
  expiresAt: string;
}

// ============================================================
// REPHRASE
// ============================================================

export interface RephrasedContent {
  text: string;
  sourceItemId: string;
}
