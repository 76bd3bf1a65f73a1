/**
 * Newswire Relay — Feeds Module
 *
 * Parsing, normalization, dedup and polling of RSS/Atom feeds.
 */

export {
  detectFormat,
  extractEntryBlocks,
  parseEntryBlock,
  parseFeed,
  parseItems,
} from './parser';

export {
  normalizeEntry,
  generateContentHash,
  normalizeDate,
  stripHtml,
  decodeEntities,
  findFirstUrl,
} from './normalizer';

export { DedupStore, type DedupStoreOptions } from './dedup';

export {
  fetchFeed,
  fetchFeeds,
  type FeedFetchResult,
  type FetchFeedsOptions,
} from './fetch';
