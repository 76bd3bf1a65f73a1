/**
 * Newswire Relay — Type Exports
 */

export type {
  Item,
  FeedFormat,
  EntryParseResult,
  ParsedFeed,
  DedupRecord,
  RephrasedContent,
} from './feed-item';
export { ItemSchema } from './feed-item';

export type { Platform, Destination, PublishResult } from './destination';
export { PlatformSchema } from './destination';
