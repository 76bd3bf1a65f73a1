/**
 * Newswire Relay — Delivery Types
 */

import type { Destination, Item, RephrasedContent } from '../types';

/**
 * One platform's posting call. Resolves to the platform's post id and
 * throws PublishError on failure.
 */
export interface PlatformPublisher {
  publish(destination: Destination, content: RephrasedContent, item: Item): Promise<string>;
}
