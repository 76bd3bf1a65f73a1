/**
 * Newswire Relay — Facebook Page Delivery
 *
 * Items with an image go out as a photo post with the rewrite as caption;
 * everything else as a feed post carrying the item link.
 */

import { z } from 'zod';
import { PublishError } from '../lib/errors';
import type { Destination, Item, RephrasedContent } from '../types';
import { sendPublishRequest } from './http';
import type { PlatformPublisher } from './types';

const GRAPH_BASE_URL = 'https://graph.facebook.com';

const GraphPostSchema = z.object({
  id: z.string().min(1),
  post_id: z.string().optional(),
});

export interface FacebookPublisherConfig {
  graphVersion?: string;
  timeoutMs?: number;
}

export class FacebookPublisher implements PlatformPublisher {
  private readonly graphVersion: string;

  constructor(private readonly config: FacebookPublisherConfig = {}) {
    this.graphVersion = config.graphVersion ?? 'v19.0';
  }

  /** Graph endpoint and form fields for one post. */
  buildRequest(
    pageId: string,
    content: RephrasedContent,
    item: Item
  ): { url: string; params: Record<string, string> } {
    const base = `${GRAPH_BASE_URL}/${this.graphVersion}/${encodeURIComponent(pageId)}`;

    if (item.imageUrl) {
      return {
        url: `${base}/photos`,
        params: { url: item.imageUrl, caption: content.text },
      };
    }

    const params: Record<string, string> = { message: content.text };
    if (item.link) {
      params.link = item.link;
    }
    return { url: `${base}/feed`, params };
  }

  async publish(destination: Destination, content: RephrasedContent, item: Item): Promise<string> {
    const { url, params } = this.buildRequest(destination.accountRef, content, item);

    const body = await sendPublishRequest(
      url,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({ ...params, access_token: destination.credential }).toString(),
      },
      this.config.timeoutMs
    );

    const parsed = GraphPostSchema.safeParse(body);
    if (!parsed.success) {
      throw new PublishError('No post id returned');
    }
    return parsed.data.post_id ?? parsed.data.id;
  }
}
