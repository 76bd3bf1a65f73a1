/**
 * Newswire Relay — Twitter/X Delivery
 *
 * Posts the rewrite as a tweet through the v2 API, one bearer token per account.
 */

import { z } from 'zod';
import { PublishError } from '../lib/errors';
import type { Destination, Item, RephrasedContent } from '../types';
import { sendPublishRequest } from './http';
import type { PlatformPublisher } from './types';

const TWEETS_URL = 'https://api.twitter.com/2/tweets';
export const TWEET_MAX_LENGTH = 280;

const TweetResponseSchema = z.object({
  data: z.object({ id: z.string().min(1) }),
});

/** Weight X gives every link, whatever its length (t.co wrapping). */
export const TWEET_URL_WEIGHT = 23;

const URL_IN_TEXT = /https?:\/\/\S+/g;

/**
 * Length as X counts it: code points, with each link weighted as a t.co link.
 */
export function tweetLength(text: string): number {
  return [...text.replace(URL_IN_TEXT, 'x'.repeat(TWEET_URL_WEIGHT))].length;
}

/**
 * Rewrite plus item link, cut to the tweet limit. The link is appended only
 * when the rewrite does not already contain it, and is never cut.
 */
export function composeTweet(text: string, link?: string): string {
  const body = text.trim();
  const suffix = link && !body.includes(link) ? `\n\n${link}` : '';
  const suffixLength = suffix ? 2 + TWEET_URL_WEIGHT : 0;

  if (tweetLength(body) + suffixLength <= TWEET_MAX_LENGTH) {
    return body + suffix;
  }

  const room = TWEET_MAX_LENGTH - suffixLength - 1;
  const cut = [...body].slice(0, room).join('').trimEnd();
  return `${cut}…${suffix}`;
}

export class TwitterPublisher implements PlatformPublisher {
  constructor(private readonly timeoutMs?: number) {}

  async publish(destination: Destination, content: RephrasedContent, item: Item): Promise<string> {
    const text = composeTweet(content.text, item.link);

    const body = await sendPublishRequest(
      TWEETS_URL,
      {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${destination.credential}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ text }),
      },
      this.timeoutMs
    );

    const parsed = TweetResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new PublishError('No tweet id returned');
    }
    return parsed.data.data.id;
  }
}
