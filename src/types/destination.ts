/**
 * Newswire Relay — Destination Types
 */

import { z } from 'zod';

export const PlatformSchema = z.enum(['facebook', 'twitter']);
export type Platform = z.infer<typeof PlatformSchema>;

/**
 * A configured publish target. Loaded once at start and never mutated.
 */
export interface Destination {
  platform: Platform;
  /** Opaque account identifier, safe to log. */
  accountRef: string;
  /** Access token for the account; never logged. */
  credential: string;
  enabled: boolean;
}

export interface PublishResult {
  destination: Destination;
  success: boolean;
  postId?: string;
  attempts: number;
  errorDetail?: string;
}
