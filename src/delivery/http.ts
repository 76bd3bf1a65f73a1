/**
 * Newswire Relay — Publish HTTP helper
 *
 * Maps fetch outcomes onto PublishError so the fanout can tell
 * retryable failures (network, timeout, 429, 5xx) from final ones.
 */

import { isTransientStatus, PublishError } from '../lib/errors';
import { errorMessage } from '../lib/logger';

export const DEFAULT_PUBLISH_TIMEOUT_MS = 25_000;

export async function sendPublishRequest(
  url: string,
  init: RequestInit,
  timeoutMs: number = DEFAULT_PUBLISH_TIMEOUT_MS
): Promise<unknown> {
  let res: Response;
  try {
    res = await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw new PublishError(`Request failed: ${errorMessage(error)}`, undefined, true);
  }

  if (!res.ok) {
    const body = await res.text().catch(() => '');
    throw new PublishError(
      `HTTP ${res.status}: ${body.slice(0, 500)}`,
      res.status,
      isTransientStatus(res.status)
    );
  }

  try {
    return await res.json();
  } catch {
    throw new PublishError('Response body is not JSON', res.status, false);
  }
}
