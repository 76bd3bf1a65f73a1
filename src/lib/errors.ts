/**
 * Newswire Relay — Error Taxonomy
 *
 * "Already seen" is not an error: DedupStore.claim() returns false for it.
 */

/**
 * The payload has no recognisable RSS or Atom root.
 * Entry-level problems never raise this.
 */
export class ParseError extends Error {
  override readonly name = 'ParseError';
}

/**
 * Every key slot is cooling down or exhausted, or the provider refused the request.
 * The item stays unmarked so a redelivery can retry it.
 */
export class RephraseError extends Error {
  override readonly name = 'RephraseError';

  constructor(
    message: string,
    readonly attempts: number = 0
  ) {
    super(message);
  }
}

/**
 * One destination failed. Never propagates to sibling destinations.
 */
export class PublishError extends Error {
  override readonly name = 'PublishError';

  constructor(
    message: string,
    readonly status?: number,
    readonly retryable: boolean = false
  ) {
    super(message);
  }
}

/**
 * The hub rejected a subscribe, unsubscribe or renewal request.
 */
export class SubscriptionError extends Error {
  override readonly name = 'SubscriptionError';

  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
  }
}

/**
 * A push failed signature verification.
 */
export class AuthenticationError extends Error {
  override readonly name = 'AuthenticationError';

  constructor(
    message: string,
    /** 401 when no signature was sent, 403 when it did not match. */
    readonly status: 401 | 403 = 403
  ) {
    super(message);
  }
}

/**
 * Statuses worth retrying: rate limits and server errors.
 */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}
