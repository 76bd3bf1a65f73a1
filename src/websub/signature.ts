/**
 * Newswire Relay — WebSub Signature Verification
 *
 * Hubs sign content distribution requests with the subscription secret:
 * `X-Hub-Signature: <algo>=<hex hmac of the raw body>`.
 */

import crypto from 'crypto';

const SUPPORTED_ALGORITHMS = ['sha1', 'sha256', 'sha384', 'sha512'] as const;
type SignatureAlgorithm = (typeof SUPPORTED_ALGORITHMS)[number];

function isSupportedAlgorithm(value: string): value is SignatureAlgorithm {
  return SUPPORTED_ALGORITHMS.some(algo => algo === value);
}

export function signPayload(
  payload: Buffer | string,
  secret: string,
  algorithm: SignatureAlgorithm = 'sha256'
): string {
  const digest = crypto.createHmac(algorithm, secret).update(payload).digest('hex');
  return `${algorithm}=${digest}`;
}

/**
 * Verify a hub signature header against the raw body.
 * Returns true if signature is valid.
 */
export function verifyHubSignature(
  payload: Buffer | string,
  signature: string | undefined,
  secret: string
): boolean {
  if (!signature || !secret) {
    return false;
  }

  const separator = signature.indexOf('=');
  if (separator <= 0) {
    return false;
  }

  const algorithm = signature.slice(0, separator).trim().toLowerCase();
  const provided = signature.slice(separator + 1).trim();

  if (!isSupportedAlgorithm(algorithm) || !/^[0-9a-f]+$/i.test(provided)) {
    return false;
  }

  const expected = crypto.createHmac(algorithm, secret).update(payload).digest();
  const actual = Buffer.from(provided, 'hex');

  return actual.length === expected.length && crypto.timingSafeEqual(actual, expected);
}
