/**
 * Tests for hub signature verification (HMAC over the raw body)
 */

import { describe, it, expect } from 'vitest';
import crypto from 'crypto';
import { signPayload, verifyHubSignature } from '../../src/websub/signature';

describe('verifyHubSignature', () => {
  const secret = 'test-secret';
  const payload = '<rss><channel></channel></rss>';

  it('should accept a valid sha256 signature', () => {
    const digest = crypto.createHmac('sha256', secret).update(payload).digest('hex');
    expect(verifyHubSignature(payload, `sha256=${digest}`, secret)).toBe(true);
  });

  it('should accept sha1, sha384 and sha512 signatures', () => {
    for (const algo of ['sha1', 'sha384', 'sha512'] as const) {
      expect(verifyHubSignature(payload, signPayload(payload, secret, algo), secret)).toBe(true);
    }
  });

  it('should accept Buffer payloads', () => {
    const body = Buffer.from(payload);
    expect(verifyHubSignature(body, signPayload(body, secret), secret)).toBe(true);
  });

  it('should reject a tampered payload', () => {
    const signature = signPayload(payload, secret);
    expect(verifyHubSignature(`${payload} `, signature, secret)).toBe(false);
  });

  it('should reject the wrong secret', () => {
    expect(verifyHubSignature(payload, signPayload(payload, secret), 'other-secret')).toBe(false);
  });

  it('should reject missing or malformed signatures', () => {
    expect(verifyHubSignature(payload, undefined, secret)).toBe(false);
    expect(verifyHubSignature(payload, 'sha256', secret)).toBe(false);
    expect(verifyHubSignature(payload, '=abc', secret)).toBe(false);
    expect(verifyHubSignature(payload, 'md5=abcdef', secret)).toBe(false);
    expect(verifyHubSignature(payload, 'sha256=not-hex!', secret)).toBe(false);
  });

  it('should reject a truncated digest', () => {
    const signature = signPayload(payload, secret);
    expect(verifyHubSignature(payload, signature.slice(0, -2), secret)).toBe(false);
  });
});
