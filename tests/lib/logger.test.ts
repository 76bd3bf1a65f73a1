/**
 * Tests for log formatting and credential masking
 */

import { describe, it, expect, vi } from 'vitest';
import { createLogger, formatEntry, maskSecret, redactContext, timeOperation } from '../../src/lib/logger';

describe('maskSecret', () => {
  it('should keep only the last four characters', () => {
    expect(maskSecret('test-token-1234')).toBe('****1234');
  });

  it('should fully mask short values', () => {
    expect(maskSecret('abcd')).toBe('****');
  });
});

describe('redactContext', () => {
  it('should mask credential-like keys', () => {
    expect(
      redactContext({
        accessToken: 'test-token-9876',
        hubSecret: 'test-secret',
        apiKey: 'key-0001',
        itemId: 'item-1',
      })
    ).toEqual({
      accessToken: '****9876',
      hubSecret: '****cret',
      apiKey: '****0001',
      itemId: 'item-1',
    });
  });

  it('should reduce errors to their message', () => {
    expect(redactContext({ error: new Error('boom') })).toEqual({ error: 'boom' });
  });

  it('should leave non-string credential values alone', () => {
    expect(redactContext({ tokenCount: 3 })).toEqual({ tokenCount: 3 });
  });
});

describe('formatEntry', () => {
  const entry = {
    timestamp: '2026-03-10T08:15:30.123Z',
    level: 'warn' as const,
    message: 'Publish failed',
    context: { platform: 'twitter' },
  };

  it('should render a readable line', () => {
    expect(formatEntry(entry, false)).toBe('08:15:30 WARN  Publish failed {"platform":"twitter"}');
  });

  it('should render JSON', () => {
    expect(JSON.parse(formatEntry(entry, true))).toEqual(entry);
  });
});

describe('createLogger', () => {
  it('should merge child context and drop entries under the threshold', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const logger = createLogger({ service: 'test' }).child({ component: 'fanout' });
    logger.error('Failed', { credential: 'test-token-5555' });
    logger.info('Dropped');

    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0][0])).toMatch(
      /ERROR Failed \{"service":"test","component":"fanout","credential":"\*\*\*\*5555"\}$/
    );
    expect(log).not.toHaveBeenCalled();

    error.mockRestore();
    log.mockRestore();
  });
});

describe('timeOperation', () => {
  it('should return the result and rethrow failures', async () => {
    await expect(timeOperation('ok', async () => 42)).resolves.toBe(42);
    await expect(
      timeOperation('fails', async () => {
        throw new Error('nope');
      })
    ).rejects.toThrow('nope');
  });
});
