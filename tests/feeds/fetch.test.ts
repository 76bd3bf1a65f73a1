/**
 * Tests for the polling fallback
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fetchFeed, fetchFeeds } from '../../src/feeds';
import { ATOM_FEED, RSS_TWO_ITEMS } from '../helpers/fixtures';

const mockFetch = vi.fn<typeof fetch>();
global.fetch = mockFetch;

function xmlResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'Content-Type': 'application/rss+xml' } });
}

describe('fetchFeed', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('should parse the fetched payload and tag items with the feed url', async () => {
    mockFetch.mockResolvedValueOnce(xmlResponse(RSS_TWO_ITEMS));

    const items = await fetchFeed('https://news.example.com/rss');

    expect(items).toHaveLength(2);
    expect(items[0].id).toBe('story-1');
    expect(items[0].source).toBe('https://news.example.com/rss');
    expect(mockFetch).toHaveBeenCalledWith('https://news.example.com/rss', expect.objectContaining({
      headers: expect.objectContaining({ Accept: expect.stringContaining('application/rss+xml') }),
    }));
  });

  it('should throw on a non-2xx response', async () => {
    mockFetch.mockResolvedValueOnce(xmlResponse('gone', 404));

    await expect(fetchFeed('https://news.example.com/rss')).rejects.toThrow(
      'HTTP 404 from https://news.example.com/rss'
    );
  });
});

describe('fetchFeeds', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('should report each feed separately without throwing', async () => {
    mockFetch.mockImplementation(async input => {
      const url = String(input);
      if (url.includes('atom')) return xmlResponse(ATOM_FEED);
      throw new Error('connection refused');
    });

    const results = await fetchFeeds(['https://atom.example.com/feed', 'https://down.example.com/rss'], {
      concurrency: 1,
    });

    expect(results).toHaveLength(2);
    expect(results[0]).toMatchObject({ url: 'https://atom.example.com/feed', success: true });
    expect(results[0].items.map(item => item.id)).toEqual(['urn:uuid:1225c695-cfb8-4ebb-aaaa-80da344efa6a']);
    expect(results[1]).toEqual({
      url: 'https://down.example.com/rss',
      success: false,
      items: [],
      error: 'connection refused',
    });
  });
});
