/**
 * Feed payloads and items shared by tests.
 */

import type { Destination, Item } from '../../src/types';

export const RSS_TWO_ITEMS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Example News</title>
    <link>https://news.example.com/</link>
    <item>
      <title>First story</title>
      <link>https://news.example.com/first</link>
      <guid isPermaLink="false">story-1</guid>
      <description>&lt;p&gt;Something &lt;b&gt;happened&lt;/b&gt; today&lt;/p&gt;</description>
      <pubDate>Tue, 10 Mar 2026 08:00:00 GMT</pubDate>
    </item>
    <item>
      <title>Second story</title>
      <description>No link here</description>
      <pubDate>Tue, 10 Mar 2026 09:30:00 GMT</pubDate>
    </item>
  </channel>
</rss>`;

export const ATOM_FEED = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Example Atom</title>
  <entry>
    <title>Atom entry</title>
    <id>urn:uuid:1225c695-cfb8-4ebb-aaaa-80da344efa6a</id>
    <link rel="self" href="https://atom.example.com/self/1"/>
    <link rel="alternate" href="https://atom.example.com/posts/1"/>
    <updated>2026-03-10T12:00:00Z</updated>
    <summary>Short summary</summary>
  </entry>
</feed>`;

export const RSS_WITH_BROKEN_ENTRY = `<rss version="2.0"><channel>
<item><title>Good one</title><guid>good-1</guid><description>fine</description></item>
<item><title>Broken<guid>bad-1</guid></item>
<item><title>Good two</title><guid>good-2</guid><description>also fine</description></item>
</channel></rss>`;

export function makeItem(overrides: Partial<Item> = {}): Item {
  return {
    id: 'item-1',
    title: 'Test headline',
    summary: 'Test summary',
    link: 'https://news.example.com/item-1',
    ...overrides,
  };
}

export function makeDestination(overrides: Partial<Destination> = {}): Destination {
  return {
    platform: 'facebook',
    accountRef: 'page-1',
    credential: 'test-token',
    enabled: true,
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
