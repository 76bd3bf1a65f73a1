/**
 * Newswire Relay — Feed Parser
 *
 * Parses pushed or polled RSS 2.0, RSS 1.0 and Atom payloads into Items
 * without being told the format. Each entry element is cut out of the
 * document and parsed on its own, so one broken entry costs only that
 * entry. Bare ampersands, common in titles, are escaped rather than
 * failing the entry.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ParseError } from '../lib/errors';
import { logger } from '../lib/logger';
import type { EntryParseResult, FeedFormat, Item, ParsedFeed } from '../types';
import { normalizeEntry, type XmlNode } from './normalizer';

const log = logger.child({ component: 'feed-parser' });

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  removeNSPrefix: false,
  htmlEntities: true,
});

// ============================================================
// FORMAT DETECTION
// ============================================================

const ROOT_FORMATS: Record<string, FeedFormat> = {
  rss: 'rss2',
  channel: 'rss2',
  rdf: 'rss1',
  feed: 'atom',
};

function localName(qualified: string): string {
  const colon = qualified.indexOf(':');
  return (colon === -1 ? qualified : qualified.slice(colon + 1)).toLowerCase();
}

/**
 * Strip prolog noise (declaration, comments, doctype, processing
 * instructions) so the first tag left is the root.
 */
function stripProlog(xml: string): string {
  return xml
    .replace(/^\uFEFF/, '')
    .replace(/<\?[\s\S]*?\?>/g, '')
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<!DOCTYPE[^>[]*(\[[\s\S]*?\])?\s*>/gi, '');
}

/**
 * Identify the feed format from the root element, falling back to searching
 * for a root anywhere in the document.
 */
export function detectFormat(xml: string): FeedFormat {
  const body = stripProlog(xml);
  const rootMatch = body.match(/<([A-Za-z_][\w.:-]*)/);

  if (rootMatch) {
    const format = ROOT_FORMATS[localName(rootMatch[1])];
    if (format) return format;
  }

  const rootPatterns: Array<[RegExp, FeedFormat]> = [
    [/<(?:[\w-]+:)?feed[\s>]/, 'atom'],
    [/<rdf:RDF[\s>]/, 'rss1'],
    [/<rss[\s>]/, 'rss2'],
    [/<channel[\s>]/, 'rss2'],
  ];

  for (const [pattern, format] of rootPatterns) {
    if (pattern.test(body)) return format;
  }

  throw new ParseError('No RSS or Atom root element found');
}

// ============================================================
// ENTRY EXTRACTION
// ============================================================

/**
 * Cut out every entry element. An entry runs from its opening tag to the
 * first matching close tag before the next opening tag; an entry left open
 * ends where the next one starts and fails validation on its own.
 */
export function extractEntryBlocks(xml: string, format: FeedFormat): string[] {
  const tag = format === 'atom' ? 'entry' : 'item';
  const opening = new RegExp(`<((?:[A-Za-z_][\\w.-]*:)?${tag})(?=[\\s>/])[^>]*>`, 'g');

  const starts: Array<{ index: number; name: string; selfClosing: boolean }> = [];
  for (const match of xml.matchAll(opening)) {
    starts.push({
      index: match.index ?? 0,
      name: match[1],
      selfClosing: match[0].endsWith('/>'),
    });
  }

  const blocks: string[] = [];

  starts.forEach((start, i) => {
    const limit = i + 1 < starts.length ? starts[i + 1].index : xml.length;
    if (start.selfClosing) {
      blocks.push(xml.slice(start.index, xml.indexOf('>', start.index) + 1));
      return;
    }

    const region = xml.slice(start.index, limit);
    const closing = new RegExp(`</${start.name.replace('.', '\\.')}\\s*>`).exec(region);
    blocks.push(closing ? region.slice(0, closing.index + closing[0].length) : region);
  });

  return blocks;
}

// ============================================================
// ENTRY PARSING
// ============================================================

const BARE_AMPERSAND = /&(?!#\d+;|#x[0-9a-f]+;|[a-z][\w.-]*;)/gi;

/**
 * Escape `&` that does not start a character or entity reference.
 */
export function escapeBareAmpersands(xml: string): string {
  return xml.replace(BARE_AMPERSAND, '&amp;');
}

export function parseEntryBlock(rawBlock: string, index: number, format: FeedFormat): EntryParseResult {
  const block = escapeBareAmpersands(rawBlock);
  const validation = XMLValidator.validate(block);
  if (validation !== true) {
    return {
      ok: false,
      index,
      reason: `${validation.err.code}: ${validation.err.msg}`,
    };
  }

  try {
    const document: Record<string, XmlNode> = xmlParser.parse(block);
    const rootKey = Object.keys(document).find(key => !key.startsWith('?'));
    const entry = rootKey === undefined ? undefined : document[rootKey];
    const node = Array.isArray(entry) ? entry[0] : entry;

    if (node === undefined) {
      return { ok: false, index, reason: 'Empty entry' };
    }

    return { ok: true, item: normalizeEntry(node, format) };
  } catch (error) {
    return {
      ok: false,
      index,
      reason: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Entries of one document. Parsing happens during iteration, and every
 * iteration re-derives the same results from the same blocks.
 */
class FeedEntries implements Iterable<EntryParseResult> {
  constructor(
    private readonly blocks: readonly string[],
    private readonly format: FeedFormat
  ) {}

  *[Symbol.iterator](): Iterator<EntryParseResult> {
    for (let i = 0; i < this.blocks.length; i++) {
      yield parseEntryBlock(this.blocks[i], i, this.format);
    }
  }
}

// ============================================================
// PUBLIC API
// ============================================================

/**
 * Parse a feed payload.
 * Throws ParseError only when no RSS or Atom root can be located.
 */
export function parseFeed(raw: string | Buffer): ParsedFeed {
  const xml = typeof raw === 'string' ? raw : raw.toString('utf8');
  const format = detectFormat(xml);
  const blocks = extractEntryBlocks(xml, format);

  return { format, entries: new FeedEntries(blocks, format) };
}

/**
 * Parse a payload and keep the well-formed entries, logging the skipped ones.
 */
export function parseItems(raw: string | Buffer, source?: string): Item[] {
  const feed = parseFeed(raw);
  const items: Item[] = [];
  let skipped = 0;

  for (const result of feed.entries) {
    if (result.ok) {
      items.push(source ? { ...result.item, source } : result.item);
    } else {
      skipped++;
      log.warn('Skipping malformed entry', { index: result.index, reason: result.reason, source });
    }
  }

  log.info('Feed parsed', { format: feed.format, items: items.length, skipped, source });

  return items;
}
