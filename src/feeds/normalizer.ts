/**
 * Newswire Relay — Feed Item Normalizer
 *
 * Turns the loosely-typed node fast-xml-parser produces for one entry into an
 * Item. Field lookups walk fallback chains because publishers disagree on
 * which elements they fill in.
 */

import { createHash } from 'crypto';
import { ItemSchema } from '../types';
import type { FeedFormat, Item } from '../types';

// ============================================================
// NODE ACCESS
// ============================================================

/** What fast-xml-parser yields for an element: text, attributes, children. */
export type XmlNode = string | number | boolean | XmlNode[] | { [key: string]: XmlNode };

type XmlObject = { [key: string]: XmlNode };

function isObject(node: XmlNode | undefined): node is XmlObject {
  return typeof node === 'object' && node !== null && !Array.isArray(node);
}

/**
 * Values of every child named `name`, unprefixed first, then any
 * namespace-prefixed variant (`dc:date`, `atom:link`).
 */
function children(node: XmlObject, name: string): XmlNode[] {
  const exact: XmlNode[] = [];
  const prefixed: XmlNode[] = [];

  for (const [key, value] of Object.entries(node)) {
    const target = key === name ? exact : key.endsWith(`:${name}`) ? prefixed : null;
    if (!target) continue;
    if (Array.isArray(value)) {
      target.push(...value);
    } else {
      target.push(value);
    }
  }

  return [...exact, ...prefixed];
}

function attr(node: XmlNode | undefined, name: string): string | undefined {
  if (!isObject(node)) return undefined;
  const value = node[`@_${name}`];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/**
 * All text under a node, attributes excluded.
 */
export function collectText(node: XmlNode | undefined): string {
  if (node === undefined) return '';
  if (typeof node === 'string') return node;
  if (typeof node === 'number' || typeof node === 'boolean') return String(node);
  if (Array.isArray(node)) return node.map(collectText).join(' ');

  return Object.entries(node)
    .filter(([key]) => !key.startsWith('@_'))
    .map(([, value]) => collectText(value))
    .join(' ');
}

function firstText(node: XmlObject, ...names: string[]): string {
  for (const name of names) {
    for (const value of children(node, name)) {
      const text = collectText(value).trim();
      if (text) return text;
    }
  }
  return '';
}

// ============================================================
// TEXT CLEANUP
// ============================================================

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  ndash: '-',
  mdash: '-',
  hellip: '...',
  lsquo: "'",
  rsquo: "'",
  ldquo: '"',
  rdquo: '"',
};

/**
 * Decode the entities that survive XML parsing (double-escaped HTML).
 * Unknown entities are left as written.
 */
export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity[0] === '#') {
      const code = entity[1] === 'x' || entity[1] === 'X'
        ? parseInt(entity.slice(2), 16)
        : parseInt(entity.slice(1), 10);
      return Number.isFinite(code) && code > 0 && code <= 0x10ffff
        ? String.fromCodePoint(code)
        : match;
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

/**
 * Plain text from an HTML fragment.
 */
export function stripHtml(html: string): string {
  return decodeEntities(
    html
      .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
      .replace(/<[^>]*>/g, ' ')
  )
    .replace(/\s+/g, ' ')
    .trim();
}

const URL_PATTERN = /https?:\/\/[^\s<>"')\]]+/i;

export function isUrl(value: string): boolean {
  return /^https?:\/\/\S+$/i.test(value);
}

/**
 * First http(s) URL anywhere in a text or HTML fragment.
 */
export function findFirstUrl(text: string): string | undefined {
  const href = text.match(/href\s*=\s*["'](https?:\/\/[^"']+)["']/i);
  if (href) return decodeEntities(href[1]);

  const match = text.match(URL_PATTERN);
  return match ? decodeEntities(match[0]).replace(/[.,;:!?]+$/, '') : undefined;
}

export function normalizeDate(raw: string): string | undefined {
  if (!raw) return undefined;
  const parsed = new Date(raw);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed.toISOString();
}

// ============================================================
// IDENTITY
// ============================================================

/**
 * Fallback identity for entries with neither guid/id nor link.
 * Depends only on the entry's own bytes, so redeliveries hash identically.
 */
export function generateContentHash(title: string, rawDate: string): string {
  const content = `${title.trim()}\n${rawDate.trim()}`;
  return `hash:${createHash('sha256').update(content).digest('hex').slice(0, 32)}`;
}

// ============================================================
// IMAGES
// ============================================================

const IMAGE_EXTENSION = /\.(jpe?g|png|gif|webp)(\?.*)?$/i;

function looksLikeImage(url: string, type?: string, medium?: string): boolean {
  if (type?.toLowerCase().startsWith('image/')) return true;
  if (medium?.toLowerCase() === 'image') return true;
  return IMAGE_EXTENSION.test(url);
}

function findImage(node: XmlObject, link: string | undefined): string | undefined {
  for (const enclosure of children(node, 'enclosure')) {
    const url = attr(enclosure, 'url');
    if (url && looksLikeImage(url, attr(enclosure, 'type'))) return url;
  }

  for (const media of [...children(node, 'content'), ...children(node, 'thumbnail')]) {
    const url = attr(media, 'url');
    if (url && looksLikeImage(url, attr(media, 'type'), attr(media, 'medium'))) return url;
  }

  for (const atomLink of children(node, 'link')) {
    const href = attr(atomLink, 'href');
    if (href && attr(atomLink, 'rel') === 'enclosure' && looksLikeImage(href, attr(atomLink, 'type'))) {
      return href;
    }
  }

  return link && IMAGE_EXTENSION.test(link) ? link : undefined;
}

// ============================================================
// ENTRY NORMALIZERS
// ============================================================

function summaryText(node: XmlObject): string {
  // media:content carries attributes only, so collectText ignores it
  return firstText(node, 'description', 'summary', 'encoded', 'content');
}

function normalizeRssEntry(node: XmlObject): Item {
  const title = stripHtml(firstText(node, 'title'));
  const rawSummary = summaryText(node);
  const rawDate = firstText(node, 'pubDate', 'date', 'published', 'updated');

  const guidNode = children(node, 'guid')[0];
  const guid = collectText(guidNode).trim();
  const guidIsLink = isUrl(guid) && attr(guidNode, 'isPermaLink') !== 'false';

  let structuredLink = '';
  for (const value of children(node, 'link')) {
    structuredLink = (attr(value, 'href') ?? collectText(value)).trim();
    if (structuredLink) break;
  }

  const link = structuredLink || (guidIsLink ? guid : '') || findFirstUrl(rawSummary);

  return buildItem({
    id: guid || structuredLink || generateContentHash(title, rawDate),
    title,
    link: link || undefined,
    rawSummary,
    rawDate,
    node,
  });
}

function normalizeAtomEntry(node: XmlObject): Item {
  const title = stripHtml(firstText(node, 'title'));
  const rawSummary = firstText(node, 'summary', 'content');
  const rawDate = firstText(node, 'published', 'updated', 'issued', 'modified');
  const atomId = firstText(node, 'id');

  const links = children(node, 'link');
  const alternate = links.find(l => {
    const rel = attr(l, 'rel');
    return attr(l, 'href') && (rel === undefined || rel === 'alternate');
  });
  const alternateHref = attr(alternate, 'href');
  const anyHref = links.map(l => attr(l, 'href')).find(href => href !== undefined);

  const link = alternateHref ?? anyHref ?? (isUrl(atomId) ? atomId : findFirstUrl(rawSummary));

  return buildItem({
    id: atomId || alternateHref || generateContentHash(title, rawDate),
    title,
    link,
    rawSummary,
    rawDate,
    node,
  });
}

function buildItem(fields: {
  id: string;
  title: string;
  link: string | undefined;
  rawSummary: string;
  rawDate: string;
  node: XmlObject;
}): Item {
  const candidate: Item = {
    id: fields.id,
    title: fields.title,
    summary: stripHtml(fields.rawSummary),
  };

  if (fields.link) candidate.link = fields.link;
  const publishedAt = normalizeDate(fields.rawDate);
  if (publishedAt) candidate.publishedAt = publishedAt;
  const imageUrl = findImage(fields.node, fields.link);
  if (imageUrl) candidate.imageUrl = imageUrl;

  return ItemSchema.parse(candidate);
}

/**
 * Normalize one parsed entry element.
 * Throws when the entry has nothing to publish (no title, summary or link).
 */
export function normalizeEntry(node: XmlNode, format: FeedFormat): Item {
  if (!isObject(node)) {
    throw new Error('Entry has no child elements');
  }

  const item = format === 'atom' ? normalizeAtomEntry(node) : normalizeRssEntry(node);

  if (!item.title && !item.summary && !item.link) {
    throw new Error('Entry has no title, summary or link');
  }

  return item;
}
