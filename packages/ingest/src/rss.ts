// =============================================================================
// @cadence/ingest — RSS/Atom feed reader
// =============================================================================
// Fetches a feed with a timeout and size limit, parses RSS 2.0 or Atom, and
// turns the first entries into sanitized pipeline items.
// =============================================================================

import { XMLParser } from "fast-xml-parser";
import { cleanFeedText, truncate, type Item } from "@cadence/shared";

/**
 * Maximum feed size in bytes.
 */
const MAX_FEED_SIZE = 5 * 1024 * 1024;

export interface FeedReadOptions {
  /** Keep at most this many titled entries. */
  itemsPerSource: number;
  /** Truncate item content to this many characters. */
  maxContentChars: number;
}

export interface FeedFetchOptions extends FeedReadOptions {
  timeoutMs: number;
}

/** Reads one feed; rejects when the feed cannot be fetched or parsed. */
export type FeedFetcher = (
  url: string,
  source: string,
  options: FeedFetchOptions,
) => Promise<Item[]>;

/**
 * Extract text content from a potentially complex XML node.
 * Handles both simple text and nodes that carry attributes.
 */
function extractText(node: unknown): string {
  if (typeof node === "string") return node;
  if (typeof node === "number") return String(node);
  if (node === null || typeof node !== "object") return "";
  if (Array.isArray(node)) return extractText(node[0]);

  const textValue: unknown = Reflect.get(node, "#text");
  if (typeof textValue === "string") return textValue;
  if (typeof textValue === "number") return String(textValue);

  return "";
}

function asRecord(node: unknown): Record<string, unknown> | undefined {
  if (typeof node !== "object" || node === null || Array.isArray(node)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(node));
}

function asRecords(node: unknown): Record<string, unknown>[] {
  const list = Array.isArray(node) ? node : node === undefined ? [] : [node];
  return list.flatMap((entry) => {
    const record = asRecord(entry);
    return record ? [record] : [];
  });
}

/**
 * Atom links are elements with an href attribute; prefer rel="alternate".
 */
function extractAtomLink(node: unknown): string {
  const links = asRecords(node);
  const alternate =
    links.find((l) => l["@_rel"] === "alternate" || l["@_rel"] === undefined) ??
    links[0];
  if (alternate) return extractText(alternate["@_href"]);
  return extractText(node);
}

function toItem(
  source: string,
  fields: { title: unknown; content: unknown; date: unknown; link: string },
  options: FeedReadOptions,
): Item | null {
  const title = cleanFeedText(extractText(fields.title));
  if (!title) return null;

  return {
    source,
    title,
    content: truncate(cleanFeedText(extractText(fields.content)), options.maxContentChars),
    publishedLabel: cleanFeedText(extractText(fields.date)),
    link: cleanFeedText(fields.link),
  };
}

function parseRss2(
  channel: Record<string, unknown>,
  source: string,
  options: FeedReadOptions,
): Item[] {
  const items: Item[] = [];
  for (const entry of asRecords(channel["item"]).slice(0, options.itemsPerSource)) {
    const item = toItem(
      source,
      {
        title: entry["title"],
        content: entry["content:encoded"] ?? entry["description"],
        date: entry["pubDate"] ?? entry["dc:date"],
        link: extractText(entry["link"]),
      },
      options,
    );
    if (item) items.push(item);
  }
  return items;
}

function parseAtom(
  feed: Record<string, unknown>,
  source: string,
  options: FeedReadOptions,
): Item[] {
  const items: Item[] = [];
  for (const entry of asRecords(feed["entry"]).slice(0, options.itemsPerSource)) {
    const item = toItem(
      source,
      {
        title: entry["title"],
        content: entry["content"] ?? entry["summary"],
        date: entry["published"] ?? entry["updated"],
        link: extractAtomLink(entry["link"]),
      },
      options,
    );
    if (item) items.push(item);
  }
  return items;
}

/**
 * Parses RSS 2.0 or Atom XML into items, in feed order.
 *
 * Entries without a title are skipped after the per-source cut, so a feed
 * yields at most `itemsPerSource` items.
 */
export function parseFeedXml(
  xml: string,
  source: string,
  options: FeedReadOptions,
): Item[] {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    textNodeName: "#text",
    parseTagValue: false,
    htmlEntities: true,
  });

  const data = asRecord(parser.parse(xml));
  if (!data) throw new Error("Feed document is empty");

  const channel = asRecord(asRecord(data["rss"])?.["channel"] ?? data["channel"]);
  if (channel) return parseRss2(channel, source, options);

  const feed = asRecord(data["feed"]);
  if (feed) return parseAtom(feed, source, options);

  throw new Error("Unknown feed format: not RSS 2.0 or Atom");
}

/**
 * Fetch and parse an RSS or Atom feed.
 */
export const fetchFeed: FeedFetcher = async (url, source, options) => {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, options.timeoutMs);

  let xml: string;
  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: {
        "User-Agent": "cadence-brief/0.1 (RSS Feed Reader)",
        Accept: "application/rss+xml, application/atom+xml, application/xml, text/xml, */*",
      },
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }

    const contentLength = response.headers.get("content-length");
    if (contentLength && parseInt(contentLength, 10) > MAX_FEED_SIZE) {
      throw new Error(`Feed too large: ${contentLength} bytes`);
    }

    xml = await response.text();
  } finally {
    clearTimeout(timeoutId);
  }

  if (xml.length > MAX_FEED_SIZE) {
    throw new Error(`Feed too large: ${xml.length} characters`);
  }
  return parseFeedXml(xml, source, options);
};
