import * as cheerio from "cheerio";
import { XMLParser } from "fast-xml-parser";

export type FeedFormat = "rss" | "atom" | "rdf";

export type FeedEntry = {
  /** Empty when the entry has none. */
  title: string;
  url: string;
  id?: string;
  author?: string;
  /** Raw date string as published. */
  publishedAt?: string;
  summary?: string;
  contentHtml?: string;
  imageUrl?: string;
};

export type ParsedFeed = {
  format: FeedFormat;
  title: string;
  entries: FeedEntry[];
};

type XmlNode = Record<string, unknown>;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true
});

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function get(node: unknown, key: string): unknown {
  return isNode(node) ? node[key] : undefined;
}

function asArray(value: unknown): unknown[] {
  if (value == null || value === "") return [];
  return Array.isArray(value) ? value : [value];
}

function textOf(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number") return String(value);
  if (Array.isArray(value)) return textOf(value[0]);
  const text = get(value, "#text");
  return typeof text === "string" ? text.trim() : "";
}

function attrOf(value: unknown, name: string): string {
  const attr = get(value, `@_${name}`);
  return typeof attr === "string" ? attr.trim() : "";
}

function firstText(node: unknown, keys: string[]): string | undefined {
  for (const key of keys) {
    const text = textOf(get(node, key));
    if (text) return text;
  }
  return undefined;
}

function pickAtomLink(linkNode: unknown): string {
  const links = asArray(linkNode);
  const alternate = links.find((l) => attrOf(l, "rel") === "alternate" || attrOf(l, "rel") === "");
  const candidate = alternate ?? links[0];
  return attrOf(candidate, "href") || textOf(candidate);
}

function isImageMedia(node: unknown): boolean {
  const type = attrOf(node, "type");
  const medium = attrOf(node, "medium");
  if (medium) return medium === "image";
  return !type || type.startsWith("image/");
}

function pickImage(node: unknown): string | undefined {
  for (const enclosure of asArray(get(node, "enclosure"))) {
    if (attrOf(enclosure, "type").startsWith("image/") && attrOf(enclosure, "url")) return attrOf(enclosure, "url");
  }
  for (const media of asArray(get(node, "media:content"))) {
    if (isImageMedia(media) && attrOf(media, "url")) return attrOf(media, "url");
  }
  for (const group of asArray(get(node, "media:group"))) {
    for (const media of asArray(get(group, "media:content"))) {
      if (isImageMedia(media) && attrOf(media, "url")) return attrOf(media, "url");
    }
  }
  const thumbnail = attrOf(asArray(get(node, "media:thumbnail"))[0], "url");
  if (thumbnail) return thumbnail;
  for (const link of asArray(get(node, "link"))) {
    if (attrOf(link, "rel") === "enclosure" && attrOf(link, "type").startsWith("image/")) return attrOf(link, "href");
  }
  return undefined;
}

function compact(entry: FeedEntry): FeedEntry {
  const out: FeedEntry = { title: entry.title, url: entry.url };
  if (entry.id) out.id = entry.id;
  if (entry.author) out.author = entry.author;
  if (entry.publishedAt) out.publishedAt = entry.publishedAt;
  if (entry.summary) out.summary = entry.summary;
  if (entry.contentHtml) out.contentHtml = entry.contentHtml;
  if (entry.imageUrl) out.imageUrl = entry.imageUrl;
  return out;
}

function rssEntry(item: unknown): FeedEntry {
  const guid = textOf(get(item, "guid"));
  const link = textOf(get(item, "link"));
  const permaLink = attrOf(get(item, "guid"), "isPermaLink") !== "false" && /^https?:\/\//i.test(guid) ? guid : "";
  return compact({
    title: textOf(get(item, "title")),
    url: link || permaLink,
    id: guid || undefined,
    author: firstText(item, ["author", "dc:creator"]),
    publishedAt: firstText(item, ["pubDate", "dc:date", "published", "updated"]),
    summary: firstText(item, ["description", "summary"]),
    contentHtml: firstText(item, ["content:encoded", "content"]),
    imageUrl: pickImage(item)
  });
}

/**
 * Inner markup of each entry's `<content type="xhtml">` wrapper div, by entry position. The object
 * form the parser builds loses the order of mixed content.
 */
function atomXhtmlContents(xml: string): (string | undefined)[] {
  const $ = cheerio.load(xml, { xml: true });
  return $("feed > entry")
    .toArray()
    .map((entry) => {
      const content = $(entry).children('content[type="xhtml"]').first();
      if (content.length === 0) return undefined;
      const div = content.children("div");
      return ((div.length === 1 ? div : content).html() ?? "").trim() || undefined;
    });
}

function atomEntry(entry: unknown, xhtmlContent?: string): FeedEntry {
  const authorName = asArray(get(entry, "author"))
    .map((a) => textOf(get(a, "name")) || textOf(a))
    .filter(Boolean)
    .join(", ");
  return compact({
    title: textOf(get(entry, "title")),
    url: pickAtomLink(get(entry, "link")),
    id: textOf(get(entry, "id")) || undefined,
    author: authorName || undefined,
    publishedAt: firstText(entry, ["published", "updated"]),
    summary: firstText(entry, ["summary"]),
    contentHtml: xhtmlContent ?? firstText(entry, ["content"]),
    imageUrl: pickImage(entry)
  });
}

function rdfEntry(item: unknown): FeedEntry {
  return compact({
    title: textOf(get(item, "title")),
    url: textOf(get(item, "link")),
    id: attrOf(item, "rdf:about") || undefined,
    author: firstText(item, ["dc:creator"]),
    publishedAt: firstText(item, ["dc:date", "date"]),
    summary: firstText(item, ["description"]),
    contentHtml: firstText(item, ["content:encoded"]),
    imageUrl: pickImage(item)
  });
}

/**
 * Parses RSS 2.0, Atom and RSS 1.0 (RDF). Entries come back in document order, including those
 * without title or link. Returns `null` for documents that are not a feed.
 */
export function parseFeed(xml: string): ParsedFeed | null {
  const root: unknown = parser.parse(xml);

  const channel = get(get(root, "rss"), "channel") ?? get(root, "channel");
  if (channel !== undefined) {
    return {
      format: "rss",
      title: textOf(get(channel, "title")),
      entries: asArray(get(channel, "item")).map(rssEntry)
    };
  }

  const feed = get(root, "feed");
  if (feed !== undefined) {
    const entries = asArray(get(feed, "entry"));
    const xhtml = entries.some((e) => attrOf(get(e, "content"), "type") === "xhtml") ? atomXhtmlContents(xml) : [];
    return {
      format: "atom",
      title: textOf(get(feed, "title")),
      entries: entries.map((e, i) => atomEntry(e, xhtml[i]))
    };
  }

  const rdf = get(root, "rdf:RDF");
  if (rdf !== undefined) {
    return {
      format: "rdf",
      title: textOf(get(get(rdf, "channel"), "title")),
      entries: asArray(get(rdf, "item")).map(rdfEntry)
    };
  }

  return null;
}
