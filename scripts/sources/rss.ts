import type { RssSourceConfig } from "../../src/lib/source-config";
import type { Item, MetadataValue } from "../../src/lib/types";
import { escapeXml } from "../../src/lib/format";
import { SourceFetchError, errorMessage } from "../lib/errors";
import { collectImageRefs, sanitizeContentHtml, stripHtmlToText, toAbsoluteHttpUrl } from "../lib/html";
import { sha1, stripAndTruncate } from "../lib/http";
import { parseDate, toIso } from "../lib/time";
import { parseFeed, type FeedEntry, type ParsedFeed } from "../lib/xml-feed";
import { mapWithConcurrency } from "../pipeline/concurrency";
import { fetchArticle, requestText } from "./request";
import type { SourceAdapter } from "./types";

const SUMMARY_CHARS = 400;

type Entry = FeedEntry & { link: string };

export function parseFeedOrThrow(sourceId: string, xml: string): ParsedFeed {
  let feed: ParsedFeed | null;
  try {
    feed = parseFeed(xml);
  } catch (err) {
    throw new SourceFetchError({ sourceId, message: `unparseable feed: ${errorMessage(err)}`, transient: false, cause: err });
  }
  if (!feed) throw new SourceFetchError({ sourceId, message: "not an RSS, Atom or RDF document", transient: false });
  return feed;
}

/** Body from the entry itself, with its image in front when the markup has none. */
export function entryContentHtml(entry: FeedEntry, baseUrl: string): string {
  const body = sanitizeContentHtml(entry.contentHtml ?? entry.summary ?? "", baseUrl);
  const image = entry.imageUrl ? toAbsoluteHttpUrl(entry.imageUrl, baseUrl) : undefined;
  if (!image || collectImageRefs(body).some((ref) => ref.url === image)) return body;
  const figure = `<figure><img src="${escapeXml(image)}" alt="${escapeXml(stripHtmlToText(entry.title))}"></figure>`;
  return body ? `${figure}\n${body}` : figure;
}

export function entryToItem(
  entry: Entry,
  params: { config: RssSourceConfig; contentHtml: string; feedUrl: string }
): Item {
  const { config, contentHtml } = params;
  const entryId = entry.id ?? entry.link;
  const date = parseDate(entry.publishedAt);
  const author = entry.author ? stripHtmlToText(entry.author) : "";
  const summaryHtml = entry.summary ?? entry.contentHtml ?? "";
  const summary = summaryHtml ? stripHtmlToText(summaryHtml) : stripHtmlToText(contentHtml);
  const metadata: Record<string, MetadataValue> = { feedUrl: params.feedUrl, entryId };

  return {
    id: `${config.id}:${sha1(entryId).slice(0, 16)}`,
    sourceId: config.id,
    kind: "rss",
    title: stripAndTruncate(stripHtmlToText(entry.title), 300),
    url: entry.link,
    ...(author ? { author } : {}),
    ...(date ? { publishedAt: toIso(date) } : {}),
    summary: stripAndTruncate(summary, SUMMARY_CHARS),
    contentHtml,
    images: collectImageRefs(contentHtml),
    metadata
  };
}

export const rssAdapter: SourceAdapter<RssSourceConfig> = {
  kind: "rss",
  async fetch(config, ctx) {
    const res = await requestText({
      sourceId: config.id,
      url: config.url,
      ctx,
      accept: "application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.5"
    });
    const feed = parseFeedOrThrow(config.id, res.text);
    ctx.log.debug(`[FEED] ${feed.format} entries=${feed.entries.length}`);

    const entries: Entry[] = [];
    feed.entries.forEach((entry, i) => {
      const link = entry.url ? toAbsoluteHttpUrl(entry.url, res.url) : undefined;
      if (!entry.title || !link) {
        ctx.log.warn(`[ITEM:SKIP] entry #${i} without ${entry.title ? "link" : "title"}`);
        return;
      }
      entries.push({ ...entry, link });
    });

    return await mapWithConcurrency({
      items: entries.slice(0, config.maxArticles),
      concurrency: ctx.concurrency,
      signal: ctx.signal,
      fn: async (entry) => {
        const article = config.includeArticleContent ? await fetchArticle(entry.link, ctx) : null;
        const contentHtml = article?.contentHtml ?? entryContentHtml(entry, entry.link);
        return entryToItem(entry, { config, contentHtml, feedUrl: config.url });
      }
    });
  }
};
