import type { KagiNewsSourceConfig } from "../../src/lib/source-config";
import type { Item, MetadataValue } from "../../src/lib/types";
import { escapeXml } from "../../src/lib/format";
import { SourceFetchError, errorMessage, isAbortError } from "../lib/errors";
import { collectImageRefs, toAbsoluteHttpUrl } from "../lib/html";
import { stripAndTruncate } from "../lib/http";
import { asArray, asNumber, asRecords, asString, isRecord, type JsonObject } from "../lib/json";
import { earliest, parseDate, toIso } from "../lib/time";
import { mapWithConcurrency } from "../pipeline/concurrency";
import { requestJson } from "./request";
import type { SourceAdapter } from "./types";

export type KagiArticle = { title: string; link: string; domain: string; date?: string };

type Citation = { index: number; link: string; title: string };

type Category = { uuid: string; name: string };

const CITATION_RE = /\[([a-zA-Z0-9._-]+\.[a-zA-Z]{2,})#(\d+)\]/g;

export function readArticles(raw: unknown): KagiArticle[] {
  return asRecords(raw).map((a) => {
    const link = asString(a.link) ?? "";
    let domain = asString(a.domain) ?? "";
    if (!domain && link) {
      try {
        domain = new URL(link).hostname;
      } catch {
        domain = "";
      }
    }
    const date = asString(a.date) ?? undefined;
    return { title: asString(a.title) ?? link, link, domain, ...(date ? { date } : {}) };
  });
}

/** `domain#N` → the N-th article of that domain, numbered by position in the source list. */
export function buildCitationMap(articles: KagiArticle[]): Map<string, Citation> {
  const perDomain = new Map<string, number>();
  const map = new Map<string, Citation>();
  articles.forEach((a, i) => {
    if (!a.domain) return;
    const n = (perDomain.get(a.domain) ?? 0) + 1;
    perDomain.set(a.domain, n);
    map.set(`${a.domain}#${n}`, { index: i + 1, link: a.link, title: a.title });
  });
  return map;
}

/** Escapes `text` and turns `[domain#N]` markers into superscript links; unknown markers stay as text. */
export function cite(text: string, citations: Map<string, Citation>): string {
  return escapeXml(text).replace(CITATION_RE, (marker: string, domain: string, n: string) => {
    const hit = citations.get(`${domain}#${Number(n)}`);
    if (!hit || !toAbsoluteHttpUrl(hit.link)) return marker;
    return `<sup><a href="${escapeXml(hit.link)}" title="${escapeXml(hit.title)}">${hit.index}</a></sup>`;
  });
}

function strings(value: unknown): string[] {
  return asArray(value)
    .map((x) => (typeof x === "string" ? x.trim() : ""))
    .filter(Boolean);
}

function timelineEntries(value: unknown): { date: string; content: string }[] {
  return asArray(value)
    .map((entry) => {
      if (typeof entry === "string") {
        const [date, ...rest] = entry.split("::");
        return rest.length > 0 ? { date: date.trim(), content: rest.join("::").trim() } : { date: "", content: entry.trim() };
      }
      if (isRecord(entry)) return { date: asString(entry.date) ?? "", content: asString(entry.content) ?? "" };
      return { date: "", content: "" };
    })
    .filter((e) => e.content);
}

/**
 * Story body: summary, lead image, numbered sources, highlights, quote, perspectives, then the
 * optional "did you know" and timeline blocks.
 */
export function composeStoryHtml(story: JsonObject, articles: KagiArticle[]): string {
  const citations = buildCitationMap(articles);
  const parts: string[] = [];

  const summary = asString(story.short_summary)?.trim();
  if (summary) parts.push(`<p>${cite(summary, citations)}</p>`);

  const image = isRecord(story.primary_image) ? story.primary_image : null;
  const imageUrl = image ? toAbsoluteHttpUrl(asString(image.url) ?? "") : undefined;
  if (image && imageUrl) {
    const caption = [asString(image.caption), asString(image.credit)].filter((x): x is string => Boolean(x)).join(" · ");
    parts.push(
      [
        "<figure>",
        `<img src="${escapeXml(imageUrl)}" alt="${escapeXml(asString(image.caption) ?? "")}">`,
        caption ? `<figcaption>${escapeXml(caption)}</figcaption>` : "",
        "</figure>"
      ].join("")
    );
  }

  const linked = articles.filter((a) => toAbsoluteHttpUrl(a.link));
  if (linked.length > 0) {
    parts.push("<h3>Sources</h3>");
    parts.push(
      `<ol>${articles
        .map((a) => {
          const href = toAbsoluteHttpUrl(a.link);
          const label = escapeXml(a.title || a.domain);
          return href
            ? `<li><a href="${escapeXml(href)}">${label}</a> (${escapeXml(a.domain)})</li>`
            : `<li>${label}</li>`;
        })
        .join("")}</ol>`
    );
  }

  const highlights = strings(story.talking_points);
  if (highlights.length > 0) {
    parts.push("<h3>Highlights</h3>");
    parts.push(`<ol>${highlights.map((h) => `<li>${cite(h, citations)}</li>`).join("")}</ol>`);
  }

  const quote = asString(story.quote)?.trim();
  if (quote) {
    const by = [asString(story.quote_author), asString(story.quote_attribution)]
      .filter((x): x is string => Boolean(x))
      .join(", ");
    parts.push(`<blockquote><p>${escapeXml(quote)}</p>${by ? `<p>${escapeXml(by)}</p>` : ""}</blockquote>`);
  }

  const perspectives = asArray(story.perspectives)
    .map((p) => (typeof p === "string" ? p : isRecord(p) ? (asString(p.text) ?? "") : ""))
    .map((p) => p.trim())
    .filter(Boolean);
  if (perspectives.length > 0) {
    parts.push("<h3>Perspectives</h3>");
    parts.push(`<ul>${perspectives.map((p) => `<li>${cite(p, citations)}</li>`).join("")}</ul>`);
  }

  const didYouKnow = asString(story.did_you_know)?.trim();
  if (didYouKnow) parts.push(`<h3>Did you know?</h3><p>${cite(didYouKnow, citations)}</p>`);

  const timeline = timelineEntries(story.timeline);
  if (timeline.length > 0) {
    parts.push("<h3>Timeline</h3>");
    parts.push(
      `<ul>${timeline
        .map((t) => `<li>${t.date ? `<strong>${escapeXml(t.date)}</strong>: ` : ""}${cite(t.content, citations)}</li>`)
        .join("")}</ul>`
    );
  }

  return parts.join("\n");
}

export function storyToItem(
  story: JsonObject,
  params: { sourceId: string; category: string; categoryName: string; position: number }
): Item | null {
  const title = asString(story.title)?.trim();
  if (!title) return null;

  const articles = readArticles(story.articles);
  const contentHtml = composeStoryHtml(story, articles);
  const published = earliest(articles.map((a) => parseDate(a.date)));
  const clusterNumber = asNumber(story.cluster_number);
  const clusterId = asString(story.id) ?? (clusterNumber != null ? String(clusterNumber) : "");
  // cluster numbers rank stories within one category only
  const nativeId =
    asString(story.id) ||
    (clusterNumber != null ? `${params.category}-${clusterNumber}` : `${params.category}#${params.position}`);
  const summary = asString(story.short_summary) ?? "";

  const metadata: Record<string, MetadataValue> = {
    clusterId,
    category: params.category,
    categoryName: params.categoryName,
    emoji: asString(story.emoji) ?? "",
    uniqueDomains: asNumber(story.unique_domains) ?? new Set(articles.map((a) => a.domain).filter(Boolean)).size
  };

  return {
    id: `${params.sourceId}:${nativeId}`,
    sourceId: params.sourceId,
    kind: "kaginews",
    title,
    url: articles.find((a) => toAbsoluteHttpUrl(a.link))?.link ?? "",
    ...(published ? { publishedAt: toIso(published) } : {}),
    summary: stripAndTruncate(summary.replace(CITATION_RE, ""), 400),
    contentHtml,
    images: collectImageRefs(contentHtml),
    metadata
  };
}

function titleCase(slug: string): string {
  return slug
    .split(/[_-]+/)
    .filter(Boolean)
    .map((w) => w[0].toUpperCase() + w.slice(1))
    .join(" ");
}

export const kagiNewsAdapter: SourceAdapter<KagiNewsSourceConfig> = {
  kind: "kaginews",
  async fetch(config, ctx) {
    const lang = encodeURIComponent(config.language);
    const batches = await requestJson({ sourceId: config.id, url: `${config.apiBase}/api/batches?lang=${lang}`, ctx });
    const batchId = asString(asRecords(isRecord(batches) ? batches.batches : null)[0]?.id);
    if (!batchId) {
      throw new SourceFetchError({ sourceId: config.id, message: "no batches available", transient: false });
    }

    const base = `${config.apiBase}/api/batches/${encodeURIComponent(batchId)}`;
    const rawCategories = await requestJson({
      sourceId: config.id,
      url: `${base}/categories?lang=${lang}`,
      ctx,
      retry: true
    });

    const categories = new Map<string, Category>();
    for (const c of asRecords(isRecord(rawCategories) ? rawCategories.categories : null)) {
      const slug = asString(c.categoryId);
      const uuid = asString(c.id);
      if (!slug || !uuid) continue;
      categories.set(slug, { uuid, name: asString(c.categoryName) ?? titleCase(slug) });
    }

    const wanted = config.categories.filter((slug) => {
      if (categories.has(slug)) return true;
      ctx.log.warn(`[CATEGORY:SKIP] unknown category "${slug}"`);
      return false;
    });

    const perCategory = await mapWithConcurrency({
      items: wanted,
      concurrency: ctx.concurrency,
      signal: ctx.signal,
      fn: async (slug): Promise<Item[]> => {
        const category = categories.get(slug);
        if (!category) return [];
        let payload: unknown;
        try {
          payload = await requestJson({
            sourceId: config.id,
            url: `${base}/categories/${encodeURIComponent(category.uuid)}/stories?lang=${lang}&limit=${config.maxStoriesPerCategory}`,
            ctx,
            retry: true
          });
        } catch (err) {
          if (isAbortError(err) || !(err instanceof SourceFetchError)) throw err;
          ctx.log.warn(`[CATEGORY:FAIL] ${slug}: ${errorMessage(err)}`);
          return [];
        }

        const stories = asArray(isRecord(payload) ? payload.stories : null).slice(0, config.maxStoriesPerCategory);
        const items: Item[] = [];
        stories.forEach((story, position) => {
          const item = isRecord(story)
            ? storyToItem(story, { sourceId: config.id, category: slug, categoryName: category.name, position })
            : null;
          if (item) items.push(item);
          else ctx.log.warn(`[ITEM:SKIP] ${slug}#${position}: story without title`);
        });
        ctx.log.debug(`[CATEGORY:OK] ${slug} stories=${items.length}`);
        return items;
      }
    });

    return perCategory.flat();
  }
};
