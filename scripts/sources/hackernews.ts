import type { HackerNewsSourceConfig } from "../../src/lib/source-config";
import type { Item, MetadataValue } from "../../src/lib/types";
import { escapeXml } from "../../src/lib/format";
import { SourceFetchError, errorMessage, isAbortError } from "../lib/errors";
import { collectImageRefs, sanitizeContentHtml, stripHtmlToText } from "../lib/html";
import { stripAndTruncate } from "../lib/http";
import { asArray, asNumber, asRecords, asString, isRecord, type JsonObject } from "../lib/json";
import { fromUnixSeconds, parseDate, toIso } from "../lib/time";
import { mapWithConcurrency } from "../pipeline/concurrency";
import { fetchArticle, requestJson } from "./request";
import type { SourceAdapter, SourceContext } from "./types";

export type HnComment = {
  author: string;
  text: string;
  publishedAt?: string;
  children: HnComment[];
};

const SUMMARY_CHARS = 300;

export function discussionUrl(id: number): string {
  return `https://news.ycombinator.com/item?id=${id}`;
}

/** Total number of comments below `children`, whatever their depth. */
export function countComments(children: unknown): number {
  let total = 0;
  for (const child of asRecords(children)) {
    if (child.type !== undefined && child.type !== "comment") continue;
    total += 1 + countComments(child.children);
  }
  return total;
}

/**
 * Keeps at most `maxPerLevel` comments per level down to `maxDepth` levels. Deleted comments (no
 * text) and non-comment children are dropped.
 */
export function trimComments(
  children: unknown,
  params: { maxDepth: number; maxPerLevel: number },
  depth = 0
): HnComment[] {
  if (depth >= params.maxDepth) return [];
  return asRecords(children)
    .filter((c) => c.type === "comment" && Boolean(asString(c.text)))
    .slice(0, params.maxPerLevel)
    .map((c) => {
      const date = fromUnixSeconds(c.created_at_i) ?? parseDate(asString(c.created_at));
      const comment: HnComment = {
        author: asString(c.author) ?? "[deleted]",
        text: asString(c.text) ?? "",
        children: trimComments(c.children, params, depth + 1)
      };
      if (date) comment.publishedAt = toIso(date);
      return comment;
    });
}

function renderComments(comments: HnComment[]): string {
  return comments
    .map((c) =>
      [
        "<blockquote>",
        `<p><strong>${escapeXml(c.author)}</strong></p>`,
        sanitizeContentHtml(c.text, "https://news.ycombinator.com/"),
        renderComments(c.children),
        "</blockquote>"
      ].join("")
    )
    .join("");
}

export function composeStoryHtml(params: {
  text?: string;
  article?: { contentHtml: string; url: string };
  comments: HnComment[];
}): string {
  const parts: string[] = [];
  if (params.text) parts.push(sanitizeContentHtml(params.text, "https://news.ycombinator.com/"));
  if (params.article) {
    const { contentHtml, url } = params.article;
    parts.push(`<section><p><em>Article from <a href="${escapeXml(url)}">${escapeXml(url)}</a></em></p>${contentHtml}</section>`);
  }
  if (params.comments.length > 0) {
    parts.push(`<section><h3>Comments</h3>${renderComments(params.comments)}</section>`);
  }
  return parts.join("\n");
}

function isOffSite(url: string | null): url is string {
  if (!url) return false;
  try {
    return new URL(url).hostname !== "news.ycombinator.com";
  } catch {
    return false;
  }
}

async function storyToItem(
  story: JsonObject,
  config: HackerNewsSourceConfig,
  ctx: SourceContext
): Promise<Item | null> {
  const id = asNumber(story.id);
  const title = asString(story.title)?.trim();
  if (id == null || !title) {
    ctx.log.warn(`[ITEM:SKIP] story without id or title (${String(story.id)})`);
    return null;
  }

  const linked = asString(story.url)?.trim() || null;
  const url = linked ?? discussionUrl(id);
  const score = asNumber(story.points) ?? asNumber(story.score) ?? 0;
  const commentCount =
    asNumber(story.num_comments) ?? asNumber(story.descendants) ?? countComments(story.children);
  const comments = config.includeComments
    ? trimComments(story.children, { maxDepth: config.maxCommentDepth, maxPerLevel: config.maxCommentsPerLevel })
    : [];

  const article =
    config.includeArticleContent && isOffSite(linked) ? await fetchArticle(linked, ctx) : null;

  const text = asString(story.text) ?? undefined;
  const contentHtml = composeStoryHtml({
    text,
    article: article && linked ? { contentHtml: article.contentHtml, url: linked } : undefined,
    comments
  });

  const date = fromUnixSeconds(story.created_at_i) ?? parseDate(asString(story.created_at));
  const author = asString(story.author)?.trim();
  const summarySource = text ? stripHtmlToText(text) : (article?.textContent ?? "");
  const metadata: Record<string, MetadataValue> = {
    hnId: id,
    score,
    comments: commentCount,
    discussionUrl: discussionUrl(id)
  };

  return {
    id: `${config.id}:${id}`,
    sourceId: config.id,
    kind: "hackernews",
    title: stripAndTruncate(title, 300),
    url,
    ...(author ? { author } : {}),
    ...(date ? { publishedAt: toIso(date) } : {}),
    summary: stripAndTruncate(summarySource, SUMMARY_CHARS),
    contentHtml,
    images: collectImageRefs(contentHtml),
    metadata
  };
}

export const hackerNewsAdapter: SourceAdapter<HackerNewsSourceConfig> = {
  kind: "hackernews",
  async fetch(config, ctx) {
    const top = await requestJson({ sourceId: config.id, url: `${config.apiBase}/topstories.json`, ctx });
    if (!Array.isArray(top)) {
      throw new SourceFetchError({ sourceId: config.id, message: "topstories: expected an array of ids", transient: false });
    }
    const ids = asArray(top)
      .filter((x): x is number => typeof x === "number" && Number.isInteger(x))
      .slice(0, config.topStories);
    ctx.log.debug(`[HN] top=${ids.length}`);

    const failures: SourceFetchError[] = [];
    const items = await mapWithConcurrency({
      items: ids,
      concurrency: ctx.concurrency,
      signal: ctx.signal,
      fn: async (storyId) => {
        let story: unknown;
        try {
          story = await requestJson({
            sourceId: config.id,
            url: `${config.itemsApiBase}/items/${storyId}`,
            ctx,
            retry: true
          });
        } catch (err) {
          if (isAbortError(err) || !(err instanceof SourceFetchError)) throw err;
          failures.push(err);
          ctx.log.warn(`[ITEM:FAIL] story ${storyId}: ${errorMessage(err)}`);
          return null;
        }
        if (!isRecord(story) || story.type !== "story") {
          ctx.log.debug(`[ITEM:SKIP] ${storyId} is not a story`);
          return null;
        }
        return await storyToItem(story, config, ctx);
      }
    });

    if (ids.length > 0 && failures.length === ids.length) {
      const first = failures[0];
      throw new SourceFetchError({
        sourceId: config.id,
        message: `every story request failed (${first.message})`,
        transient: first.transient,
        httpStatus: first.httpStatus,
        cause: first
      });
    }

    return items.filter((x): x is Item => x !== null);
  }
};
