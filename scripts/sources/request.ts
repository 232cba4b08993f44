import { SourceFetchError, errorMessage } from "../lib/errors";
import { bodyJson, bodyText, httpGet, isHtmlContentType, type HttpResponse } from "../lib/http";
import { sanitizeContentHtml } from "../lib/html";
import { extractReadable, type ReadableArticle } from "../lib/readability";
import type { SourceContext } from "./types";

type SourceRequest = {
  sourceId: string;
  url: string;
  ctx: SourceContext;
  accept?: string;
  /** Sub-requests retry on their own; the source's top-level request leaves that to the orchestrator. */
  retry?: boolean;
};

async function request(params: SourceRequest): Promise<HttpResponse> {
  const { sourceId, url, ctx } = params;
  const res = await httpGet({
    url,
    timeoutMs: ctx.http.timeoutMs,
    signal: ctx.signal,
    accept: params.accept,
    userAgent: ctx.http.userAgent,
    retry: params.retry
      ? {
          ...ctx.retry,
          onRetry: ({ attempt, delayMs, error }) =>
            ctx.log.debug(`[RETRY] ${url} attempt=${attempt + 1} wait=${delayMs}ms error=${errorMessage(error)}`)
        }
      : undefined
  });

  if (!res.ok) {
    throw new SourceFetchError({
      sourceId,
      message: `${url}: ${res.error}`,
      transient: res.transient,
      httpStatus: res.status > 0 ? res.status : undefined
    });
  }
  return res;
}

export async function requestJson(params: SourceRequest): Promise<unknown> {
  const res = await request({ ...params, accept: params.accept ?? "application/json" });
  try {
    return bodyJson(res);
  } catch (err) {
    throw new SourceFetchError({
      sourceId: params.sourceId,
      message: `${params.url}: invalid JSON (${errorMessage(err)})`,
      transient: false,
      httpStatus: res.status,
      cause: err
    });
  }
}

export async function requestText(params: SourceRequest): Promise<{ text: string; status: number; url: string }> {
  const res = await request(params);
  return { text: bodyText(res), status: res.status, url: res.url };
}

/**
 * Readable part of a linked page, sanitized against its final URL. Anything short of a readable
 * HTML page within the size limit yields `null`.
 */
export async function fetchArticle(url: string, ctx: SourceContext): Promise<ReadableArticle | null> {
  const res = await httpGet({
    url,
    timeoutMs: ctx.http.articleTimeoutMs,
    signal: ctx.signal,
    accept: "text/html,application/xhtml+xml",
    userAgent: ctx.http.userAgent,
    maxBytes: ctx.http.maxArticleBytes,
    retry: ctx.retry
  });

  if (!res.ok) {
    ctx.log.debug(`[ARTICLE:SKIP] ${url} ${res.error}`);
    return null;
  }
  if (!isHtmlContentType(res.contentType)) {
    ctx.log.debug(`[ARTICLE:SKIP] ${url} content-type=${res.contentType ?? "-"}`);
    return null;
  }

  let article: ReadableArticle | null;
  try {
    article = extractReadable(bodyText(res), res.url);
  } catch (err) {
    ctx.log.debug(`[ARTICLE:SKIP] ${url} ${errorMessage(err)}`);
    return null;
  }
  if (!article) return null;

  const contentHtml = sanitizeContentHtml(article.contentHtml, res.url);
  return contentHtml ? { ...article, contentHtml } : null;
}
