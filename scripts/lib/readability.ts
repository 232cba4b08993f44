import { Readability } from "@mozilla/readability";
import { JSDOM, VirtualConsole } from "jsdom";

export type ReadableArticle = {
  title: string;
  contentHtml: string;
  textContent: string;
  byline?: string;
};

const MIN_TEXT_LENGTH = 50;

/**
 * Reduces a full page to its readable part. Returns `null` when nothing article-like is found or
 * the result has fewer than 50 characters of text.
 */
export function extractReadable(html: string, url: string): ReadableArticle | null {
  // page scripts and stylesheet parse errors stay out of the run log
  const dom = new JSDOM(html, { url, virtualConsole: new VirtualConsole() });
  try {
    const article = new Readability(dom.window.document).parse();
    if (!article) return null;

    const textContent = (article.textContent ?? "").replace(/\s+/g, " ").trim();
    if (textContent.length < MIN_TEXT_LENGTH) return null;

    const byline = (article.byline ?? "").trim();
    return {
      title: (article.title ?? "").trim(),
      contentHtml: article.content ?? "",
      textContent,
      ...(byline ? { byline } : {})
    };
  } finally {
    dom.window.close();
  }
}
