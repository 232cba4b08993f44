import * as cheerio from "cheerio";
import type { Element } from "domhandler";
import type { ImageRef } from "../../src/lib/types";

const DROPPED_TAGS = "script, style, iframe, object, embed, form, input, button, noscript, link, meta, svg, template";

export function stripHtmlToText(html: string): string {
  const $ = cheerio.load(html, null, false);
  $("script, style, noscript").remove();
  return $.root().text().replace(/\s+/g, " ").trim();
}

export function toAbsoluteHttpUrl(raw: string, baseUrl?: string): string | undefined {
  const src = raw.trim();
  if (!src) return undefined;
  if (src.startsWith("data:")) return undefined;

  try {
    const url = baseUrl ? new URL(src, baseUrl).toString() : new URL(src).toString();
    return /^https?:\/\//i.test(url) ? url : undefined;
  } catch {
    return undefined;
  }
}

export function pickBestFromSrcset(srcset: string): string | undefined {
  const parts = srcset
    .split(",")
    .map((x) => x.trim())
    .filter(Boolean);
  let best: { url: string; score: number } | undefined;

  for (const part of parts) {
    const tokens = part.split(/\s+/).filter(Boolean);
    if (tokens.length === 0) continue;
    const url = tokens[0] ?? "";
    const descriptor = tokens[1] ?? "";
    let score = 0;
    if (descriptor.endsWith("w")) score = Number(descriptor.slice(0, -1));
    else if (descriptor.endsWith("x")) score = Number(descriptor.slice(0, -1)) * 1000;
    if (!Number.isFinite(score)) score = 0;

    if (!best || score > best.score) best = { url, score };
  }

  return best?.url;
}

type Attrs = Record<string, string | undefined>;

function imageSource(attrs: Attrs): string | undefined {
  const srcset = attrs.srcset ?? attrs["data-srcset"];
  return (
    attrs["data-src"] ??
    attrs["data-original"] ??
    attrs["data-lazy-src"] ??
    attrs.src ??
    (srcset ? pickBestFromSrcset(srcset) : undefined)
  );
}

/**
 * Cleans an HTML fragment for embedding: drops active and form content, event handlers, inline
 * styles and non-http links, resolves relative `href`/`src` against `baseUrl` and settles lazy
 * image attributes into a single `src`. Images without a usable source are removed.
 */
export function sanitizeContentHtml(html: string, baseUrl?: string): string {
  if (!html.trim()) return "";
  const $ = cheerio.load(html, null, false);
  $(DROPPED_TAGS).remove();

  $<Element, string>("*").each((_, el) => {
    for (const name of Object.keys(el.attribs)) {
      if (name.startsWith("on") || name === "style" || name === "class" || name === "id") $(el).removeAttr(name);
    }
  });

  $("a").each((_, el) => {
    const href = $(el).attr("href");
    const abs = href && !href.startsWith("#") ? toAbsoluteHttpUrl(href, baseUrl) : undefined;
    if (abs) $(el).attr("href", abs);
    else $(el).removeAttr("href");
  });

  $("img").each((_, el) => {
    const $img = $(el);
    const raw = imageSource(el.attribs);
    const abs = raw ? toAbsoluteHttpUrl(raw, baseUrl) : undefined;
    if (!abs) {
      $img.remove();
      return;
    }
    for (const name of ["srcset", "data-srcset", "data-src", "data-original", "data-lazy-src", "loading", "sizes"]) {
      $img.removeAttr(name);
    }
    $img.attr("src", abs);
  });

  return $.html().trim();
}

/** Distinct `<img>` sources of a sanitized fragment, in document order. */
export function collectImageRefs(html: string): ImageRef[] {
  if (!html.trim()) return [];
  const $ = cheerio.load(html, null, false);
  const seen = new Set<string>();
  const refs: ImageRef[] = [];

  $("img").each((_, el) => {
    const src = el.attribs.src;
    if (!src || !/^https?:\/\//i.test(src) || seen.has(src)) return;
    seen.add(src);
    const alt = el.attribs.alt?.trim();
    refs.push(alt ? { url: src, alt } : { url: src });
  });

  return refs;
}

/**
 * Points every `<img>` at `resolve(src)`; images it returns `undefined` for are removed, and so is
 * a `<figure>` left without images.
 */
export function rewriteImageSources(html: string, resolve: (src: string) => string | undefined): string {
  if (!html.trim()) return html;
  const $ = cheerio.load(html, null, false);

  $("img").each((_, el) => {
    const $img = $(el);
    const target = resolve(el.attribs.src ?? "");
    if (target) {
      $img.attr("src", target);
      return;
    }
    const figure = $img.closest("figure");
    $img.remove();
    if (figure.length > 0 && figure.find("img").length === 0) figure.remove();
  });

  return $.html().trim();
}
