import * as cheerio from "cheerio";
import { bylineParts, escapeXml, formatUtc, hostOf } from "../format";
import type { Edition, Item } from "../types";
import { sniffImageType } from "./image-type";
import type { RenderContext, Renderer } from "./types";

const STYLE = [
  ":root { color-scheme: light; }",
  "body { margin: 0 auto; max-width: 42rem; padding: 1.5rem 1rem 4rem; font: 17px/1.55 Georgia, 'Times New Roman', serif; color: #111; background: #fff; }",
  "header.masthead { border-bottom: 3px double #111; margin-bottom: 1.5rem; text-align: center; }",
  "header.masthead h1 { margin: 0; font-size: 2.2rem; letter-spacing: 0.02em; }",
  "header.masthead p { margin: 0.25rem 0 0.75rem; color: #555; font-size: 0.9rem; }",
  "nav.toc ol { padding-left: 1.25rem; }",
  "nav.toc li { margin: 0.15rem 0; }",
  "section.source > h2 { border-bottom: 1px solid #999; padding-bottom: 0.25rem; margin-top: 2.5rem; }",
  "article { margin: 1.75rem 0; padding-bottom: 1rem; border-bottom: 1px dotted #bbb; }",
  "article h3 { margin: 0 0 0.25rem; font-size: 1.25rem; }",
  "article h3 a { color: inherit; }",
  ".byline { color: #555; font-size: 0.85rem; margin: 0 0 0.75rem; }",
  ".summary { font-style: italic; }",
  "img { max-width: 100%; height: auto; }",
  "figure { margin: 1rem 0; }",
  "figcaption { font-size: 0.8rem; color: #555; }",
  "blockquote { margin: 0.75rem 0 0.75rem 0.5rem; padding-left: 0.75rem; border-left: 2px solid #ccc; }",
  "pre { overflow-x: auto; background: #f4f4f4; padding: 0.5rem; }",
  ".back { font-size: 0.8rem; }",
  ".empty { text-align: center; color: #555; }"
].join("\n");

export function sectionAnchor(sectionIndex: number): string {
  return `section-${sectionIndex + 1}`;
}

export function itemAnchor(sectionIndex: number, itemIndex: number): string {
  return `item-${sectionIndex + 1}-${itemIndex + 1}`;
}

function titleMarkup(item: Item): string {
  const title = escapeXml(item.title);
  return item.url ? `<a href="${escapeXml(item.url)}">${title}</a>` : title;
}

function bylineMarkup(item: Item): string {
  const parts = bylineParts(item).map(escapeXml);
  if (item.url) parts.push(escapeXml(hostOf(item.url)));
  const discussion = item.metadata.discussionUrl;
  if (typeof discussion === "string" && discussion !== item.url) {
    parts.push(`<a href="${escapeXml(discussion)}">discussion</a>`);
  }
  return parts.length > 0 ? `<p class="byline">${parts.join(" · ")}</p>` : "";
}

async function embedImages(item: Item, ctx: RenderContext): Promise<string> {
  const local = new Map(item.images.filter((ref) => ref.localPath).map((ref) => [ref.localPath ?? "", ref]));
  if (local.size === 0) return item.contentHtml;

  const dataUris = new Map<string, string>();
  for (const [path, ref] of local) {
    const bytes = await ctx.readAsset(path);
    if (!bytes) continue;
    const mimeType = sniffImageType(bytes)?.mimeType ?? ref.mimeType ?? "application/octet-stream";
    dataUris.set(path, `data:${mimeType};base64,${Buffer.from(bytes).toString("base64")}`);
  }

  const $ = cheerio.load(item.contentHtml, null, false);
  $("img").each((_, el) => {
    const uri = dataUris.get(el.attribs.src ?? "");
    if (uri) $(el).attr("src", uri);
  });
  return $.html();
}

async function articleMarkup(item: Item, sectionIndex: number, itemIndex: number, ctx: RenderContext): Promise<string> {
  const body = ctx.embedAssets ? await embedImages(item, ctx) : item.contentHtml;
  return [
    `<article id="${itemAnchor(sectionIndex, itemIndex)}">`,
    `<h3>${titleMarkup(item)}</h3>`,
    bylineMarkup(item),
    item.summary && !body ? `<p class="summary">${escapeXml(item.summary)}</p>` : "",
    body ? `<div class="content">\n${body}\n</div>` : "",
    `<p class="back"><a href="#contents">Back to contents</a></p>`,
    "</article>"
  ]
    .filter(Boolean)
    .join("\n");
}

function tocMarkup(edition: Edition): string {
  if (edition.sections.length === 0) return "";
  const sections = edition.sections.map((section, s) => {
    const items = section.items
      .map((item, i) => `<li><a href="#${itemAnchor(s, i)}">${escapeXml(item.title)}</a></li>`)
      .join("\n");
    return [
      `<li><a href="#${sectionAnchor(s)}">${escapeXml(section.title)}</a> (${section.items.length})`,
      items ? `<ol>\n${items}\n</ol>` : "",
      "</li>"
    ]
      .filter(Boolean)
      .join("\n");
  });
  return ['<nav class="toc" id="contents">', "<h2>Contents</h2>", "<ol>", ...sections, "</ol>", "</nav>"].join("\n");
}

export async function renderHtml(edition: Edition, ctx: RenderContext): Promise<string> {
  const sections: string[] = [];
  for (const [s, section] of edition.sections.entries()) {
    const articles: string[] = [];
    for (const [i, item] of section.items.entries()) {
      ctx.signal?.throwIfAborted();
      articles.push(await articleMarkup(item, s, i, ctx));
    }
    sections.push(
      [
        `<section class="source" id="${sectionAnchor(s)}">`,
        `<h2>${escapeXml(section.title)}</h2>`,
        ...articles,
        "</section>"
      ].join("\n")
    );
  }

  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    `<meta name="generator" content="broadsheet">`,
    `<title>${escapeXml(edition.title)} · ${escapeXml(edition.date)}</title>`,
    `<style>\n${STYLE}\n</style>`,
    "</head>",
    "<body>",
    '<header class="masthead">',
    `<h1>${escapeXml(edition.title)}</h1>`,
    `<p>${escapeXml(formatUtc(edition.generatedAt))} · ${edition.itemCount} ${edition.itemCount === 1 ? "item" : "items"}</p>`,
    "</header>",
    edition.itemCount === 0 ? '<p class="empty" id="contents">No items in this edition.</p>' : tocMarkup(edition),
    ...sections,
    "</body>",
    "</html>",
    ""
  ]
    .filter(Boolean)
    .join("\n");
}

export const htmlRenderer: Renderer = {
  format: "html",
  extension: "html",
  render: renderHtml
};
