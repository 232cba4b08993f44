import * as cheerio from "cheerio";
import { escapeXml, excerpt, formatUtc } from "../format";
import type { EinkSettings } from "../source-config";
import type { Edition, Item } from "../types";
import { encodeGrayscaleBmp, quantizeGray } from "./bmp";
import type { RenderContext, Renderer } from "./types";

export type FrontPage = {
  spotlights: { item: Item; excerpt: string }[];
  sections: { title: string; headlines: string[]; more: number }[];
};

function plainText(item: Item): string {
  if (item.summary.trim()) return item.summary;
  if (!item.contentHtml.trim()) return "";
  const $ = cheerio.load(item.contentHtml, null, false);
  $("script, style, figure, figcaption").remove();
  return $.root().text();
}

/** Spotlights are the first items, in edition order, with any text to excerpt. */
export function selectFrontPage(edition: Edition, settings: EinkSettings): FrontPage {
  const spotlights: FrontPage["spotlights"] = [];
  for (const section of edition.sections) {
    for (const item of section.items) {
      if (spotlights.length >= settings.spotlightCount) break;
      const text = plainText(item).replace(/\s+/g, " ").trim();
      if (text) spotlights.push({ item, excerpt: excerpt(text, settings.maxExcerptChars) });
    }
  }

  const sections = edition.sections
    .filter((s) => s.items.length > 0)
    .map((s) => {
      const headlines = s.items.slice(0, settings.maxHeadlinesPerSource).map((it) => it.title);
      return { title: s.title, headlines, more: s.items.length - headlines.length };
    });

  return { spotlights, sections };
}

const FRONT_PAGE_STYLE = [
  "* { box-sizing: border-box; }",
  "html, body { margin: 0; padding: 0; background: #fff; color: #000; }",
  "body { font-family: 'DejaVu Serif', Georgia, serif; font-size: 15px; line-height: 1.3; overflow: hidden; }",
  ".page { padding: 14px 16px; height: 100%; overflow: hidden; }",
  ".masthead { text-align: center; border-bottom: 4px double #000; padding-bottom: 6px; margin-bottom: 10px; }",
  ".masthead h1 { margin: 0; font-size: 30px; letter-spacing: 1px; }",
  ".masthead p { margin: 2px 0 0; font-size: 13px; }",
  ".spotlight { border-bottom: 1px solid #000; padding-bottom: 8px; margin-bottom: 8px; }",
  ".spotlight h2 { margin: 0 0 4px; font-size: 19px; }",
  ".spotlight p { margin: 0; font-size: 14px; }",
  ".spotlight .source { font-size: 11px; text-transform: uppercase; letter-spacing: 1px; }",
  ".section h3 { margin: 8px 0 3px; font-size: 13px; text-transform: uppercase; letter-spacing: 1px; border-bottom: 1px solid #555; }",
  ".section ul { margin: 0; padding-left: 16px; }",
  ".section li { font-size: 13px; margin: 1px 0; }",
  ".more { font-size: 11px; font-style: italic; }",
  ".empty { text-align: center; margin-top: 40%; font-size: 18px; }"
].join("\n");

/** Fixed-size front page markup; the same edition and settings give the same markup. */
export function composeEinkMarkup(edition: Edition, settings: EinkSettings): string {
  const page = selectFrontPage(edition, settings);
  const sourceTitle = new Map(edition.sections.map((s) => [s.sourceId, s.title]));

  const spotlights = page.spotlights.map(({ item, excerpt: text }) =>
    [
      '<div class="spotlight">',
      `<div class="source">${escapeXml(sourceTitle.get(item.sourceId) ?? item.sourceId)}</div>`,
      `<h2>${escapeXml(item.title)}</h2>`,
      `<p>${escapeXml(text)}</p>`,
      "</div>"
    ].join("")
  );

  const sections = page.sections.map((s) =>
    [
      '<div class="section">',
      `<h3>${escapeXml(s.title)}</h3>`,
      `<ul>${s.headlines.map((h) => `<li>${escapeXml(h)}</li>`).join("")}</ul>`,
      s.more > 0 ? `<div class="more">+${s.more} more</div>` : "",
      "</div>"
    ].join("")
  );

  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    `<style>\n${FRONT_PAGE_STYLE}\nhtml, body { width: ${settings.width}px; height: ${settings.height}px; }\n</style>`,
    "</head>",
    "<body>",
    '<div class="page">',
    '<div class="masthead">',
    `<h1>${escapeXml(edition.title)}</h1>`,
    `<p>${escapeXml(formatUtc(edition.generatedAt))} · ${edition.itemCount} ${edition.itemCount === 1 ? "item" : "items"}</p>`,
    "</div>",
    edition.itemCount === 0 ? '<div class="empty">No items in this edition.</div>' : "",
    ...spotlights,
    ...sections,
    "</div>",
    "</body>",
    "</html>",
    ""
  ]
    .filter(Boolean)
    .join("\n");
}

export async function renderEink(edition: Edition, ctx: RenderContext): Promise<Buffer> {
  const size = { width: ctx.eink.width, height: ctx.eink.height };
  const markup = composeEinkMarkup(edition, ctx.eink);
  const engine = await ctx.acquireRasterEngine();
  try {
    const gray = await engine.render(markup, size, ctx.signal);
    if (gray.width !== size.width || gray.height !== size.height) {
      throw new Error(`raster engine returned ${gray.width}x${gray.height}, expected ${size.width}x${size.height}`);
    }
    return encodeGrayscaleBmp(quantizeGray(gray));
  } finally {
    await engine.release();
  }
}

export const einkRenderer: Renderer = {
  format: "eink",
  extension: "bmp",
  render: renderEink
};
