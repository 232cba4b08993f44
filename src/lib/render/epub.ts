import { createHash } from "node:crypto";
import archiver from "archiver";
import * as cheerio from "cheerio";
import { bylineParts, escapeXml, formatUtc } from "../format";
import type { Edition, Item } from "../types";
import { isEpubCoreImage, sniffImageType } from "./image-type";
import type { RenderContext, Renderer } from "./types";

export type EpubEntry = {
  name: string;
  data: string | Buffer;
  /** Stored uncompressed. */
  store?: boolean;
};

type ManifestImage = { id: string; href: string; mimeType: string; bytes: Buffer };

const XHTML_HEAD = '<?xml version="1.0" encoding="UTF-8"?>\n<!DOCTYPE html>';

const STYLE = [
  "body { font-family: serif; line-height: 1.45; margin: 0 0.5em; }",
  "h1 { font-size: 1.6em; margin: 1em 0 0.5em; }",
  "h2 { font-size: 1.25em; margin: 1.5em 0 0.25em; }",
  ".byline { font-size: 0.85em; color: #444; margin: 0 0 0.75em; }",
  ".summary { font-style: italic; }",
  "img { max-width: 100%; }",
  "blockquote { margin: 0.5em 0 0.5em 0.5em; padding-left: 0.5em; border-left: 1px solid #888; }",
  "pre { white-space: pre-wrap; font-size: 0.85em; }",
  ".title-page { text-align: center; margin-top: 30%; }"
].join("\n");

export function chapterFile(sectionIndex: number): string {
  return `section-${sectionIndex + 1}.xhtml`;
}

function itemAnchor(itemIndex: number): string {
  return `item-${itemIndex + 1}`;
}

/** `CCYY-MM-DDThh:mm:ssZ`, the form `dcterms:modified` takes. */
export function epubTimestamp(iso: string): string {
  const time = Date.parse(iso);
  const date = Number.isFinite(time) ? new Date(time) : new Date(0);
  return `${date.toISOString().slice(0, 19)}Z`;
}

function bookId(edition: Edition): string {
  const hex = createHash("sha1").update(`${edition.title}\n${edition.generatedAt}`).digest("hex");
  return `urn:uuid:${hex.slice(0, 8)}-${hex.slice(8, 12)}-5${hex.slice(13, 16)}-a${hex.slice(17, 20)}-${hex.slice(20, 32)}`;
}

function xhtmlDocument(title: string, body: string): string {
  return [
    XHTML_HEAD,
    '<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops" lang="en" xml:lang="en">',
    "<head>",
    '<meta charset="UTF-8"/>',
    `<title>${escapeXml(title)}</title>`,
    '<link rel="stylesheet" type="text/css" href="style.css"/>',
    "</head>",
    "<body>",
    body,
    "</body>",
    "</html>",
    ""
  ].join("\n");
}

/**
 * Re-serializes an HTML fragment as well-formed XHTML. Images are pointed at their package
 * resource, or removed when the package has none for them.
 */
export function toXhtmlFragment(html: string, resolveImage: (src: string) => string | undefined): string {
  if (!html.trim()) return "";
  const $ = cheerio.load(html, null, false);
  $("img").each((_, el) => {
    const $img = $(el);
    const href = resolveImage(el.attribs.src ?? "");
    if (!href) {
      const figure = $img.closest("figure");
      $img.remove();
      if (figure.length > 0 && figure.find("img").length === 0) figure.remove();
      return;
    }
    $img.attr("src", href);
    if ($img.attr("alt") == null) $img.attr("alt", "");
  });
  return $.xml().trim();
}

async function collectImages(edition: Edition, ctx: RenderContext): Promise<Map<string, ManifestImage>> {
  const images = new Map<string, ManifestImage>();
  for (const section of edition.sections) {
    for (const item of section.items) {
      for (const ref of item.images) {
        const path = ref.localPath;
        if (!path || images.has(path)) continue;
        const bytes = await ctx.readAsset(path);
        if (!bytes) continue;
        const type = sniffImageType(bytes);
        if (!isEpubCoreImage(type)) continue;
        const name = path.slice(path.lastIndexOf("/") + 1);
        images.set(path, {
          id: `img-${images.size + 1}`,
          href: `images/${name}`,
          mimeType: type.mimeType,
          bytes: Buffer.from(bytes)
        });
      }
    }
  }
  return images;
}

function itemXhtml(item: Item, itemIndex: number, images: Map<string, ManifestImage>): string {
  const title = escapeXml(item.title);
  const byline = bylineParts(item).map(escapeXml).join(" · ");
  const body = toXhtmlFragment(item.contentHtml, (src) => images.get(src)?.href);
  return [
    `<section id="${itemAnchor(itemIndex)}">`,
    `<h2>${item.url ? `<a href="${escapeXml(item.url)}">${title}</a>` : title}</h2>`,
    byline ? `<p class="byline">${byline}</p>` : "",
    body || (item.summary ? `<p class="summary">${escapeXml(item.summary)}</p>` : ""),
    "</section>"
  ]
    .filter(Boolean)
    .join("\n");
}

function navXhtml(edition: Edition): string {
  const sections = edition.sections.map((section, s) => {
    const items = section.items
      .map((item, i) => `<li><a href="${chapterFile(s)}#${itemAnchor(i)}">${escapeXml(item.title)}</a></li>`)
      .join("\n");
    return [
      `<li><a href="${chapterFile(s)}">${escapeXml(section.title)}</a>`,
      items ? `<ol>\n${items}\n</ol>` : "",
      "</li>"
    ]
      .filter(Boolean)
      .join("\n");
  });
  const body = [
    '<nav epub:type="toc" id="toc">',
    "<h1>Contents</h1>",
    "<ol>",
    `<li><a href="title.xhtml">${escapeXml(edition.title)}</a></li>`,
    ...sections,
    "</ol>",
    "</nav>"
  ].join("\n");
  return xhtmlDocument("Contents", body);
}

function tocNcx(edition: Edition): string {
  let order = 0;
  const point = (id: string, label: string, src: string, children = ""): string => {
    order += 1;
    return [
      `<navPoint id="${id}" playOrder="${order}">`,
      `<navLabel><text>${escapeXml(label)}</text></navLabel>`,
      `<content src="${src}"/>`,
      children,
      "</navPoint>"
    ]
      .filter(Boolean)
      .join("\n");
  };

  const points = [point("nav-title", edition.title, "title.xhtml")];
  edition.sections.forEach((section, s) => {
    // playOrder follows reading order: the section before its items
    order += 1;
    const sectionOrder = order;
    const children = section.items
      .map((item, i) => point(`nav-${s + 1}-${i + 1}`, item.title, `${chapterFile(s)}#${itemAnchor(i)}`))
      .join("\n");
    points.push(
      [
        `<navPoint id="nav-${s + 1}" playOrder="${sectionOrder}">`,
        `<navLabel><text>${escapeXml(section.title)}</text></navLabel>`,
        `<content src="${chapterFile(s)}"/>`,
        children,
        "</navPoint>"
      ]
        .filter(Boolean)
        .join("\n")
    );
  });

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">',
    "<head>",
    `<meta name="dtb:uid" content="${bookId(edition)}"/>`,
    '<meta name="dtb:depth" content="2"/>',
    "</head>",
    `<docTitle><text>${escapeXml(edition.title)}</text></docTitle>`,
    "<navMap>",
    ...points,
    "</navMap>",
    "</ncx>",
    ""
  ].join("\n");
}

function contentOpf(edition: Edition, images: ManifestImage[]): string {
  const chapters = edition.sections.map((_, s) => ({ id: `section-${s + 1}`, href: chapterFile(s) }));
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="book-id" xml:lang="en">',
    '<metadata xmlns:dc="http://purl.org/dc/elements/1.1/">',
    `<dc:identifier id="book-id">${bookId(edition)}</dc:identifier>`,
    `<dc:title>${escapeXml(`${edition.title} · ${edition.date}`)}</dc:title>`,
    "<dc:language>en</dc:language>",
    `<dc:date>${edition.date}</dc:date>`,
    `<meta property="dcterms:modified">${epubTimestamp(edition.generatedAt)}</meta>`,
    "</metadata>",
    "<manifest>",
    '<item id="nav" href="nav.xhtml" media-type="application/xhtml+xml" properties="nav"/>',
    '<item id="ncx" href="toc.ncx" media-type="application/x-dtbncx+xml"/>',
    '<item id="css" href="style.css" media-type="text/css"/>',
    '<item id="title" href="title.xhtml" media-type="application/xhtml+xml"/>',
    ...chapters.map((c) => `<item id="${c.id}" href="${c.href}" media-type="application/xhtml+xml"/>`),
    ...images.map((img) => `<item id="${img.id}" href="${img.href}" media-type="${img.mimeType}"/>`),
    "</manifest>",
    '<spine toc="ncx">',
    '<itemref idref="title"/>',
    ...chapters.map((c) => `<itemref idref="${c.id}"/>`),
    "</spine>",
    "</package>",
    ""
  ].join("\n");
}

const CONTAINER_XML = [
  '<?xml version="1.0" encoding="UTF-8"?>',
  '<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">',
  "<rootfiles>",
  '<rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>',
  "</rootfiles>",
  "</container>",
  ""
].join("\n");

/** Package entries in archive order; `mimetype` comes first and is stored. */
export async function buildEpubEntries(edition: Edition, ctx: RenderContext): Promise<EpubEntry[]> {
  const images = await collectImages(edition, ctx);
  ctx.signal?.throwIfAborted();

  const count = `${edition.itemCount} ${edition.itemCount === 1 ? "item" : "items"}`;
  const titlePage = xhtmlDocument(
    edition.title,
    [
      '<div class="title-page">',
      `<h1>${escapeXml(edition.title)}</h1>`,
      `<p>${escapeXml(formatUtc(edition.generatedAt))}</p>`,
      `<p>${count}</p>`,
      edition.itemCount === 0 ? "<p>No items in this edition.</p>" : "",
      "</div>"
    ]
      .filter(Boolean)
      .join("\n")
  );

  const chapters: EpubEntry[] = edition.sections.map((section, s) => ({
    name: `OEBPS/${chapterFile(s)}`,
    data: xhtmlDocument(
      section.title,
      [`<h1>${escapeXml(section.title)}</h1>`, ...section.items.map((item, i) => itemXhtml(item, i, images))].join("\n")
    )
  }));

  const manifestImages = [...images.values()];
  return [
    { name: "mimetype", data: "application/epub+zip", store: true },
    { name: "META-INF/container.xml", data: CONTAINER_XML },
    { name: "OEBPS/content.opf", data: contentOpf(edition, manifestImages) },
    { name: "OEBPS/nav.xhtml", data: navXhtml(edition) },
    { name: "OEBPS/toc.ncx", data: tocNcx(edition) },
    { name: "OEBPS/style.css", data: STYLE },
    { name: "OEBPS/title.xhtml", data: titlePage },
    ...chapters,
    ...manifestImages.map((img) => ({ name: `OEBPS/${img.href}`, data: img.bytes, store: true }))
  ];
}

/** Zips `entries` in order; every entry carries `date` so equal input gives equal bytes. */
export function zipEntries(entries: EpubEntry[], date: Date): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const archive = archiver("zip", { zlib: { level: 9 } });
    const chunks: Buffer[] = [];

    archive.on("data", (chunk: Buffer) => chunks.push(chunk));
    archive.on("end", () => resolve(Buffer.concat(chunks)));
    archive.on("error", reject);
    archive.on("warning", reject);

    for (const entry of entries) {
      archive.append(entry.data, { name: entry.name, date, store: entry.store ?? false });
    }
    archive.finalize().catch(reject);
  });
}

export async function renderEpub(edition: Edition, ctx: RenderContext): Promise<Buffer> {
  const entries = await buildEpubEntries(edition, ctx);
  ctx.signal?.throwIfAborted();
  const time = Date.parse(edition.generatedAt);
  return await zipEntries(entries, new Date(Number.isFinite(time) ? time : 0));
}

export const epubRenderer: Renderer = {
  format: "epub",
  extension: "epub",
  render: renderEpub
};
