import * as cheerio from "cheerio";
import { bylineParts, formatUtc } from "../format";
import type { Edition, Item } from "../types";
import type { Renderer } from "./types";

/** The parts of a parsed DOM node the walker reads. */
type DomNode = {
  readonly type: string;
  readonly name?: string;
  readonly data?: string;
  readonly attribs?: Record<string, string>;
  readonly children?: readonly DomNode[];
};

const SKIPPED = new Set(["script", "style", "iframe", "noscript", "template", "head", "svg", "object", "embed"]);
const HEADINGS: Record<string, string> = { h1: "#", h2: "##", h3: "###", h4: "###", h5: "###", h6: "###" };

function oneLine(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Link lines end the target at the first whitespace, so it must carry none. */
function linkTarget(url: string): string {
  try {
    return new URL(url.trim()).toString();
  } catch {
    return url.trim().replace(/\s/g, "%20");
  }
}

function linkLine(url: string, label: string): string {
  const target = linkTarget(url);
  const clean = oneLine(label);
  return clean && clean !== target ? `=> ${target} ${clean}` : `=> ${target}`;
}

function isLinkable(href: string | undefined): href is string {
  if (!href) return false;
  return /^(https?|gemini):\/\//i.test(href) || href.startsWith("images/");
}

function textContent(node: DomNode): string {
  if (node.type === "text") return node.data ?? "";
  if (node.name && SKIPPED.has(node.name)) return "";
  return (node.children ?? []).map(textContent).join("");
}

class GemtextWriter {
  readonly lines: string[] = [];
  private inline = "";
  private pendingLinks: string[] = [];

  /** Ends the running paragraph and emits the links it collected. */
  flush(): void {
    const text = oneLine(this.inline);
    this.inline = "";
    if (text) this.block([text]);
    if (this.pendingLinks.length > 0) {
      this.block(this.pendingLinks);
      this.pendingLinks = [];
    }
  }

  block(lines: string[]): void {
    if (lines.length === 0) return;
    if (this.lines.length > 0 && this.lines[this.lines.length - 1] !== "") this.lines.push("");
    this.lines.push(...lines);
  }

  walk(node: DomNode): void {
    if (node.type === "text") {
      this.inline += node.data ?? "";
      return;
    }
    if (node.type !== "tag" && node.type !== "root") return;
    const name = node.name ?? "";
    if (SKIPPED.has(name)) return;
    const children = node.children ?? [];

    const heading = HEADINGS[name];
    if (heading) {
      this.flush();
      const text = oneLine(textContent(node));
      if (text) this.block([`${heading} ${text}`]);
      this.collectLinks(children);
      this.flush();
      return;
    }

    switch (name) {
      case "a": {
        const href = node.attribs?.href;
        const before = this.inline.length;
        children.forEach((c) => this.walk(c));
        if (isLinkable(href)) this.pendingLinks.push(linkLine(href, this.inline.slice(before) || href));
        return;
      }
      case "img": {
        const src = node.attribs?.src;
        if (isLinkable(src)) this.pendingLinks.push(linkLine(src, node.attribs?.alt || "Image"));
        return;
      }
      case "br":
        this.inline += "\n";
        this.flushLinesOnly();
        return;
      case "hr":
        this.flush();
        return;
      case "pre": {
        this.flush();
        const raw = textContent(node).replace(/^\n+|\s+$/g, "");
        if (raw) this.block(["```", ...raw.split("\n").map((l) => (l.startsWith("```") ? ` ${l}` : l)), "```"]);
        return;
      }
      case "blockquote": {
        this.flush();
        const inner = new GemtextWriter();
        children.forEach((c) => inner.walk(c));
        inner.flush();
        const quoted = inner.lines.filter((l) => l !== "" && !l.startsWith("=>") && l !== "```");
        const links = inner.lines.filter((l) => l.startsWith("=>"));
        this.block(quoted.map((l) => `> ${l.replace(/^(> |\* |#+ )/, "")}`));
        this.block(links);
        return;
      }
      case "ul":
      case "ol": {
        this.flush();
        const items: string[] = [];
        const links: string[] = [];
        this.listItems(node, items, links);
        this.block(items);
        this.block(links);
        return;
      }
      case "p":
      case "div":
      case "section":
      case "article":
      case "figure":
      case "figcaption":
      case "header":
      case "footer":
      case "main":
      case "aside":
      case "details":
      case "summary":
      case "table":
      case "tr":
      case "dl":
      case "dt":
      case "dd":
        this.flush();
        children.forEach((c) => this.walk(c));
        this.flush();
        return;
      case "td":
      case "th":
        children.forEach((c) => this.walk(c));
        this.inline += " ";
        return;
      default:
        children.forEach((c) => this.walk(c));
    }
  }

  private flushLinesOnly(): void {
    const parts = this.inline.split("\n");
    this.inline = parts.pop() ?? "";
    const lines = parts.map(oneLine).filter(Boolean);
    if (lines.length > 0) this.block(lines);
  }

  private collectLinks(children: readonly DomNode[]): void {
    for (const child of children) {
      if (child.name === "a" && isLinkable(child.attribs?.href)) {
        this.pendingLinks.push(linkLine(child.attribs?.href ?? "", textContent(child)));
      } else if (child.name === "img" && isLinkable(child.attribs?.src)) {
        this.pendingLinks.push(linkLine(child.attribs?.src ?? "", child.attribs?.alt || "Image"));
      } else if (child.children) {
        this.collectLinks(child.children);
      }
    }
  }

  private listItems(list: DomNode, items: string[], links: string[]): void {
    for (const li of list.children ?? []) {
      if (li.name !== "li") continue;
      const inner = new GemtextWriter();
      for (const child of li.children ?? []) {
        if (child.name === "ul" || child.name === "ol") this.listItems(child, items, links);
        else inner.walk(child);
      }
      inner.flush();
      const text = oneLine(inner.lines.filter((l) => l && !l.startsWith("=>") && l !== "```").join(" "));
      if (text) items.push(`* ${text.replace(/^(> |\* |#+ )/, "")}`);
      links.push(...inner.lines.filter((l) => l.startsWith("=>")));
    }
  }
}

/** Converts an HTML fragment to gemtext lines; all markup is dropped. */
export function htmlToGemtext(html: string): string {
  if (!html.trim()) return "";
  const $ = cheerio.load(html, null, false);
  const nodes: DomNode[] = $.root().contents().toArray();
  const writer = new GemtextWriter();
  nodes.forEach((n) => writer.walk(n));
  writer.flush();
  return writer.lines.join("\n").replace(/\n{3,}/g, "\n\n").trim();
}

function itemGemtext(item: Item): string {
  const lines: string[] = [`### ${oneLine(item.title)}`];
  const byline = bylineParts(item);
  if (byline.length > 0) lines.push(byline.join(" · "));
  if (item.url) lines.push(linkLine(item.url, "Original link"));
  const discussion = item.metadata.discussionUrl;
  if (typeof discussion === "string" && discussion !== item.url) lines.push(linkLine(discussion, "Discussion"));
  lines.push("");

  const body = htmlToGemtext(item.contentHtml);
  lines.push(body || oneLine(item.summary));
  return lines.join("\n").trim();
}

export function renderGemtext(edition: Edition): string {
  const blocks: string[] = [
    `# ${oneLine(edition.title)}`,
    `${formatUtc(edition.generatedAt)} · ${edition.itemCount} ${edition.itemCount === 1 ? "item" : "items"}`
  ];

  if (edition.itemCount === 0) blocks.push("No items in this edition.");

  for (const section of edition.sections) {
    blocks.push(`## ${oneLine(section.title)}`);
    for (const item of section.items) blocks.push(itemGemtext(item));
  }

  return `${blocks.join("\n\n").replace(/\n{3,}/g, "\n\n")}\n`;
}

export const gemtextRenderer: Renderer = {
  format: "gemtext",
  extension: "gmi",
  render: async (edition) => renderGemtext(edition)
};
