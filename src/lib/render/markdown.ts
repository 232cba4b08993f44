import TurndownService from "turndown";
import { bylineParts, formatUtc } from "../format";
import type { Edition, Item } from "../types";
import type { Renderer } from "./types";

export function createTurndown(): TurndownService {
  const service = new TurndownService({
    headingStyle: "atx",
    codeBlockStyle: "fenced",
    bulletListMarker: "-",
    hr: "---"
  });
  service.remove(["script", "style", "iframe"]);
  // item bodies live under a level-3 heading
  service.addRule("demoteHeadings", {
    filter: ["h1", "h2", "h3"],
    replacement: (content) => `\n\n#### ${content.trim()}\n\n`
  });
  return service;
}

function markdownUrl(url: string): string {
  return url.replace(/ /g, "%20").replace(/\(/g, "%28").replace(/\)/g, "%29");
}

function itemMarkdown(item: Item, td: TurndownService): string {
  const title = td.escape(item.title);
  const lines: string[] = [item.url ? `### [${title}](${markdownUrl(item.url)})` : `### ${title}`, ""];

  const byline = bylineParts(item).map((p) => td.escape(p));
  const discussion = item.metadata.discussionUrl;
  if (typeof discussion === "string" && discussion !== item.url) byline.push(`[discussion](${markdownUrl(discussion)})`);
  if (byline.length > 0) lines.push(`*${byline.join(" · ")}*`, "");

  const body = item.contentHtml ? td.turndown(item.contentHtml).trim() : "";
  if (body) lines.push(body, "");
  else if (item.summary) lines.push(td.escape(item.summary), "");
  return lines.join("\n");
}

export function renderMarkdown(edition: Edition): string {
  const td = createTurndown();
  const lines: string[] = [
    `# ${td.escape(edition.title)}`,
    "",
    `*${formatUtc(edition.generatedAt)} · ${edition.itemCount} ${edition.itemCount === 1 ? "item" : "items"}*`,
    ""
  ];

  if (edition.itemCount === 0) {
    lines.push("No items in this edition.", "");
  } else {
    lines.push("## Contents", "");
    for (const section of edition.sections) {
      lines.push(`- ${td.escape(section.title)} (${section.items.length})`);
      for (const item of section.items) lines.push(`  - ${td.escape(item.title)}`);
    }
    lines.push("");
  }

  for (const section of edition.sections) {
    lines.push("---", "", `## ${td.escape(section.title)}`, "");
    for (const item of section.items) lines.push(itemMarkdown(item, td), "");
  }

  return `${lines.join("\n").replace(/\n{3,}/g, "\n\n").trim()}\n`;
}

export const markdownRenderer: Renderer = {
  format: "markdown",
  extension: "md",
  render: async (edition) => renderMarkdown(edition)
};
